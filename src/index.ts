/**
 * toolhooks - best-effort formatter, linter and pre-commit hooks for
 * editor and agent lifecycle events.
 *
 * @example
 * ```typescript
 * import { createDefaultDeps, loadConfig, runCommitGuard } from "toolhooks";
 *
 * const deps = createDefaultDeps(await loadConfig());
 * const outcome = await runCommitGuard('git commit -m "wip"', deps);
 * // outcome.status is "skipped", "ran" or "failed"; it never throws
 * ```
 *
 * @packageDocumentation
 */

// Hook runner
export {
  bestEffort,
  buildFormatInvocation,
  buildLintInvocation,
  buildPrecommitInvocation,
  createDefaultDeps,
  runCommitGuard,
  runFileFormat,
  runFileLint,
} from "./hooks/runner.js";
export type { HookRunnerDeps } from "./hooks/runner.js";

// Trigger context & commit detection
export {
  parseHookPayload,
  parseToolInput,
  resolveCommandContext,
  resolveFilesContext,
  splitPaths,
} from "./hooks/context.js";
export type { ContextSources, HookPayload } from "./hooks/context.js";
export { isGitSubcommand, splitCommands } from "./hooks/command-match.js";

// External tools
export { ToolExecutor, listStagedFiles } from "./tools/index.js";
export { ToolError, ToolErrorCode } from "./errors.js";

// Configuration
export { loadConfig, getDefaultConfig, RC_FILENAME } from "./config.js";
export type { PartialConfig } from "./config.js";

// Catalog & settings
export { HOOKS, PROFILES, selectHooks, hookCommand } from "./catalog.js";
export {
  buildHookSettings,
  mergeSettings,
  removeHookSettings,
  installHooks,
  uninstallHooks,
  readSettings,
  getSettingsPath,
} from "./settings.js";

export type {
  CommandContext,
  FilesContext,
  HookContext,
  HookDefinition,
  HookEvent,
  HookName,
  HookOutcome,
  HookProfile,
  HostSettings,
  MatcherGroup,
  ToolInvocation,
  ToolResult,
  ToolhooksConfig,
} from "./types.js";
