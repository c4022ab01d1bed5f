/**
 * Hook exports.
 * @module hooks
 */

export { registerPrecommitCommand } from "./precommit.js";
export { registerFormatCommand } from "./format.js";
export { registerLintCommand } from "./lint.js";
export {
  bestEffort,
  buildFormatInvocation,
  buildLintInvocation,
  buildPrecommitInvocation,
  createDefaultDeps,
  runCommitGuard,
  runFileFormat,
  runFileLint,
} from "./runner.js";
export type { HookRunnerDeps } from "./runner.js";
export { isGitSubcommand, splitCommands } from "./command-match.js";
export {
  parseHookPayload,
  parseToolInput,
  readStdin,
  resolveCommandContext,
  resolveFilesContext,
  splitPaths,
} from "./context.js";
export type { ContextSources, HookPayload } from "./context.js";
