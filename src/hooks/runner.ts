/**
 * Hook runner: decide whether a hook applies and invoke one tool.
 * @module hooks/runner
 *
 * Every variant is best-effort. Whatever the tool does (missing binary,
 * non-zero exit, timeout) the variant resolves with a HookOutcome and
 * never rejects, so the host process is never blocked by a hook.
 */

import { getDefaultConfig } from "../config.js";
import { ToolError } from "../errors.js";
import { ToolExecutor } from "../tools/executor.js";
import { listStagedFiles } from "../tools/git.js";
import type {
  HookName,
  HookOutcome,
  ToolInvocation,
  ToolResult,
  ToolhooksConfig,
} from "../types.js";
import { isGitSubcommand } from "./command-match.js";

/**
 * Collaborators the runner needs. Passed explicitly so hooks can be
 * exercised without spawning processes.
 */
export interface HookRunnerDeps {
  /** Runs the external tool */
  run: (invocation: ToolInvocation) => Promise<ToolResult>;
  /** Lists staged paths for the commit guard */
  listStagedFiles: (cwd?: string) => Promise<string[]>;
  config: ToolhooksConfig;
  /** Working directory for git and the tools */
  cwd?: string;
}

/**
 * Build the production dependencies.
 */
export function createDefaultDeps(
  config: ToolhooksConfig = getDefaultConfig(),
  cwd?: string,
): HookRunnerDeps {
  const executor = new ToolExecutor();
  const deps: HookRunnerDeps = {
    run: (invocation) => executor.run(invocation),
    listStagedFiles,
    config,
  };
  if (cwd !== undefined) {
    deps.cwd = cwd;
  }
  return deps;
}

// ============================================
// Best-effort wrapper
// ============================================

/**
 * Run a hook body, mapping any thrown error to a failed outcome.
 */
export async function bestEffort(
  hook: HookName,
  body: () => Promise<HookOutcome>,
): Promise<HookOutcome> {
  try {
    return await body();
  } catch (error) {
    return {
      hook,
      status: "failed",
      reason: describeError(error),
    };
  }
}

/**
 * @internal
 */
function describeError(error: unknown): string {
  if (ToolError.isToolError(error)) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Invoke one tool, turning exit status into an outcome.
 * @internal
 */
async function invoke(
  hook: HookName,
  invocation: ToolInvocation,
  deps: HookRunnerDeps,
): Promise<HookOutcome> {
  try {
    const result = await deps.run(invocation);
    return {
      hook,
      status: result.exitCode === 0 ? "ran" : "failed",
      invocation,
      result,
    };
  } catch (error) {
    return {
      hook,
      status: "failed",
      reason: describeError(error),
      invocation,
    };
  }
}

/**
 * Fill in cwd and timeout from the runner deps.
 * @internal
 */
function withRuntime(
  command: string,
  args: string[],
  deps: HookRunnerDeps,
): ToolInvocation {
  const invocation: ToolInvocation = { command, args };
  if (deps.cwd !== undefined) {
    invocation.cwd = deps.cwd;
  }
  if (deps.config.timeout > 0) {
    invocation.timeout = deps.config.timeout;
  }
  return invocation;
}

// ============================================
// Invocation builders
// ============================================

export function buildPrecommitInvocation(
  paths: string[],
  deps: HookRunnerDeps,
): ToolInvocation {
  const { command, args } = deps.config.precommit;
  return withRuntime(command, [...args, "--files", ...paths], deps);
}

export function buildFormatInvocation(
  paths: string[],
  deps: HookRunnerDeps,
): ToolInvocation {
  const { command, args, lineLength } = deps.config.format;
  return withRuntime(
    command,
    [...args, "--line-length", String(lineLength), ...paths],
    deps,
  );
}

export function buildLintInvocation(
  paths: string[],
  deps: HookRunnerDeps,
): ToolInvocation {
  const { command, args } = deps.config.lint;
  return withRuntime(command, [...args, ...paths], deps);
}

// ============================================
// Variants
// ============================================

/**
 * Commit guard: run the aggregator on staged files before a commit.
 *
 * Does nothing unless the command runs `git commit` and something is
 * staged.
 */
export function runCommitGuard(
  command: string,
  deps: HookRunnerDeps,
): Promise<HookOutcome> {
  return bestEffort("precommit", async () => {
    if (!isGitSubcommand(command, deps.config.commitSubcommand)) {
      return { hook: "precommit", status: "skipped", reason: "not a commit" };
    }

    let staged: string[];
    try {
      staged = await deps.listStagedFiles(deps.cwd);
    } catch (error) {
      return {
        hook: "precommit",
        status: "skipped",
        reason: describeError(error),
      };
    }

    if (staged.length === 0) {
      return {
        hook: "precommit",
        status: "skipped",
        reason: "no staged files",
      };
    }

    return invoke("precommit", buildPrecommitInvocation(staged, deps), deps);
  });
}

/**
 * Format the given paths. Always attempts one formatter call, even for
 * an empty list.
 */
export function runFileFormat(
  paths: string[],
  deps: HookRunnerDeps,
): Promise<HookOutcome> {
  return bestEffort("format", () =>
    invoke("format", buildFormatInvocation(paths, deps), deps),
  );
}

/**
 * Lint and auto-fix the given paths. Always attempts one linter call,
 * even for an empty list.
 */
export function runFileLint(
  paths: string[],
  deps: HookRunnerDeps,
): Promise<HookOutcome> {
  return bestEffort("lint", () =>
    invoke("lint", buildLintInvocation(paths, deps), deps),
  );
}
