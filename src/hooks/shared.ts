/**
 * Plumbing shared by the hook commands.
 * @module hooks/shared
 */

import { getDefaultConfig, isDebugEnv, loadConfig } from "../config.js";
import { formatOutcome, info } from "../cli/utils/output.js";
import type { HookOutcome, ToolhooksConfig } from "../types.js";
import { createDefaultDeps, type HookRunnerDeps } from "./runner.js";

/**
 * Options every hook command accepts.
 */
export interface HookCommandOptions {
  cwd?: string;
  verbose?: boolean;
}

/**
 * Load config for a hook. A broken config file must not break the
 * hook, so errors fall back to the defaults.
 */
export async function loadHookConfig(
  projectPath: string,
  verbose: boolean,
): Promise<ToolhooksConfig> {
  try {
    return await loadConfig(projectPath);
  } catch (error) {
    if (verbose || isDebugEnv()) {
      info(
        `toolhooks: using default config (${error instanceof Error ? error.message : String(error)})`,
      );
    }
    return getDefaultConfig();
  }
}

/**
 * Resolve config and runner dependencies for a hook command.
 */
export async function prepareHook(
  options: HookCommandOptions,
): Promise<{ deps: HookRunnerDeps; verbose: boolean }> {
  const projectPath = options.cwd ?? process.cwd();
  const config = await loadHookConfig(projectPath, options.verbose === true);
  const verbose = options.verbose === true || config.debug === true;
  return {
    deps: createDefaultDeps(config, options.cwd),
    verbose,
  };
}

/**
 * Log an outcome to stderr in verbose mode, relaying the tool's own
 * stderr when it failed. Stdout is left untouched for the host.
 */
export function reportOutcome(outcome: HookOutcome, verbose: boolean): void {
  if (!verbose) return;

  info(formatOutcome(outcome));
  const stderr = outcome.result?.stderr.trim();
  if (outcome.status === "failed" && stderr) {
    info(stderr);
  }
}

/**
 * Log an unexpected hook error in verbose mode.
 */
export function reportHookError(
  hook: string,
  error: unknown,
  verbose: boolean,
): void {
  if (!verbose && !isDebugEnv()) return;
  info(
    `${hook} warning: ${error instanceof Error ? error.message : String(error)}`,
  );
}
