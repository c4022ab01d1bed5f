/**
 * PostToolUse hook - lint and auto-fix edited files with Ruff.
 * @module hooks/lint
 */

import type { CAC } from "cac";
import { readStdin, resolveFilesContext } from "./context.js";
import { runFileLint } from "./runner.js";
import {
  prepareHook,
  reportHookError,
  reportOutcome,
  type HookCommandOptions,
} from "./shared.js";

export function registerLintCommand(cli: CAC): void {
  cli
    .command("lint [...paths]", "Lint and auto-fix edited files with Ruff (hook)")
    .option("--cwd <path>", "Working directory (default: payload cwd or current directory)")
    .option("--verbose", "Log the hook outcome to stderr")
    .action(
      async (paths: Array<string | number>, options: HookCommandOptions) => {
        try {
          const context = await resolveFilesContext({
            paths: paths.map(String),
            readStdin: () => readStdin(),
          });
          const { deps, verbose } = await prepareHook({
            ...options,
            cwd: options.cwd ?? context.cwd,
          });

          const outcome = await runFileLint(context.paths, deps);
          reportOutcome(outcome, verbose);
        } catch (error) {
          reportHookError("lint", error, options.verbose === true);
        }

        process.exit(0);
      },
    );
}
