/**
 * PostToolUse hook - format edited files with Black.
 * @module hooks/format
 */

import type { CAC } from "cac";
import { readStdin, resolveFilesContext } from "./context.js";
import { runFileFormat } from "./runner.js";
import {
  prepareHook,
  reportHookError,
  reportOutcome,
  type HookCommandOptions,
} from "./shared.js";

/**
 * Register the format hook command.
 *
 * Paths come from the arguments, $CLAUDE_FILE_PATHS or the stdin
 * payload. The formatter is called once even with no paths.
 */
export function registerFormatCommand(cli: CAC): void {
  cli
    .command("format [...paths]", "Format edited files with Black (hook)")
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

          const outcome = await runFileFormat(context.paths, deps);
          reportOutcome(outcome, verbose);
        } catch (error) {
          reportHookError("format", error, options.verbose === true);
        }

        process.exit(0);
      },
    );
}
