/**
 * PreToolUse hook - run pre-commit on staged files before git commit.
 * @module hooks/precommit
 */

import type { CAC } from "cac";
import { readStdin, resolveCommandContext, type ContextSources } from "./context.js";
import { runCommitGuard } from "./runner.js";
import {
  prepareHook,
  reportHookError,
  reportOutcome,
  type HookCommandOptions,
} from "./shared.js";

interface PrecommitOptions extends HookCommandOptions {
  command?: string | number;
}

/**
 * Register the precommit hook command.
 *
 * Called by the host before a shell command runs. When the command is a
 * `git commit` and files are staged, runs the aggregator on them.
 *
 * IMPORTANT: This command must:
 * - Write nothing to stdout
 * - NEVER fail (always exit 0)
 */
export function registerPrecommitCommand(cli: CAC): void {
  cli
    .command("precommit", "Run pre-commit on staged files before git commit (hook)")
    .option(
      "--command <cmd>",
      "Shell command about to run (default: $CLAUDE_TOOL_INPUT or stdin payload)",
    )
    .option("--cwd <path>", "Repository directory (default: payload cwd or current directory)")
    .option("--verbose", "Log the hook outcome to stderr")
    .action(async (options: PrecommitOptions) => {
      const verboseFlag = options.verbose === true;

      try {
        const sources: ContextSources = { readStdin: () => readStdin() };
        if (options.command !== undefined) {
          sources.command = String(options.command);
        }
        const context = await resolveCommandContext(sources);

        const { deps, verbose } = await prepareHook({
          ...options,
          cwd: options.cwd ?? context.cwd,
        });

        const outcome = await runCommitGuard(context.command, deps);
        reportOutcome(outcome, verbose);
      } catch (error) {
        reportHookError("precommit", error, verboseFlag);
      }

      // Always exit 0 to not block the host
      process.exit(0);
    });
}
