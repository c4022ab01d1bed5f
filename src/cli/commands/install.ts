/**
 * CLI install command - add hooks to a project's settings.
 * @module cli/commands/install
 */

import { resolve } from "node:path";
import type { CAC } from "cac";
import { PROFILES, UnknownProfileError } from "../../catalog.js";
import { installHooks } from "../../settings.js";
import {
  CLIError,
  ExitCode,
  formatInstallResult,
  handleError,
  info,
  output,
} from "../utils/index.js";

interface InstallOptions {
  profile?: string;
  target?: string;
  json?: boolean;
}

/**
 * Register the install command.
 *
 * Writes hook entries into <target>/.claude/settings.local.json,
 * merging with whatever is already there.
 */
export function registerInstallCommand(cli: CAC): void {
  cli
    .command("install [...hooks]", "Install hooks into a project")
    .option("--profile <name>", `Hook profile (${Object.keys(PROFILES).join(", ")})`)
    .option("--target <path>", "Project directory (default: current directory)")
    .option("--json", "Output as JSON")
    .example("toolhooks install --profile python")
    .example("toolhooks install precommit ruff --target ../api")
    .action(async (ids: Array<string | number>, options: InstallOptions) => {
      const target = resolve(options.target ?? process.cwd());

      try {
        const selection: { ids?: string[]; profile?: string } = {
          ids: ids.map(String),
        };
        if (options.profile !== undefined) {
          selection.profile = String(options.profile);
        }

        const result = await installHooks(target, selection);
        output(result, formatInstallResult, { json: options.json === true });

        if (result.installed.length > 0) {
          info("Restart your editor session to pick up the new hooks", {
            json: options.json === true,
          });
        }
      } catch (error) {
        const cliError =
          error instanceof UnknownProfileError
            ? new CLIError(
                error.message,
                ExitCode.CONFIG_ERROR,
                `Available profiles: ${Object.keys(PROFILES).join(", ")}`,
              )
            : new CLIError(
                error instanceof Error ? error.message : String(error),
                ExitCode.SETTINGS_ERROR,
                "Fix or remove the settings file and run install again",
              );
        handleError(cliError, { json: options.json === true });
      }
    });
}
