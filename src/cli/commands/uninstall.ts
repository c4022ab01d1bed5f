/**
 * CLI uninstall command - remove toolhooks entries from a project.
 * @module cli/commands/uninstall
 */

import { resolve } from "node:path";
import type { CAC } from "cac";
import { uninstallHooks } from "../../settings.js";
import {
  CLIError,
  ExitCode,
  formatUninstallResult,
  handleError,
  output,
} from "../utils/index.js";

interface UninstallOptions {
  target?: string;
  json?: boolean;
}

/**
 * Register the uninstall command.
 */
export function registerUninstallCommand(cli: CAC): void {
  cli
    .command("uninstall", "Remove toolhooks entries from a project")
    .option("--target <path>", "Project directory (default: current directory)")
    .option("--json", "Output as JSON")
    .action(async (options: UninstallOptions) => {
      const target = resolve(options.target ?? process.cwd());

      try {
        const result = await uninstallHooks(target);
        output(result, formatUninstallResult, { json: options.json === true });
      } catch (error) {
        handleError(CLIError.from(error, ExitCode.SETTINGS_ERROR), {
          json: options.json === true,
        });
      }
    });
}
