/**
 * CLI list command - show installable hooks and profiles.
 * @module cli/commands/list
 */

import type { CAC } from "cac";
import { HOOKS, PROFILES } from "../../catalog.js";
import { formatHookList, output } from "../utils/index.js";

interface ListOptions {
  json?: boolean;
}

/**
 * Register the list command.
 */
export function registerListCommand(cli: CAC): void {
  cli
    .command("list", "List available hooks and profiles")
    .option("--json", "Output as JSON")
    .action((options: ListOptions) => {
      output({ hooks: [...HOOKS], profiles: { ...PROFILES } }, formatHookList, {
        json: options.json === true,
      });
    });
}
