#!/usr/bin/env node
/**
 * CLI entry point for toolhooks.
 * @module cli
 */

import { cac, type CAC } from "cac";
import { handleError } from "./utils/index.js";
import {
  registerInstallCommand,
  registerListCommand,
  registerUninstallCommand,
} from "./commands/index.js";
import {
  registerFormatCommand,
  registerLintCommand,
  registerPrecommitCommand,
} from "../hooks/index.js";

const VERSION = "0.1.0";

/**
 * Create and configure the CLI.
 */
function createCLI(): CAC {
  const cli = cac("toolhooks");

  registerListCommand(cli);
  registerInstallCommand(cli);
  registerUninstallCommand(cli);

  // Hook commands
  registerPrecommitCommand(cli);
  registerFormatCommand(cli);
  registerLintCommand(cli);

  cli.help();
  cli.version(VERSION);

  return cli;
}

/**
 * Run the CLI.
 */
async function main(): Promise<void> {
  const cli = createCLI();

  try {
    cli.parse(process.argv, { run: false });
    await cli.runMatchedCommand();
  } catch (error) {
    handleError(error);
  }
}

main().catch((error: unknown) => {
  handleError(error);
});
