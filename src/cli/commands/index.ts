/**
 * CLI command exports.
 * @module cli/commands
 */

export { registerListCommand } from "./list.js";
export { registerInstallCommand } from "./install.js";
export { registerUninstallCommand } from "./uninstall.js";
