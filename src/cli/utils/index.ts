/**
 * CLI utility exports.
 * @module cli/utils
 */

export { CLIError, ExitCode, formatError, handleError } from "./errors.js";

export {
  output,
  info,
  warn,
  formatOutcome,
  formatHookList,
  formatInstallResult,
  formatUninstallResult,
} from "./output.js";
export type { OutputOptions } from "./output.js";
