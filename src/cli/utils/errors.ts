/**
 * Errors and exit codes for the management commands.
 * @module cli/utils/errors
 *
 * Hook commands never come through here: they always exit 0.
 */

/**
 * Exit codes for list, install and uninstall.
 */
export const ExitCode = {
  GENERAL_ERROR: 1,
  /** Bad --profile or hook selection */
  CONFIG_ERROR: 2,
  /** Settings file unreadable, malformed or unwritable */
  SETTINGS_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * An error the CLI reports to the user, with the exit code to use and
 * an optional next step.
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ExitCode = ExitCode.GENERAL_ERROR,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = "CLIError";
  }

  /** Wrap anything thrown, keeping a CLIError as it is. */
  static from(error: unknown, code: ExitCode = ExitCode.GENERAL_ERROR): CLIError {
    if (error instanceof CLIError) return error;
    return new CLIError(error instanceof Error ? error.message : String(error), code);
  }
}

/**
 * Lines printed to stderr for an error: one JSON line in `--json` mode,
 * otherwise `Error:` and an optional `Hint:` line.
 */
export function formatError(error: CLIError, json = false): string[] {
  if (json) {
    return [
      JSON.stringify({ error: error.message, code: error.code, hint: error.hint }),
    ];
  }
  return error.hint
    ? [`Error: ${error.message}`, `Hint: ${error.hint}`]
    : [`Error: ${error.message}`];
}

/**
 * Print an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: { json?: boolean } = {},
): never {
  const cliError = CLIError.from(error);
  for (const line of formatError(cliError, options.json === true)) {
    console.error(line);
  }
  process.exit(cliError.code);
}
