/**
 * Errors raised while invoking external tools.
 * @module errors
 */

// ============================================
// Error Codes
// ============================================

/**
 * Error codes for ToolError.
 */
export const ToolErrorCode = {
  /** Binary not found on PATH */
  TOOL_NOT_FOUND: "TOOL_NOT_FOUND",
  /** Process could not be started */
  SPAWN_FAILED: "SPAWN_FAILED",
  /** Process killed after the configured timeout */
  TIMEOUT: "TIMEOUT",
  /** git query failed (not a repository, git missing, ...) */
  GIT_FAILED: "GIT_FAILED",
} as const;

export type ToolErrorCode = (typeof ToolErrorCode)[keyof typeof ToolErrorCode];

// ============================================
// Error Class
// ============================================

/**
 * Error class for external tool invocations.
 *
 * Hooks never let this escape; it is mapped to a skipped or failed
 * outcome by the runner.
 *
 * @example
 * ```typescript
 * try {
 *   await executor.run({ command: "black", args: ["x.py"] });
 * } catch (error) {
 *   if (ToolError.isToolError(error) && error.isNotFound) {
 *     console.error(`${error.tool} is not installed`);
 *   }
 * }
 * ```
 */
export class ToolError extends Error {
  /** Error code for programmatic handling */
  readonly code: ToolErrorCode;

  /** Tool that failed */
  readonly tool: string;

  /** Whether running the tool again could succeed */
  readonly isRetryable: boolean;

  constructor(
    message: string,
    code: ToolErrorCode,
    tool: string,
    options: {
      cause?: Error;
      isRetryable?: boolean;
    } = {},
  ) {
    super(message, { cause: options.cause });

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "ToolError";
    this.code = code;
    this.tool = tool;
    this.isRetryable = options.isRetryable ?? false;
  }

  /**
   * Type guard to check if an error is a ToolError.
   */
  static isToolError(error: unknown): error is ToolError {
    return error instanceof ToolError;
  }

  /** Check if the binary is not installed */
  get isNotFound(): boolean {
    return this.code === "TOOL_NOT_FOUND";
  }

  /** Check if this is a timeout error */
  get isTimeout(): boolean {
    return this.code === "TIMEOUT";
  }
}

/**
 * Build a ToolError from a spawn error (ENOENT, EACCES, ...).
 * @internal
 */
export function fromSpawnError(tool: string, error: Error): ToolError {
  const errno = "code" in error ? error.code : undefined;
  if (errno === "ENOENT") {
    return new ToolError(`${tool} not found on PATH`, "TOOL_NOT_FOUND", tool, {
      cause: error,
    });
  }
  return new ToolError(
    `${tool} could not be started: ${error.message}`,
    "SPAWN_FAILED",
    tool,
    { cause: error },
  );
}
