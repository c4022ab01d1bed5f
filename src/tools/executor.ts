/**
 * Low-level external tool executor.
 * @module tools/executor
 */

import { spawn } from "node:child_process";
import { ToolError, fromSpawnError } from "../errors.js";
import type { ToolInvocation, ToolResult } from "../types.js";

/**
 * Runs one external binary and collects its output.
 *
 * Handles:
 * - Spawning without a shell (arguments are never re-parsed)
 * - Optional timeout
 * - Mapping spawn failures to typed ToolErrors
 *
 * A non-zero exit code is not an error here: it is returned in the
 * result and left to the caller.
 *
 * @example
 * ```typescript
 * const executor = new ToolExecutor();
 * const result = await executor.run({
 *   command: "ruff",
 *   args: ["check", "--fix", "src/app.py"],
 * });
 * console.log(result.exitCode);
 * ```
 */
export class ToolExecutor {
  /**
   * Check if a tool is installed and answers `--version`.
   */
  async checkAvailable(command: string): Promise<boolean> {
    return new Promise((resolve) => {
      const proc = spawn(command, ["--version"], {
        stdio: ["ignore", "pipe", "pipe"],
      });

      const timer = setTimeout(() => {
        proc.kill("SIGTERM");
        resolve(false);
      }, 5000);

      proc.on("error", () => {
        clearTimeout(timer);
        resolve(false);
      });

      proc.on("close", (code) => {
        clearTimeout(timer);
        resolve(code === 0);
      });
    });
  }

  /**
   * Run a tool to completion.
   *
   * @throws {ToolError} If the tool is missing, cannot start, or times out
   */
  run(invocation: ToolInvocation): Promise<ToolResult> {
    const { command, args, cwd, timeout = 0 } = invocation;

    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: cwd ?? process.cwd(),
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;

      let timeoutId: ReturnType<typeof setTimeout> | undefined;
      if (timeout > 0) {
        timeoutId = setTimeout(() => {
          timedOut = true;
          proc.kill("SIGTERM");
        }, timeout);
      }

      proc.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on("error", (error: Error) => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        reject(fromSpawnError(command, error));
      });

      proc.on("close", (code: number | null) => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }

        if (timedOut) {
          reject(
            new ToolError(
              `${command} timed out after ${timeout}ms`,
              "TIMEOUT",
              command,
              { isRetryable: true },
            ),
          );
          return;
        }

        // Killed by a signal: no exit code
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  }
}
