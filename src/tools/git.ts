/**
 * git queries used by the commit guard.
 * @module tools/git
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ToolError } from "../errors.js";

const execFileAsync = promisify(execFile);

/**
 * List paths staged for the next commit.
 *
 * @param cwd - Repository directory (default: current directory)
 * Uses `-z` so names come back unquoted and byte-for-byte, including
 * non-ASCII characters and surrounding spaces.
 *
 * @returns Staged paths in git's order, empty when nothing is staged
 * @throws {ToolError} If git is missing or cwd is not a repository
 */
export async function listStagedFiles(
  cwd: string = process.cwd(),
): Promise<string[]> {
  try {
    const { stdout } = await execFileAsync(
      "git",
      ["diff", "--cached", "--name-only", "-z"],
      { cwd, maxBuffer: 10 * 1024 * 1024 },
    );
    return parseNameOnly(stdout);
  } catch (error) {
    throw new ToolError(
      `git diff --cached failed: ${error instanceof Error ? error.message : String(error)}`,
      "GIT_FAILED",
      "git",
      error instanceof Error ? { cause: error } : {},
    );
  }
}

/**
 * Split NUL-terminated `--name-only -z` output into paths.
 * @internal
 */
export function parseNameOnly(output: string): string[] {
  return output.split("\0").filter((path) => path.length > 0);
}
