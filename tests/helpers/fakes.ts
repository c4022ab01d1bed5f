/**
 * Fakes for hook runner tests.
 * @module tests/helpers/fakes
 */

import { vi, type Mock } from "vitest";
import { getDefaultConfig } from "../../src/config.js";
import type { HookRunnerDeps } from "../../src/hooks/runner.js";
import type { ToolInvocation, ToolResult } from "../../src/types.js";

export interface FakeDeps extends HookRunnerDeps {
  run: Mock<(invocation: ToolInvocation) => Promise<ToolResult>>;
  listStagedFiles: Mock<(cwd?: string) => Promise<string[]>>;
}

/**
 * Runner deps whose tool always exits 0 and with nothing staged.
 */
export function createFakeDeps(
  options: { staged?: string[]; exitCode?: number } = {},
): FakeDeps {
  return {
    run: vi.fn<(invocation: ToolInvocation) => Promise<ToolResult>>()
      .mockResolvedValue(createResult(options.exitCode ?? 0)),
    listStagedFiles: vi.fn<(cwd?: string) => Promise<string[]>>()
      .mockResolvedValue(options.staged ?? []),
    config: getDefaultConfig(),
  };
}

export function createResult(exitCode = 0, stderr = ""): ToolResult {
  return { exitCode, stdout: "", stderr };
}
