/**
 * Tests for ToolExecutor.
 * @module tests/unit/tools/executor
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { ChildProcess } from "node:child_process";
import { ToolExecutor } from "../../../src/tools/executor.js";
import { ToolError } from "../../../src/errors.js";

// Mock node:child_process
const mockSpawn = vi.fn();
vi.mock("node:child_process", () => ({
  spawn: (...args: unknown[]) => mockSpawn(...args),
}));

type MockChildProcess = ChildProcess & {
  emit: (event: string, ...args: unknown[]) => void;
};

/**
 * Create a mock ChildProcess with event emitter functionality.
 * stdout/stderr events are emitted as "stdout:data" / "stderr:data".
 */
function createMockChildProcess(): MockChildProcess {
  const listeners = new Map<string, Array<(...args: unknown[]) => void>>();

  const register =
    (prefix: string) =>
    (event: string, handler: (...args: unknown[]) => void) => {
      const key = `${prefix}${event}`;
      const list = listeners.get(key) || [];
      list.push(handler);
      listeners.set(key, list);
    };

  const mockProc = {
    stdout: { on: vi.fn(register("stdout:")) },
    stderr: { on: vi.fn(register("stderr:")) },
    on: vi.fn(register("")),
    kill: vi.fn(),
    emit: (event: string, ...args: unknown[]) => {
      const handlers = listeners.get(event) || [];
      handlers.forEach((handler) => handler(...args));
    },
  };

  return mockProc as unknown as MockChildProcess;
}

describe("ToolExecutor", () => {
  let executor: ToolExecutor;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    executor = new ToolExecutor();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("run()", () => {
    it("should spawn the tool without a shell and collect output", async () => {
      const mockProc = createMockChildProcess();
      mockSpawn.mockReturnValue(mockProc);

      const promise = executor.run({
        command: "black",
        args: ["--quiet", "x.py"],
        cwd: "/project",
      });

      mockProc.emit("stdout:data", Buffer.from("reformatted "));
      mockProc.emit("stdout:data", Buffer.from("x.py"));
      mockProc.emit("stderr:data", Buffer.from("warn"));
      mockProc.emit("close", 0);

      await expect(promise).resolves.toEqual({
        exitCode: 0,
        stdout: "reformatted x.py",
        stderr: "warn",
      });
      expect(mockSpawn).toHaveBeenCalledWith(
        "black",
        ["--quiet", "x.py"],
        expect.objectContaining({ cwd: "/project" }),
      );
      expect(mockSpawn.mock.calls[0]?.[2]).not.toHaveProperty("shell");
    });

    it("should resolve with a non-zero exit code", async () => {
      const mockProc = createMockChildProcess();
      mockSpawn.mockReturnValue(mockProc);

      const promise = executor.run({ command: "ruff", args: ["check"] });
      mockProc.emit("close", 2);

      await expect(promise).resolves.toEqual({
        exitCode: 2,
        stdout: "",
        stderr: "",
      });
    });

    it("should treat a signal exit as exit code 1", async () => {
      const mockProc = createMockChildProcess();
      mockSpawn.mockReturnValue(mockProc);

      const promise = executor.run({ command: "ruff", args: [] });
      mockProc.emit("close", null);

      const result = await promise;
      expect(result.exitCode).toBe(1);
    });

    it("should reject with TOOL_NOT_FOUND when the binary is missing", async () => {
      const mockProc = createMockChildProcess();
      mockSpawn.mockReturnValue(mockProc);

      const promise = executor.run({ command: "black", args: ["x.py"] });
      mockProc.emit(
        "error",
        Object.assign(new Error("spawn black ENOENT"), { code: "ENOENT" }),
      );

      const error = await promise.catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ToolError);
      expect(error).toMatchObject({
        code: "TOOL_NOT_FOUND",
        tool: "black",
        message: "black not found on PATH",
      });
    });

    it("should kill the process and reject on timeout", async () => {
      const mockProc = createMockChildProcess();
      mockSpawn.mockReturnValue(mockProc);

      const promise = executor.run({
        command: "pre-commit",
        args: ["run"],
        timeout: 1000,
      });

      vi.advanceTimersByTime(1000);
      expect(mockProc.kill).toHaveBeenCalledWith("SIGTERM");
      mockProc.emit("close", null);

      await expect(promise).rejects.toMatchObject({
        code: "TIMEOUT",
        message: "pre-commit timed out after 1000ms",
        isRetryable: true,
      });
    });

    it("should not time out without a timeout", async () => {
      const mockProc = createMockChildProcess();
      mockSpawn.mockReturnValue(mockProc);

      const promise = executor.run({ command: "black", args: [] });

      vi.advanceTimersByTime(600000);
      expect(mockProc.kill).not.toHaveBeenCalled();
      mockProc.emit("close", 0);

      await expect(promise).resolves.toMatchObject({ exitCode: 0 });
    });
  });

  describe("checkAvailable()", () => {
    it("should return true when --version succeeds", async () => {
      const mockProc = createMockChildProcess();
      mockSpawn.mockReturnValue(mockProc);

      const promise = executor.checkAvailable("ruff");
      mockProc.emit("close", 0);

      await expect(promise).resolves.toBe(true);
      expect(mockSpawn).toHaveBeenCalledWith(
        "ruff",
        ["--version"],
        expect.any(Object),
      );
    });

    it("should return false when the tool is missing", async () => {
      const mockProc = createMockChildProcess();
      mockSpawn.mockReturnValue(mockProc);

      const promise = executor.checkAvailable("ruff");
      mockProc.emit("error", new Error("spawn ruff ENOENT"));

      await expect(promise).resolves.toBe(false);
    });

    it("should return false when the check hangs", async () => {
      const mockProc = createMockChildProcess();
      mockSpawn.mockReturnValue(mockProc);

      const promise = executor.checkAvailable("ruff");
      vi.advanceTimersByTime(5000);

      await expect(promise).resolves.toBe(false);
      expect(mockProc.kill).toHaveBeenCalledWith("SIGTERM");
    });
  });
});
