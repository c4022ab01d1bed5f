/**
 * Tests for staged file listing.
 * @module tests/unit/tools/git
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { listStagedFiles, parseNameOnly } from "../../../src/tools/git.js";
import { ToolError } from "../../../src/errors.js";

type ExecFileCallback = (
  error: Error | null,
  result?: { stdout: string; stderr: string },
) => void;

const mockExecFile = vi.fn();
vi.mock("node:child_process", () => ({
  execFile: (...args: unknown[]) => mockExecFile(...args),
}));

function succeedWith(stdout: string): void {
  mockExecFile.mockImplementation((...args: unknown[]) => {
    const callback = args[args.length - 1] as ExecFileCallback;
    callback(null, { stdout, stderr: "" });
  });
}

describe("listStagedFiles()", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should ask git for cached names in the given directory", async () => {
    succeedWith("a.py\0src/b.py\0");

    const files = await listStagedFiles("/repo");

    expect(files).toEqual(["a.py", "src/b.py"]);
    expect(mockExecFile).toHaveBeenCalledWith(
      "git",
      ["diff", "--cached", "--name-only", "-z"],
      expect.objectContaining({ cwd: "/repo" }),
      expect.any(Function),
    );
  });

  it("should return an empty list when nothing is staged", async () => {
    succeedWith("");

    await expect(listStagedFiles("/repo")).resolves.toEqual([]);
  });

  it("should wrap git failures in a GIT_FAILED error", async () => {
    mockExecFile.mockImplementation((...args: unknown[]) => {
      const callback = args[args.length - 1] as ExecFileCallback;
      callback(new Error("not a git repository"));
    });

    const error = await listStagedFiles("/tmp").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolError);
    expect(error).toMatchObject({
      code: "GIT_FAILED",
      tool: "git",
      message: "git diff --cached failed: not a git repository",
    });
  });
});

describe("parseNameOnly()", () => {
  it("should split on NUL and keep names exactly as staged", () => {
    expect(parseNameOnly("caf\u00e9.py\0 lead.py\0dir/with space.py\0")).toEqual([
      "caf\u00e9.py",
      " lead.py",
      "dir/with space.py",
    ]);
  });

  it("should return nothing for empty output", () => {
    expect(parseNameOnly("")).toEqual([]);
  });
});
