/**
 * Tests for trigger context resolution.
 * @module tests/unit/hooks/context
 */

import { describe, it, expect, vi } from "vitest";
import {
  parseHookPayload,
  parseToolInput,
  payloadCommand,
  payloadPaths,
  resolveCommandContext,
  resolveFilesContext,
  splitPaths,
} from "../../../src/hooks/context.js";

describe("splitPaths()", () => {
  it("should split on any whitespace", () => {
    expect(splitPaths("  a.py\tb.py\n c.py ")).toEqual(["a.py", "b.py", "c.py"]);
  });

  it("should return an empty list for missing input", () => {
    expect(splitPaths(undefined)).toEqual([]);
    expect(splitPaths("")).toEqual([]);
    expect(splitPaths("   ")).toEqual([]);
  });
});

describe("parseToolInput()", () => {
  it("should return a raw command unchanged", () => {
    expect(parseToolInput("git commit -m test")).toBe("git commit -m test");
  });

  it("should extract command from a JSON tool input", () => {
    expect(parseToolInput('{"command":"git commit -m x","timeout":1000}')).toBe(
      "git commit -m x",
    );
  });

  it("should fall back to the raw text for invalid JSON", () => {
    expect(parseToolInput("{not json")).toBe("{not json");
  });

  it("should return an empty string for missing input", () => {
    expect(parseToolInput(undefined)).toBe("");
  });
});

describe("parseHookPayload()", () => {
  it("should parse a host payload", () => {
    const payload = parseHookPayload(
      JSON.stringify({
        session_id: "abc",
        tool_name: "Bash",
        tool_input: { command: "git commit -m x" },
      }),
    );

    expect(payload?.tool_name).toBe("Bash");
    expect(payloadCommand(payload)).toBe("git commit -m x");
  });

  it.each(["", "not json", "[1, 2]", "{broken", '{"tool_input": "text"}'])(
    "should return undefined for %j",
    (raw) => {
      expect(parseHookPayload(raw)).toBeUndefined();
    },
  );
});

describe("payloadPaths()", () => {
  it("should collect file_path, notebook_path and edits without duplicates", () => {
    const payload = parseHookPayload(
      JSON.stringify({
        tool_input: {
          file_path: "a.py",
          notebook_path: "n.ipynb",
          edits: [{ file_path: "a.py" }, { file_path: "b.py" }, {}],
        },
      }),
    );

    expect(payloadPaths(payload)).toEqual(["a.py", "n.ipynb", "b.py"]);
  });

  it("should return an empty list without a payload", () => {
    expect(payloadPaths(undefined)).toEqual([]);
  });
});

describe("resolveCommandContext()", () => {
  it("should prefer an explicit command", async () => {
    const readStdin = vi.fn().mockResolvedValue("");

    const context = await resolveCommandContext({
      command: "ls",
      env: { CLAUDE_TOOL_INPUT: "git commit" },
      readStdin,
    });

    expect(context).toEqual({ kind: "command", command: "ls" });
    expect(readStdin).not.toHaveBeenCalled();
  });

  it("should read CLAUDE_TOOL_INPUT", async () => {
    const context = await resolveCommandContext({
      env: { CLAUDE_TOOL_INPUT: "git commit -m test" },
    });

    expect(context.command).toBe("git commit -m test");
  });

  it("should fall back to the stdin payload", async () => {
    const context = await resolveCommandContext({
      env: {},
      readStdin: () =>
        Promise.resolve('{"tool_input":{"command":"git commit -m y"}}'),
    });

    expect(context.command).toBe("git commit -m y");
  });

  it("should carry the payload's cwd", async () => {
    const context = await resolveCommandContext({
      env: {},
      readStdin: () =>
        Promise.resolve('{"cwd":"/work/app","tool_input":{"command":"ls"}}'),
    });

    expect(context).toEqual({ kind: "command", command: "ls", cwd: "/work/app" });
  });

  it("should resolve to an empty command when nothing is supplied", async () => {
    const context = await resolveCommandContext({
      env: {},
      readStdin: () => Promise.resolve(""),
    });

    expect(context).toEqual({ kind: "command", command: "" });
  });
});

describe("resolveFilesContext()", () => {
  it("should prefer explicit paths", async () => {
    const context = await resolveFilesContext({
      paths: ["x.py"],
      env: { CLAUDE_FILE_PATHS: "y.py" },
    });

    expect(context).toEqual({ kind: "files", paths: ["x.py"] });
  });

  it("should read CLAUDE_FILE_PATHS", async () => {
    const context = await resolveFilesContext({
      paths: [],
      env: { CLAUDE_FILE_PATHS: "a.py b.py" },
    });

    expect(context.paths).toEqual(["a.py", "b.py"]);
  });

  it("should fall back to the stdin payload", async () => {
    const context = await resolveFilesContext({
      env: {},
      readStdin: () => Promise.resolve('{"tool_input":{"file_path":"/p/c.py"}}'),
    });

    expect(context).toEqual({ kind: "files", paths: ["/p/c.py"] });
  });

  it("should carry the payload's cwd with the paths", async () => {
    const context = await resolveFilesContext({
      env: {},
      readStdin: () =>
        Promise.resolve('{"cwd":"/work/app","tool_input":{"file_path":"c.py"}}'),
    });

    expect(context).toEqual({ kind: "files", paths: ["c.py"], cwd: "/work/app" });
  });

  it("should resolve to no paths when nothing is supplied", async () => {
    const context = await resolveFilesContext({ env: {} });

    expect(context).toEqual({ kind: "files", paths: [] });
  });
});
