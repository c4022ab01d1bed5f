/**
 * Tests for the hook catalog.
 * @module tests/unit/catalog
 */

import { describe, it, expect } from "vitest";
import {
  HOOKS,
  hookCommand,
  PROFILES,
  selectHooks,
  UnknownProfileError,
} from "../../src/catalog.js";

const ids = (hooks: { id: string }[]): string[] => hooks.map((hook) => hook.id);

describe("HOOKS", () => {
  it("should have unique ids", () => {
    expect(new Set(ids([...HOOKS])).size).toBe(HOOKS.length);
  });

  it("should only reference known hooks from profiles", () => {
    const known = new Set(ids([...HOOKS]));
    for (const profile of Object.values(PROFILES)) {
      for (const id of profile.hooks) {
        expect(known.has(id)).toBe(true);
      }
    }
  });
});

describe("selectHooks()", () => {
  it("should select every hook by default", () => {
    expect(ids(selectHooks())).toEqual(["precommit", "black", "ruff"]);
    expect(ids(selectHooks({ ids: [] }))).toEqual(["precommit", "black", "ruff"]);
  });

  it("should select by id in the order asked", () => {
    expect(ids(selectHooks({ ids: ["ruff", "precommit"] }))).toEqual([
      "ruff",
      "precommit",
    ]);
  });

  it("should drop unknown and repeated ids", () => {
    expect(ids(selectHooks({ ids: ["ruff", "mypy", "ruff"] }))).toEqual(["ruff"]);
  });

  it("should let a profile win over ids", () => {
    expect(ids(selectHooks({ ids: ["ruff"], profile: "general" }))).toEqual([
      "precommit",
    ]);
  });

  it("should throw for an unknown profile", () => {
    expect(() => selectHooks({ profile: "rust" })).toThrow(UnknownProfileError);
    expect(() => selectHooks({ profile: "rust" })).toThrow("Unknown profile 'rust'");
  });

  it.each(["toString", "constructor", "__proto__"])(
    "should not treat the inherited name %j as a profile",
    (name) => {
      expect(() => selectHooks({ profile: name })).toThrow(UnknownProfileError);
    },
  );
});

describe("hookCommand()", () => {
  it("should run the matching subcommand of the binary", () => {
    expect(HOOKS.map(hookCommand)).toEqual([
      "toolhooks precommit",
      "toolhooks format",
      "toolhooks lint",
    ]);
  });
});
