/**
 * Installable hooks and hook profiles.
 * @module catalog
 */

import type { HookDefinition, HookProfile } from "./types.js";

/** Name of the installed binary, used in generated settings. */
export const BIN_NAME = "toolhooks";

/** Host tools that edit files. */
const FILE_EDIT_MATCHER = "Edit|Write|Update|NotebookEdit|Delete";

/**
 * Every hook toolhooks can install, in install order.
 */
export const HOOKS: readonly HookDefinition[] = [
  {
    id: "precommit",
    name: "Pre-commit Runner",
    description: "Run pre-commit hooks on staged files before git commit",
    event: "PreToolUse",
    matcher: "Bash",
    tags: ["git", "general"],
    requires: ["pre-commit"],
    statusMessage: "Running pre-commit",
    subcommand: "precommit",
  },
  {
    id: "black",
    name: "Black Formatter",
    description: "Auto-format edited Python files with Black",
    event: "PostToolUse",
    matcher: FILE_EDIT_MATCHER,
    tags: ["python", "format"],
    requires: ["black"],
    statusMessage: "Formatting with Black",
    subcommand: "format",
  },
  {
    id: "ruff",
    name: "Ruff Linter",
    description: "Lint and auto-fix edited Python files with Ruff",
    event: "PostToolUse",
    matcher: FILE_EDIT_MATCHER,
    tags: ["python", "lint"],
    requires: ["ruff"],
    statusMessage: "Linting with Ruff",
    subcommand: "lint",
  },
];

/**
 * Named hook sets.
 */
export const PROFILES: Readonly<Record<string, HookProfile>> = {
  general: {
    description: "Language-agnostic hooks",
    hooks: ["precommit"],
  },
  python: {
    description: "Python projects: pre-commit, Black and Ruff",
    hooks: ["precommit", "black", "ruff"],
  },
};

/**
 * Thrown for a profile name not in PROFILES.
 */
export class UnknownProfileError extends Error {
  constructor(public readonly profile: string) {
    super(`Unknown profile '${profile}'`);
    this.name = "UnknownProfileError";
  }
}

/**
 * Pick hooks by id or profile.
 *
 * A profile wins over ids. Unknown ids are dropped. With neither, every
 * hook is selected. Results keep the order they were asked for.
 *
 * @throws {UnknownProfileError} If the profile does not exist
 */
export function selectHooks(
  selection: { ids?: string[]; profile?: string } = {},
): HookDefinition[] {
  let ids = selection.ids;

  if (selection.profile !== undefined) {
    // Own keys only: "toString" is not a profile
    const profile = Object.hasOwn(PROFILES, selection.profile)
      ? PROFILES[selection.profile]
      : undefined;
    if (!profile) {
      throw new UnknownProfileError(selection.profile);
    }
    ids = profile.hooks;
  } else if (ids === undefined || ids.length === 0) {
    return [...HOOKS];
  }

  const byId = new Map(HOOKS.map((hook) => [hook.id, hook]));
  const selected: HookDefinition[] = [];
  for (const id of ids) {
    const hook = byId.get(id);
    if (hook && !selected.includes(hook)) {
      selected.push(hook);
    }
  }
  return selected;
}

/**
 * Command line the host runs for a hook.
 */
export function hookCommand(hook: HookDefinition): string {
  return `${BIN_NAME} ${hook.subcommand}`;
}
