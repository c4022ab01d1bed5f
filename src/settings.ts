/**
 * Host settings generation, merging and file updates.
 * @module settings
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { hookCommand, HOOKS, selectHooks } from "./catalog.js";
import type {
  HookCommandEntry,
  HookDefinition,
  HostSettings,
  MatcherGroup,
  PermissionSettings,
} from "./types.js";

/** Settings file written by install, relative to the project. */
export const SETTINGS_RELATIVE_PATH = join(".claude", "settings.local.json");

const PERMISSION_KINDS = ["allow", "deny", "ask"] as const;

function isPermissionKind(
  name: string,
): name is (typeof PERMISSION_KINDS)[number] {
  return PERMISSION_KINDS.some((kind) => kind === name);
}

// ============================================
// Zod Schemas
// ============================================

const commandEntrySchema = z
  .object({
    type: z.literal("command"),
    command: z.string(),
    statusMessage: z.string().optional(),
  })
  .passthrough();

const matcherGroupSchema = z
  .object({
    matcher: z.string().default(""),
    hooks: z.array(commandEntrySchema).default([]),
  })
  .passthrough();

const settingsSchema = z
  .object({
    hooks: z.record(z.array(matcherGroupSchema)).optional(),
    permissions: z
      .object({
        allow: z.array(z.string()).optional(),
        deny: z.array(z.string()).optional(),
        ask: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

// ============================================
// Building
// ============================================

/**
 * Settings entries for a set of hooks, grouped by event then matcher.
 * Returns `{}` for an empty selection.
 */
export function buildHookSettings(hooks: HookDefinition[]): HostSettings {
  const byEvent = new Map<string, Map<string, HookCommandEntry[]>>();

  for (const hook of hooks) {
    const groups = byEvent.get(hook.event) ?? new Map<string, HookCommandEntry[]>();
    byEvent.set(hook.event, groups);

    const entries = groups.get(hook.matcher) ?? [];
    groups.set(hook.matcher, entries);
    entries.push({
      type: "command",
      command: hookCommand(hook),
      statusMessage: hook.statusMessage,
    });
  }

  if (byEvent.size === 0) return {};

  const result: Record<string, MatcherGroup[]> = {};
  // PreToolUse before PostToolUse regardless of selection order
  for (const event of ["PreToolUse", "PostToolUse"]) {
    const groups = byEvent.get(event);
    if (groups) {
      result[event] = [...groups].map(([matcher, entries]) => ({
        matcher,
        hooks: entries,
      }));
    }
  }
  return { hooks: result };
}

// ============================================
// Merging
// ============================================

/**
 * Drop entries with a command already seen, keeping the first.
 */
export function dedupeHooks(entries: HookCommandEntry[]): HookCommandEntry[] {
  const seen = new Set<string>();
  const result: HookCommandEntry[] = [];
  for (const entry of entries) {
    if (!seen.has(entry.command)) {
      seen.add(entry.command);
      result.push(entry);
    }
  }
  return result;
}

/**
 * Merge settings objects left to right.
 *
 * - hooks: matcher groups are concatenated per event, regrouped by
 *   matcher, and entries de-duplicated by command
 * - permissions: allow/deny/ask are unioned in first-seen order, other
 *   permission keys (defaultMode, ...) take the last value
 * - anything else: last value wins
 */
export function mergeSettings(...settingsList: HostSettings[]): HostSettings {
  const result: HostSettings = {};
  let hooks: Record<string, MatcherGroup[]> | undefined;
  let permissions: PermissionSettings | undefined;
  const permissionExtras: Record<string, unknown> = {};

  for (const settings of settingsList) {
    for (const [key, value] of Object.entries(settings)) {
      if (key === "hooks" && settings.hooks) {
        hooks ??= {};
        for (const [event, groups] of Object.entries(settings.hooks)) {
          hooks[event] = [...(hooks[event] ?? []), ...groups];
        }
      } else if (key === "permissions" && settings.permissions) {
        permissions ??= { allow: [], deny: [], ask: [] };
        for (const [name, entry] of Object.entries(settings.permissions)) {
          if (!isPermissionKind(name) && entry !== undefined) {
            permissionExtras[name] = entry;
          }
        }
        for (const kind of PERMISSION_KINDS) {
          permissions[kind].push(...(settings.permissions[kind] ?? []));
        }
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }

  if (hooks) {
    const regrouped: Record<string, MatcherGroup[]> = {};
    for (const [event, groups] of Object.entries(hooks)) {
      // Extra group keys come from the first group with that matcher
      const byMatcher = new Map<string, MatcherGroup>();
      for (const group of groups) {
        const merged = byMatcher.get(group.matcher);
        if (merged) {
          merged.hooks.push(...group.hooks);
        } else {
          byMatcher.set(group.matcher, { ...group, hooks: [...group.hooks] });
        }
      }
      regrouped[event] = [...byMatcher.values()].map((group) => ({
        ...group,
        hooks: dedupeHooks(group.hooks),
      }));
    }
    result.hooks = regrouped;
  }

  if (permissions) {
    result.permissions = {
      ...permissionExtras,
      allow: [...new Set(permissions.allow)],
      deny: [...new Set(permissions.deny)],
      ask: [...new Set(permissions.ask)],
    };
  }

  return result;
}

/**
 * Remove hook entries whose command is in `commands`, dropping matcher
 * groups, events and the hooks key once they are empty.
 *
 * @returns The new settings and how many entries were removed
 */
export function removeHookSettings(
  settings: HostSettings,
  commands: ReadonlySet<string>,
): { settings: HostSettings; removed: number } {
  if (!settings.hooks) {
    return { settings: { ...settings }, removed: 0 };
  }

  let removed = 0;
  const hooks: Record<string, MatcherGroup[]> = {};

  for (const [event, groups] of Object.entries(settings.hooks)) {
    const kept: MatcherGroup[] = [];
    for (const group of groups) {
      const entries = group.hooks.filter((entry) => !commands.has(entry.command));
      removed += group.hooks.length - entries.length;
      if (entries.length > 0) {
        kept.push({ ...group, hooks: entries });
      }
    }
    if (kept.length > 0) {
      hooks[event] = kept;
    }
  }

  const { hooks: _previous, ...rest } = settings;
  const next: HostSettings = { ...rest };
  if (Object.keys(hooks).length > 0) {
    next.hooks = hooks;
  }
  return { settings: next, removed };
}

// ============================================
// File I/O
// ============================================

/**
 * Path of the settings file for a project.
 */
export function getSettingsPath(target: string): string {
  return join(target, SETTINGS_RELATIVE_PATH);
}

/**
 * Read a settings file. A missing file is `{}`.
 *
 * @throws {Error} If the file exists but is not valid settings JSON
 */
export async function readSettings(path: string): Promise<HostSettings> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = settingsSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(
      `${path} has an unexpected shape: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
    );
  }
  return parsed.data;
}

/**
 * Write settings with 2-space indentation and a trailing newline.
 */
export async function writeSettings(
  path: string,
  settings: HostSettings,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(settings, null, 2) + "\n");
}

/**
 * Install hooks into a project's settings file.
 */
export async function installHooks(
  target: string,
  selection: { ids?: string[]; profile?: string } = {},
): Promise<{ settingsPath: string; installed: string[] }> {
  const settingsPath = getSettingsPath(target);
  const hooks = selectHooks(selection);
  if (hooks.length === 0) {
    return { settingsPath, installed: [] };
  }

  const existing = await readSettings(settingsPath);
  const merged = mergeSettings(existing, buildHookSettings(hooks));
  await writeSettings(settingsPath, merged);

  return { settingsPath, installed: hooks.map((hook) => hook.id) };
}

/**
 * Remove every toolhooks entry from a project's settings file.
 * Leaves the file alone when nothing matched.
 */
export async function uninstallHooks(
  target: string,
): Promise<{ settingsPath: string; removed: number }> {
  const settingsPath = getSettingsPath(target);
  const existing = await readSettings(settingsPath);

  const commands = new Set(HOOKS.map(hookCommand));
  const { settings, removed } = removeHookSettings(existing, commands);

  if (removed > 0) {
    await writeSettings(settingsPath, settings);
  }
  return { settingsPath, removed };
}
