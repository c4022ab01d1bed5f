/**
 * Build the trigger context for a hook invocation.
 * @module hooks/context
 *
 * Sources, first non-empty wins:
 * 1. Explicit CLI input (--command, positional paths)
 * 2. CLAUDE_TOOL_INPUT / CLAUDE_FILE_PATHS environment variables
 * 3. The host's JSON payload on stdin
 *
 * A payload's `cwd` is carried on the context so the hook can run git
 * and the tools in the host's project when no --cwd is given.
 */

import { createInterface } from "node:readline";
import { z } from "zod";
import type { CommandContext, FilesContext, HookContext } from "../types.js";

/** Env var carrying the shell command about to run. */
export const TOOL_INPUT_ENV = "CLAUDE_TOOL_INPUT";

/** Env var carrying whitespace-separated edited paths. */
export const FILE_PATHS_ENV = "CLAUDE_FILE_PATHS";

/** Give up on stdin after this long. */
const STDIN_TIMEOUT = 2000;

const toolInputSchema = z
  .object({
    command: z.string().optional(),
    file_path: z.string().optional(),
    notebook_path: z.string().optional(),
    edits: z
      .array(z.object({ file_path: z.string().optional() }).passthrough())
      .optional(),
  })
  .passthrough();

const hookPayloadSchema = z
  .object({
    cwd: z.string().optional(),
    tool_name: z.string().optional(),
    tool_input: toolInputSchema.optional(),
  })
  .passthrough();

export type HookPayload = z.infer<typeof hookPayloadSchema>;

/**
 * Where a resolver may look for context.
 */
export interface ContextSources {
  /** Explicit command (precommit) */
  command?: string;
  /** Explicit paths (format/lint) */
  paths?: string[];
  env?: NodeJS.ProcessEnv;
  /** Reads the host payload; omitted means no stdin */
  readStdin?: () => Promise<string>;
}

// ============================================
// Parsing
// ============================================

/**
 * Split a whitespace-separated path list.
 */
export function splitPaths(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(/\s+/).filter((p) => p.length > 0);
}

/**
 * Parse the host's JSON payload. Returns undefined for anything that
 * is not a JSON object.
 */
export function parseHookPayload(raw: string): HookPayload | undefined {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("{")) return undefined;

  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch {
    return undefined;
  }

  const result = hookPayloadSchema.safeParse(data);
  return result.success ? result.data : undefined;
}

/**
 * Extract the command from CLAUDE_TOOL_INPUT, which is either the raw
 * command or a JSON tool input with a `command` field.
 */
export function parseToolInput(raw: string | undefined): string {
  if (!raw) return "";
  const trimmed = raw.trim();
  if (trimmed.startsWith("{")) {
    try {
      const result = toolInputSchema.safeParse(JSON.parse(trimmed));
      if (result.success && result.data.command !== undefined) {
        return result.data.command;
      }
    } catch {
      // Not JSON after all: treat as a raw command
    }
  }
  return raw;
}

/**
 * Command string carried by a payload, or "".
 */
export function payloadCommand(payload: HookPayload | undefined): string {
  return payload?.tool_input?.command ?? "";
}

/**
 * Edited paths carried by a payload, de-duplicated in order.
 */
export function payloadPaths(payload: HookPayload | undefined): string[] {
  const input = payload?.tool_input;
  if (!input) return [];

  const paths: string[] = [];
  const add = (p: string | undefined): void => {
    if (p && !paths.includes(p)) paths.push(p);
  };

  add(input.file_path);
  add(input.notebook_path);
  for (const edit of input.edits ?? []) {
    add(edit.file_path);
  }
  return paths;
}

// ============================================
// Resolution
// ============================================

/**
 * Attach the payload's working directory, when it has one.
 * @internal
 */
function withPayloadCwd<T extends HookContext>(
  context: T,
  payload: HookPayload | undefined,
): T {
  return payload?.cwd ? { ...context, cwd: payload.cwd } : context;
}

/**
 * Resolve the context for the commit guard.
 */
export async function resolveCommandContext(
  sources: ContextSources,
): Promise<CommandContext> {
  if (sources.command) {
    return { kind: "command", command: sources.command };
  }

  const env = sources.env ?? process.env;
  const fromEnv = parseToolInput(env[TOOL_INPUT_ENV]);
  if (fromEnv.trim()) {
    return { kind: "command", command: fromEnv };
  }

  if (sources.readStdin) {
    const payload = parseHookPayload(await sources.readStdin());
    return withPayloadCwd(
      { kind: "command", command: payloadCommand(payload) },
      payload,
    );
  }

  return { kind: "command", command: "" };
}

/**
 * Resolve the context for the format and lint hooks.
 */
export async function resolveFilesContext(
  sources: ContextSources,
): Promise<FilesContext> {
  if (sources.paths && sources.paths.length > 0) {
    return { kind: "files", paths: sources.paths };
  }

  const env = sources.env ?? process.env;
  const fromEnv = splitPaths(env[FILE_PATHS_ENV]);
  if (fromEnv.length > 0) {
    return { kind: "files", paths: fromEnv };
  }

  if (sources.readStdin) {
    const payload = parseHookPayload(await sources.readStdin());
    return withPayloadCwd(
      { kind: "files", paths: payloadPaths(payload) },
      payload,
    );
  }

  return { kind: "files", paths: [] };
}

// ============================================
// stdin
// ============================================

/**
 * Read all of stdin, or "" when stdin is a TTY. Stops waiting after a
 * short timeout so a host that keeps stdin open cannot hang the hook.
 */
export async function readStdin(
  timeout: number = STDIN_TIMEOUT,
): Promise<string> {
  if (process.stdin.isTTY) return "";

  return new Promise<string>((resolve) => {
    const chunks: string[] = [];
    const rl = createInterface({
      input: process.stdin,
      terminal: false,
    });

    const timer = setTimeout(() => {
      rl.close();
    }, timeout);

    rl.on("line", (line) => {
      chunks.push(line);
    });

    rl.on("close", () => {
      clearTimeout(timer);
      resolve(chunks.join("\n"));
    });
  });
}
