/**
 * Configuration loading for toolhooks.
 * Uses Zod schemas for validation and deep merging.
 * @module config
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { ToolhooksConfig } from "./types.js";

// ============================================
// Zod Schemas
// ============================================

const toolCommandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()),
});

const formatToolSchema = toolCommandSchema.extend({
  lineLength: z.number().int().positive(),
});

/** Full config schema, used for final validation. */
const configSchema = z.object({
  precommit: toolCommandSchema,
  format: formatToolSchema,
  lint: toolCommandSchema,
  commitSubcommand: z.string().min(1),
  timeout: z.number().int().nonnegative(),
  debug: z.boolean().optional(),
});

// ============================================
// Defaults
// ============================================

/** Name of the per-project rc file. */
export const RC_FILENAME = ".toolhooksrc";

/** package.json key holding inline configuration. */
export const PACKAGE_JSON_KEY = "toolhooks";

/**
 * Default configuration values.
 */
const DEFAULT_CONFIG: ToolhooksConfig = {
  precommit: {
    command: "pre-commit",
    args: ["run"],
  },
  format: {
    command: "black",
    args: ["--quiet"],
    lineLength: 100,
  },
  lint: {
    command: "ruff",
    args: ["check", "--fix", "--quiet"],
  },
  commitSubcommand: "commit",
  timeout: 0,
};

// ============================================
// Partial Config Type
// ============================================

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

export type PartialConfig = DeepPartial<ToolhooksConfig>;

// ============================================
// Deep Merge Utility
// ============================================

/**
 * Check if a value is a plain object (not array, null, etc.).
 * @internal
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Source values override target values.
 * Arrays are replaced, not merged.
 * @internal
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];

    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      result[key] = sourceVal;
    }
  }

  return result;
}

// ============================================
// File Loaders
// ============================================

/**
 * Read and parse a JSON file.
 * Returns undefined if the file doesn't exist.
 *
 * @throws {Error} If the file exists but is not valid JSON
 * @internal
 */
async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }

  try {
    const data: unknown = JSON.parse(content);
    return data;
  } catch (error) {
    throw new Error(
      `Invalid configuration: ${path} is not valid JSON (${error instanceof Error ? error.message : String(error)})`,
    );
  }
}

/**
 * ENOENT, or ENOTDIR when the project path itself is a file.
 * @internal
 */
function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Load configuration from the package.json "toolhooks" key.
 * @internal
 */
async function loadPackageJsonConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const pkg = await readJsonFile(join(projectPath, "package.json"));

  if (isPlainObject(pkg)) {
    const section = pkg[PACKAGE_JSON_KEY];
    if (isPlainObject(section)) {
      return section;
    }
  }

  return undefined;
}

/**
 * Load configuration from the .toolhooksrc file.
 * @internal
 */
async function loadRcConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const rc = await readJsonFile(join(projectPath, RC_FILENAME));
  return isPlainObject(rc) ? rc : undefined;
}

// ============================================
// Environment Variables
// ============================================

/**
 * Parse a non-negative integer from an env var, ignoring junk.
 * @internal
 */
function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 0 ? undefined : parsed;
}

/**
 * Whether TOOLHOOKS_DEBUG asks for verbose output.
 */
export function isDebugEnv(): boolean {
  const raw = process.env["TOOLHOOKS_DEBUG"]?.toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

/**
 * Build a partial config from environment variables.
 * @internal
 */
function getEnvConfig(): PartialConfig {
  const partial: PartialConfig = {};

  const lineLength = parseIntEnv("TOOLHOOKS_BLACK_LINE_LENGTH");
  if (lineLength !== undefined && lineLength > 0) {
    partial.format = { lineLength };
  }

  const timeout = parseIntEnv("TOOLHOOKS_TIMEOUT");
  if (timeout !== undefined) {
    partial.timeout = timeout;
  }

  if (isDebugEnv()) {
    partial.debug = true;
  }

  return partial;
}

// ============================================
// Public API
// ============================================

/**
 * Load configuration from multiple sources with priority order:
 *
 * 1. Explicit overrides (highest priority)
 * 2. Environment variables
 * 3. .toolhooksrc file
 * 4. package.json "toolhooks" key
 * 5. Default values (lowest priority)
 *
 * @param projectPath - Root directory of the project (default: process.cwd())
 * @param overrides - Explicit configuration overrides
 * @returns Merged configuration
 * @throws {Error} If a config file is not valid JSON, or the merged
 * configuration fails validation
 *
 * @example
 * ```typescript
 * const config = await loadConfig("/path/to/project", {
 *   format: { lineLength: 88 },
 * });
 * ```
 */
export async function loadConfig(
  projectPath: string = process.cwd(),
  overrides?: PartialConfig,
): Promise<ToolhooksConfig> {
  // Collect all config sources (lowest to highest priority)
  const sources: Record<string, unknown>[] = [];

  const pkgConfig = await loadPackageJsonConfig(projectPath);
  if (pkgConfig) {
    sources.push(pkgConfig);
  }

  const rcConfig = await loadRcConfig(projectPath);
  if (rcConfig) {
    sources.push(rcConfig);
  }

  const envConfig = getEnvConfig();
  if (Object.keys(envConfig).length > 0) {
    sources.push(envConfig);
  }

  if (overrides) {
    sources.push(overrides);
  }

  let merged: Record<string, unknown> = { ...getDefaultConfig() };
  for (const source of sources) {
    merged = deepMerge(merged, source);
  }

  const parseResult = configSchema.safeParse(merged);

  if (!parseResult.success) {
    throw new Error(
      `Invalid configuration: ${parseResult.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
    );
  }

  return toConfig(parseResult.data);
}

/**
 * Get default configuration without loading from files.
 * Useful for testing or when config loading fails inside a hook.
 */
export function getDefaultConfig(): ToolhooksConfig {
  return structuredClone(DEFAULT_CONFIG);
}

/**
 * Drop an undefined debug flag so the result fits ToolhooksConfig.
 * @internal
 */
function toConfig(data: z.infer<typeof configSchema>): ToolhooksConfig {
  const { debug, ...rest } = data;
  return debug === undefined ? rest : { ...rest, debug };
}
