/**
 * CLI output utilities.
 * @module cli/utils/output
 */

import type {
  HookDefinition,
  HookOutcome,
  HookProfile,
} from "../../types.js";

// ============================================
// Output Options
// ============================================

/**
 * Output formatting options.
 */
export interface OutputOptions {
  /** Output as JSON */
  json?: boolean;
  /** Suppress output */
  quiet?: boolean;
}

// ============================================
// Output Function
// ============================================

/**
 * Output data in the appropriate format.
 *
 * @param data - Data to output
 * @param formatter - Function to format data for human-readable output
 * @param options - Output options
 */
export function output<T>(
  data: T,
  formatter: (data: T) => string,
  options: OutputOptions = {},
): void {
  if (options.quiet) return;

  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(formatter(data));
  }
}

/**
 * Output to stderr (for messages that shouldn't interfere with piping).
 */
export function info(message: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  if (options.json) return;
  console.error(message);
}

/**
 * Output a warning to stderr.
 */
export function warn(message: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  if (options.json) return;
  console.error(`Warning: ${message}`);
}

// ============================================
// Formatters
// ============================================

/**
 * One-line summary of a hook outcome.
 */
export function formatOutcome(outcome: HookOutcome): string {
  const { hook, status, invocation, result, reason } = outcome;

  if (status === "skipped") {
    return `${hook}: skipped${reason ? ` (${reason})` : ""}`;
  }

  const tool = invocation?.command ?? hook;
  if (result) {
    const verb = status === "ran" ? "ran" : "failed";
    return `${hook}: ${verb} ${tool} (exit ${result.exitCode})`;
  }

  return `${hook}: failed${reason ? ` (${reason})` : ""}`;
}

/**
 * Format the hook catalog and profiles for `list`.
 */
export function formatHookList(data: {
  hooks: HookDefinition[];
  profiles: Record<string, HookProfile>;
}): string {
  const lines: string[] = [];

  lines.push("Available hooks:");
  lines.push("");
  for (const hook of data.hooks) {
    const requires = hook.requires.length > 0 ? hook.requires.join(", ") : "none";
    lines.push(`  ${hook.id.padEnd(12)} ${hook.name}`);
    lines.push(`  ${"".padEnd(12)} ${hook.description}`);
    lines.push(
      `  ${"".padEnd(12)} ${hook.event} [${hook.matcher}] | Tags: ${hook.tags.join(", ")} | Requires: ${requires}`,
    );
    lines.push("");
  }

  lines.push("Profiles:");
  lines.push("");
  for (const [name, profile] of Object.entries(data.profiles)) {
    lines.push(`  ${name.padEnd(12)} ${profile.description}`);
    lines.push(`  ${"".padEnd(12)} Hooks: ${profile.hooks.join(", ")}`);
  }

  return lines.join("\n");
}

/**
 * Format the result of `install`.
 */
export function formatInstallResult(result: {
  settingsPath: string;
  installed: string[];
}): string {
  if (result.installed.length === 0) {
    return "No hooks selected.";
  }
  return [
    `Installed ${result.installed.length} hook(s): ${result.installed.join(", ")}`,
    `Updated: ${result.settingsPath}`,
  ].join("\n");
}

/**
 * Format the result of `uninstall`.
 */
export function formatUninstallResult(result: {
  settingsPath: string;
  removed: number;
}): string {
  if (result.removed === 0) {
    return `No toolhooks entries found in ${result.settingsPath}`;
  }
  return `Removed ${result.removed} hook entr${result.removed === 1 ? "y" : "ies"} from ${result.settingsPath}`;
}
