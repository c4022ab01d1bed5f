/**
 * Core type definitions for toolhooks.
 * @module types
 */

// ============================================
// Trigger Context
// ============================================

/**
 * What the host hands a hook for one invocation.
 *
 * A command context carries the shell command about to run; a files
 * context carries the paths touched by the triggering edit.
 */
export type HookContext = CommandContext | FilesContext;

export interface CommandContext {
  kind: "command";
  command: string;
  /** Working directory reported by the host payload */
  cwd?: string;
}

export interface FilesContext {
  kind: "files";
  paths: string[];
  cwd?: string;
}

/** Hook variants the runner knows about. */
export type HookName = "precommit" | "format" | "lint";

// ============================================
// Tool Invocation
// ============================================

/**
 * A single external tool call.
 */
export interface ToolInvocation {
  /** Binary to execute (looked up on PATH) */
  command: string;
  /** Arguments passed verbatim, no shell expansion */
  args: string[];
  /** Working directory (default: current directory) */
  cwd?: string;
  /** Kill the process after this many ms (0 = never) */
  timeout?: number;
}

/**
 * Exit status and captured output of a tool call.
 */
export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Outcome of running one hook variant.
 *
 * Only used for verbose logging and tests. The hook process exit
 * code never depends on it.
 */
export interface HookOutcome {
  hook: HookName;
  status: "skipped" | "ran" | "failed";
  reason?: string;
  invocation?: ToolInvocation;
  result?: ToolResult;
}

// ============================================
// Configuration
// ============================================

export interface ToolCommandConfig {
  /** Binary name or path */
  command: string;
  /** Arguments placed before the file list */
  args: string[];
}

export interface FormatToolConfig extends ToolCommandConfig {
  /** Passed as --line-length */
  lineLength: number;
}

/**
 * Complete toolhooks configuration.
 */
export interface ToolhooksConfig {
  /** Aggregator run before commits */
  precommit: ToolCommandConfig;
  /** Formatter run after edits */
  format: FormatToolConfig;
  /** Linter run after edits */
  lint: ToolCommandConfig;
  /** git subcommand that marks a commit */
  commitSubcommand: string;
  /** Tool timeout in ms (0 = none) */
  timeout: number;
  /** Log hook outcomes to stderr */
  debug?: boolean;
}

// ============================================
// Hook Catalog & Host Settings
// ============================================

/** Host lifecycle events hooks can attach to. */
export type HookEvent = "PreToolUse" | "PostToolUse";

/**
 * An installable hook.
 */
export interface HookDefinition {
  /** Stable identifier used on the command line */
  id: string;
  /** Human-readable name */
  name: string;
  description: string;
  event: HookEvent;
  /** Host tool-name pattern the hook fires on */
  matcher: string;
  tags: string[];
  /** External tools that must be installed */
  requires: string[];
  /** Shown by the host while the hook runs */
  statusMessage: string;
  /** toolhooks subcommand the host should call */
  subcommand: HookName;
}

/**
 * Named set of hooks installed together.
 */
export interface HookProfile {
  description: string;
  hooks: string[];
}

/**
 * One command entry inside a matcher group.
 */
export interface HookCommandEntry {
  type: "command";
  command: string;
  statusMessage?: string;
}

/**
 * Hooks sharing a matcher for one event.
 */
export interface MatcherGroup {
  matcher: string;
  hooks: HookCommandEntry[];
  [key: string]: unknown;
}

export interface PermissionSettings {
  allow: string[];
  deny: string[];
  ask: string[];
}

/**
 * Host settings file contents. Keys we don't manage are kept as-is.
 */
export interface HostSettings {
  hooks?: Record<string, MatcherGroup[]>;
  permissions?: Partial<PermissionSettings> & { [key: string]: unknown };
  [key: string]: unknown;
}
