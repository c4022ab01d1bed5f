/**
 * Detect git commit invocations inside a shell command line.
 * @module hooks/command-match
 *
 * The command is split into simple commands with shell quoting rules,
 * so quoted text such as `echo "git commit"` is a single word and never
 * counts as a commit.
 */

/** Characters that end a simple command outside of quotes. */
const SEPARATORS = new Set([";", "&", "|", "\n", "(", ")"]);

/** Shell keywords that may precede a command. */
const RESERVED_WORDS = new Set([
  "if",
  "then",
  "elif",
  "else",
  "while",
  "until",
  "do",
  "!",
  "{",
]);

/**
 * Words that run the following words as a command, mapped to their
 * options that consume the next word as a value.
 */
const COMMAND_PREFIXES = new Map<string, ReadonlySet<string>>([
  ["env", new Set(["-u", "--unset", "-C", "--chdir", "-S", "--split-string"])],
  ["command", new Set<string>()],
  ["builtin", new Set<string>()],
  ["exec", new Set(["-a"])],
  ["time", new Set(["-o", "--output", "-f", "--format"])],
  ["nohup", new Set<string>()],
  ["nice", new Set(["-n", "--adjustment"])],
  [
    "sudo",
    new Set([
      "-u",
      "--user",
      "-g",
      "--group",
      "-h",
      "--host",
      "-p",
      "--prompt",
      "-C",
      "--close-from",
      "-D",
      "--chdir",
      "-r",
      "--role",
      "-t",
      "--type",
      "-U",
      "--other-user",
      "-T",
      "--command-timeout",
    ]),
  ],
]);

/** Shells whose `-c` argument is itself a command line. */
const SHELLS = new Set(["sh", "bash", "zsh", "dash", "ksh"]);

/** Shell options that consume the next word as a value. */
const SHELL_OPTIONS_WITH_VALUE = new Set([
  "-o",
  "+o",
  "-O",
  "+O",
  "--rcfile",
  "--init-file",
]);

/** git global options that consume the next word as their value. */
const GIT_OPTIONS_WITH_VALUE = new Set([
  "-C",
  "-c",
  "--git-dir",
  "--work-tree",
  "--namespace",
  "--super-prefix",
  "--config-env",
]);

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/**
 * Split a shell command line into simple commands, each a list of words.
 *
 * Handles single quotes, double quotes, backslash escapes, comments and
 * the `;`, `&&`, `||`, `|`, `&`, newline and parenthesis separators.
 * Expansions are not performed.
 *
 * @example
 * ```typescript
 * splitCommands(`cd app && git commit -m "first commit"`);
 * // [["cd", "app"], ["git", "commit", "-m", "first commit"]]
 * ```
 */
export function splitCommands(command: string): string[][] {
  const commands: string[][] = [];
  let words: string[] = [];
  let word = "";
  let inWord = false;
  let i = 0;

  const endWord = (): void => {
    if (inWord) {
      words.push(word);
      word = "";
      inWord = false;
    }
  };

  const endCommand = (): void => {
    endWord();
    if (words.length > 0) {
      commands.push(words);
      words = [];
    }
  };

  while (i < command.length) {
    const ch = command.charAt(i);

    if (ch === "'") {
      const close = command.indexOf("'", i + 1);
      const end = close === -1 ? command.length : close;
      word += command.slice(i + 1, end);
      inWord = true;
      i = end + 1;
      continue;
    }

    if (ch === '"') {
      inWord = true;
      i++;
      while (i < command.length && command.charAt(i) !== '"') {
        const inner = command.charAt(i);
        const next = command.charAt(i + 1);
        if (inner === "\\" && (next === '"' || next === "\\" || next === "$" || next === "`")) {
          word += next;
          i += 2;
        } else if (inner === "\\" && next === "\n") {
          i += 2;
        } else {
          word += inner;
          i++;
        }
      }
      i++;
      continue;
    }

    if (ch === "\\") {
      const next = command.charAt(i + 1);
      if (next === "\n") {
        i += 2;
        continue;
      }
      word += next;
      inWord = true;
      i += 2;
      continue;
    }

    if (ch === "#" && !inWord) {
      const newline = command.indexOf("\n", i);
      i = newline === -1 ? command.length : newline;
      continue;
    }

    if (SEPARATORS.has(ch)) {
      endCommand();
      i++;
      continue;
    }

    if (ch === " " || ch === "\t" || ch === "\r") {
      endWord();
      i++;
      continue;
    }

    word += ch;
    inWord = true;
    i++;
  }

  endCommand();
  return commands;
}

/**
 * Index of the program word in a simple command, after assignments,
 * shell keywords and wrappers such as `sudo -u me` or `env -i`.
 * @internal
 */
function programIndex(words: string[]): number {
  let i = 0;

  while (i < words.length) {
    const w = words[i] ?? "";
    const wrapperOptions = COMMAND_PREFIXES.get(w);

    if (ASSIGNMENT.test(w) || RESERVED_WORDS.has(w)) {
      i++;
    } else if (wrapperOptions) {
      i++;
      // Wrapper options, up to `--` or the first plain word
      while (i < words.length) {
        const opt = words[i] ?? "";
        if (opt === "--") {
          i++;
          break;
        }
        if (!opt.startsWith("-")) break;
        i += wrapperOptions.has(opt) ? 2 : 1;
      }
    } else {
      break;
    }
  }

  return i;
}

/**
 * Basename of a program word, so `/usr/bin/git` matches `git`.
 * @internal
 */
function programName(word: string | undefined): string | undefined {
  if (word === undefined) return undefined;
  return word.slice(word.lastIndexOf("/") + 1);
}

/**
 * Return the git subcommand of a simple command, if it runs git.
 * @internal
 */
export function gitSubcommand(words: string[]): string | undefined {
  let i = programIndex(words);
  if (programName(words[i]) !== "git") {
    return undefined;
  }
  i++;

  while (i < words.length) {
    const w = words[i] ?? "";
    if (GIT_OPTIONS_WITH_VALUE.has(w)) {
      i += 2;
    } else if (w.startsWith("-")) {
      i++;
    } else {
      return w;
    }
  }

  return undefined;
}

/**
 * Return the script of a `sh -c <script>` style command, if any.
 * @internal
 */
export function shellScript(words: string[]): string | undefined {
  let i = programIndex(words);
  if (!SHELLS.has(programName(words[i]) ?? "")) {
    return undefined;
  }
  i++;

  let hasScript = false;
  while (i < words.length) {
    const w = words[i] ?? "";
    if (w === "--") {
      i++;
      break;
    }
    if (SHELL_OPTIONS_WITH_VALUE.has(w)) {
      i += 2;
    } else if (/^-[A-Za-z]*c[A-Za-z]*$/.test(w)) {
      hasScript = true;
      i++;
    } else if (w.startsWith("-") || w.startsWith("+")) {
      i++;
    } else {
      break;
    }
  }

  return hasScript ? words[i] : undefined;
}

/**
 * Check whether a shell command line runs `git <subcommand>`, looking
 * inside `bash -c '...'` scripts as well.
 *
 * @param command - Full shell command about to run
 * @param subcommand - git subcommand to look for (default: "commit")
 */
export function isGitSubcommand(
  command: string,
  subcommand: string = "commit",
): boolean {
  return splitCommands(command).some((words) => {
    const script = shellScript(words);
    if (script !== undefined) {
      return isGitSubcommand(script, subcommand);
    }
    return gitSubcommand(words) === subcommand;
  });
}
