import { parse, quote } from "shell-quote";
import type { CommandArg, Plan, PlannedCommand } from "./types.js";

// operators that only sequence commands; everything else needs a shell.
const SEQUENCE_OPERATORS = new Set(["&&", ";"]);

export class CommandSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandSyntaxError";
  }
}

// characters that end a word or quote it; glob metacharacters are left bare.
const GLOB_ESCAPES = /([\s"'\\$`#|&;()<>])/g;

// word boundaries before which a `#` starts a comment.
const WORD_BREAK = /[\s|&;()<>]/;

export function formatCommand(args: readonly CommandArg[]): string {
  return args
    .map((arg) =>
      typeof arg === "string" ? quote([arg]) : arg.glob.replace(GLOB_ESCAPES, "\\$1")
    )
    .join(" ");
}

/**
 * Escape every unquoted `#` that does not begin a word, so only a `#` at the
 * start of a word is read as a comment, as in a POSIX shell.
 */
function escapeInnerHashes(line: string): string {
  let out = "";
  let quoteChar: string | null = null;
  let previous = "";

  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (c === "\\" && quoteChar !== "'") {
      out += c + (line[i + 1] ?? "");
      i++;
      previous = "\\";
      continue;
    }
    if (quoteChar !== null) {
      if (c === quoteChar) quoteChar = null;
    } else if (c === '"' || c === "'") {
      quoteChar = c;
    } else if (c === "#" && previous !== "" && !WORD_BREAK.test(previous)) {
      out += "\\#";
      previous = c;
      continue;
    }
    out += c;
    previous = c;
  }
  return out;
}

function toPlannedCommand(args: CommandArg[]): PlannedCommand {
  return { text: formatCommand(args), args };
}

/**
 * Tokenize one suggested command line into argv lists.
 *
 * `&&` and `;` split the line into sequential commands. A `#` at the start of
 * a word begins a comment; inside a word it is literal. Unquoted globs are
 * kept as patterns and `$NAME` stays literal.
 */
export function parseCommandLine(line: string): PlannedCommand[] {
  const tokens = parse(escapeInnerHashes(line), (name: string) => `$${name}`);
  const commands: PlannedCommand[] = [];
  let current: CommandArg[] = [];

  const flush = () => {
    if (current.length > 0) commands.push(toPlannedCommand(current));
    current = [];
  };

  for (const token of tokens) {
    if (typeof token === "string") {
      current.push(token);
    } else if ("comment" in token) {
      break;
    } else if (token.op === "glob") {
      current.push({ glob: token.pattern });
    } else if (SEQUENCE_OPERATORS.has(token.op)) {
      flush();
    } else {
      throw new CommandSyntaxError(
        `Unsupported shell operator "${token.op}" in: ${line}`
      );
    }
  }
  flush();

  return commands;
}

export function parseCommandLines(lines: readonly string[]): Plan {
  return lines.flatMap((line) => parseCommandLine(line));
}

/** Plan text as edited by the user: one command per line, `#` lines ignored. */
export function parsePlanText(text: string): Plan {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
  return parseCommandLines(lines);
}

export function renderPlanText(plan: Plan): string {
  return plan.map((command) => command.text).join("\n") + "\n";
}
