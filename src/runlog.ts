import { promises as fs } from "fs";
import { dirname } from "path";
import type {
  ExecutionResult,
  ExtractionWarning,
  ReviewState,
} from "./types.js";

export type RunOutcome =
  | "completed"
  | "rejected"
  | "empty_plan"
  | "dry_run"
  | "failed";

export interface RunRecord {
  timestamp: Date;
  sourceDir: string;
  query: string;
  depth: number;
  model?: string;
  warnings: ExtractionWarning[];
  prompt?: string;
  rawResponse?: string;
  commands: string[];
  // set when the plan was changed in the editor before review.
  editedCommands?: string[];
  review?: ReviewState;
  results: ExecutionResult[];
  notRun: string[];
  outcome: RunOutcome;
  error?: string;
}

function section(title: string, body: string): string[] {
  return [`--- ${title} ---`, body.length > 0 ? body : "(empty)"];
}

function numbered(commands: readonly string[]): string {
  return commands.map((command, i) => `${i + 1}. ${command}`).join("\n");
}

function indent(text: string): string {
  return text
    .trimEnd()
    .split("\n")
    .map((line) => `      ${line}`)
    .join("\n");
}

function formatResult(result: ExecutionResult, index: number): string[] {
  const status =
    result.error !== undefined
      ? `${result.error} (exit ${result.exitCode ?? "none"})`
      : `exit ${result.exitCode}`;
  const lines = [`[${index + 1}] ${result.command} -> ${status}`];
  if (result.stdout.trim()) lines.push("    stdout:", indent(result.stdout));
  if (result.stderr.trim()) lines.push("    stderr:", indent(result.stderr));
  return lines;
}

export function formatRunRecord(record: RunRecord): string {
  const lines = [
    `==== docsift run ${record.timestamp.toISOString()} ====`,
    `Source: ${record.sourceDir}`,
    `Query: ${record.query}`,
    `Depth: ${record.depth}`,
  ];
  if (record.model) lines.push(`Model: ${record.model}`);

  if (record.warnings.length > 0) {
    lines.push("Warnings:");
    for (const warning of record.warnings) {
      lines.push(`  - ${warning.path}: ${warning.message}`);
    }
  }

  if (record.prompt !== undefined) {
    lines.push(...section("Prompt", record.prompt));
  }
  if (record.rawResponse !== undefined) {
    lines.push(...section("Model response", record.rawResponse));
  }

  lines.push(...section("Commands", numbered(record.commands)));
  if (record.editedCommands !== undefined) {
    lines.push(...section("Edited commands", numbered(record.editedCommands)));
  }
  if (record.review) lines.push(`Review: ${record.review}`);

  if (record.results.length > 0) {
    lines.push("--- Results ---");
    record.results.forEach((result, i) => lines.push(...formatResult(result, i)));
  }
  if (record.notRun.length > 0) {
    lines.push("Not run:", ...record.notRun.map((command) => `  - ${command}`));
  }

  lines.push(`Outcome: ${record.outcome}`);
  if (record.error) lines.push(`Error: ${record.error}`);

  return lines.join("\n") + "\n\n";
}

/** Append a run record. Failures are reported on stderr and never thrown. */
export async function appendRunRecord(
  logFile: string,
  record: RunRecord
): Promise<void> {
  try {
    await fs.mkdir(dirname(logFile), { recursive: true });
    await fs.appendFile(logFile, formatRunRecord(record), "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`⚠️ Could not write run log ${logFile}: ${message}`);
  }
}
