import type { FileEntry } from "./types.js";

export interface PromptInput {
  query: string;
  root: string;
  depth: number;
  entries: readonly FileEntry[];
}

// system instruction sent with every request; the reply format must match
// the schema parsed in ai.ts.
export const SYSTEM_INSTRUCTION = `You are an expert file organizer working in a POSIX shell.
A user gives you a request in natural language and a list of files, each with a short
preview of its content. Your ONLY task is to return the commands that organize the files
as requested.

Crucial Rules:
1. Output MUST be JSON of the form {"commands": ["<command>", ...]} and nothing else.
2. Each entry is ONE program invocation (e.g. 'mkdir -p reports', 'mv "a b.pdf" reports/').
   Do not use pipes, redirections, subshells, command substitution or variables.
3. Commands run from inside the listed directory: use the relative paths exactly as listed.
4. Prefer standard, widely available utilities ('mkdir', 'mv', 'cp', 'ln').
   Never delete files.
5. Quote paths that contain spaces or special characters.
6. If nothing needs to change, return {"commands": []}.
`;

function describeEntry(entry: FileEntry): string {
  const preview = entry.preview.length > 0 ? entry.preview : "(no preview)";
  return `- ${entry.path} [${entry.type}, ${entry.size} bytes]: ${preview}`;
}

/**
 * Assemble the user prompt. Pure: the same input always gives the same text.
 */
export function buildPrompt(input: PromptInput): string {
  const lines = [
    `Query: ${input.query}`,
    `Directory: ${input.root}`,
    `Depth: ${input.depth}`,
    `Files (${input.entries.length}):`,
  ];

  if (input.entries.length === 0) {
    lines.push("(none)");
  } else {
    lines.push(...input.entries.map(describeEntry));
  }

  return lines.join("\n");
}
