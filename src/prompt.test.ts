import { describe, expect, it } from "vitest";
import { buildPrompt, SYSTEM_INSTRUCTION } from "./prompt.js";
import type { FileEntry } from "./types.js";

const entries: FileEntry[] = [
  { path: "invoice.txt", type: "TXT", size: 10, preview: "invoice #1" },
  { path: "scans/lease.pdf", type: "PDF", size: 2048, preview: "" },
];

describe("buildPrompt", () => {
  it("lays out query, directory, depth and files", () => {
    const prompt = buildPrompt({
      query: "group invoices",
      root: "/data/inbox",
      depth: 2,
      entries,
    });

    expect(prompt).toBe(
      [
        "Query: group invoices",
        "Directory: /data/inbox",
        "Depth: 2",
        "Files (2):",
        "- invoice.txt [TXT, 10 bytes]: invoice #1",
        "- scans/lease.pdf [PDF, 2048 bytes]: (no preview)",
      ].join("\n")
    );
  });

  it("marks an empty file list", () => {
    const prompt = buildPrompt({
      query: "tidy up",
      root: "/data/empty",
      depth: 1,
      entries: [],
    });

    expect(prompt.split("\n").slice(-2)).toEqual(["Files (0):", "(none)"]);
  });

  it("is deterministic for identical input", () => {
    const input = { query: "group invoices", root: "/data", depth: 1, entries };
    const copy = { ...input, entries: entries.map((entry) => ({ ...entry })) };

    expect(buildPrompt(copy)).toBe(buildPrompt(input));
  });
});

describe("SYSTEM_INSTRUCTION", () => {
  it("asks for the JSON command list", () => {
    expect(SYSTEM_INSTRUCTION).toContain('{"commands": ["<command>", ...]}');
  });
});
