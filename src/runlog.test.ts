import { promises as fs } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { appendRunRecord, formatRunRecord, type RunRecord } from "./runlog.js";
import { makeTempDir } from "./testing/fixtures.js";

function record(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    timestamp: new Date("2026-03-01T09:30:00.000Z"),
    sourceDir: "/data/inbox",
    query: "group invoices",
    depth: 1,
    warnings: [],
    commands: [],
    results: [],
    notRun: [],
    outcome: "completed",
    ...overrides,
  };
}

describe("formatRunRecord", () => {
  it("writes every stage of a completed run", () => {
    const text = formatRunRecord(
      record({
        model: "fake-model",
        warnings: [{ path: "broken.pdf", message: "Could not extract PDF content: bad" }],
        prompt: "Query: group invoices",
        rawResponse: '{"commands": ["mkdir invoices"]}',
        commands: ["mkdir invoices"],
        review: "approved",
        results: [
          {
            command: "mkdir invoices",
            argv: ["mkdir", "invoices"],
            exitCode: 0,
            stdout: "",
            stderr: "",
          },
        ],
      })
    );

    expect(text).toBe(
      [
        "==== docsift run 2026-03-01T09:30:00.000Z ====",
        "Source: /data/inbox",
        "Query: group invoices",
        "Depth: 1",
        "Model: fake-model",
        "Warnings:",
        "  - broken.pdf: Could not extract PDF content: bad",
        "--- Prompt ---",
        "Query: group invoices",
        "--- Model response ---",
        '{"commands": ["mkdir invoices"]}',
        "--- Commands ---",
        "1. mkdir invoices",
        "Review: approved",
        "--- Results ---",
        "[1] mkdir invoices -> exit 0",
        "Outcome: completed",
      ].join("\n") + "\n\n"
    );
  });

  it("includes output, skipped commands and the error of a failed run", () => {
    const text = formatRunRecord(
      record({
        commands: ["mv a.txt b/", "mkdir c"],
        results: [
          {
            command: "mv a.txt b/",
            argv: ["mv", "a.txt", "b/"],
            exitCode: 1,
            stdout: "",
            stderr: "mv: cannot stat 'a.txt'\n",
          },
        ],
        notRun: ["mkdir c"],
        outcome: "failed",
        error: "Command failed",
      })
    );

    expect(text).toContain(
      [
        "[1] mv a.txt b/ -> exit 1",
        "    stderr:",
        "      mv: cannot stat 'a.txt'",
        "Not run:",
        "  - mkdir c",
        "Outcome: failed",
        "Error: Command failed",
      ].join("\n")
    );
  });

  it("lists edited commands after the model's commands", () => {
    const text = formatRunRecord(
      record({
        commands: ["mkdir invoices"],
        editedCommands: ["mkdir bills", "mv invoice.txt bills/"],
        review: "approved",
      })
    );

    expect(text).toContain(
      [
        "--- Commands ---",
        "1. mkdir invoices",
        "--- Edited commands ---",
        "1. mkdir bills",
        "2. mv invoice.txt bills/",
        "Review: approved",
      ].join("\n")
    );
  });

  it("marks empty sections", () => {
    const text = formatRunRecord(record({ outcome: "empty_plan" }));
    expect(text).toContain("--- Commands ---\n(empty)\n");
  });
});

describe("appendRunRecord", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("appends one record per call", async () => {
    const logFile = join(dir, "logs", "docsift.log");

    await appendRunRecord(logFile, record({ query: "first" }));
    await appendRunRecord(logFile, record({ query: "second" }));

    const text = await fs.readFile(logFile, "utf-8");
    expect(text.match(/^==== docsift run /gm)).toHaveLength(2);
    expect(text.indexOf("Query: first")).toBeLessThan(text.indexOf("Query: second"));
  });

  it("warns instead of throwing when the log cannot be written", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    // a directory in place of the log file makes appendFile fail
    const logFile = join(dir, "taken");
    await fs.mkdir(logFile);

    await expect(appendRunRecord(logFile, record())).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^⚠️ Could not write run log /);
  });
});
