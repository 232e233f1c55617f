import { describe, expect, it } from "vitest";
import {
  ConfigError,
  ExecutionError,
  GenerationError,
  isDocsiftError,
} from "./errors.js";
import { parseCommandLines } from "./plan.js";
import type { ExecutionResult } from "./types.js";

function result(command: string, exitCode: number | null, error?: string): ExecutionResult {
  return { command, argv: command.split(" "), exitCode, stdout: "", stderr: "", error };
}

describe("errors", () => {
  it("tags each subclass with a code", () => {
    expect(new ConfigError("missing key").code).toBe("CONFIG_ERROR");
    expect(new GenerationError("bad reply", "raw").code).toBe("GENERATION_ERROR");
    expect(isDocsiftError(new ConfigError("missing key"))).toBe(true);
    expect(isDocsiftError(new Error("plain"))).toBe(false);
  });

  it("describes which commands ran and which did not", () => {
    const error = new ExecutionError(
      result("mv a.txt b/", 1),
      [result("mkdir b", 0)],
      parseCommandLines(["mkdir c", "mkdir d"])
    );

    expect(error.message).toBe(
      'Command "mv a.txt b/" exited with code 1. 1 command(s) ran before it, 2 not run.'
    );
    expect(error.name).toBe("ExecutionError");
  });

  it("uses the spawn error when the program never started", () => {
    const error = new ExecutionError(
      result("nope x", null, "could not be started: spawn nope ENOENT"),
      [],
      []
    );

    expect(error.message).toBe(
      'Command "nope x" could not be started: spawn nope ENOENT. 0 command(s) ran before it, 0 not run.'
    );
  });
});
