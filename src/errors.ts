import type { ExecutionResult, PlannedCommand } from "./types.js";

/** Base error for docsift. Carries a `code` and optional `context`. */
export class DocsiftError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = "DOCSIFT_ERROR",
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DocsiftError";
    this.code = code;
    this.context = context;
  }
}

/** Missing credentials or invalid configuration values. */
export class ConfigError extends DocsiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/** Bad CLI input: unknown directory, depth out of range. */
export class ValidationError extends DocsiftError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * The model call failed, timed out, or its reply could not be turned into
 * commands. `rawResponse` is set when a reply was received.
 */
export class GenerationError extends DocsiftError {
  readonly rawResponse?: string;

  constructor(
    message: string,
    rawResponse?: string,
    context?: Record<string, unknown>
  ) {
    super(message, "GENERATION_ERROR", context);
    this.name = "GenerationError";
    this.rawResponse = rawResponse;
  }
}

/** A planned command failed; the remaining ones were not run. */
export class ExecutionError extends DocsiftError {
  readonly completed: ExecutionResult[];
  readonly failed: ExecutionResult;
  readonly notRun: PlannedCommand[];

  constructor(
    failed: ExecutionResult,
    completed: ExecutionResult[],
    notRun: PlannedCommand[]
  ) {
    const reason =
      failed.error ?? `exited with code ${failed.exitCode ?? "unknown"}`;
    super(
      `Command "${failed.command}" ${reason}. ${completed.length} command(s) ran before it, ${notRun.length} not run.`,
      "EXECUTION_ERROR"
    );
    this.name = "ExecutionError";
    this.completed = completed;
    this.failed = failed;
    this.notRun = notRun;
  }
}

export function isDocsiftError(error: unknown): error is DocsiftError {
  return error instanceof DocsiftError;
}
