import { spawn } from "child_process";
import { globSync } from "glob";
import type {
  CommandArg,
  ExecutionReport,
  ExecutionResult,
  Plan,
  PlannedCommand,
} from "./types.js";

export interface ExecuteOptions {
  cwd: string;
}

// unmatched patterns are passed through as-is, like bash without nullglob.
export function resolveArgs(args: readonly CommandArg[], cwd: string): string[] {
  return args.flatMap((arg) => {
    if (typeof arg === "string") return [arg];
    const matches = globSync(arg.glob, { cwd }).sort();
    return matches.length > 0 ? matches : [arg.glob];
  });
}

export function runCommand(
  command: PlannedCommand,
  options: ExecuteOptions
): Promise<ExecutionResult> {
  const argv = resolveArgs(command.args, options.cwd);
  const [program, ...args] = argv;

  if (program === undefined) {
    return Promise.resolve({
      command: command.text,
      argv,
      exitCode: null,
      stdout: "",
      stderr: "",
      error: "is empty",
    });
  }

  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (exitCode: number | null, error?: string) => {
      if (settled) return;
      settled = true;
      resolve({ command: command.text, argv, exitCode, stdout, stderr, error });
    };

    const child = spawn(program, args, {
      cwd: options.cwd,
      shell: false,
      stdio: ["ignore", "pipe", "pipe"],
    });

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", (err) => {
      finish(null, `could not be started: ${err.message}`);
    });
    child.on("close", (code, signal) => {
      finish(code, signal ? `was terminated by ${signal}` : undefined);
    });
  });
}

function succeeded(result: ExecutionResult): boolean {
  return result.exitCode === 0 && result.error === undefined;
}

/**
 * Run the plan in order, stopping at the first command that cannot start or
 * exits non-zero. Commands after it are reported in `notRun`.
 */
export async function executePlan(
  plan: Plan,
  options: ExecuteOptions
): Promise<ExecutionReport> {
  const results: ExecutionResult[] = [];

  for (const [index, command] of plan.entries()) {
    console.log(`\n🚀 [${index + 1}/${plan.length}] $ ${command.text}`);
    const result = await runCommand(command, options);
    results.push(result);

    if (result.stdout.trim()) console.log(result.stdout.trim());

    if (!succeeded(result)) {
      const reason = result.error ?? `exit code ${result.exitCode}`;
      console.error(`❌ Execution Error (${reason}):\n${result.stderr.trim()}`);
      return { results, failed: result, notRun: plan.slice(index + 1) };
    }
    if (result.stderr.trim()) {
      console.warn(`⚠️ Command Warnings:\n${result.stderr.trim()}`);
    }
  }

  console.log(`\n✅ All ${results.length} command(s) succeeded.`);
  return { results, notRun: [] };
}
