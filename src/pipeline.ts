import { promises as fs } from "fs";
import { resolve } from "path";
import type { CommandGenerator, GeneratedPlan } from "./ai.js";
import { editPlanInEditor } from "./editor.js";
import { ExecutionError, GenerationError, ValidationError } from "./errors.js";
import { executePlan } from "./executor.js";
import { extractDirectory } from "./extractor.js";
import { buildPrompt } from "./prompt.js";
import { printPlan, reviewPlan } from "./review.js";
import { appendRunRecord, type RunOutcome, type RunRecord } from "./runlog.js";
import type { AskFn, Plan } from "./types.js";

export interface RunOptions {
  source: string;
  query: string;
  depth: number;
  dryRun?: boolean;
  edit?: boolean;
}

export interface PipelineDeps {
  generator: CommandGenerator;
  ask: AskFn;
  logFile: string;
  previewLength?: number;
  // defaults to opening $EDITOR when `edit` is set.
  editPlan?: (plan: Plan) => Promise<Plan>;
  now?: () => Date;
}

export interface RunSummary {
  outcome: Exclude<RunOutcome, "failed">;
  plan: Plan;
  record: RunRecord;
}

async function assertDirectory(dir: string): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(dir)).isDirectory();
  } catch {
    throw new ValidationError(`Source directory ${dir} does not exist.`);
  }
  if (!isDirectory) {
    throw new ValidationError(`Source ${dir} is not a directory.`);
  }
}

/**
 * Scan, plan, review and execute. The run record is appended to the log in
 * every case, including failures.
 */
export async function runOrganizer(
  options: RunOptions,
  deps: PipelineDeps
): Promise<RunSummary> {
  const root = resolve(options.source);
  const record: RunRecord = {
    timestamp: (deps.now ?? (() => new Date()))(),
    sourceDir: root,
    query: options.query,
    depth: options.depth,
    model: deps.generator.modelName,
    warnings: [],
    commands: [],
    results: [],
    notRun: [],
    outcome: "failed",
  };

  const finish = (outcome: RunSummary["outcome"], plan: Plan): RunSummary => {
    record.outcome = outcome;
    return { outcome, plan, record };
  };

  try {
    if (!Number.isInteger(options.depth) || options.depth < 1) {
      throw new ValidationError(
        `Depth must be a positive integer, got ${options.depth}.`
      );
    }
    await assertDirectory(root);

    console.log(`🔍 Scanning ${root} (depth ${options.depth})...`);
    const { entries, warnings } = await extractDirectory(root, {
      depth: options.depth,
      previewLength: deps.previewLength,
    });
    record.warnings = warnings;
    for (const warning of warnings) {
      console.warn(`⚠️ ${warning.path}: ${warning.message}`);
    }
    console.log(`📄 Found ${entries.length} supported file(s).`);

    record.prompt = buildPrompt({
      query: options.query,
      root,
      depth: options.depth,
      entries,
    });

    console.log(`🤖 Asking ${deps.generator.modelName} for a plan...`);
    let generated: GeneratedPlan;
    try {
      generated = await deps.generator.generate(record.prompt);
    } catch (err) {
      if (err instanceof GenerationError) record.rawResponse = err.rawResponse;
      throw err;
    }
    let plan = generated.plan;
    record.rawResponse = generated.rawResponse;
    record.commands = plan.map((command) => command.text);

    if (plan.length === 0) {
      console.log("\n✨ Nothing to do: the model proposed no commands.");
      return finish("empty_plan", plan);
    }

    if (options.dryRun) {
      printPlan(plan);
      console.log("\n🧪 Dry run: no commands were executed.");
      return finish("dry_run", plan);
    }

    if (options.edit) {
      plan = await (deps.editPlan ?? editPlanInEditor)(plan);
      record.editedCommands = plan.map((command) => command.text);
      if (plan.length === 0) {
        console.log("\n✨ Nothing to do: the edited plan is empty.");
        return finish("empty_plan", plan);
      }
    }

    record.review = await reviewPlan(plan, deps.ask);
    if (record.review !== "approved") {
      return finish("rejected", plan);
    }

    const report = await executePlan(plan, { cwd: root });
    record.results = report.results;
    record.notRun = report.notRun.map((command) => command.text);

    if (report.failed) {
      throw new ExecutionError(
        report.failed,
        report.results.slice(0, -1),
        report.notRun
      );
    }
    return finish("completed", plan);
  } catch (err) {
    record.outcome = "failed";
    record.error = err instanceof Error ? err.message : String(err);
    throw err;
  } finally {
    await appendRunRecord(deps.logFile, record);
  }
}
