#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import * as dotenv from "dotenv";
import { CommandGenerator, GeminiClient } from "./ai.js";
import { loadConfig } from "./config.js";
import { isDocsiftError } from "./errors.js";
import { runOrganizer } from "./pipeline.js";
import { askQuestion } from "./review.js";

dotenv.config();

interface CliOptions {
  source: string;
  query: string;
  depth: number;
  dryRun?: boolean;
  edit?: boolean;
  model?: string;
  timeout?: number;
  logFile?: string;
}

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name("docsift")
    .version("1.0.0")
    .description(
      "docsift: organize a folder by what its documents say. Reads previews of PDF, DOCX, TXT, MD and image files, asks Gemini for a plan of file commands, and runs it after you confirm."
    )
    .requiredOption("-s, --source <dir>", "Directory to organize.")
    .requiredOption("-q, --query <text>", "How the files should be organized.")
    .option("-d, --depth <n>", "How many directory levels to scan.", positiveInteger, 1)
    .option("--dry-run", "Show the proposed commands without running them.")
    .option("-e, --edit", "Edit the proposed commands in $EDITOR before review.")
    .option("-m, --model <name>", "Gemini model to use.")
    .option("-t, --timeout <ms>", "Model request timeout in milliseconds.", positiveInteger)
    .option("--log-file <path>", "Run log to append to.")
    .action(async (options: CliOptions) => {
      const config = await loadConfig(
        {
          model: options.model,
          timeoutMs: options.timeout,
          logFile: options.logFile,
        },
        { ask: process.stdin.isTTY ? askQuestion : undefined }
      );

      const generator = new CommandGenerator(
        new GeminiClient(config.apiKey, config.model),
        { timeoutMs: config.timeoutMs }
      );

      await runOrganizer(
        {
          source: options.source,
          query: options.query,
          depth: options.depth,
          dryRun: options.dryRun,
          edit: options.edit,
        },
        {
          generator,
          ask: askQuestion,
          logFile: config.logFile,
          previewLength: config.previewLength,
        }
      );
    });

  return program;
}

async function main() {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (err) {
    if (isDocsiftError(err)) {
      console.error(`\n❌ ${err.message}`);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`\n❌ Unexpected error: ${message}`);
    }
    process.exitCode = 1;
  }
}

await main();
