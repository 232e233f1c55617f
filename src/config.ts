import { promises as fs } from "fs";
import { dirname, join, resolve } from "path";
import { homedir } from "os";
import { z } from "zod";
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from "./ai.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_PREVIEW_LENGTH } from "./extractor.js";
import type { AskFn } from "./types.js";

export const CONFIG_PATH = join(homedir(), ".docsift", "config.json");
export const DEFAULT_LOG_FILE = "docsift.log";

const StoredConfigSchema = z
  .object({
    geminiApiKey: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    previewLength: z.number().int().positive().optional(),
  })
  .passthrough();

export type StoredConfig = z.infer<typeof StoredConfigSchema>;
export type ConfigKey = "geminiApiKey" | "model" | "timeoutMs" | "previewLength";

/** Everything the pipeline needs, resolved once and passed down. */
export interface AppConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
  previewLength: number;
  logFile: string;
}

export interface ConfigOverrides {
  model?: string;
  timeoutMs?: number;
  logFile?: string;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  cwd?: string;
  // prompt for a missing API key; when unset, a missing key is an error.
  ask?: AskFn;
}

export async function getConfig(
  configPath: string = CONFIG_PATH
): Promise<StoredConfig> {
  let data: string;
  try {
    data = await fs.readFile(configPath, "utf-8");
  } catch {
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    throw new ConfigError(`Config file ${configPath} is not valid JSON.`);
  }

  const parsed = StoredConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `Invalid config file ${configPath}: ${issue.path.join(".")} ${issue.message}`
    );
  }
  return parsed.data;
}

export async function setConfig(
  key: ConfigKey,
  value: string | number,
  configPath: string = CONFIG_PATH
): Promise<void> {
  await fs.mkdir(dirname(configPath), { recursive: true });

  const config: Record<string, unknown> = await getConfig(configPath);
  config[key] = value;

  await fs.writeFile(configPath, JSON.stringify(config, null, 2));
}

function envString(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

function positiveInt(name: string, raw: string | undefined): number | undefined {
  if (envString(raw) === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}".`);
  }
  return value;
}

async function resolveApiKey(
  stored: StoredConfig,
  env: NodeJS.ProcessEnv,
  configPath: string,
  ask?: AskFn
): Promise<string> {
  const fromEnv = envString(env.GEMINI_API_KEY);
  if (fromEnv) return fromEnv;
  if (stored.geminiApiKey) return stored.geminiApiKey;

  if (!ask) {
    throw new ConfigError(
      `GEMINI_API_KEY not found. Set it in the environment, a .env file, or ${configPath}.`
    );
  }

  const apiKey = (await ask("Enter your GEMINI API key: ")).trim();
  if (!apiKey) {
    throw new ConfigError("No GEMINI API key was entered.");
  }
  await setConfig("geminiApiKey", apiKey, configPath);
  console.log("API key saved for future use.\n");
  return apiKey;
}

/**
 * Resolve the run configuration. Precedence: overrides (CLI flags), then
 * environment, then the user config file, then defaults.
 */
export async function loadConfig(
  overrides: ConfigOverrides = {},
  options: LoadConfigOptions = {}
): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? CONFIG_PATH;
  const cwd = options.cwd ?? process.cwd();
  const stored = await getConfig(configPath);

  const apiKey = await resolveApiKey(stored, env, configPath, options.ask);

  return {
    apiKey,
    model:
      overrides.model ?? envString(env.DOCSIFT_MODEL) ?? stored.model ?? DEFAULT_MODEL,
    timeoutMs:
      overrides.timeoutMs ??
      positiveInt("DOCSIFT_TIMEOUT_MS", env.DOCSIFT_TIMEOUT_MS) ??
      stored.timeoutMs ??
      DEFAULT_TIMEOUT_MS,
    previewLength:
      positiveInt("DOCSIFT_PREVIEW_LENGTH", env.DOCSIFT_PREVIEW_LENGTH) ??
      stored.previewLength ??
      DEFAULT_PREVIEW_LENGTH,
    logFile: resolve(
      cwd,
      overrides.logFile ?? envString(env.DOCSIFT_LOG_FILE) ?? DEFAULT_LOG_FILE
    ),
  };
}
