import { GoogleGenAI, Type, type Schema } from "@google/genai";
import { z } from "zod";
import { GenerationError } from "./errors.js";
import { CommandSyntaxError, parseCommandLines } from "./plan.js";
import { SYSTEM_INSTRUCTION } from "./prompt.js";
import type { Plan } from "./types.js";

export const DEFAULT_MODEL = "gemini-2.5-flash";
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ModelRequest {
  systemInstruction: string;
  prompt: string;
  signal: AbortSignal;
}

/** Text in, text out. */
export interface ModelClient {
  readonly name: string;
  generate(request: ModelRequest): Promise<string>;
}

const PLAN_RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    commands: {
      type: Type.ARRAY,
      items: { type: Type.STRING },
    },
  },
  required: ["commands"],
};

export class GeminiClient implements ModelClient {
  private readonly ai: GoogleGenAI;
  readonly name: string;

  constructor(apiKey: string, model: string = DEFAULT_MODEL) {
    this.ai = new GoogleGenAI({ apiKey });
    this.name = model;
  }

  async generate(request: ModelRequest): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.name,
      contents: [{ role: "user", parts: [{ text: request.prompt }] }],
      config: {
        systemInstruction: {
          parts: [{ text: request.systemInstruction }],
        },
        responseMimeType: "application/json",
        responseSchema: PLAN_RESPONSE_SCHEMA,
        abortSignal: request.signal,
      },
    });

    return response.text ?? "";
  }
}

const PlanResponseSchema = z.union([
  z.object({ commands: z.array(z.string()) }),
  z.array(z.string()),
]);

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function sliceBetween(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start >= 0 && end > start ? text.slice(start, end + 1) : null;
}

/**
 * Pull the command list out of a model reply. Tries the whole reply, then a
 * fenced code block, then the outermost `{...}` and `[...]` slices; the first
 * candidate matching `{ commands: string[] }` (or a bare string array) wins.
 */
export function extractCommandList(raw: string): string[] | null {
  const trimmed = raw.trim();
  const candidates = [
    trimmed,
    trimmed.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/)?.[1]?.trim(),
    sliceBetween(trimmed, "{", "}"),
    sliceBetween(trimmed, "[", "]"),
  ];

  for (const candidate of candidates) {
    if (!candidate) continue;
    const parsed = PlanResponseSchema.safeParse(tryParseJson(candidate));
    if (!parsed.success) continue;
    const commands = Array.isArray(parsed.data)
      ? parsed.data
      : parsed.data.commands;
    return commands.map((command) => command.trim()).filter(Boolean);
  }

  return null;
}

export function parsePlanResponse(raw: string): Plan {
  const commands = extractCommandList(raw);
  if (commands === null) {
    throw new GenerationError(
      "The model response did not contain a command list.",
      raw
    );
  }

  try {
    return parseCommandLines(commands);
  } catch (err) {
    if (err instanceof CommandSyntaxError) {
      throw new GenerationError(err.message, raw);
    }
    throw err;
  }
}

export interface GeneratedPlan {
  rawResponse: string;
  plan: Plan;
}

export interface GeneratorOptions {
  timeoutMs?: number;
}

export class CommandGenerator {
  private readonly timeoutMs: number;

  constructor(
    private readonly client: ModelClient,
    options: GeneratorOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get modelName(): string {
    return this.client.name;
  }

  async generate(prompt: string): Promise<GeneratedPlan> {
    const rawResponse = await this.request(prompt);
    return { rawResponse, plan: parsePlanResponse(rawResponse) };
  }

  private async request(prompt: string): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new GenerationError(
            `The model did not answer within ${this.timeoutMs} ms.`
          )
        );
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        this.client.generate({
          systemInstruction: SYSTEM_INSTRUCTION,
          prompt,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } catch (err) {
      if (err instanceof GenerationError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new GenerationError(`The model request failed: ${message}`);
    } finally {
      clearTimeout(timer);
    }
  }
}
