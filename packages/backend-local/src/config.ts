import { resolve } from "node:path";
import { z } from "zod";

import { resolveLogLevel, type LogLevel } from "./logger.js";

export interface BackendConfig {
  readonly port: number;
  readonly dataDir: string;
  readonly storySeedPath: string;
  readonly llmProvider: "ollama" | "none";
  readonly llmEndpoint: string;
  readonly llmModel: string;
  readonly narrationTimeoutMs: number;
  readonly logLevel: LogLevel;
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  DATA_DIR: z.string().min(1).default("./data"),
  STORY_SEED_PATH: z.string().min(1).optional(),
  LLM_PROVIDER: z.enum(["ollama", "none"]).default("ollama"),
  LLM_ENDPOINT: z.string().url().default("http://localhost:11434/api/generate"),
  LLM_MODEL: z.string().min(1).default("dolphin-mixtral"),
  NARRATION_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
});

/** Reads the server settings from the environment; throws on invalid values. */
export function loadBackendConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const parsed = EnvSchema.parse(blankToUndefined(env));
  const dataDir = resolve(parsed.DATA_DIR);

  return {
    port: parsed.PORT,
    dataDir,
    storySeedPath: resolve(parsed.STORY_SEED_PATH ?? resolve(dataDir, "story_seed.json")),
    llmProvider: parsed.LLM_PROVIDER,
    llmEndpoint: parsed.LLM_ENDPOINT,
    llmModel: parsed.LLM_MODEL,
    narrationTimeoutMs: parsed.NARRATION_TIMEOUT_MS,
    logLevel: resolveLogLevel(env),
  };
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === undefined || value.trim() === "" ? undefined : value;
  }
  return cleaned;
}
