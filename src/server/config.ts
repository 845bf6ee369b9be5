import { readFile } from "node:fs/promises";
import path, { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./core/errors";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DATA_DIR = path.join(__dirname, "../../data");

export interface EngineConfig {
  /** Phrase window capacity, in words. */
  maxPhraseLength: number;
  /** Shortest phrase scored, in characters. */
  minPhraseLength: number;
  minSimilarity: number;
  enablePartialMatching: boolean;
  recentPhrasesSize: number;
  /** Milliseconds; 0 disables the timeout. */
  suggestionTimeout: number;
  maxSuggestions: number;
  minSuggestions: number;
}

// Timers clamp longer delays to 1 ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

// Unknown keys are dropped by z.object.
const engineConfigSchema = z
  .object({
    max_phrase_length: z.number().int().min(1).default(10),
    min_phrase_length: z.number().int().min(0).default(3),
    min_similarity: z.number().min(0).max(1).default(0.5),
    enable_partial_matching: z.boolean().default(true),
    recent_phrases_size: z.number().int().min(1).default(50),
    suggestion_timeout: z.number().int().min(0).max(MAX_TIMER_DELAY_MS).default(8000),
    max_suggestions: z.number().int().min(1).default(10),
    min_suggestions: z.number().int().min(0).default(3),
  })
  .refine(c => c.min_suggestions <= c.max_suggestions, {
    message: "min_suggestions must not exceed max_suggestions",
    path: ["min_suggestions"],
  });

function toEngineConfig(c: z.infer<typeof engineConfigSchema>): EngineConfig {
  return {
    maxPhraseLength: c.max_phrase_length,
    minPhraseLength: c.min_phrase_length,
    minSimilarity: c.min_similarity,
    enablePartialMatching: c.enable_partial_matching,
    recentPhrasesSize: c.recent_phrases_size,
    suggestionTimeout: c.suggestion_timeout,
    maxSuggestions: c.max_suggestions,
    minSuggestions: c.min_suggestions,
  };
}

/** Throws a ZodError on invalid input. */
export function parseEngineConfig(raw: unknown): EngineConfig {
  return toEngineConfig(engineConfigSchema.parse(raw));
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = parseEngineConfig({});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Reads a JSON engine config. A missing file means defaults. */
export async function loadEngineConfig(file: string): Promise<EngineConfig> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return DEFAULT_ENGINE_CONFIG;
    throw new ConfigError(file, error instanceof Error ? error.message : String(error), { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(file, "not valid JSON", { cause: error });
  }

  const result = engineConfigSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigError(file, detail, { cause: result.error });
  }
  return toEngineConfig(result.data);
}

export interface ServerSettings {
  httpPort: number;
  keywordsFile: string;
  configFile: string;
  applyAckTimeoutMs: number;
}

// ────────────────  Runtime config (ENV‑driven)  ───────────────────────────
export function readServerSettings(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  return {
    httpPort: Number(env.HTTP_PORT ?? 5500),
    keywordsFile: env.KEYWORDS_FILE ?? path.join(DATA_DIR, "keywords.txt"),
    configFile: env.CONFIG_FILE ?? path.join(DATA_DIR, "config.json"),
    applyAckTimeoutMs: Number(env.APPLY_ACK_TIMEOUT_MS ?? 5000),
  };
}
