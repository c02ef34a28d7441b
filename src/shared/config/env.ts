import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  FILINGS_ROOT: z.string().default("."),
  FILINGS_DIR_NAME: z.string().default("SnP500_filings"),
  PAGE_PATTERN_CACHE_PATH: z.string().default(".cache/page-patterns.json"),
  SECTION_MIN_LENGTH: z.coerce.number().int().nonnegative().optional(),
  KEYWORD_WINDOW_SIZE: z.coerce.number().int().nonnegative().default(4_000),
  BATCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  OLLAMA_BASE_URL: z.string().default("http://localhost:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_CHAT_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

/**
 * Splits a comma-separated ticker list into canonical upper-case symbols.
 */
export const parseTickerList = (raw: string): string[] =>
  Array.from(
    new Set(
      raw
        .split(",")
        .map((item) => item.trim().toUpperCase())
        .filter(Boolean),
    ),
  );
