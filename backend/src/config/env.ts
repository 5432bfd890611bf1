/**
 * Process configuration, read once at start-up and frozen.
 *
 * Numeric values that are missing or unparsable fall back to their defaults.
 */
import path from "path";
import dotenv from "dotenv";
import type { RetryPolicy } from "../utils/retry";
import { DEFAULT_RETRY_POLICY } from "../utils/retry";
import type { SourceFormat } from "../extraction/formats";

dotenv.config();

export type AppConfig = Readonly<{
  port: number;
  geminiApiKey?: string;
  geminiModel: string;
  uploadDir: string;
  resultsDir: string;
  allowedFormats: readonly SourceFormat[];
  /** Characters of extracted text sent to the model; the rest is dropped. */
  maxInputChars: number;
  maxQuestionCount: number;
  generationTimeoutMs: number;
  retry: Readonly<RetryPolicy>;
}>;

export const DEFAULT_MODEL = "gemini-2.5-flash";
export const DEFAULT_MAX_INPUT_CHARS = 30_000;

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) || num <= 0 ? defaultValue : num;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cwd = process.cwd();
  return Object.freeze({
    port: parseNumericEnv(env.PORT, 8585),
    geminiApiKey: env.GEMINI_API_KEY || undefined,
    geminiModel: env.GEMINI_MODEL || DEFAULT_MODEL,
    uploadDir: path.resolve(cwd, env.UPLOAD_DIR || "uploads"),
    resultsDir: path.resolve(cwd, env.RESULTS_DIR || "results"),
    allowedFormats: Object.freeze<SourceFormat[]>(["pdf", "text", "docx"]),
    maxInputChars: parseNumericEnv(env.MCQ_MAX_INPUT_CHARS, DEFAULT_MAX_INPUT_CHARS),
    maxQuestionCount: parseNumericEnv(env.MAX_QUESTION_COUNT, 50),
    generationTimeoutMs: parseNumericEnv(env.GENERATION_TIMEOUT_MS, 60_000),
    retry: Object.freeze({
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: parseNumericEnv(
        env.GENERATION_MAX_ATTEMPTS,
        DEFAULT_RETRY_POLICY.maxAttempts
      ),
      initialDelayMs: parseNumericEnv(
        env.GENERATION_RETRY_INITIAL_DELAY_MS,
        DEFAULT_RETRY_POLICY.initialDelayMs
      ),
      maxDelayMs: parseNumericEnv(
        env.GENERATION_RETRY_MAX_DELAY_MS,
        DEFAULT_RETRY_POLICY.maxDelayMs
      ),
    }),
  });
}
