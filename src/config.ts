import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_FORMS_DIR = path.resolve(__dirname, "..", "forms");

// winston's npm levels
export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().trim().default(""),
  GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash"),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().min(1).default("llama3"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FORMS_DIR: z.string().trim().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type AppConfig = {
  gemini: { apiKey: string; model: string } | null;
  ollama: { baseUrl: string; model: string };
  llmTimeoutMs: number;
  formsDir: string;
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    gemini: e.GEMINI_API_KEY ? { apiKey: e.GEMINI_API_KEY, model: e.GEMINI_MODEL } : null,
    ollama: { baseUrl: e.OLLAMA_BASE_URL.replace(/\/+$/, ""), model: e.OLLAMA_MODEL },
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    formsDir: e.FORMS_DIR ? path.resolve(e.FORMS_DIR) : DEFAULT_FORMS_DIR,
    logLevel: e.LOG_LEVEL,
  };
}
