import axios, { type AxiosRequestConfig } from "axios";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { buildFormPrompt } from "./formPrompt.js";
import { logger } from "./logger.js";

/** The slice of an axios instance the generators rely on. */
export interface HttpClient {
  post(url: string, data: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

export interface FormSchemaGenerator {
  /** Shown to users, e.g. "Gemini (gemini-2.5-flash)" */
  readonly label: string;
  /** Sends the full prompt and returns the model's raw text. */
  complete(promptText: string): Promise<string>;
}

const GEMINI_ENDPOINT = "https://generativelanguage.googleapis.com/v1beta/models";

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string() })).min(1),
        }),
      }),
    )
    .min(1),
});

const OllamaChatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

export class UnexpectedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnexpectedResponseError";
  }
}

export class GeminiGenerator implements FormSchemaGenerator {
  readonly label: string;

  constructor(
    private readonly http: HttpClient,
    private readonly apiKey: string,
    private readonly model: string,
  ) {
    this.label = `Gemini (${model})`;
  }

  async complete(promptText: string): Promise<string> {
    const response = await this.http.post(
      `${GEMINI_ENDPOINT}/${this.model}:generateContent`,
      {
        contents: [{ parts: [{ text: promptText }] }],
        generationConfig: { responseMimeType: "application/json", temperature: 0 },
      },
      { headers: { "Content-Type": "application/json", "x-goog-api-key": this.apiKey } },
    );

    const parsed = GeminiResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UnexpectedResponseError(
        "Cloud API returned an unexpected response structure. Check API key permissions.",
      );
    }
    return parsed.data.candidates[0].content.parts[0].text;
  }
}

export class OllamaGenerator implements FormSchemaGenerator {
  readonly label: string;

  constructor(
    private readonly http: HttpClient,
    private readonly baseUrl: string,
    private readonly model: string,
  ) {
    this.label = `Ollama (${model})`;
  }

  async complete(promptText: string): Promise<string> {
    const response = await this.http.post(`${this.baseUrl}/api/chat`, {
      model: this.model,
      messages: [{ role: "user", content: promptText }],
      format: "json",
      stream: false,
      options: { temperature: 0 },
    });

    const parsed = OllamaChatResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UnexpectedResponseError("Ollama returned a reply without message content.");
    }
    return parsed.data.message.content;
  }
}

export function createGenerator(config: AppConfig, http?: HttpClient): FormSchemaGenerator {
  const client = http ?? axios.create({ timeout: config.llmTimeoutMs });
  if (config.gemini) {
    return new GeminiGenerator(client, config.gemini.apiKey, config.gemini.model);
  }
  return new OllamaGenerator(client, config.ollama.baseUrl, config.ollama.model);
}

/**
 * Asks the model for a form schema. Failures come back as a clarification
 * document rather than an exception, so callers always get JSON text.
 */
export async function generateFormJson(
  generator: FormSchemaGenerator,
  prompt: string,
): Promise<string> {
  logger.info("Generating form schema", { generator: generator.label, promptLength: prompt.length });
  try {
    return await generator.complete(buildFormPrompt(prompt));
  } catch (err) {
    const reason = describeFailure(err);
    logger.warn("Form schema generation failed", { generator: generator.label, reason });
    return JSON.stringify({ clarification: `${generator.label} error: ${reason}` });
  }
}

function describeFailure(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response) {
      return `request failed with status ${err.response.status}`;
    }
    return `connection failed (${err.code ?? "no response"}): ${err.message}`;
  }
  return errorMessage(err);
}
