import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import {
  EmptyResponseError,
  GenerationFailure,
  describeError,
  type GenerationError,
} from "../errors";
import { logger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";
import { TimeoutError, withTimeout } from "../utils/withTimeout";
import { classifyResponse, payloadText, type GeminiResponseLike } from "./responsePayload";
import type { GenerationRequest, TextGenerator } from "./types";

/** The part of `GoogleGenAI["models"]` this client calls. */
export interface ContentModels {
  generateContent(params: GenerateContentParameters): Promise<GeminiResponseLike>;
}

export type GeminiOptions = {
  model: string;
  timeoutMs: number;
};

export class GeminiTextGenerator implements TextGenerator {
  constructor(
    private readonly models: ContentModels,
    private readonly options: GeminiOptions
  ) {}

  async generate(request: GenerationRequest): Promise<Result<string, GenerationError>> {
    const controller = new AbortController();
    const startedAt = Date.now();

    let response: GeminiResponseLike;
    try {
      response = await withTimeout(
        this.models.generateContent({
          model: this.options.model,
          contents: [{ role: "user", parts: [{ text: request.prompt }] }],
          config: { abortSignal: controller.signal },
        }),
        this.options.timeoutMs,
        "Gemini generateContent",
        () => controller.abort()
      );
    } catch (error) {
      return err(toGenerationFailure(error));
    }

    const payload = classifyResponse(response);
    const text = payloadText(payload);
    logger.debug(
      {
        model: this.options.model,
        payloadKind: payload.kind,
        textLength: text.length,
        durationMs: Date.now() - startedAt,
      },
      "Gemini response received"
    );

    if (!text) {
      return err(new EmptyResponseError("Gemini returned no text"));
    }
    return ok(text);
  }
}

/**
 * Stands in for the Gemini client when no API key is configured.
 */
export class UnconfiguredTextGenerator implements TextGenerator {
  async generate(): Promise<Result<string, GenerationError>> {
    return err(new GenerationFailure("GEMINI_API_KEY is not set"));
  }
}

export function createGeminiGenerator(config: {
  geminiApiKey?: string;
  geminiModel: string;
  generationTimeoutMs: number;
}): TextGenerator {
  if (!config.geminiApiKey) {
    logger.error("GEMINI_API_KEY environment variable is not set; generation will fail");
    return new UnconfiguredTextGenerator();
  }
  const ai = new GoogleGenAI({ apiKey: config.geminiApiKey });
  return new GeminiTextGenerator(ai.models, {
    model: config.geminiModel,
    timeoutMs: config.generationTimeoutMs,
  });
}

function toGenerationFailure(error: unknown): GenerationFailure {
  if (error instanceof TimeoutError) {
    return new GenerationFailure(error.message, { timedOut: true, cause: error });
  }
  const status =
    error && typeof error === "object" && "status" in error && typeof error.status === "number"
      ? error.status
      : undefined;
  return new GenerationFailure(describeError(error), { status, cause: error });
}
