import type { GenerationError } from "../errors";
import type { Result } from "../utils/result";

export type GenerationRequest = {
  /** Source text as sent to the model, after truncation. */
  content: string;
  requestedCount: number;
  prompt: string;
  truncated: boolean;
};

export interface TextGenerator {
  /** Resolves with the raw model text or a classified failure; never rejects. */
  generate(request: GenerationRequest): Promise<Result<string, GenerationError>>;
}
