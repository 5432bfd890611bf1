import { GenerationFailure, type GenerationError } from "../errors";
import { logger } from "../utils/logger";
import type { Result } from "../utils/result";
import {
  calculateBackoffDelay,
  isTransientError,
  sleep,
  type RetryPolicy,
} from "../utils/retry";
import type { GenerationRequest, TextGenerator } from "./types";

function isRetryable(error: GenerationError): boolean {
  if (!(error instanceof GenerationFailure)) return false;
  if (error.timedOut) return true;
  if (error.status !== undefined) return isTransientError({ status: error.status });
  return isTransientError(error.cause);
}

/**
 * Decorates a generator with bounded retries and exponential backoff.
 * Only transient upstream failures are retried; an empty answer is final.
 */
export class RetryingTextGenerator implements TextGenerator {
  constructor(
    private readonly inner: TextGenerator,
    private readonly policy: RetryPolicy,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  async generate(request: GenerationRequest): Promise<Result<string, GenerationError>> {
    const attempts = Math.max(1, this.policy.maxAttempts);

    let result = await this.inner.generate(request);
    for (let retry = 0; retry < attempts - 1; retry++) {
      if (result.ok || !isRetryable(result.error)) break;

      const delay = calculateBackoffDelay(retry, this.policy);
      logger.warn(
        { attempt: retry + 1, maxAttempts: attempts, delayMs: delay, reason: result.error.message },
        "Retrying MCQ generation after transient failure"
      );
      await this.wait(delay);
      result = await this.inner.generate(request);
    }

    if (!result.ok && attempts > 1) {
      logger.error({ maxAttempts: attempts, reason: result.error.message }, "MCQ generation failed");
    }
    return result;
  }
}
