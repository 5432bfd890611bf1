/**
 * Failure taxonomy for a pipeline run.
 *
 * Every stage hands these back inside a `Result` instead of throwing; the HTTP
 * layer turns them into status codes with `httpStatusFor`.
 */

export type FailureStage = "extraction" | "generation" | "parse" | "render";

export abstract class McqPipelineError extends Error {
  abstract readonly code: string;
  abstract readonly stage: FailureStage;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---- extraction ----

export class UnsupportedFormatError extends McqPipelineError {
  readonly code = "UNSUPPORTED_FORMAT";
  readonly stage = "extraction";
}

export class DecodeError extends McqPipelineError {
  readonly code = "DECODE_ERROR";
  readonly stage = "extraction";
}

export class EmptyContentError extends McqPipelineError {
  readonly code = "EMPTY_CONTENT";
  readonly stage = "extraction";
}

export class SourceReadError extends McqPipelineError {
  readonly code = "SOURCE_READ_ERROR";
  readonly stage = "extraction";
}

export type ExtractionFailure =
  | UnsupportedFormatError
  | DecodeError
  | EmptyContentError
  | SourceReadError;

// ---- generation ----

export class GenerationFailure extends McqPipelineError {
  readonly code = "GENERATION_FAILED";
  readonly stage = "generation";
  /** Upstream error detail, kept for logs. */
  readonly detail: string;
  readonly timedOut: boolean;
  /** HTTP status reported by the upstream service, when it gave one. */
  readonly status?: number;

  constructor(
    detail: string,
    options: { timedOut?: boolean; status?: number; cause?: unknown } = {}
  ) {
    super(
      options.timedOut
        ? `MCQ generation timed out: ${detail}`
        : `MCQ generation failed: ${detail}`,
      { cause: options.cause }
    );
    this.detail = detail;
    this.timedOut = options.timedOut ?? false;
    this.status = options.status;
  }
}

export class EmptyResponseError extends McqPipelineError {
  readonly code = "EMPTY_RESPONSE";
  readonly stage = "generation";
}

export type GenerationError = GenerationFailure | EmptyResponseError;

// ---- parse / render ----

export class NoValidRecordsError extends McqPipelineError {
  readonly code = "NO_VALID_RECORDS";
  readonly stage = "parse";
}

export class ArtifactWriteError extends McqPipelineError {
  readonly code = "ARTIFACT_WRITE_FAILED";
  readonly stage = "render";
}

export type PipelineError =
  | ExtractionFailure
  | GenerationError
  | NoValidRecordsError
  | ArtifactWriteError;

export function httpStatusFor(error: PipelineError): number {
  if (error instanceof UnsupportedFormatError) return 415;
  if (error instanceof GenerationFailure) return error.timedOut ? 504 : 502;
  if (error instanceof EmptyResponseError) return 502;
  if (error instanceof ArtifactWriteError || error instanceof SourceReadError) {
    return 500;
  }
  // DecodeError, EmptyContentError, NoValidRecordsError
  return 422;
}

/** Best-effort message for anything caught from a library call. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
