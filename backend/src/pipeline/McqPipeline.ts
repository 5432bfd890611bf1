import path from "path";
import {
  ArtifactWriteError,
  NoValidRecordsError,
  describeError,
  type PipelineError,
} from "../errors";
import { extractText, type TextExtractor } from "../extraction/extractText";
import type { SourceFormat } from "../extraction/formats";
import { buildMcqRequest } from "../llm/buildPrompt";
import type { TextGenerator } from "../llm/types";
import { parseMcqBlocks } from "../mcq/parseMcqs";
import type { McqResultSet } from "../mcq/types";
import { renderArtifacts, type OutputArtifacts } from "../render/renderArtifacts";
import { artifactFilenames, writeArtifacts, type ArtifactWriter } from "../render/writeArtifacts";
import { createChildLogger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";

export type PipelineConfig = Readonly<{
  resultsDir: string;
  maxInputChars: number;
}>;

export type PipelineDeps = {
  generator: TextGenerator;
  extractor?: TextExtractor;
  writer?: ArtifactWriter;
};

export type PipelineOutput = {
  transcriptPath: string;
  documentPath: string;
  transcriptFilename: string;
  documentFilename: string;
  transcript: string;
  records: McqResultSet;
  requestedCount: number;
};

/**
 * extract → prompt → generate → parse → render → write, strictly in that
 * order. Each run is independent; the only shared resource is the results
 * directory.
 */
export class McqPipeline {
  private readonly extractor: TextExtractor;
  private readonly writer: ArtifactWriter;
  private readonly generator: TextGenerator;

  constructor(
    private readonly config: PipelineConfig,
    deps: PipelineDeps
  ) {
    this.generator = deps.generator;
    this.extractor = deps.extractor ?? extractText;
    this.writer = deps.writer ?? writeArtifacts;
  }

  /**
   * `sourceName` is the client's filename; artifact names derive from its
   * stem. Defaults to the basename of `filePath`.
   */
  async run(
    filePath: string,
    declaredFormat: SourceFormat,
    requestedCount: number,
    sourceName: string = path.basename(filePath)
  ): Promise<Result<PipelineOutput, PipelineError>> {
    const stem = path.parse(sourceName).name;
    const log = createChildLogger({ source: sourceName, requestedCount });

    const extracted = await this.extractor(filePath, declaredFormat);
    if (!extracted.ok) return extracted;

    const request = buildMcqRequest(extracted.value, requestedCount, this.config.maxInputChars);
    if (request.truncated) {
      log.info(
        { originalLength: extracted.value.length, sentLength: request.content.length },
        "Source text truncated before generation"
      );
    }

    const generated = await this.generator.generate(request);
    if (!generated.ok) {
      log.warn({ code: generated.error.code, reason: generated.error.message }, "Generation failed");
      return generated;
    }

    const { records, discarded } = parseMcqBlocks(generated.value);
    if (discarded.length > 0) {
      log.info({ discarded }, "Dropped malformed MCQ blocks");
    }
    if (records.length === 0) {
      return err(new NoValidRecordsError("The model response contained no valid MCQs"));
    }
    if (records.length < requestedCount) {
      log.warn({ generated: records.length }, "Fewer MCQs than requested");
    }

    let artifacts: OutputArtifacts;
    try {
      artifacts = await renderArtifacts(records);
    } catch (error) {
      return err(
        new ArtifactWriteError(`Rendering MCQ artifacts failed: ${describeError(error)}`, {
          cause: error,
        })
      );
    }
    const written = await this.writer(this.config.resultsDir, stem, artifacts);
    if (!written.ok) {
      log.error({ reason: written.error.message }, "Artifact write failed");
      return written;
    }

    const names = artifactFilenames(stem);
    log.info({ generated: records.length }, "MCQ generation completed");
    return ok({
      ...written.value,
      transcriptFilename: names.transcript,
      documentFilename: names.document,
      transcript: artifacts.transcript,
      records,
      requestedCount,
    });
  }
}
