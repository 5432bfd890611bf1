import { randomUUID } from "crypto";
import { mkdir, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { ArtifactWriteError, describeError } from "../errors";
import { logger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";
import type { OutputArtifacts } from "./renderArtifacts";

export type ArtifactPaths = {
  transcriptPath: string;
  documentPath: string;
};

export type ArtifactWriter = (
  dir: string,
  stem: string,
  artifacts: OutputArtifacts
) => Promise<Result<ArtifactPaths, ArtifactWriteError>>;

export function artifactFilenames(stem: string) {
  return {
    transcript: `generated_mcqs_${stem}.txt`,
    document: `generated_mcqs_${stem}.pdf`,
  };
}

/**
 * Write both artifacts next to each other. Files are staged under unique temp
 * names and renamed into place, so a failed run leaves nothing under the
 * final names.
 */
export const writeArtifacts: ArtifactWriter = async (dir, stem, artifacts) => {
  const names = artifactFilenames(stem);
  const transcriptPath = path.join(dir, names.transcript);
  const documentPath = path.join(dir, names.document);
  const tag = randomUUID();
  const staged = [`${transcriptPath}.${tag}.tmp`, `${documentPath}.${tag}.tmp`];
  const placed: string[] = [];

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(staged[0], artifacts.transcript, "utf-8");
    await writeFile(staged[1], artifacts.document);
    await rename(staged[0], transcriptPath);
    placed.push(transcriptPath);
    await rename(staged[1], documentPath);
    placed.push(documentPath);
  } catch (error) {
    await Promise.all(
      [...staged, ...placed].map((file) =>
        rm(file, { force: true }).catch((cleanupError: unknown) => {
          logger.warn({ file, error: describeError(cleanupError) }, "Failed to remove artifact");
        })
      )
    );
    return err(
      new ArtifactWriteError(`Writing MCQ artifacts failed: ${describeError(error)}`, {
        cause: error,
      })
    );
  }

  return ok({ transcriptPath, documentPath });
};
