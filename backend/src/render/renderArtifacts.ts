import type { McqResultSet } from "../mcq/types";
import { renderMcqPdf } from "./pdfDocument";
import { renderTranscript } from "./transcript";

export type OutputArtifacts = {
  transcript: string;
  /** PDF bytes. */
  document: Buffer;
};

export async function renderArtifacts(records: McqResultSet): Promise<OutputArtifacts> {
  return {
    transcript: renderTranscript(records),
    document: await renderMcqPdf(records),
  };
}
