import type { McqRecord, McqResultSet } from "../mcq/types";

/**
 * Canonical text of one MCQ, in the same line format the model is asked for.
 */
export function formatMcqBlock(record: McqRecord): string {
  return [
    `Question: ${record.question}`,
    ...record.options.map((option) => `${option.label}) ${option.text}`),
    `Correct Answer: ${record.correctLabel}`,
  ].join("\n");
}

export function renderTranscript(records: McqResultSet): string {
  if (records.length === 0) return "";
  return records.map(formatMcqBlock).join("\n\n") + "\n";
}
