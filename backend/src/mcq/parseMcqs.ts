import { MCQ_DELIMITER } from "../llm/mcqPrompt";
import {
  isOptionLabel,
  type DiscardReason,
  type McqRecord,
  type McqResultSet,
  type OptionLabel,
  type ParsedMcqs,
} from "./types";

// Model output drifts: bold markers, stray list bullets, odd casing.
const QUESTION_LINE = /^[*\-\s]*question\s*:\s*\**\s*(.*)$/i;
const OPTION_LINE = /^[*\-\s]*([A-D])\s*\)\s*\**\s*(.*)$/;
const ANSWER_LINE = /^[*\-\s]*correct\s+answer\s*:\s*\**\s*(.*)$/i;
const ANSWER_LETTER = /^(?:option\s+)?\(?([A-D])(?:[).:\s*]|$)/i;

type BlockOutcome = { record: McqRecord } | { reason: DiscardReason };

const cleanField = (value: string) => value.replace(/\*+$/, "").trim();

export function normalizeAnswerLabel(value: string): OptionLabel | undefined {
  const match = cleanField(value).match(ANSWER_LETTER);
  const label = match?.[1]?.toUpperCase();
  return label !== undefined && isOptionLabel(label) ? label : undefined;
}

function parseBlock(block: string): BlockOutcome {
  const lines = block.split(/\r?\n/).map((line) => line.trim());

  const questionAt = lines.findIndex((line) => QUESTION_LINE.test(line));
  if (questionAt < 0) return { reason: "missing-question" };
  const question = cleanField(lines[questionAt].match(QUESTION_LINE)?.[1] ?? "");
  if (!question) return { reason: "missing-question" };

  const options: Partial<Record<OptionLabel, string>> = {};
  for (const line of lines.slice(questionAt + 1)) {
    const match = line.match(OPTION_LINE);
    if (!match) continue;
    const label = match[1];
    if (isOptionLabel(label) && options[label] === undefined) {
      options[label] = cleanField(match[2]);
    }
  }
  const { A, B, C, D } = options;
  if (!A || !B || !C || !D) return { reason: "missing-option" };

  const answerLine = lines.find((line) => ANSWER_LINE.test(line));
  if (answerLine === undefined) return { reason: "missing-answer" };
  const correctLabel = normalizeAnswerLabel(answerLine.match(ANSWER_LINE)?.[1] ?? "");
  if (!correctLabel) return { reason: "invalid-answer" };

  return {
    record: {
      question,
      options: [
        { label: "A", text: A },
        { label: "B", text: B },
        { label: "C", text: C },
        { label: "D", text: D },
      ],
      correctLabel,
    },
  };
}

/**
 * Split a raw model response into MCQ records. Blocks that cannot be
 * reconstructed are dropped and reported; this never throws.
 */
export function parseMcqBlocks(raw: string): ParsedMcqs {
  const records: McqRecord[] = [];
  const discarded: { index: number; reason: DiscardReason }[] = [];

  raw
    .split(MCQ_DELIMITER)
    .filter((block) => block.trim() !== "")
    .forEach((block, index) => {
      const outcome = parseBlock(block);
      if ("record" in outcome) records.push(outcome.record);
      else discarded.push({ index, reason: outcome.reason });
    });

  return { records, discarded };
}

export function parseMcqs(raw: string): McqResultSet {
  return parseMcqBlocks(raw).records;
}
