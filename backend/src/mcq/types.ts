export const OPTION_LABELS = ["A", "B", "C", "D"] as const;

export type OptionLabel = (typeof OPTION_LABELS)[number];

export type McqOption = {
  label: OptionLabel;
  text: string;
};

export type McqRecord = {
  question: string;
  options: readonly [McqOption, McqOption, McqOption, McqOption];
  correctLabel: OptionLabel;
};

export type McqResultSet = readonly McqRecord[];

export type DiscardReason =
  | "missing-question"
  | "missing-option"
  | "missing-answer"
  | "invalid-answer";

export type DiscardedBlock = {
  /** Position of the block among the non-blank blocks of the response. */
  index: number;
  reason: DiscardReason;
};

export type ParsedMcqs = {
  records: McqResultSet;
  discarded: readonly DiscardedBlock[];
};

export function isOptionLabel(value: string): value is OptionLabel {
  return OPTION_LABELS.some((label) => label === value);
}
