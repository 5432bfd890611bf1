import type { McqRecord } from "../src/mcq/types";

export function mcqBlock(n: number, answer = "B"): string {
  return [
    "## MCQ",
    `Question: What is fact ${n}?`,
    `A) wrong ${n}`,
    `B) right ${n}`,
    `C) also wrong ${n}`,
    `D) never ${n}`,
    `Correct Answer: ${answer}`,
  ].join("\n");
}

export function mcqRecord(n: number): McqRecord {
  return {
    question: `What is fact ${n}?`,
    options: [
      { label: "A", text: `wrong ${n}` },
      { label: "B", text: `right ${n}` },
      { label: "C", text: `also wrong ${n}` },
      { label: "D", text: `never ${n}` },
    ],
    correctLabel: "B",
  };
}
