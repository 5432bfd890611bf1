export const MCQ_DELIMITER = "## MCQ";

export function mcqInstructions(count: number, sourceText: string): string {
  return `
You are an assistant that writes multiple-choice questions (MCQs) about a document.

DOCUMENT
"""
${sourceText}
"""

TASK
- Generate exactly ${count} MCQs answerable from the document alone.
- Each MCQ has one clear question and four answer options labelled A, B, C and D.
- Exactly one option is correct.

FORMAT
- Start every MCQ with a line containing only "${MCQ_DELIMITER}".
- Use exactly these line prefixes, one field per line, and nothing else:
${MCQ_DELIMITER}
Question: [question]
A) [option A]
B) [option B]
C) [option C]
D) [option D]
Correct Answer: [letter of the correct option]
`;
}
