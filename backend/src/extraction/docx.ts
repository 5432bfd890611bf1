import mammoth from "mammoth";
import { DecodeError, EmptyContentError, describeError } from "../errors";
import { err, ok, type Result } from "../utils/result";

/**
 * Paragraph texts of a DOCX document, in document order.
 */
export async function readDocxParagraphs(bytes: Buffer): Promise<string[]> {
  const result = await mammoth.extractRawText({ buffer: bytes });
  // mammoth ends every paragraph with a blank line
  const paragraphs = result.value.split("\n\n");
  if (paragraphs[paragraphs.length - 1] === "") paragraphs.pop();
  return paragraphs;
}

export async function extractDocxText(
  bytes: Buffer
): Promise<Result<string, DecodeError | EmptyContentError>> {
  let paragraphs: string[];
  try {
    paragraphs = await readDocxParagraphs(bytes);
  } catch (error) {
    return err(
      new DecodeError(`DOCX extraction failed: ${describeError(error)}`, {
        cause: error,
      })
    );
  }

  if (paragraphs.every((p) => p.trim() === "")) {
    return err(new EmptyContentError("DOCX document has no paragraph text"));
  }
  return ok(paragraphs.join("\n"));
}
