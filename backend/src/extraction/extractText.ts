import { open, type FileHandle } from "fs/promises";
import {
  DecodeError,
  EmptyContentError,
  SourceReadError,
  UnsupportedFormatError,
  describeError,
  type ExtractionFailure,
} from "../errors";
import { createChildLogger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";
import { extractDocxText } from "./docx";
import { isSourceFormat, matchesSignature, type SourceFormat } from "./formats";
import { extractPdfText } from "./pdf";
import { decodePlainText } from "./plainText";

export type TextExtractor = (
  filePath: string,
  /** Checked at run time; anything but a SourceFormat is unsupported. */
  declaredFormat: string
) => Promise<Result<string, ExtractionFailure>>;

/**
 * Read a source document and normalize it to a single non-empty text blob.
 * The file handle is released on every path, including extractor failures.
 */
export const extractText: TextExtractor = async (filePath, declaredFormat) => {
  const log = createChildLogger({ filePath, declaredFormat });

  if (!isSourceFormat(declaredFormat)) {
    return err(new UnsupportedFormatError(`Unsupported format: ${declaredFormat}`));
  }

  let handle: FileHandle;
  try {
    handle = await open(filePath, "r");
  } catch (error) {
    return err(
      new SourceReadError(`Cannot open ${filePath}: ${describeError(error)}`, {
        cause: error,
      })
    );
  }

  try {
    let bytes: Buffer;
    try {
      bytes = await handle.readFile();
    } catch (error) {
      return err(
        new SourceReadError(`Cannot read ${filePath}: ${describeError(error)}`, {
          cause: error,
        })
      );
    }

    if (!matchesSignature(bytes, declaredFormat)) {
      return err(
        new UnsupportedFormatError(
          `File content does not match the declared ${declaredFormat} format`
        )
      );
    }

    const result = await extractByFormat(bytes, declaredFormat);
    if (!result.ok) {
      log.warn({ code: result.error.code, reason: result.error.message }, "Text extraction failed");
      return result;
    }

    const text = result.value.trim();
    if (!text) {
      return err(new EmptyContentError("Document contains no text"));
    }
    log.debug({ textLength: text.length }, "Text extraction completed");
    return ok(text);
  } finally {
    await handle.close();
  }
};

function extractByFormat(
  bytes: Buffer,
  format: SourceFormat
): Promise<Result<string, DecodeError | EmptyContentError>> {
  switch (format) {
    case "pdf":
      return extractPdfText(bytes);
    case "docx":
      return extractDocxText(bytes);
    case "text":
      return Promise.resolve(decodePlainText(bytes));
  }
}
