import { DecodeError, EmptyContentError, describeError } from "../errors";
import { logger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";

type PdfTextItem = { str?: string; transform?: number[] };

/** The slice of a pdf.js page proxy that text extraction needs. */
export interface PdfPage {
  pageIndex?: number;
  getTextContent(options?: {
    normalizeWhitespace?: boolean;
    disableCombineTextItems?: boolean;
  }): Promise<{ items: PdfTextItem[] }>;
}

type PdfParse = (
  data: Buffer,
  options?: { max?: number; pagerender?: (page: PdfPage) => Promise<string> }
) => Promise<{ numpages: number; text: string }>;

async function loadPdfParse(): Promise<PdfParse> {
  // pdf-parse awaits `pagerender`, but its typings only allow a synchronous
  // string return. Loaded lazily so its self-test entry point never runs.
  const mod = await import("pdf-parse");
  return mod.default as unknown as PdfParse;
}

/**
 * Text of one page, with a line break wherever the baseline moves.
 */
export async function readPageText(page: PdfPage): Promise<string> {
  const content = await page.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });

  let lastY: number | undefined;
  let text = "";
  for (const item of content.items) {
    const y = item.transform?.[5];
    const str = item.str ?? "";
    text += lastY === undefined || y === lastY ? str : "\n" + str;
    lastY = y;
  }
  return text;
}

/**
 * Extract every page; pages that fail or carry no text are skipped.
 */
export async function extractPdfText(
  bytes: Buffer
): Promise<Result<string, DecodeError | EmptyContentError>> {
  const pages: string[] = [];
  let skipped = 0;

  const pagerender = async (page: PdfPage): Promise<string> => {
    try {
      const text = await readPageText(page);
      if (text.trim()) pages.push(text);
      else skipped++;
      return text;
    } catch (error) {
      skipped++;
      logger.warn(
        { pageIndex: page.pageIndex, error: describeError(error) },
        "Skipping PDF page that failed text extraction"
      );
      return "";
    }
  };

  let pageCount: number;
  try {
    const pdfParse = await loadPdfParse();
    const data = await pdfParse(bytes, { max: 0, pagerender });
    pageCount = data.numpages;
  } catch (error) {
    return err(
      new DecodeError(`PDF extraction failed: ${describeError(error)}`, {
        cause: error,
      })
    );
  }

  logger.debug({ pageCount, extracted: pages.length, skipped }, "PDF extraction completed");

  if (pages.length === 0) {
    return err(
      new EmptyContentError(`No text could be extracted from any of ${pageCount} PDF pages`)
    );
  }
  return ok(pages.join("\n"));
}
