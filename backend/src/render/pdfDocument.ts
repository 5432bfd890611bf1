import PDFDocument from "pdfkit";
import type { McqResultSet } from "../mcq/types";
import { formatMcqBlock } from "./transcript";

const PAGE_MARGIN = 50;
const FONT_SIZE = 12;
/** Vertical gap after each MCQ, in lines of the current font. */
const RECORD_GAP_LINES = 1;

/**
 * Lay the MCQs out as wrapped text blocks on A4 pages. pdfkit breaks pages
 * when a block runs past the bottom margin.
 */
export function renderMcqPdf(records: McqResultSet): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({
      size: "A4",
      margin: PAGE_MARGIN,
      info: { Title: "Generated MCQs", Creator: "mcq-generator" },
    });

    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc.font("Helvetica").fontSize(FONT_SIZE);
    const width = doc.page.width - 2 * PAGE_MARGIN;

    for (const record of records) {
      doc.text(formatMcqBlock(record), { width, lineGap: 2 });
      doc.moveDown(RECORD_GAP_LINES);
    }

    doc.end();
  });
}
