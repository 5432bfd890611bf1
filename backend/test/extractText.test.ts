import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import {
  DecodeError,
  EmptyContentError,
  SourceReadError,
  UnsupportedFormatError,
} from "../src/errors";
import { extractText } from "../src/extraction/extractText";
import { formatFromFilename, matchesSignature } from "../src/extraction/formats";
import type { PdfPage } from "../src/extraction/pdf";

const { extractRawText, pdfParse } = vi.hoisted(() => ({
  extractRawText: vi.fn(),
  pdfParse: vi.fn(),
}));

vi.mock("mammoth", () => ({ default: { extractRawText } }));
vi.mock("pdf-parse", () => ({ default: pdfParse }));

const PDF_BYTES = Buffer.from("%PDF-1.4\n% test document\n", "latin1");
const DOCX_BYTES = Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]);

function page(lines: Array<[string, number]>): PdfPage {
  return {
    getTextContent: async () => ({
      items: lines.map(([str, y]) => ({ str, transform: [1, 0, 0, 1, 72, y] })),
    }),
  };
}

const brokenPage: PdfPage = {
  pageIndex: 1,
  getTextContent: async () => {
    throw new Error("bad content stream");
  },
};

function renderPages(pages: PdfPage[]) {
  pdfParse.mockImplementation(
    async (_data: Buffer, options: { pagerender: (p: PdfPage) => Promise<string> }) => {
      for (const p of pages) await options.pagerender(p);
      return { numpages: pages.length, text: "" };
    }
  );
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "mcq-extract-"));
  extractRawText.mockReset();
  pdfParse.mockReset();
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function fixture(name: string, content: string | Buffer) {
  const file = path.join(dir, name);
  await writeFile(file, content);
  return file;
}

describe("extractText: plain text", () => {
  it("returns the trimmed UTF-8 content", async () => {
    const file = await fixture("notes.txt", "  Photosynthesis converts light into chemical energy.\n");

    const result = await extractText(file, "text");

    expect(result).toEqual({
      ok: true,
      value: "Photosynthesis converts light into chemical energy.",
    });
  });

  it("rejects invalid UTF-8 with DecodeError", async () => {
    const file = await fixture("broken.txt", Buffer.from([0x48, 0xc3, 0x28]));

    const result = await extractText(file, "text");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(DecodeError);
  });

  it("treats whitespace-only text as empty", async () => {
    const file = await fixture("blank.txt", " \n\t\n");

    const result = await extractText(file, "text");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(EmptyContentError);
  });
});

describe("extractText: docx", () => {
  it("joins paragraphs with newlines", async () => {
    extractRawText.mockResolvedValue({
      value: "Cells are the unit of life.\n\nDNA carries genes.\n\n",
      messages: [],
    });
    const file = await fixture("biology.docx", DOCX_BYTES);

    const result = await extractText(file, "docx");

    expect(result).toEqual({ ok: true, value: "Cells are the unit of life.\nDNA carries genes." });
    expect(extractRawText).toHaveBeenCalledWith({ buffer: DOCX_BYTES });
  });

  it("returns EmptyContentError for a document without paragraphs", async () => {
    extractRawText.mockResolvedValue({ value: "", messages: [] });
    const file = await fixture("empty.docx", DOCX_BYTES);

    const result = await extractText(file, "docx");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(EmptyContentError);
  });

  it("returns EmptyContentError when every paragraph is blank", async () => {
    extractRawText.mockResolvedValue({ value: "\n\n  \n\n", messages: [] });
    const file = await fixture("blank.docx", DOCX_BYTES);

    const result = await extractText(file, "docx");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(EmptyContentError);
  });

  it("maps reader failures to DecodeError", async () => {
    extractRawText.mockRejectedValue(new Error("Could not find file in options"));
    const file = await fixture("corrupt.docx", DOCX_BYTES);

    const result = await extractText(file, "docx");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DecodeError);
      expect(result.error.message).toBe("DOCX extraction failed: Could not find file in options");
    }
  });
});

describe("extractText: pdf", () => {
  it("joins page texts and breaks lines on baseline changes", async () => {
    renderPages([
      page([
        ["Chapter 1", 700],
        ["Atoms", 680],
        [" and molecules", 680],
      ]),
      page([["Chapter 2", 700]]),
    ]);
    const file = await fixture("chem.pdf", PDF_BYTES);

    const result = await extractText(file, "pdf");

    expect(result).toEqual({ ok: true, value: "Chapter 1\nAtoms and molecules\nChapter 2" });
  });

  it("skips pages that fail or carry no text", async () => {
    renderPages([page([["First page", 700]]), brokenPage, page([]), page([["Last page", 700]])]);
    const file = await fixture("mixed.pdf", PDF_BYTES);

    const result = await extractText(file, "pdf");

    expect(result).toEqual({ ok: true, value: "First page\nLast page" });
  });

  it("returns EmptyContentError when no page yields text", async () => {
    renderPages([brokenPage, page([])]);
    const file = await fixture("scanned.pdf", PDF_BYTES);

    const result = await extractText(file, "pdf");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(EmptyContentError);
  });

  it("maps an unreadable document to DecodeError", async () => {
    pdfParse.mockRejectedValue(new Error("Invalid PDF structure"));
    const file = await fixture("corrupt.pdf", PDF_BYTES);

    const result = await extractText(file, "pdf");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(DecodeError);
  });
});

describe("extractText: format handling", () => {
  it("rejects an unknown declared format", async () => {
    const file = await fixture("slides.rtf", "{\\rtf1 hello}");

    const result = await extractText(file, "rtf");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(UnsupportedFormatError);
  });

  it("rejects content that does not match the declared format", async () => {
    const file = await fixture("fake.pdf", "just some text");

    const result = await extractText(file, "pdf");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(UnsupportedFormatError);
    expect(pdfParse).not.toHaveBeenCalled();
  });

  it("reports a missing file as SourceReadError", async () => {
    const result = await extractText(path.join(dir, "missing.txt"), "text");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(SourceReadError);
  });
});

describe("formats", () => {
  it("maps extensions case-insensitively", () => {
    expect(formatFromFilename("Lecture.PDF")).toBe("pdf");
    expect(formatFromFilename("notes.txt")).toBe("text");
    expect(formatFromFilename("essay.docx")).toBe("docx");
    expect(formatFromFilename("essay.doc")).toBeUndefined();
    expect(formatFromFilename("README")).toBeUndefined();
  });

  it("checks file signatures", () => {
    expect(matchesSignature(PDF_BYTES, "pdf")).toBe(true);
    expect(matchesSignature(DOCX_BYTES, "docx")).toBe(true);
    expect(matchesSignature(PDF_BYTES, "docx")).toBe(false);
    expect(matchesSignature(Buffer.from("hello"), "text")).toBe(true);
  });
});
