import path from "path";

export type SourceFormat = "text" | "pdf" | "docx";

const EXTENSION_FORMATS: Record<string, SourceFormat> = {
  ".txt": "text",
  ".pdf": "pdf",
  ".docx": "docx",
};

const PDF_MAGIC = Buffer.from("%PDF-", "latin1");
// DOCX is a ZIP container
const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export function formatFromFilename(filename: string): SourceFormat | undefined {
  return EXTENSION_FORMATS[path.extname(filename).toLowerCase()];
}

export function isSourceFormat(value: string): value is SourceFormat {
  return value === "text" || value === "pdf" || value === "docx";
}

/**
 * Checks the leading bytes against the declared format. Plain text has no
 * signature and always matches.
 */
export function matchesSignature(bytes: Buffer, format: SourceFormat): boolean {
  switch (format) {
    case "pdf":
      return bytes.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC);
    case "docx":
      return bytes.subarray(0, ZIP_MAGIC.length).equals(ZIP_MAGIC);
    case "text":
      return true;
  }
}
