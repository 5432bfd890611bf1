import { formatFromFilename, type SourceFormat } from "../extraction/formats";

/**
 * Reduce a client-supplied filename to something safe to join onto a local
 * directory: ASCII only, no path separators, whitespace collapsed to "_",
 * leading/trailing dots and underscores stripped. May return "".
 */
export function secureFilename(filename: string): string {
  const ascii = filename.normalize("NFKD").replace(/[^\x00-\x7f]/g, "");
  return ascii
    .replace(/[/\\]/g, " ")
    .split(/\s+/)
    .filter(Boolean)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");
}

/** Format of an upload whose extension is on the allow-list. */
export function allowedUploadFormat(
  filename: string,
  allowed: readonly SourceFormat[]
): SourceFormat | undefined {
  const format = formatFromFilename(filename);
  return format && allowed.includes(format) ? format : undefined;
}

/**
 * Requested question count from a form field: a whole number in 1..max.
 */
export function parseQuestionCount(value: unknown, max: number): number | undefined {
  if (typeof value !== "string" || !/^\s*\d+\s*$/.test(value)) return undefined;
  const count = parseInt(value, 10);
  return count >= 1 && count <= max ? count : undefined;
}
