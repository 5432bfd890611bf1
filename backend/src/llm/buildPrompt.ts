import { mcqInstructions } from "./mcqPrompt";
import type { GenerationRequest } from "./types";

/**
 * First `maxChars` UTF-16 units of `text`, backing off one unit rather than
 * splitting a surrogate pair.
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  let end = maxChars;
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end--;
  return text.slice(0, end);
}

export function buildMcqRequest(
  text: string,
  requestedCount: number,
  maxChars: number
): GenerationRequest {
  const content = truncateText(text, maxChars);
  return {
    content,
    requestedCount,
    prompt: mcqInstructions(requestedCount, content),
    truncated: content.length < text.length,
  };
}
