/**
 * Gemini answers either with an aggregated `text` field or with a list of
 * content parts. Both are resolved here, once, into a tagged union so nothing
 * downstream has to care which one arrived.
 */

export type GeminiResponseLike = {
  text?: string;
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
  }>;
};

export type ResponsePayload =
  | { kind: "aggregate"; text: string }
  | { kind: "fragments"; fragments: string[] }
  | { kind: "empty" };

export function classifyResponse(response: GeminiResponseLike): ResponsePayload {
  if (typeof response.text === "string" && response.text.trim()) {
    return { kind: "aggregate", text: response.text };
  }

  const fragments = (response.candidates?.[0]?.content?.parts ?? [])
    .map((part) => part.text)
    .filter((text): text is string => typeof text === "string" && text.length > 0);

  if (fragments.some((f) => f.trim())) {
    return { kind: "fragments", fragments };
  }
  return { kind: "empty" };
}

export function payloadText(payload: ResponsePayload): string {
  switch (payload.kind) {
    case "aggregate":
      return payload.text.trim();
    case "fragments":
      return payload.fragments.join("\n").trim();
    case "empty":
      return "";
  }
}
