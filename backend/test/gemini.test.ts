import { describe, it, expect, vi } from "vitest";
import type { GenerateContentParameters } from "@google/genai";
import { EmptyResponseError, GenerationFailure } from "../src/errors";
import { GeminiTextGenerator, UnconfiguredTextGenerator } from "../src/llm/gemini";
import { buildMcqRequest } from "../src/llm/buildPrompt";
import { classifyResponse, payloadText, type GeminiResponseLike } from "../src/llm/responsePayload";

const request = buildMcqRequest("Water boils at 100 degrees Celsius at sea level.", 2, 1000);

function setup(timeoutMs = 1000) {
  const generateContent =
    vi.fn<(params: GenerateContentParameters) => Promise<GeminiResponseLike>>();
  const generator = new GeminiTextGenerator(
    { generateContent },
    { model: "gemini-test", timeoutMs }
  );
  return { generateContent, generator };
}

describe("classifyResponse", () => {
  it("prefers the aggregated text field", () => {
    const payload = classifyResponse({
      text: "aggregate",
      candidates: [{ content: { parts: [{ text: "fragment" }] } }],
    });
    expect(payload).toEqual({ kind: "aggregate", text: "aggregate" });
  });

  it("falls back to content fragments joined by newlines", () => {
    const payload = classifyResponse({
      candidates: [{ content: { parts: [{ text: "## MCQ" }, {}, { text: "Question: Why?" }] } }],
    });
    expect(payload).toEqual({ kind: "fragments", fragments: ["## MCQ", "Question: Why?"] });
    expect(payloadText(payload)).toBe("## MCQ\nQuestion: Why?");
  });

  it("treats whitespace-only text as empty", () => {
    expect(classifyResponse({ text: "  ", candidates: [] })).toEqual({ kind: "empty" });
    expect(classifyResponse({})).toEqual({ kind: "empty" });
  });
});

describe("GeminiTextGenerator", () => {
  it("sends the prompt to the configured model and returns trimmed text", async () => {
    const { generateContent, generator } = setup();
    generateContent.mockResolvedValue({ text: "\n## MCQ\nQuestion: Q?\n" });

    const result = await generator.generate(request);

    expect(result).toEqual({ ok: true, value: "## MCQ\nQuestion: Q?" });
    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(generateContent.mock.calls[0][0]).toMatchObject({
      model: "gemini-test",
      contents: [{ role: "user", parts: [{ text: request.prompt }] }],
    });
  });

  it("fails with EmptyResponseError when neither shape carries text", async () => {
    const { generateContent, generator } = setup();
    generateContent.mockResolvedValue({ candidates: [{ content: { parts: [] } }] });

    const result = await generator.generate(request);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(EmptyResponseError);
  });

  it("classifies upstream errors and keeps their status", async () => {
    const { generateContent, generator } = setup();
    generateContent.mockRejectedValue(Object.assign(new Error("quota exceeded"), { status: 429 }));

    const result = await generator.generate(request);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(GenerationFailure);
    expect(result.error).toMatchObject({ detail: "quota exceeded", status: 429, timedOut: false });
  });

  it("times out and aborts the request", async () => {
    const { generateContent, generator } = setup(20);
    generateContent.mockReturnValue(new Promise<GeminiResponseLike>(() => {}));

    const result = await generator.generate(request);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(GenerationFailure);
    expect(result.error).toMatchObject({ timedOut: true });
    expect(generateContent.mock.calls[0][0].config?.abortSignal?.aborted).toBe(true);
  });
});

describe("UnconfiguredTextGenerator", () => {
  it("always fails with a missing key message", async () => {
    const result = await new UnconfiguredTextGenerator().generate();
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("MCQ generation failed: GEMINI_API_KEY is not set");
  });
});
