import { APICallError, RetryError, generateText } from "ai";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GeminiGenerator } from "../../src/adapters/geminiGenerator.js";
import type { GenerationRequest } from "../../src/adapters/generation.js";
import { ConfigError, GenerationUnavailableError, InvoiceQaError } from "../../src/utils/errors.js";

vi.mock("ai", async (importOriginal) => ({
  ...(await importOriginal<typeof import("ai")>()),
  generateText: vi.fn(async () => ({ text: "The total on INV-2025-0001 is EUR 12,027.40." })),
}));

const request: GenerationRequest = {
  messages: [
    { role: "system", content: "Answer from context." },
    { role: "system", content: "Cite invoice ids." },
    { role: "user", content: "What is the total?" },
  ],
  maxOutputTokens: 50,
};

function apiError(statusCode: number) {
  return new APICallError({
    message: `HTTP ${statusCode}`,
    url: "https://generativelanguage.example/v1beta/models/gemini-2.5-flash:generateContent",
    requestBodyValues: {},
    statusCode,
  });
}

beforeEach(() => {
  vi.clearAllMocks();
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("GeminiGenerator", () => {
  it("requires an API key", () => {
    vi.stubEnv("GEMINI_API_KEY", "");
    expect(() => new GeminiGenerator()).toThrow(ConfigError);
  });

  it("sends system text separately from the conversation", async () => {
    const generator = new GeminiGenerator({ apiKey: "test-key" });
    const result = await generator.complete(request);

    expect(result).toEqual({ text: "The total on INV-2025-0001 is EUR 12,027.40." });
    expect(vi.mocked(generateText).mock.calls[0][0]).toMatchObject({
      system: "Answer from context.\n\nCite invoice ids.",
      messages: [{ role: "user", content: "What is the total?" }],
      maxTokens: 50,
      temperature: 0.3,
      maxRetries: 0,
    });
  });

  it("treats retryable API errors as unavailable", async () => {
    vi.mocked(generateText).mockRejectedValueOnce(apiError(503));
    await expect(new GeminiGenerator({ apiKey: "test-key" }).complete(request)).rejects.toThrow(
      GenerationUnavailableError
    );
  });

  it("treats other API errors as rejected", async () => {
    vi.mocked(generateText).mockRejectedValueOnce(apiError(400));
    const err = await new GeminiGenerator({ apiKey: "test-key" }).complete(request).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvoiceQaError);
    expect(err).not.toBeInstanceOf(GenerationUnavailableError);
    expect(err).toMatchObject({ code: "GENERATION_REJECTED" });
  });

  it("treats exhausted SDK retries as unavailable", async () => {
    vi.mocked(generateText).mockRejectedValueOnce(
      new RetryError({ message: "Failed after 3 attempts", reason: "maxRetriesExceeded", errors: [] })
    );
    await expect(new GeminiGenerator({ apiKey: "test-key" }).complete(request)).rejects.toThrow(
      "gemini unavailable: Failed after 3 attempts"
    );
  });

  it("wraps unexpected failures", async () => {
    vi.mocked(generateText).mockRejectedValueOnce(new Error("boom"));
    await expect(new GeminiGenerator({ apiKey: "test-key" }).complete(request)).rejects.toThrow(
      "gemini request failed: boom"
    );
  });
});
