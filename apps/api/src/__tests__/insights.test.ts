import { describe, it, expect, vi } from "vitest";
import { InsightGenerationFailed } from "../errors.js";
import { OpenAiInsightGenerator, type FetchLike, type OpenAiInsightOptions } from "../services/insights.js";

function completion(content: string | null): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: "assistant", content } }] }), {
    status: 200,
    headers: { "Content-Type": "application/json" }
  });
}

function generator(fetchImpl: FetchLike, overrides: Partial<OpenAiInsightOptions> = {}) {
  return new OpenAiInsightGenerator({
    apiKey: "test-key",
    baseUrl: "https://llm.test/v1",
    model: "test-model",
    timeoutMs: 1000,
    maxRetries: 0,
    retryBackoffMs: 0,
    fetchImpl,
    ...overrides
  });
}

const params = { session: "s1", system: "Be kind.", prompt: "How was today?" };

describe("OpenAiInsightGenerator", () => {
  it("posts a chat completion and returns the trimmed reply", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => completion("  Take a slow breath.  "));

    await expect(generator(fetchImpl).generate(params)).resolves.toBe("Take a slow breath.");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-key");
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: "test-model",
      user: "s1",
      messages: [
        { role: "system", content: "Be kind." },
        { role: "user", content: "How was today?" }
      ]
    });
  });

  it("drops trailing slashes from the base url", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => completion("ok"));
    await generator(fetchImpl, { baseUrl: "https://llm.test/v1/" }).generate(params);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://llm.test/v1/chat/completions");
  });

  it("fails without calling out when no api key is configured", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => completion("unused"));
    await expect(generator(fetchImpl, { apiKey: undefined }).generate(params)).rejects.toBeInstanceOf(InsightGenerationFailed);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("maps a non-2xx response to InsightGenerationFailed", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("upstream down", { status: 502 }));
    await expect(generator(fetchImpl).generate(params)).rejects.toThrow("openai chat failed: 502 upstream down");
  });

  it("treats an empty reply as unusable", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => completion("   "));
    await expect(generator(fetchImpl).generate(params)).rejects.toThrow("openai chat returned no usable text");
  });

  it("treats a malformed body as unusable", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("not json", { status: 200 }));
    await expect(generator(fetchImpl).generate(params)).rejects.toThrow("openai chat returned no usable text");
  });

  it("gives up when the provider does not answer within the timeout", async () => {
    const fetchImpl = vi.fn<FetchLike>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const err = await generator(fetchImpl, { timeoutMs: 20 })
      .generate(params)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InsightGenerationFailed);
    expect(err).toHaveProperty("message", "insight request failed: request timed out after 20ms");
  });

  it("wraps network errors", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new Error("getaddrinfo ENOTFOUND llm.test");
    });
    await expect(generator(fetchImpl).generate(params)).rejects.toThrow("insight request failed: getaddrinfo ENOTFOUND llm.test");
  });

  it("retries up to maxRetries extra times", async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(completion("Second time lucky."));

    await expect(generator(fetchImpl, { maxRetries: 1 }).generate(params)).resolves.toBe("Second time lucky.");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("does not retry by default", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("busy", { status: 503 }));
    await expect(generator(fetchImpl).generate(params)).rejects.toBeInstanceOf(InsightGenerationFailed);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
