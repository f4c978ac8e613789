import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";
import { InsightGenerationFailed, errorMessage } from "../errors.js";
import { sleep } from "../utils/time.js";

export type GenerateParams = {
  session: string;
  system: string;
  prompt: string;
};

/** Turns a persona plus a prompt into a short piece of natural-language text. */
export interface InsightGenerator {
  generate(params: GenerateParams): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type JsonResponse = { ok: boolean; status: number; json: unknown; text: string };

export async function postJson(
  url: string,
  body: unknown,
  opts: { headers?: Record<string, string>; timeoutMs: number; fetchImpl?: FetchLike }
): Promise<JsonResponse> {
  const doFetch: FetchLike = opts.fetchImpl ?? fetch;
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), opts.timeoutMs);
  try {
    let res: Response;
    try {
      res = await doFetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...(opts.headers || {}) },
        body: JSON.stringify(body),
        signal: ctrl.signal
      });
    } catch (e) {
      if (ctrl.signal.aborted) throw new Error(`request timed out after ${opts.timeoutMs}ms`);
      throw e;
    }
    const text = await res.text();
    let json: unknown = null;
    try {
      json = text ? JSON.parse(text) : null;
    } catch {
      json = null;
    }
    return { ok: res.ok, status: res.status, json, text };
  } finally {
    clearTimeout(t);
  }
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() })
      })
    )
    .min(1)
});

export type OpenAiInsightOptions = {
  apiKey?: string | undefined;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  /** Extra attempts after the first failure. 0 keeps a single attempt. */
  maxRetries: number;
  retryBackoffMs: number;
  log?: FastifyBaseLogger;
  fetchImpl?: FetchLike;
};

export class OpenAiInsightGenerator implements InsightGenerator {
  constructor(private readonly opts: OpenAiInsightOptions) {}

  async generate(params: GenerateParams): Promise<string> {
    if (!this.opts.apiKey) {
      throw new InsightGenerationFailed("insight generator is not configured: OPENAI_API_KEY is missing");
    }
    let lastError: InsightGenerationFailed | null = null;
    for (let attempt = 0; attempt <= this.opts.maxRetries; attempt++) {
      if (attempt > 0) await sleep(this.opts.retryBackoffMs * attempt);
      try {
        return await this.requestOnce(this.opts.apiKey, params);
      } catch (e) {
        lastError = e instanceof InsightGenerationFailed ? e : new InsightGenerationFailed(`insight request failed: ${errorMessage(e)}`, e);
        this.opts.log?.warn({ session: params.session, attempt, reason: lastError.message }, "insight generation failed");
      }
    }
    throw lastError ?? new InsightGenerationFailed("insight request failed");
  }

  private async requestOnce(apiKey: string, params: GenerateParams): Promise<string> {
    const payload = {
      model: this.opts.model,
      messages: [
        { role: "system", content: params.system },
        { role: "user", content: params.prompt }
      ],
      temperature: 0.6,
      // lets the provider group requests per client session
      user: params.session
    };
    const res = await postJson(`${this.opts.baseUrl.replace(/\/+$/, "")}/chat/completions`, payload, {
      headers: { Authorization: `Bearer ${apiKey}` },
      timeoutMs: this.opts.timeoutMs,
      fetchImpl: this.opts.fetchImpl
    });
    if (!res.ok) {
      throw new InsightGenerationFailed(`openai chat failed: ${res.status} ${res.text}`);
    }
    const parsed = chatCompletionSchema.safeParse(res.json);
    const reply = parsed.success ? (parsed.data.choices[0]?.message.content ?? "").trim() : "";
    if (!reply) {
      throw new InsightGenerationFailed("openai chat returned no usable text");
    }
    return reply;
  }
}
