import { describe, it, expect, vi } from "vitest";

import { ModelProviderError, openAIChatCompletion, parseRetryAfterMs, type FetchLike } from "../src/providers/openai_model";
import { chatCompletion, jsonResponse } from "./helpers/app_fixtures";

const BASE = {
  baseUrl: "http://model-runner.test/v1",
  apiKey: "test-key",
  model: "test-model",
  messages: [
    { role: "system" as const, content: "sys" },
    { role: "user" as const, content: "hello" },
  ],
};

describe("parseRetryAfterMs", () => {
  it("parses seconds and HTTP dates", () => {
    expect(parseRetryAfterMs("2")).toBe(2000);
    const now = Date.parse("Wed, 21 Oct 2026 07:28:00 GMT");
    expect(parseRetryAfterMs("Wed, 21 Oct 2026 07:28:05 GMT", now)).toBe(5000);
  });

  it("ignores missing or unparsable values", () => {
    expect(parseRetryAfterMs(null)).toBeUndefined();
    expect(parseRetryAfterMs("soon")).toBeUndefined();
  });
});

describe("openAIChatCompletion", () => {
  it("posts a JSON-mode chat completion and returns trimmed content", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => chatCompletion('  {"command":null}\n'));

    const result = await openAIChatCompletion({ ...BASE, maxTokens: 64, temperature: 0.1, jsonResponse: true, fetchImpl });

    expect(result).toEqual({ rawText: '{"command":null}' });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://model-runner.test/v1/chat/completions");
    expect(new Headers(init.headers).get("authorization")).toBe("Bearer test-key");
    expect(JSON.parse(String(init.body))).toEqual({
      model: "test-model",
      messages: BASE.messages,
      stream: false,
      max_tokens: 64,
      temperature: 0.1,
      response_format: { type: "json_object" },
    });
  });

  it("raises a retryable error with retry-after on rate limits", async () => {
    const fetchImpl: FetchLike = async () =>
      new Response(JSON.stringify({ error: { type: "rate_limit", code: "rate_limited", message: "slow down" } }), {
        status: 429,
        headers: { "retry-after": "3" },
      });

    const error = await openAIChatCompletion({ ...BASE, fetchImpl }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelProviderError);
    if (!(error instanceof ModelProviderError)) return;
    expect(error.message).toBe("Model runner error 429: slow down");
    expect(error.statusCode).toBe(429);
    expect(error.retryable).toBe(true);
    expect(error.errorCode).toBe("rate_limited");
    expect(error.retryAfterMs).toBe(3000);
  });

  it("marks invalid requests as not retryable", async () => {
    const fetchImpl: FetchLike = async () =>
      jsonResponse({ error: { type: "invalid_request_error", message: "bad model" } }, 400);

    await expect(openAIChatCompletion({ ...BASE, fetchImpl })).rejects.toMatchObject({
      statusCode: 400,
      retryable: false,
      errorType: "invalid_request_error",
    });
  });

  it("rejects a response without message content", async () => {
    const fetchImpl: FetchLike = async () => jsonResponse({ choices: [] });

    await expect(openAIChatCompletion({ ...BASE, fetchImpl })).rejects.toThrow(ModelProviderError);
  });
});
