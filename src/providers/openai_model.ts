import type { BaseLogger } from "pino";
import { z } from "zod";

import type { ChatMessage } from "../control-plane/prompt_builder";

export class ModelProviderError extends Error {
  statusCode: number;
  retryable: boolean;
  errorType?: string;
  errorCode?: string;
  retryAfterMs?: number;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorType?: string;
      errorCode?: string;
      retryAfterMs?: number;
    } = {}
  ) {
    super(message);
    this.name = "ModelProviderError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorType = args.errorType;
    this.errorCode = args.errorCode;
    this.retryAfterMs = args.retryAfterMs;
  }
}

const ErrorBody = z.object({
  error: z.object({
    type: z.string().optional(),
    code: z.string().nullable().optional(),
    message: z.string().optional(),
  }),
});

const ChatCompletionBody = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
      }),
    })
  ),
});

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export function parseRetryAfterMs(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, retryDate - now);
  }
  return undefined;
}

function parseErrorBody(text: string): z.infer<typeof ErrorBody> | null {
  try {
    const parsed = ErrorBody.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * One non-streaming call to an OpenAI-compatible `/chat/completions` endpoint
 * (Docker Model Runner, Ollama, llama.cpp server, OpenAI).
 * Returns the raw message content; the caller owns parsing.
 */
export async function openAIChatCompletion(input: {
  baseUrl: string;
  apiKey: string;
  model: string;
  messages: ChatMessage[];
  maxTokens?: number;
  temperature?: number;
  jsonResponse?: boolean;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  logger?: BaseLogger;
}): Promise<{ rawText: string }> {
  const doFetch = input.fetchImpl ?? fetch;

  const body: Record<string, unknown> = {
    model: input.model,
    messages: input.messages,
    stream: false,
  };
  if (typeof input.maxTokens === "number") {
    body.max_tokens = input.maxTokens;
  }
  if (typeof input.temperature === "number") {
    body.temperature = input.temperature;
  }
  if (input.jsonResponse) {
    body.response_format = { type: "json_object" };
  }

  const res = await doFetch(`${input.baseUrl}/chat/completions`, {
    method: "POST",
    headers: {
      "content-type": "application/json",
      authorization: `Bearer ${input.apiKey}`,
    },
    body: JSON.stringify(body),
    signal: input.signal,
  });

  if (!res.ok) {
    const text = await res.text();
    const parsed = parseErrorBody(text);
    const errorType = parsed?.error.type;
    const errorCode = parsed?.error.code ?? undefined;
    const requestId = res.headers.get("x-request-id") ?? undefined;
    const bodySnippet = (parsed?.error.message ?? text).slice(0, 500);
    const retryAfterMs = parseRetryAfterMs(res.headers.get("retry-after"));
    const retryable = errorType !== "invalid_request_error";
    const statusCode = res.status;
    input.logger?.error(
      { evt: "model.request_failed", statusCode, requestId, bodySnippet, errorType, errorCode },
      "model.request_failed"
    );
    throw new ModelProviderError(`Model runner error ${statusCode}: ${bodySnippet}`, {
      statusCode,
      retryable,
      errorType,
      errorCode,
      retryAfterMs,
    });
  }

  const data = ChatCompletionBody.safeParse(await res.json());
  const content = data.success ? data.data.choices[0]?.message.content : undefined;

  if (!content) {
    throw new ModelProviderError("Model runner response missing content", {
      statusCode: 502,
      retryable: true,
    });
  }

  return { rawText: content.trim() };
}
