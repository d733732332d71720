import type { BaseLogger } from "pino";
import { z } from "zod";

import {
  PipelineError,
  describeError,
  requestCancelled,
  upstreamUnavailable,
} from "../contracts/errors";
import { ModelProviderError, type FetchLike } from "../providers/openai_model";

export type Upstream = "generation" | "validator";

export type CallContext = {
  signal?: AbortSignal;
  log?: BaseLogger;
};

export const CORRELATION_HEADER = "x-correlation-id";

// Error body of a sibling service (PipelineError.toJSON); only the retry hints matter here.
const UpstreamErrorBody = z.object({
  retryable: z.boolean().optional(),
  retryAfterMs: z.number().nonnegative().optional(),
});

/**
 * Retry hints from a failed sibling-service response.
 */
export function upstreamHints(status: number, json: unknown): {
  upstreamStatus: number;
  retryable?: boolean;
  retryAfterMs?: number;
} {
  const parsed = UpstreamErrorBody.safeParse(json);
  return parsed.success ? { upstreamStatus: status, ...parsed.data } : { upstreamStatus: status };
}

/**
 * Per-call signal: aborts on the caller's signal or after `timeoutMs`.
 */
export function withTimeout(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export function isTimeoutAbort(signal: AbortSignal | undefined): boolean {
  // AbortSignal.timeout() aborts with a DOMException named TimeoutError.
  const reason: unknown = signal?.reason;
  return typeof reason === "object"
    && reason !== null
    && "name" in reason
    && reason.name === "TimeoutError";
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted && !isTimeoutAbort(signal)) {
    throw requestCancelled();
  }
}

/**
 * Map anything thrown by a downstream call onto the pipeline taxonomy.
 * A timeout is an upstream failure; a caller abort is a cancellation.
 */
export function toUpstreamError(err: unknown, upstream: Upstream, signal?: AbortSignal): PipelineError {
  if (err instanceof PipelineError) return err;
  if (err instanceof ModelProviderError) {
    return upstreamUnavailable(upstream, `${upstream} call failed`, err.message, {
      retryable: err.retryable,
      retryAfterMs: err.retryAfterMs,
      upstreamStatus: err.statusCode,
    });
  }
  if (signal?.aborted) {
    return isTimeoutAbort(signal)
      ? upstreamUnavailable(upstream, `${upstream} call timed out`)
      : requestCancelled();
  }
  return upstreamUnavailable(upstream, `${upstream} call failed`, describeError(err));
}

/**
 * POST a JSON body to a sibling service, carrying the correlation id in both
 * header and body. Returns status and parsed JSON (null when not JSON).
 */
export async function postJson(args: {
  url: string;
  body: Record<string, unknown>;
  correlationId: string;
  upstream: Upstream;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}): Promise<{ status: number; json: unknown }> {
  const doFetch = args.fetchImpl ?? fetch;
  try {
    const res = await doFetch(args.url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        [CORRELATION_HEADER]: args.correlationId,
      },
      body: JSON.stringify({ ...args.body, correlationId: args.correlationId }),
      signal: args.signal,
    });
    const text = await res.text();
    let json: unknown = null;
    try {
      json = JSON.parse(text);
    } catch {
      json = null;
    }
    return { status: res.status, json };
  } catch (err) {
    throw toUpstreamError(err, args.upstream, args.signal);
  }
}
