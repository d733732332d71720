export type PipelineErrorCode =
  | "unknown_command"
  | "schema_violation"
  | "upstream_unavailable"
  | "internal_error"
  | "request_cancelled";

export interface PipelineErrorDetails {
  code: PipelineErrorCode;
  message: string;
  details?: string;
  // Which collaborator failed (generation | validator), bounded to a label.
  upstream?: "generation" | "validator";
  // HTTP status the collaborator (or its model runner) answered with.
  upstreamStatus?: number;
  retryAfterMs?: number;
  field?: string;
}

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  unknown_command: 422,
  schema_violation: 422,
  upstream_unavailable: 503,
  internal_error: 500,
  // Client closed request.
  request_cancelled: 499,
};

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly details: PipelineErrorDetails;

  constructor(details: PipelineErrorDetails, args: { retryable?: boolean } = {}) {
    super(details.message);
    this.name = "PipelineError";
    this.code = details.code;
    this.statusCode = STATUS_BY_CODE[details.code];
    this.retryable = args.retryable ?? details.code === "upstream_unavailable";
    this.details = details;
  }

  /**
   * Value for a Retry-After header (whole seconds), when the upstream gave a hint.
   */
  retryAfterHeader(): string | undefined {
    const ms = this.details.retryAfterMs;
    return typeof ms === "number" ? String(Math.ceil(ms / 1000)) : undefined;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(this.details.details ? { details: this.details.details } : {}),
      ...(this.details.upstream ? { upstream: this.details.upstream } : {}),
      ...(typeof this.details.upstreamStatus === "number" ? { upstreamStatus: this.details.upstreamStatus } : {}),
      ...(typeof this.details.retryAfterMs === "number" ? { retryAfterMs: this.details.retryAfterMs } : {}),
      ...(this.details.field ? { field: this.details.field } : {}),
    };
  }
}

export function upstreamUnavailable(
  upstream: "generation" | "validator",
  message: string,
  details?: string,
  hints: { retryable?: boolean; retryAfterMs?: number; upstreamStatus?: number } = {}
): PipelineError {
  return new PipelineError(
    {
      code: "upstream_unavailable",
      upstream,
      message,
      details,
      upstreamStatus: hints.upstreamStatus,
      retryAfterMs: hints.retryAfterMs,
    },
    { retryable: hints.retryable }
  );
}

export function requestCancelled(): PipelineError {
  return new PipelineError({
    code: "request_cancelled",
    message: "Request cancelled by caller",
  });
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
