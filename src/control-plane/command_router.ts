import type { BaseLogger } from "pino";

import { PipelineError, describeError } from "../contracts/errors";
import type { GenerationResponse, ValidatorFailure, ValidatorResponse } from "../contracts/pipeline";
import type { GenerationClient } from "./generation_client";
import { throwIfCancelled, toUpstreamError, withTimeout } from "./upstream";
import type { ValidatorClient } from "./validator_client";

export type RouterState =
  | "received"
  | "generating"
  | "validating"
  | "retrying"
  | "done_chat"
  | "done_command"
  | "failed";

export type Attempt = 0 | 1;

export type RouterTransition = {
  state: RouterState;
  attempt: Attempt;
};

export type RouterOutcome =
  | { state: "done_chat"; generation: GenerationResponse }
  | { state: "done_command"; generation: GenerationResponse; validationResult: string }
  | { state: "failed"; error: PipelineError; generation: GenerationResponse | null };

export type RouterResult = RouterOutcome & {
  correlationId: string;
  attempts: number;
  transitions: RouterTransition[];
};

export type RouterTimeouts = {
  generationMs: number;
  validationMs: number;
};

type AttemptResult =
  | { kind: "final"; outcome: RouterOutcome }
  | { kind: "invalid"; verdict: ValidatorFailure; generation: GenerationResponse };

function validationError(verdict: ValidatorFailure): PipelineError {
  if (verdict.errorCode === "internal_error") {
    return new PipelineError({ code: "internal_error", message: verdict.error, details: verdict.details });
  }
  return new PipelineError({
    code: verdict.errorCode ?? "schema_violation",
    message: verdict.error,
    details: verdict.details,
  });
}

/**
 * Drives one request: generate -> (chat | validate) -> (done | one retry) -> done | failed.
 *
 * The retry edge exists once in the code below: attempt 0 may hand its
 * validation error to attempt 1, and attempt 1 can only finish.
 */
export async function runCommandRouter(args: {
  userText: string;
  correlationId: string;
  generation: GenerationClient;
  validator: ValidatorClient;
  timeouts: RouterTimeouts;
  signal?: AbortSignal;
  log?: BaseLogger;
}): Promise<RouterResult> {
  const { userText, correlationId, signal, log, timeouts } = args;
  const transitions: RouterTransition[] = [];
  const startNs = process.hrtime.bigint();
  let attempts = 0;
  let lastGeneration: GenerationResponse | null = null;

  const enter = (state: RouterState, attempt: Attempt) => {
    transitions.push({ state, attempt });
    log?.debug({ evt: "router.transition", state, attempt }, "router.transition");
  };

  const finish = (outcome: RouterOutcome): RouterResult => {
    const durationMs = Math.round(Number(process.hrtime.bigint() - startNs) / 1e6);
    log?.info(
      {
        evt: "router.completed",
        state: outcome.state,
        attempts,
        durationMs,
        ...(outcome.state === "failed" ? { code: outcome.error.code } : {}),
      },
      "router.completed"
    );
    return { ...outcome, correlationId, attempts, transitions };
  };

  const runAttempt = async (attempt: Attempt, retryFeedback: string | null): Promise<AttemptResult> => {
    throwIfCancelled(signal);
    enter("generating", attempt);
    attempts = attempt + 1;

    const generationSignal = withTimeout(signal, timeouts.generationMs);
    let generation: GenerationResponse;
    try {
      generation = await args.generation.generate(
        { userText, retryFeedback, correlationId },
        { signal: generationSignal, log }
      );
    } catch (err) {
      throw toUpstreamError(err, "generation", generationSignal);
    }
    lastGeneration = generation;
    throwIfCancelled(signal);

    if (generation.command === null) {
      enter("done_chat", attempt);
      return { kind: "final", outcome: { state: "done_chat", generation } };
    }

    enter("validating", attempt);
    const validationSignal = withTimeout(signal, timeouts.validationMs);
    let verdict: ValidatorResponse;
    try {
      verdict = await args.validator.execute(
        {
          command: generation.command,
          commandParameters: generation.commandParameters ?? {},
          correlationId,
        },
        { signal: validationSignal, log }
      );
    } catch (err) {
      throw toUpstreamError(err, "validator", validationSignal);
    }
    throwIfCancelled(signal);

    if (verdict.success) {
      enter("done_command", attempt);
      return {
        kind: "final",
        outcome: { state: "done_command", generation, validationResult: verdict.message },
      };
    }

    // Internal errors point at a registry/validator mismatch; a retry cannot fix them.
    if (verdict.errorCode === "internal_error") {
      enter("failed", attempt);
      return {
        kind: "final",
        outcome: { state: "failed", error: validationError(verdict), generation },
      };
    }

    return { kind: "invalid", verdict, generation };
  };

  enter("received", 0);

  try {
    const first = await runAttempt(0, null);
    if (first.kind === "final") return finish(first.outcome);

    log?.info(
      { evt: "router.validation_failed_retrying", error: first.verdict.error },
      "router.validation_failed_retrying"
    );
    enter("retrying", 0);

    const second = await runAttempt(1, first.verdict.error);
    if (second.kind === "final") return finish(second.outcome);

    log?.warn(
      { evt: "router.validation_failed_final", error: second.verdict.error },
      "router.validation_failed_final"
    );
    enter("failed", 1);
    return finish({ state: "failed", error: validationError(second.verdict), generation: second.generation });
  } catch (err) {
    const error = err instanceof PipelineError
      ? err
      : new PipelineError({ code: "internal_error", message: describeError(err) });
    enter("failed", attempts > 1 ? 1 : 0);
    return finish({ state: "failed", error, generation: lastGeneration });
  }
}

export function toProcessResponse(result: RouterResult): { statusCode: number; body: Record<string, unknown> } {
  const base = { correlationId: result.correlationId, attempts: result.attempts };

  switch (result.state) {
    case "done_chat":
      return {
        statusCode: 200,
        body: {
          ...base,
          response: result.generation.replyText,
          command: null,
          commandParameters: null,
        },
      };
    case "done_command":
      return {
        statusCode: 200,
        body: {
          ...base,
          response: result.generation.replyText,
          command: result.generation.command,
          commandParameters: result.generation.commandParameters,
          validationResult: result.validationResult,
        },
      };
    case "failed":
      return {
        statusCode: result.error.statusCode,
        body: {
          ...result.error.toJSON(),
          ...base,
          command: result.generation?.command ?? null,
          commandParameters: result.generation?.commandParameters ?? null,
        },
      };
  }
}
