import { describe, it, expect, afterAll } from "vitest";

import { buildApp } from "../src/app";
import { HttpGenerationClient } from "../src/control-plane/generation_client";
import { withTimeout } from "../src/control-plane/upstream";
import { HttpValidatorClient } from "../src/control-plane/validator_client";
import { PipelineError } from "../src/contracts/errors";
import {
  TEST_TIMEOUTS,
  fakeModelSettings,
  hangingFetch,
  injectFetch,
  jsonResponse,
  type RecordedCall,
} from "./helpers/app_fixtures";

describe("orchestrator over HTTP collaborators", () => {
  // One app plays the generation and validator services.
  const services = buildApp({ logger: false, modelSettings: fakeModelSettings(), timeouts: TEST_TIMEOUTS });
  const calls: RecordedCall[] = [];
  const gateway = buildApp({
    logger: false,
    modelSettings: fakeModelSettings(),
    timeouts: TEST_TIMEOUTS,
    llmServiceUrl: "http://llm.test",
    validatorServiceUrl: "http://validator.test",
    fetchImpl: injectFetch(services, calls),
  });

  afterAll(async () => {
    await gateway.close();
    await services.close();
  });

  it("threads the correlation id through both services", async () => {
    const response = await gateway.inject({
      method: "POST",
      url: "/v1/process",
      headers: { "x-correlation-id": "trace-77" },
      payload: { userInput: "move to 5, 7" },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json().validationResult).toContain("Robot navigating to coordinates (5, 7)");

    expect(calls.map((c) => c.url)).toEqual([
      "http://llm.test/v1/generate_response",
      "http://validator.test/v1/execute_command",
    ]);
    for (const call of calls) {
      expect(call.headers["x-correlation-id"]).toBe("trace-77");
      expect(call.body.correlationId).toBe("trace-77");
    }
    expect(calls[0].body).toEqual({ userText: "move to 5, 7", retryFeedback: null, correlationId: "trace-77" });
    expect(calls[1].body).toEqual({
      command: "move_to",
      commandParameters: { x: 5, y: 7 },
      correlationId: "trace-77",
    });
  });
});

describe("HttpValidatorClient", () => {
  it("returns verdicts carried by a 200", async () => {
    const client = new HttpValidatorClient({
      baseUrl: "http://validator.test",
      fetchImpl: async () => jsonResponse({ success: false, error: "nope", errorCode: "schema_violation" }),
    });

    await expect(
      client.execute({ command: "rotate", commandParameters: {}, correlationId: "c-1" })
    ).resolves.toEqual({ success: false, error: "nope", errorCode: "schema_violation" });
  });

  it("treats other statuses as an unavailable upstream", async () => {
    const client = new HttpValidatorClient({
      baseUrl: "http://validator.test",
      fetchImpl: async () => new Response("not found", { status: 404 }),
    });

    const error = await client
      .execute({ command: "rotate", commandParameters: {}, correlationId: "c-1" })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PipelineError);
    if (!(error instanceof PipelineError)) return;
    expect(error.code).toBe("upstream_unavailable");
    expect(error.message).toBe("validator service responded 404");
  });
});

describe("HttpGenerationClient", () => {
  it("rejects a malformed service response", async () => {
    const client = new HttpGenerationClient({
      baseUrl: "http://llm.test",
      fetchImpl: async () => jsonResponse({ reply: "hi" }),
    });

    await expect(
      client.generate({ userText: "hi", retryFeedback: null, correlationId: "c-2" })
    ).rejects.toMatchObject({
      code: "upstream_unavailable",
      message: "generation service returned a malformed response",
    });
  });

  it("keeps the retry hints of a failed generation service", async () => {
    const client = new HttpGenerationClient({
      baseUrl: "http://llm.test",
      fetchImpl: async () =>
        jsonResponse({ error: "upstream_unavailable", message: "generation call failed", retryable: false, retryAfterMs: 3000 }, 503),
    });

    const error = await client
      .generate({ userText: "hi", retryFeedback: null, correlationId: "c-5" })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PipelineError);
    if (!(error instanceof PipelineError)) return;
    expect(error.message).toBe("generation service responded 503");
    expect(error.retryable).toBe(false);
    expect(error.details.upstreamStatus).toBe(503);
    expect(error.retryAfterHeader()).toBe("3");
  });

  it("maps a timeout to an unavailable upstream", async () => {
    const client = new HttpGenerationClient({ baseUrl: "http://llm.test", fetchImpl: hangingFetch });

    await expect(
      client.generate(
        { userText: "hi", retryFeedback: null, correlationId: "c-3" },
        { signal: withTimeout(undefined, 20) }
      )
    ).rejects.toMatchObject({ code: "upstream_unavailable", message: "generation call timed out" });
  });

  it("maps a caller abort to a cancellation", async () => {
    const controller = new AbortController();
    const client = new HttpGenerationClient({ baseUrl: "http://llm.test", fetchImpl: hangingFetch });

    const pending = client.generate(
      { userText: "hi", retryFeedback: null, correlationId: "c-4" },
      { signal: withTimeout(controller.signal, 1_000) }
    );
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: "request_cancelled", statusCode: 499 });
  });
});
