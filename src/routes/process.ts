import type { FastifyInstance } from "fastify";

import { ProcessInput } from "../contracts/pipeline";
import { runCommandRouter, toProcessResponse, type RouterTimeouts } from "../control-plane/command_router";
import type { GenerationClient } from "../control-plane/generation_client";
import type { ValidatorClient } from "../control-plane/validator_client";

export type ProcessRouteOptions = {
  generation: GenerationClient;
  validator: ValidatorClient;
  timeouts: RouterTimeouts;
};

export async function processRoutes(app: FastifyInstance, opts: ProcessRouteOptions) {
  app.post("/process", async (req, reply) => {
    const parsed = ProcessInput.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    // Fastify's request id is the correlation id (x-correlation-id or generated).
    const correlationId = req.id;
    const log = req.log.child({ plane: "process" });

    log.info(
      { evt: "process.received", userChars: parsed.data.userInput.length },
      "process.received"
    );

    // Client disconnect aborts the in-flight call and stops the router.
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.on("close", onClose);

    try {
      const result = await runCommandRouter({
        userText: parsed.data.userInput,
        correlationId,
        generation: opts.generation,
        validator: opts.validator,
        timeouts: opts.timeouts,
        signal: controller.signal,
        log,
      });

      const { statusCode, body } = toProcessResponse(result);
      log.info(
        {
          evt: "process.completed",
          statusCode,
          state: result.state,
          attempts: result.attempts,
          command: result.generation?.command ?? undefined,
        },
        "process.completed"
      );
      const retryAfter = result.state === "failed" ? result.error.retryAfterHeader() : undefined;
      if (retryAfter) reply.header("retry-after", retryAfter);
      return reply.code(statusCode).send(body);
    } finally {
      reply.raw.off("close", onClose);
    }
  });
}
