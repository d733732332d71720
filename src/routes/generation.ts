import type { FastifyInstance } from "fastify";

import { GenerationRequest } from "../contracts/pipeline";
import type { GenerationClient } from "../control-plane/generation_client";
import { toUpstreamError } from "../control-plane/upstream";

export async function generationRoutes(
  app: FastifyInstance,
  opts: { generation: GenerationClient }
) {
  app.post("/generate_response", async (req, reply) => {
    const parsed = GenerationRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const { userText, retryFeedback } = parsed.data;
    const correlationId = parsed.data.correlationId ?? req.id;
    const log = req.log.child({ plane: "generation", correlationId });

    try {
      return await opts.generation.generate({ userText, retryFeedback, correlationId }, { log });
    } catch (err) {
      const error = toUpstreamError(err, "generation");
      log.error({ evt: "generation.failed", code: error.code }, error.message);
      const retryAfter = error.retryAfterHeader();
      if (retryAfter) reply.header("retry-after", retryAfter);
      return reply.code(error.statusCode).send(error.toJSON());
    }
  });
}
