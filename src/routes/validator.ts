import type { FastifyInstance } from "fastify";

import { ExecuteCommandRequest } from "../contracts/pipeline";
import { describeCommands } from "../robot/command_registry";
import { executeCommand } from "../robot/execute_command";

export async function validatorRoutes(app: FastifyInstance) {
  app.get("/commands", async () => ({ commands: describeCommands() }));

  app.post("/execute_command", async (req, reply) => {
    const parsed = ExecuteCommandRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const { command, commandParameters, correlationId } = parsed.data;
    const log = req.log.child({ plane: "validator", correlationId: correlationId ?? req.id });

    const verdict = executeCommand({ command, commandParameters, log });

    // Verdicts are 200 either way; only a simulator inconsistency is a server error.
    if (!verdict.success && verdict.errorCode === "internal_error") {
      return reply.code(500).send(verdict);
    }
    return verdict;
  });
}
