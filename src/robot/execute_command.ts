import type { BaseLogger } from "pino";

import type { CommandParameters, ValidatorResponse } from "../contracts/pipeline";
import { validateCommand } from "./command_validator";
import { simulateCommand } from "./simulator";

/**
 * Validator service body: validate, then simulate on success.
 * Verdicts are data; nothing here throws for bad input.
 */
export function executeCommand(args: {
  command: string;
  commandParameters: CommandParameters;
  log?: BaseLogger;
}): ValidatorResponse {
  const { command, commandParameters, log } = args;

  log?.debug({ evt: "validator.received", command }, "validator.received");

  const outcome = validateCommand(command, commandParameters);
  if (!outcome.valid) {
    log?.warn(
      {
        evt: "validator.rejected",
        command,
        errorCode: outcome.errorCode,
        field: outcome.field,
        violation: outcome.violation,
      },
      outcome.message
    );
    return {
      success: false,
      error: outcome.message,
      details: outcome.details,
      errorCode: outcome.errorCode,
    };
  }

  log?.info({ evt: "validator.success", command }, outcome.message);

  const simulation = simulateCommand(outcome.command);
  if (!simulation.ok) {
    log?.error({ evt: "simulator.failed", command }, simulation.message);
    return {
      success: false,
      error: `Unexpected error processing command: ${simulation.message}`,
      details: "Internal server error",
      errorCode: "internal_error",
    };
  }

  log?.info({ evt: "simulator.action", command }, simulation.description);

  return {
    success: true,
    message: `${outcome.message}. ${simulation.description}`,
    command,
    commandParameters,
  };
}
