import { ValidatorResponse, type CommandParameters } from "../contracts/pipeline";
import { upstreamUnavailable } from "../contracts/errors";
import { executeCommand } from "../robot/execute_command";
import type { FetchLike } from "../providers/openai_model";
import { postJson, upstreamHints, type CallContext } from "./upstream";

export type ValidationInput = {
  command: string;
  commandParameters: CommandParameters;
  correlationId: string;
};

export interface ValidatorClient {
  execute(input: ValidationInput, ctx?: CallContext): Promise<ValidatorResponse>;
}

export class InProcessValidatorClient implements ValidatorClient {
  async execute(input: ValidationInput, ctx: CallContext = {}): Promise<ValidatorResponse> {
    return executeCommand({
      command: input.command,
      commandParameters: input.commandParameters,
      log: ctx.log,
    });
  }
}

/**
 * Validation through a remote validator service (VALIDATOR_SERVICE_URL).
 * 200 and 500 both carry a verdict body; anything else is a transport failure.
 */
export class HttpValidatorClient implements ValidatorClient {
  constructor(private readonly opts: { baseUrl: string; fetchImpl?: FetchLike }) {}

  async execute(input: ValidationInput, ctx: CallContext = {}): Promise<ValidatorResponse> {
    const { status, json } = await postJson({
      url: `${this.opts.baseUrl}/v1/execute_command`,
      body: { command: input.command, commandParameters: input.commandParameters },
      correlationId: input.correlationId,
      upstream: "validator",
      signal: ctx.signal,
      fetchImpl: this.opts.fetchImpl,
    });

    const parsed = ValidatorResponse.safeParse(json);
    if ((status === 200 || status === 500) && parsed.success) {
      return parsed.data;
    }

    ctx.log?.error({ evt: "upstream.failed", upstream: "validator", status }, "upstream.failed");
  throw upstreamUnavailable(
      "validator",
      `validator service responded ${status}`,
      undefined,
      upstreamHints(status, json)
    );
  }
}
