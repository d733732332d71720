import type { BaseLogger } from "pino";

import { GenerationResponse } from "../contracts/pipeline";
import { describeError, upstreamUnavailable } from "../contracts/errors";
import { fakeModelReply } from "../providers/fake_model";
import { openAIChatCompletion, type FetchLike } from "../providers/openai_model";
import type { ModelSettings } from "../providers/provider_config";
import type { ChatMessage, PromptBuilder } from "./prompt_builder";
import { fallbackProposal, parseProposal, type CommandProposal } from "./proposal_parser";
import { postJson, throwIfCancelled, toUpstreamError, upstreamHints, type CallContext } from "./upstream";

export type GenerationInput = {
  userText: string;
  retryFeedback: string | null;
  correlationId: string;
};

export interface GenerationClient {
  generate(input: GenerationInput, ctx?: CallContext): Promise<GenerationResponse>;
}

export type ModelCall = (input: {
  messages: ChatMessage[];
  signal?: AbortSignal;
  log?: BaseLogger;
}) => Promise<{ rawText: string }>;

export function toGenerationResponse(proposal: CommandProposal): GenerationResponse {
  return proposal.command === null
    ? { replyText: proposal.replyText, command: null, commandParameters: null }
    : {
        replyText: proposal.replyText,
        command: proposal.command,
        commandParameters: proposal.parameters,
      };
}

export function createModelCall(settings: ModelSettings, fetchImpl?: FetchLike): ModelCall {
  if (settings.provider === "fake") {
    return ({ messages }) => fakeModelReply({ messages });
  }

  return ({ messages, signal, log }) =>
    openAIChatCompletion({
      baseUrl: settings.endpoint.baseUrl,
      apiKey: settings.apiKey,
      model: settings.model,
      messages,
      maxTokens: settings.maxTokens,
      temperature: settings.temperature,
      jsonResponse: true,
      signal,
      fetchImpl,
      logger: log,
    });
}

/**
 * Generation against a model provider: one model call, one parse.
 * Unparseable output degrades to a conversational reply.
 */
export class ModelGenerationClient implements GenerationClient {
  constructor(
    private readonly deps: {
      promptBuilder: PromptBuilder;
      callModel: ModelCall;
      provider: string;
    }
  ) {}

  async generate(input: GenerationInput, ctx: CallContext = {}): Promise<GenerationResponse> {
    const { signal, log } = ctx;
    const messages = this.deps.promptBuilder.buildMessages(input.userText, input.retryFeedback);

    log?.info(
      {
        evt: input.retryFeedback ? "generation.retry_request" : "generation.request",
        provider: this.deps.provider,
        userChars: input.userText.length,
        retryFeedback: input.retryFeedback ?? undefined,
      },
      input.retryFeedback ? "generation.retry_request" : "generation.request"
    );

    const startNs = process.hrtime.bigint();
    let rawText: string;
    try {
      ({ rawText } = await this.deps.callModel({ messages, signal, log }));
    } catch (err) {
      const error = toUpstreamError(err, "generation", signal);
      log?.error({ evt: "generation.model_failed", code: error.code, error: describeError(err) }, "generation.model_failed");
      throw error;
    }
    throwIfCancelled(signal);

    const durationMs = Math.round(Number(process.hrtime.bigint() - startNs) / 1e6);
    log?.debug({ evt: "generation.raw_output", outputLength: rawText.length, durationMs }, "generation.raw_output");

    const parsed = parseProposal(rawText);
    if (!parsed.ok) {
      log?.warn(
        { evt: "generation.parse_failed", reason: parsed.reason, detail: parsed.detail.slice(0, 200) },
        "generation.parse_failed"
      );
    }
    const proposal = parsed.ok ? parsed.proposal : fallbackProposal();

    log?.info(
      {
        evt: proposal.command ? "generation.command" : "generation.chat",
        command: proposal.command ?? undefined,
        durationMs,
      },
      proposal.command ? "generation.command" : "generation.chat"
    );

    return toGenerationResponse(proposal);
  }
}

/**
 * Generation through a remote generation service (LLM_SERVICE_URL).
 */
export class HttpGenerationClient implements GenerationClient {
  constructor(private readonly opts: { baseUrl: string; fetchImpl?: FetchLike }) {}

  async generate(input: GenerationInput, ctx: CallContext = {}): Promise<GenerationResponse> {
    const { status, json } = await postJson({
      url: `${this.opts.baseUrl}/v1/generate_response`,
      body: { userText: input.userText, retryFeedback: input.retryFeedback },
      correlationId: input.correlationId,
      upstream: "generation",
      signal: ctx.signal,
      fetchImpl: this.opts.fetchImpl,
    });

    if (status < 200 || status >= 300) {
      ctx.log?.error({ evt: "upstream.failed", upstream: "generation", status }, "upstream.failed");
      throw upstreamUnavailable(
        "generation",
        `generation service responded ${status}`,
        undefined,
        upstreamHints(status, json)
      );
    }

    const parsed = GenerationResponse.safeParse(json);
    if (!parsed.success) {
      throw upstreamUnavailable("generation", "generation service returned a malformed response");
    }
    return parsed.data;
  }
}
