import { randomUUID } from "node:crypto";

import Fastify from "fastify";
import cors from "@fastify/cors";
import type { LoggerOptions } from "pino";

import type { RouterTimeouts } from "./control-plane/command_router";
import {
  HttpGenerationClient,
  ModelGenerationClient,
  createModelCall,
  type GenerationClient,
} from "./control-plane/generation_client";
import { resolvePipelineConfig } from "./control-plane/pipeline_config";
import { PromptBuilder } from "./control-plane/prompt_builder";
import { CORRELATION_HEADER } from "./control-plane/upstream";
import {
  HttpValidatorClient,
  InProcessValidatorClient,
  type ValidatorClient,
} from "./control-plane/validator_client";
import { buildLoggerOptions } from "./logger";
import type { FetchLike } from "./providers/openai_model";
import { resolveModelSettings, type ModelSettings } from "./providers/provider_config";
import { generationRoutes } from "./routes/generation";
import { healthRoutes } from "./routes/healthz";
import { processRoutes } from "./routes/process";
import { validatorRoutes } from "./routes/validator";

export type AppOptions = {
  logger?: boolean | LoggerOptions;
  modelSettings?: ModelSettings;
  timeouts?: RouterTimeouts;
  promptsDir?: string;
  // Overrides for the orchestrator's collaborators.
  generation?: GenerationClient;
  validator?: ValidatorClient;
  llmServiceUrl?: string;
  validatorServiceUrl?: string;
  fetchImpl?: FetchLike;
};

export function newCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

export function buildApp(opts: AppOptions = {}) {
  const pipeline = resolvePipelineConfig();
  const modelSettings = opts.modelSettings ?? resolveModelSettings();
  const timeouts = opts.timeouts ?? pipeline.timeouts;
  const llmServiceUrl = opts.llmServiceUrl ?? pipeline.llmServiceUrl;
  const validatorServiceUrl = opts.validatorServiceUrl ?? pipeline.validatorServiceUrl;

  const app = Fastify({
    logger: opts.logger ?? buildLoggerOptions(),
    requestIdHeader: CORRELATION_HEADER,
    requestIdLogLabel: "correlationId",
    genReqId: () => newCorrelationId(),
  });

  // The generation service always talks to the model provider directly.
  const modelGeneration = new ModelGenerationClient({
    promptBuilder: new PromptBuilder(opts.promptsDir),
    callModel: createModelCall(modelSettings, opts.fetchImpl),
    provider: modelSettings.provider,
  });

  const generation = opts.generation
    ?? (llmServiceUrl
      ? new HttpGenerationClient({ baseUrl: llmServiceUrl, fetchImpl: opts.fetchImpl })
      : modelGeneration);
  const validator = opts.validator
    ?? (validatorServiceUrl
      ? new HttpValidatorClient({ baseUrl: validatorServiceUrl, fetchImpl: opts.fetchImpl })
      : new InProcessValidatorClient());

  app.addHook("onSend", async (req, reply, payload) => {
    reply.header(CORRELATION_HEADER, req.id);
    return payload;
  });

  // CORS (v0/dev): permissive, the UI runs on another origin.
  app.register(cors, { origin: true });

  app.register(healthRoutes, { modelSettings, fetchImpl: opts.fetchImpl });
  app.register(processRoutes, { prefix: "/v1", generation, validator, timeouts });
  app.register(generationRoutes, { prefix: "/v1", generation: modelGeneration });
  app.register(validatorRoutes, { prefix: "/v1" });

  app.log.info(
    {
      evt: "app.configured",
      provider: modelSettings.provider,
      providerSource: modelSettings.providerSource,
      model: modelSettings.model,
      modelEndpoint: modelSettings.endpoint.baseUrl,
      endpointSource: modelSettings.endpoint.source,
      generation: llmServiceUrl ?? "in-process",
      validator: validatorServiceUrl ?? "in-process",
      timeouts,
    },
    "app.configured"
  );

  return app;
}
