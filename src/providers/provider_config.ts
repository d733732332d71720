import { existsSync } from "node:fs";

import { readNumber, readPositiveInt, readUrl, type Env } from "../config/env";

export type LlmProvider = "fake" | "openai";

export type ModelEndpoint = {
  baseUrl: string;
  source: "env" | "container" | "host";
};

export type ModelSettings = {
  provider: LlmProvider;
  providerSource: "env" | "default";
  model: string;
  endpoint: ModelEndpoint;
  apiKey: string;
  maxTokens: number;
  temperature: number;
};

export const CONTAINER_MODEL_RUNNER_URL = "http://model-runner.docker.internal/engines/llama.cpp/v1";
export const HOST_MODEL_RUNNER_URL = "http://localhost:11434/v1";
export const DEFAULT_MODEL = "ai/gemma3:270M";

// Local model runners ignore the key, but OpenAI-compatible servers expect the header.
const PLACEHOLDER_API_KEY = "model-runner";

function detectContainer(): boolean {
  return existsSync("/.dockerenv");
}

export function resolveModelEndpoint(args: {
  env?: Env;
  inContainer?: boolean;
} = {}): ModelEndpoint {
  const env = args.env ?? process.env;

  const explicit = readUrl(env.MODEL_RUNNER_URL);
  if (explicit) return { baseUrl: explicit, source: "env" };

  const inContainer = args.inContainer ?? detectContainer();
  if (inContainer) return { baseUrl: CONTAINER_MODEL_RUNNER_URL, source: "container" };

  return {
    baseUrl: readUrl(env.MODEL_RUNNER_FALLBACK_URL) ?? HOST_MODEL_RUNNER_URL,
    source: "host",
  };
}

export function resolveProvider(env: Env = process.env): { provider: LlmProvider; source: "env" | "default" } {
  const raw = (env.LLM_PROVIDER ?? "").trim().toLowerCase();
  if (!raw) return { provider: "fake", source: "default" };
  return { provider: raw === "openai" ? "openai" : "fake", source: "env" };
}

export function resolveModelSettings(args: {
  env?: Env;
  inContainer?: boolean;
} = {}): ModelSettings {
  const env = args.env ?? process.env;
  const { provider, source } = resolveProvider(env);

  return {
    provider,
    providerSource: source,
    model: env.MODEL_NAME?.trim() || DEFAULT_MODEL,
    endpoint: resolveModelEndpoint({ env, inContainer: args.inContainer }),
    apiKey: env.MODEL_API_KEY?.trim() || PLACEHOLDER_API_KEY,
    maxTokens: readPositiveInt(env.MODEL_MAX_TOKENS, 512),
    temperature: readNumber(env.MODEL_TEMPERATURE, 0.1),
  };
}
