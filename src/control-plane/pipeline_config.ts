import { readPositiveInt, readUrl, type Env } from "../config/env";
import type { RouterTimeouts } from "./command_router";

export type PipelineConfig = {
  timeouts: RouterTimeouts;
  // Remote sibling services; in-process when unset.
  llmServiceUrl?: string;
  validatorServiceUrl?: string;
};

export const DEFAULT_GENERATION_TIMEOUT_MS = 120_000;
export const DEFAULT_VALIDATION_TIMEOUT_MS = 30_000;

export function resolvePipelineConfig(env: Env = process.env): PipelineConfig {
  return {
    timeouts: {
      generationMs: readPositiveInt(env.GENERATION_TIMEOUT_MS, DEFAULT_GENERATION_TIMEOUT_MS),
      validationMs: readPositiveInt(env.VALIDATION_TIMEOUT_MS, DEFAULT_VALIDATION_TIMEOUT_MS),
    },
    llmServiceUrl: readUrl(env.LLM_SERVICE_URL),
    validatorServiceUrl: readUrl(env.VALIDATOR_SERVICE_URL),
  };
}
