import { describe, it, expect } from "vitest";

import {
  CONTAINER_MODEL_RUNNER_URL,
  DEFAULT_MODEL,
  HOST_MODEL_RUNNER_URL,
  resolveModelEndpoint,
  resolveModelSettings,
  resolveProvider,
} from "../src/providers/provider_config";
import {
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_VALIDATION_TIMEOUT_MS,
  resolvePipelineConfig,
} from "../src/control-plane/pipeline_config";
import { readNumber, readPositiveInt, readUrl } from "../src/config/env";

describe("resolveModelEndpoint", () => {
  it("prefers an explicit MODEL_RUNNER_URL", () => {
    const endpoint = resolveModelEndpoint({
      env: { MODEL_RUNNER_URL: " http://runner.local/v1/ " },
      inContainer: true,
    });
    expect(endpoint).toEqual({ baseUrl: "http://runner.local/v1", source: "env" });
  });

  it("uses the container runner inside a container", () => {
    expect(resolveModelEndpoint({ env: {}, inContainer: true })).toEqual({
      baseUrl: CONTAINER_MODEL_RUNNER_URL,
      source: "container",
    });
  });

  it("falls back to the host runner outside a container", () => {
    expect(resolveModelEndpoint({ env: {}, inContainer: false })).toEqual({
      baseUrl: HOST_MODEL_RUNNER_URL,
      source: "host",
    });
    expect(
      resolveModelEndpoint({ env: { MODEL_RUNNER_FALLBACK_URL: "http://127.0.0.1:12434/v1" }, inContainer: false })
    ).toEqual({ baseUrl: "http://127.0.0.1:12434/v1", source: "host" });
  });
});

describe("resolveProvider", () => {
  it("defaults to the fake provider", () => {
    expect(resolveProvider({})).toEqual({ provider: "fake", source: "default" });
  });

  it("reads LLM_PROVIDER case-insensitively", () => {
    expect(resolveProvider({ LLM_PROVIDER: "OpenAI" })).toEqual({ provider: "openai", source: "env" });
    expect(resolveProvider({ LLM_PROVIDER: "something-else" })).toEqual({ provider: "fake", source: "env" });
  });
});

describe("resolveModelSettings", () => {
  it("applies defaults for unset or unparsable values", () => {
    const settings = resolveModelSettings({
      env: { MODEL_TEMPERATURE: "0", MODEL_MAX_TOKENS: "lots" },
      inContainer: false,
    });
    expect(settings).toEqual({
      provider: "fake",
      providerSource: "default",
      model: DEFAULT_MODEL,
      endpoint: { baseUrl: HOST_MODEL_RUNNER_URL, source: "host" },
      apiKey: "model-runner",
      maxTokens: 512,
      temperature: 0,
    });
  });

  it("takes model name and key from the environment", () => {
    const settings = resolveModelSettings({
      env: { LLM_PROVIDER: "openai", MODEL_NAME: "test-model", MODEL_API_KEY: "test-secret", MODEL_MAX_TOKENS: "256" },
      inContainer: false,
    });
    expect(settings.provider).toBe("openai");
    expect(settings.model).toBe("test-model");
    expect(settings.apiKey).toBe("test-secret");
    expect(settings.maxTokens).toBe(256);
  });
});

describe("resolvePipelineConfig", () => {
  it("defaults to in-process collaborators and standard timeouts", () => {
    expect(resolvePipelineConfig({})).toEqual({
      timeouts: {
        generationMs: DEFAULT_GENERATION_TIMEOUT_MS,
        validationMs: DEFAULT_VALIDATION_TIMEOUT_MS,
      },
      llmServiceUrl: undefined,
      validatorServiceUrl: undefined,
    });
  });

  it("reads service URLs and timeouts", () => {
    const config = resolvePipelineConfig({
      LLM_SERVICE_URL: "http://llm:8001/",
      VALIDATOR_SERVICE_URL: "http://validator:8002",
      GENERATION_TIMEOUT_MS: "5000",
      VALIDATION_TIMEOUT_MS: "-1",
    });
    expect(config).toEqual({
      timeouts: { generationMs: 5000, validationMs: DEFAULT_VALIDATION_TIMEOUT_MS },
      llmServiceUrl: "http://llm:8001",
      validatorServiceUrl: "http://validator:8002",
    });
  });
});

describe("env readers", () => {
  it("parse numbers with fallbacks", () => {
    expect(readNumber(undefined, 7)).toBe(7);
    expect(readNumber("  ", 7)).toBe(7);
    expect(readNumber("0.25", 7)).toBe(0.25);
    expect(readPositiveInt("12.9", 1)).toBe(12);
    expect(readPositiveInt("0", 1)).toBe(1);
    expect(readUrl("")).toBeUndefined();
    expect(readUrl("http://a.test//")).toBe("http://a.test");
  });
});
