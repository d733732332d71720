import { describeError } from "../contracts/errors";
import type { FetchLike } from "./openai_model";
import type { ModelSettings } from "./provider_config";

export type ModelStatus = "ready" | "unavailable" | "not_checked";

export type ModelHealth = {
  status: ModelStatus;
  model: string;
  endpoint?: string;
  detail?: string;
};

export const MODEL_HEALTH_TIMEOUT_MS = 2_000;

/**
 * Readiness check against the model runner's `/models` listing.
 * The fake provider has nothing to check.
 */
export async function checkModelRunner(args: {
  settings: ModelSettings;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}): Promise<ModelHealth> {
  const { settings } = args;
  if (settings.provider === "fake") {
    return { status: "not_checked", model: settings.model };
  }

  const doFetch = args.fetchImpl ?? fetch;
  const endpoint = settings.endpoint.baseUrl;
  try {
    const res = await doFetch(`${endpoint}/models`, {
      method: "GET",
      headers: { authorization: `Bearer ${settings.apiKey}` },
      signal: AbortSignal.timeout(args.timeoutMs ?? MODEL_HEALTH_TIMEOUT_MS),
    });
    // Body is not needed; release it.
    await res.body?.cancel();
    return res.ok
      ? { status: "ready", model: settings.model, endpoint }
      : { status: "unavailable", model: settings.model, endpoint, detail: `Model runner responded ${res.status}` };
  } catch (err) {
    return { status: "unavailable", model: settings.model, endpoint, detail: describeError(err) };
  }
}
