import type { FastifyInstance } from "fastify";

import { checkModelRunner } from "../providers/model_health";
import type { FetchLike } from "../providers/openai_model";
import type { ModelSettings } from "../providers/provider_config";

export const SERVICE_NAME = "robot-command-gateway";

export type HealthRouteOptions = {
  modelSettings: ModelSettings;
  fetchImpl?: FetchLike;
};

export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions) {
  const checkModel = () => checkModelRunner({ settings: opts.modelSettings, fetchImpl: opts.fetchImpl });

  app.get("/healthz", async () => {
    const model = await checkModel();
    return {
      ok: true,
      service: SERVICE_NAME,
      provider: opts.modelSettings.provider,
      status: model.status === "unavailable" ? "degraded" : "healthy",
      model,
      ts: new Date().toISOString(),
    };
  });

  // Container health checks hit this path; degraded still answers 200.
  app.get("/health", async () => {
    const model = await checkModel();
    return {
      status: model.status === "unavailable" ? "degraded" : "healthy",
      modelStatus: model.status,
    };
  });
}
