/**
 * API Routes
 *
 * Health check, gateway stats and the model list.
 */

import type { Hono } from "hono";
import type { Gateway } from "../pipeline/index.js";

export const SERVICE_NAME = "modelgate";
export const SERVICE_VERSION = "0.1.0";

export function registerApiRoutes(app: Hono, gateway: Gateway): void {
  // Health check
  app.get("/health", (c) =>
    c.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: "running",
    }),
  );

  app.get("/stats", (c) => {
    return c.json(gateway.stats());
  });

  app.get("/v1/models", (c) => {
    const models = gateway.listModels();
    return c.json({ models, count: models.length });
  });
}
