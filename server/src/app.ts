/**
 * HTTP application
 *
 * Builds the hono app around a Gateway. Kept apart from index.ts so tests
 * can drive it through app.request() without binding a port.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { createComponentLogger } from "./logging.js";
import type { Gateway } from "./pipeline/index.js";
import { registerApiRoutes } from "./routes/api.js";
import { toHttpError } from "./routes/errors.js";
import { registerMemoryRoutes } from "./routes/memory.js";
import { registerSessionRoutes } from "./routes/sessions.js";

const log = createComponentLogger("http");

export function createApp(gateway: Gateway): Hono {
  const app = new Hono();

  app.use("*", cors());
  app.use("*", async (c, next) => {
    const started = Date.now();
    await next();
    log.debug("Request", { method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - started });
  });

  registerApiRoutes(app, gateway);
  registerSessionRoutes(app, gateway);
  registerMemoryRoutes(app, gateway.memory, gateway.continuity);

  app.notFound((c) => c.json({ error: { code: "not_found", message: `No route for ${c.req.method} ${c.req.path}` } }, 404));

  app.onError((err, c) => {
    if (err instanceof HTTPException) return err.getResponse();
    const { status, body } = toHttpError(err);
    if (status >= 500) {
      log.error("Request failed", err, { method: c.req.method, path: c.req.path });
    } else {
      log.debug("Request rejected", { method: c.req.method, path: c.req.path, code: body.error.code });
    }
    return c.json(body, status);
  });

  return app;
}
