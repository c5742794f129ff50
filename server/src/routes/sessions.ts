/**
 * Session Routes
 *
 * Session lifecycle, exchanges (JSON or SSE), cancel, undo/redo and
 * manual compaction.
 */

import type { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { SessionNotFoundError, toErrorMessage } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import type { ExchangeInput, ExchangeResult, Gateway } from "../pipeline/index.js";
import { readBody, toHttpError } from "./errors.js";
import { CreateSessionBody, EndSessionBody, MessageBody } from "./schemas.js";

const log = createComponentLogger("http.sessions");

export function registerSessionRoutes(app: Hono, gateway: Gateway): void {
  // ============================================
  // LIFECYCLE
  // ============================================

  app.post("/v1/sessions", async (c) => {
    const body = await readBody(c, CreateSessionBody);
    const session = await gateway.createSession(body);
    return c.json(session, 201);
  });

  app.get("/v1/sessions", (c) => {
    const sessions = gateway.sessions.list();
    return c.json({ sessions, count: sessions.length });
  });

  app.get("/v1/sessions/:id", (c) => {
    return c.json(gateway.sessions.get(c.req.param("id")));
  });

  app.delete("/v1/sessions/:id", (c) => {
    const id = c.req.param("id");
    if (!gateway.destroySession(id)) throw new SessionNotFoundError(id);
    return c.json({ id, deleted: true });
  });

  app.post("/v1/sessions/:id/end", async (c) => {
    const { reason } = await readBody(c, EndSessionBody);
    return c.json(await gateway.endSession(c.req.param("id"), reason));
  });

  app.post("/v1/sessions/:id/resume", async (c) => {
    return c.json(await gateway.resumeSession(c.req.param("id")));
  });

  // ============================================
  // EXCHANGES
  // ============================================

  app.post("/v1/sessions/:id/messages", async (c) => {
    const id = c.req.param("id");
    const { stream, ...input } = await readBody(c, MessageBody);
    gateway.sessions.get(id);

    if (!stream) {
      const result = await gateway.exchange(id, input, { signal: c.req.raw.signal });
      if (result.status === "degraded") {
        const { status, body } = toHttpError(result.error);
        return c.json(body, status);
      }
      return c.json(result);
    }

    return streamSSE(c, async (sse) => {
      const controller = new AbortController();
      sse.onAbort(() => controller.abort());

      // Deltas arrive synchronously; writes are chained to keep their order
      let writes: Promise<void> = Promise.resolve();
      try {
        const result = await runExchange(gateway, id, input, controller.signal, (event, data) => {
          writes = writes.then(() => sse.writeSSE({ event, data }));
        });
        await writes;
        if (result.status === "degraded") {
          await sse.writeSSE({ event: "error", data: JSON.stringify(toHttpError(result.error).body) });
        } else {
          await sse.writeSSE({ event: "done", data: JSON.stringify(result) });
        }
      } catch (err) {
        log.warn("Streaming exchange failed", { sessionId: id, error: toHttpError(err).body.error.message });
        await writes.catch((writeErr) => log.debug("Pending SSE write failed", { sessionId: id, error: toErrorMessage(writeErr) }));
        await sse.writeSSE({ event: "error", data: JSON.stringify(toHttpError(err).body) });
      }
    });
  });

  app.post("/v1/sessions/:id/cancel", (c) => {
    const id = c.req.param("id");
    gateway.sessions.get(id);
    return c.json({ id, cancelled: gateway.cancel(id) });
  });

  // ============================================
  // HISTORY
  // ============================================

  app.post("/v1/sessions/:id/undo", async (c) => {
    return c.json({ turn: await gateway.undo(c.req.param("id")) });
  });

  app.post("/v1/sessions/:id/redo", async (c) => {
    return c.json({ turn: await gateway.redo(c.req.param("id")) });
  });

  app.post("/v1/sessions/:id/compact", async (c) => {
    return c.json(await gateway.compact(c.req.param("id")));
  });

  app.get("/v1/sessions/:id/compactions", (c) => {
    const compactions = gateway.compactions(c.req.param("id"));
    return c.json({ compactions, count: compactions.length });
  });

  app.get("/v1/sessions/:id/activity", (c) => {
    const id = c.req.param("id");
    gateway.sessions.get(id);
    const entries = gateway.continuity?.activities(id) ?? [];
    return c.json({ entries, count: entries.length });
  });

  app.get("/v1/sessions/:id/transcript", (c) => {
    const entries = gateway.sessions.transcript(c.req.param("id"));
    return c.json({ entries, count: entries.length });
  });
}

function runExchange(
  gateway: Gateway,
  id: string,
  input: ExchangeInput,
  signal: AbortSignal,
  send: (event: string, data: string) => void,
): Promise<ExchangeResult> {
  return gateway.exchange(id, input, { signal, onDelta: (delta) => send("delta", JSON.stringify(delta)) });
}
