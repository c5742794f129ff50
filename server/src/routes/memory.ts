/**
 * Memory Routes
 *
 * Core memory blocks, the archival store and recent-session summaries.
 */

import type { Hono } from "hono";
import { MemoryNotFoundError } from "../errors.js";
import type { ContinuityStore, MemoryStore } from "../memory/index.js";
import { readBody } from "./errors.js";
import { CoreBlockBody, SaveMemoryBody } from "./schemas.js";

function tagList(raw: string | undefined): string[] | undefined {
  const tags = (raw ?? "").split(",").map((t) => t.trim()).filter(Boolean);
  return tags.length > 0 ? tags : undefined;
}

function positiveInt(raw: string | undefined): number | undefined {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

export function registerMemoryRoutes(app: Hono, memory: MemoryStore, continuity?: ContinuityStore): void {
  // ============================================
  // CORE MEMORY
  // ============================================

  app.get("/v1/memory/core", (c) => {
    const blocks = memory.listCore();
    return c.json({ blocks, count: blocks.length });
  });

  app.get("/v1/memory/core/:name", (c) => {
    const block = memory.readCore(c.req.param("name"));
    if (!block) return c.json({ error: { code: "memory_not_found", message: "Core block not found" } }, 404);
    return c.json(block);
  });

  app.put("/v1/memory/core/:name", async (c) => {
    const { content } = await readBody(c, CoreBlockBody);
    return c.json(memory.writeCore(c.req.param("name"), content));
  });

  app.delete("/v1/memory/core/:name", (c) => {
    const name = c.req.param("name");
    return c.json({ name, deleted: memory.deleteCore(name) });
  });

  // ============================================
  // ARCHIVAL MEMORY
  // ============================================

  app.post("/v1/memory/archival", async (c) => {
    const body = await readBody(c, SaveMemoryBody);
    return c.json(memory.save(body), 201);
  });

  // Registered before /:id so "search" is not taken as an id
  app.get("/v1/memory/archival/search", (c) => {
    const query = c.req.query("q") ?? "";
    const results = memory.search(query, {
      limit: positiveInt(c.req.query("limit")),
      tags: tagList(c.req.query("tags")),
      includeHistory: c.req.query("history") === "true",
    });
    return c.json({ query, results, count: results.length });
  });

  app.get("/v1/memory/archival/:id", (c) => {
    const id = c.req.param("id");
    const record = memory.get(id);
    if (!record) throw new MemoryNotFoundError(id);
    return c.json(record);
  });

  app.get("/v1/memory/archival/:id/history", (c) => {
    const id = c.req.param("id");
    const record = memory.get(id);
    if (!record) throw new MemoryNotFoundError(id);
    const versions = memory.history(record.lineageId);
    return c.json({ lineageId: record.lineageId, versions, count: versions.length });
  });

  app.put("/v1/memory/archival/:id", async (c) => {
    const { text, tags } = await readBody(c, SaveMemoryBody);
    return c.json(memory.update(c.req.param("id"), text, tags));
  });

  app.delete("/v1/memory/archival/:id", (c) => {
    return c.json(memory.forget(c.req.param("id")));
  });

  // ============================================
  // RECENT SESSIONS
  // ============================================

  app.get("/v1/memory/recent", (c) => {
    const sessions = continuity?.recentSessions(positiveInt(c.req.query("limit"))) ?? [];
    return c.json({ sessions, count: sessions.length });
  });
}
