import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MemoryTransport } from "@modelgate/shared/logging";
import { openDatabase } from "../db/index.js";
import { userText, textOf, type Message } from "../canonical/index.js";
import { HookEngine } from "../hooks/index.js";
import { initGatewayLogging } from "../logging.js";
import { SessionManager, SessionStore } from "../session/index.js";
import { CompactionEngine, type Summarizer } from "./engine.js";

function words(n: number): Message {
  return userText(Array(n).fill("word").join(" "));
}

// 155 words -> 200 units, 392 words -> 500 units
const SIZE_200 = 155;
const SIZE_500 = 392;

const SUMMARY_REPLY = [
  "## Primary Request and Intent",
  "Keep going.",
  "## Current Work",
  "Counting words.",
].join("\n");

function fixedSummarizer(reply = SUMMARY_REPLY) {
  return vi.fn<Summarizer["summarize"]>(async () => reply);
}

describe("CompactionEngine", () => {
  let sessions: SessionManager;
  let sessionId: string;

  beforeEach(() => {
    sessions = new SessionManager(new SessionStore(openDatabase(":memory:")));
    sessionId = sessions.create().id;
  });

  function engine(summarize: Summarizer["summarize"], extra: Partial<ConstructorParameters<typeof CompactionEngine>[0]> = {}) {
    return new CompactionEngine({
      sessions,
      summarizer: { summarize },
      contextWindow: () => 1000,
      threshold: 1,
      responseReserve: 0,
      ...extra,
    });
  }

  it("computes the budget from window, threshold and reserve", () => {
    const e = new CompactionEngine({
      sessions,
      summarizer: { summarize: fixedSummarizer() },
      contextWindow: () => 200_000,
    });
    expect(e.budgetFor(sessionId)).toBe(Math.floor(200_000 * 0.85) - 4096);

    const tiny = engine(fixedSummarizer(), { contextWindow: () => 1000, threshold: 0.5, responseReserve: 4096 });
    expect(tiny.budgetFor(sessionId)).toBe(0);
  });

  it("summarizes three 200-unit turns before a 500-unit turn under a 1000 budget", async () => {
    const summarize = fixedSummarizer();
    const e = engine(summarize);

    for (let i = 0; i < 3; i++) {
      const { turn, compaction } = await e.appendTurn(sessionId, [words(SIZE_200)]);
      expect(turn.size).toBe(200);
      expect(compaction).toBeNull();
    }
    const { turn, compaction } = await e.appendTurn(sessionId, [words(SIZE_500)]);

    expect(turn.size).toBe(500);
    expect(compaction?.status).toBe("compacted");
    expect(summarize).toHaveBeenCalledTimes(1);

    const session = sessions.get(sessionId);
    expect(session.turns.map((t) => t.kind)).toEqual(["summary", "verbatim"]);
    expect(session.turns[1].id).toBe(turn.id);
    expect(session.budgetUsed).toBe(session.turns[0].size + 500);
    expect(session.status).toBe("active");
    expect(textOf(session.turns[0].messages[0])).toContain("## Current Work\nCounting words.");
    expect(sessions.transcript(sessionId)).toHaveLength(3);
  });

  it("never leaves two summaries in the active list", async () => {
    const e = engine(fixedSummarizer());
    for (let i = 0; i < 8; i++) {
      await e.appendTurn(sessionId, [words(SIZE_500)]);
      const kinds = sessions.get(sessionId).turns.map((t) => t.kind);
      expect(kinds.filter((k) => k === "summary").length).toBeLessThanOrEqual(1);
      expect(kinds.slice(1)).not.toContain("summary");
    }
    expect(sessions.compactions(sessionId).length).toBeGreaterThan(1);
  });

  it("keeps the newest turns when preserveRecentTurns is set", async () => {
    const e = engine(fixedSummarizer(), { preserveRecentTurns: 1 });
    await e.appendTurn(sessionId, [words(SIZE_200)]);
    await e.appendTurn(sessionId, [words(SIZE_200)]);
    const { turn: third } = await e.appendTurn(sessionId, [words(SIZE_200)]);
    const { turn: fourth } = await e.appendTurn(sessionId, [words(SIZE_500)]);

    const turns = sessions.get(sessionId).turns;
    expect(turns.map((t) => t.kind)).toEqual(["summary", "verbatim", "verbatim"]);
    expect(turns.slice(1).map((t) => t.id)).toEqual([third.id, fourth.id]);
  });

  it("defers when the summarizer fails and still appends the turn", async () => {
    const e = engine(vi.fn<Summarizer["summarize"]>(async () => Promise.reject(new Error("upstream down"))));
    for (let i = 0; i < 3; i++) await e.appendTurn(sessionId, [words(SIZE_200)]);
    const { compaction } = await e.appendTurn(sessionId, [words(SIZE_500)]);

    expect(compaction).toEqual({ status: "deferred", reason: "upstream down" });
    const session = sessions.get(sessionId);
    expect(session.turns.map((t) => t.kind)).toEqual(["verbatim", "verbatim", "verbatim", "verbatim"]);
    expect(session.budgetUsed).toBe(1100);
    expect(session.status).toBe("active");
    expect(sessions.compactions(sessionId)).toEqual([]);
  });

  describe("failure logging", () => {
    const transport = new MemoryTransport();

    beforeEach(() => {
      transport.clear();
      initGatewayLogging({ console: false, transports: [transport] });
    });

    afterEach(() => {
      initGatewayLogging({ console: false });
    });

    it("logs the summarizer error with the session and trigger", async () => {
      const e = engine(vi.fn<Summarizer["summarize"]>(async () => Promise.reject(new Error("upstream down"))));
      await e.appendTurn(sessionId, [words(SIZE_500)]);
      await e.compact(sessionId, "manual");

      const [entry] = transport.find("Compaction failed");
      expect(entry?.level).toBe("error");
      expect(entry?.error).toMatchObject({ name: "Error", message: "upstream down" });
      expect(entry?.data).toEqual({ sessionId, trigger: "manual" });
    });
  });

  it("defers when the reply has no recognizable sections", async () => {
    const e = engine(fixedSummarizer("I could not summarize that."));
    await e.appendTurn(sessionId, [words(SIZE_500)]);
    const outcome = await e.compact(sessionId, "manual");

    expect(outcome).toEqual({ status: "deferred", reason: "Summary reply has none of the expected sections" });
    expect(sessions.get(sessionId).turns.map((t) => t.kind)).toEqual(["verbatim"]);
  });

  it("defers when a pre_compact hook blocks", async () => {
    const summarize = fixedSummarizer();
    const hooks = new HookEngine(
      { pre_compact: [{ hooks: [{ type: "prompt", prompt: "May we compact?" }] }] },
      { projectDir: "/tmp", decisionModel: { decide: async () => '{"ok": false, "reason": "not now"}' } },
    );
    const e = engine(summarize, { hooks });
    await e.appendTurn(sessionId, [words(SIZE_500)]);

    expect(await e.compact(sessionId, "manual")).toEqual({ status: "deferred", reason: "not now" });
    expect(summarize).not.toHaveBeenCalled();
  });

  it("skips when there is nothing to compact", async () => {
    const e = engine(fixedSummarizer());
    expect(await e.compact(sessionId, "manual")).toEqual({ status: "skipped", reason: "nothing to compact" });

    await e.appendTurn(sessionId, [words(SIZE_200)]);
    await e.compact(sessionId, "manual");
    expect(await e.compact(sessionId, "manual")).toEqual({ status: "skipped", reason: "nothing to compact" });
  });

  it("ensureCapacity does nothing while the turn fits", async () => {
    const summarize = fixedSummarizer();
    const e = engine(summarize);
    await e.appendTurn(sessionId, [words(SIZE_500)]);

    expect(await e.ensureCapacity(sessionId, 500)).toBeNull();
    expect((await e.ensureCapacity(sessionId, 501))?.status).toBe("compacted");
    expect(summarize).toHaveBeenCalledTimes(1);
  });
});
