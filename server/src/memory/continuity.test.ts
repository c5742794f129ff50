import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createMessage, userText } from "../canonical/index.js";
import { openDatabase, type GatewayDatabase } from "../db/index.js";
import { SessionManager, SessionStore } from "../session/index.js";
import { ContinuityStore, activityKindFor, activityTargetFor } from "./continuity.js";

const T0 = new Date("2026-03-02T09:00:00.000Z");
const HOUR = 3_600_000;

function assistantText(text: string) {
  return createMessage("assistant", [{ type: "text", text }]);
}

describe("ContinuityStore", () => {
  let db: GatewayDatabase;
  let store: ContinuityStore;
  let sessions: SessionManager;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);
    db = openDatabase(":memory:");
    store = new ContinuityStore(db);
    sessions = new SessionManager(new SessionStore(db));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("logs activity and reports each modified file once", () => {
    store.logActivity("sess_a", "file_write", "src/b.ts");
    store.logActivity("sess_a", "file_read", "README.md");
    store.logActivity("sess_a", "file_edit", "src/a.ts");
    store.logActivity("sess_a", "file_edit", "src/b.ts", "error");
    store.logActivity("sess_other", "file_write", "src/c.ts");

    expect(store.filesModified("sess_a")).toEqual(["src/a.ts", "src/b.ts"]);
    const [latest] = store.activities("sess_a");
    expect(latest).toMatchObject({ sessionId: "sess_a", kind: "file_edit", target: "src/b.ts", details: "error" });
    expect(store.activities("sess_a")).toHaveLength(4);
  });

  it("summarizes an ending session from its requests and last reply", () => {
    const session = sessions.create();
    sessions.appendTurn(session.id, [userText("Fix the login bug\nIt fails on empty passwords"), assistantText("Patched auth.ts\nAdded a guard\nRan tests\nAll green")]);
    sessions.appendTurn(session.id, [userText("Add a regression test"), assistantText("Added auth.test.ts")]);
    store.logActivity(session.id, "file_edit", "src/auth.ts");
    store.logActivity(session.id, "file_read", "README.md");

    const recent = store.recordSessionEnd(sessions.get(session.id));

    expect(recent).toEqual({
      sessionId: session.id,
      summary: "User requests: Fix the login bug; Add a regression test\nLast action: Added auth.test.ts",
      filesModified: ["src/auth.ts"],
      startedAt: T0.toISOString(),
      endedAt: T0.toISOString(),
    });
    expect(store.recentSessions()).toEqual([recent]);
  });

  it("keeps the first three lines of the last reply", () => {
    const session = sessions.create();
    sessions.appendTurn(session.id, [userText("go"), assistantText("one\ntwo\nthree\nfour")]);

    expect(store.recordSessionEnd(sessions.get(session.id))?.summary).toBe("User requests: go\nLast action: one two three");
  });

  it("cuts long requests at 100 characters", () => {
    const session = sessions.create();
    sessions.appendTurn(session.id, [userText("x".repeat(120))]);

    expect(store.recordSessionEnd(sessions.get(session.id))?.summary).toBe(`User requests: ${"x".repeat(100)}...`);
  });

  it("records nothing for a session without turns", () => {
    const session = sessions.create();
    expect(store.recordSessionEnd(session)).toBeNull();
    expect(store.recentSessions()).toEqual([]);
  });

  it("lists recent sessions newest first up to the limit", () => {
    store.saveSessionSummary({ sessionId: "sess_1", summary: "first", filesModified: [], startedAt: T0.toISOString() });
    vi.setSystemTime(T0.getTime() + HOUR);
    store.saveSessionSummary({ sessionId: "sess_2", summary: "second", filesModified: [], startedAt: T0.toISOString() });

    expect(store.recentSessions().map((s) => s.sessionId)).toEqual(["sess_2", "sess_1"]);
    expect(store.recentSessions(1).map((s) => s.sessionId)).toEqual(["sess_2"]);
  });

  it("drops sessions and activity older than the window", () => {
    store.saveSessionSummary({ sessionId: "sess_old", summary: "old", filesModified: [], startedAt: T0.toISOString() });
    store.logActivity("sess_old", "command", "npm test");

    vi.setSystemTime(T0.getTime() + 49 * HOUR);
    expect(store.recentSessions()).toEqual([]);
    expect(store.cleanupExpired()).toEqual({ sessions: 1, activities: 1 });
    expect(store.activities("sess_old")).toEqual([]);
  });

  it("renders recent sessions as a prompt section", () => {
    expect(store.formatRecentContext()).toBe("");

    store.saveSessionSummary({ sessionId: "sess_a", summary: "User requests: ship it", filesModified: ["a.ts", "b.ts"], startedAt: T0.toISOString() });

    expect(store.formatRecentContext()).toBe(
      [
        "<recent_sessions>",
        "The following sessions occurred recently. Use this context to maintain continuity:",
        "",
        `### Session 1 (ended ${T0.toISOString()})`,
        "User requests: ship it",
        "Files modified: a.ts, b.ts",
        "",
        "</recent_sessions>",
      ].join("\n"),
    );
  });
});

describe("activity classification", () => {
  it("maps tool names onto activity kinds", () => {
    expect(["Read", "Write", "Edit", "MultiEdit", "Bash", "WebFetch"].map(activityKindFor)).toEqual([
      "file_read",
      "file_write",
      "file_edit",
      "file_edit",
      "command",
      "tool_call",
    ]);
  });

  it("takes the target from the path, file path or command", () => {
    expect(activityTargetFor("Read", { path: "notes.md" })).toBe("notes.md");
    expect(activityTargetFor("Edit", { file_path: "src/a.ts", old_string: "x" })).toBe("src/a.ts");
    expect(activityTargetFor("Bash", { command: "ls" })).toBe("ls");
    expect(activityTargetFor("WebFetch", { url: "http://example.test" })).toBe("WebFetch");
  });
});
