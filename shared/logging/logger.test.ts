import { describe, it, expect } from "vitest";
import { Logger, RingBuffer } from "./logger.js";
import { MemoryTransport } from "./transports/memory.js";
import { ConsoleTransport } from "./transports/console.js";

function makeLogger(minLevel: "debug" | "info" = "debug") {
  const transport = new MemoryTransport();
  const logger = new Logger({ minLevel, component: "gateway", transports: [transport] });
  return { logger, transport };
}

describe("Logger", () => {
  it("drops entries below the minimum level", () => {
    const { logger, transport } = makeLogger("info");
    logger.debug("hidden");
    logger.info("shown");
    expect(transport.entries.map((e) => e.message)).toEqual(["shown"]);
  });

  it("redacts secret-looking keys, including nested ones", () => {
    const { logger, transport } = makeLogger();
    logger.info("request", {
      apiKey: "test-secret",
      headers: { authorization: "Bearer test-secret", accept: "json" },
      inputTokens: 12,
    });
    expect(transport.entries[0]?.data).toEqual({
      apiKey: "[REDACTED]",
      headers: { authorization: "[REDACTED]", accept: "json" },
      inputTokens: 12,
    });
  });

  it("child loggers extend the component path and carry context", () => {
    const { logger, transport } = makeLogger();
    const child = logger.child({ component: "hooks", sessionId: "sess_1" });
    child.child({ provider: "openai" }).warn("slow");
    const entry = transport.entries[0];
    expect(entry?.component).toBe("gateway.hooks");
    expect(entry?.sessionId).toBe("sess_1");
    expect(entry?.provider).toBe("openai");
  });

  it("shares the ring buffer with children", () => {
    const { logger } = makeLogger();
    logger.child({ component: "a" }).info("one");
    logger.info("two");
    expect(logger.getRecentLogs().map((e) => e.message)).toEqual(["one", "two"]);
  });

  it("records error details", () => {
    const { logger, transport } = makeLogger();
    logger.error("boom", new TypeError("bad"));
    logger.error("odd", "plain string");
    expect(transport.entries[0]?.error?.name).toBe("TypeError");
    expect(transport.entries[1]?.error).toEqual({ name: "Unknown", message: "plain string" });
  });
});

describe("RingBuffer", () => {
  it("keeps the most recent items in insertion order", () => {
    const buffer = new RingBuffer<number>(3);
    for (const n of [1, 2, 3, 4, 5]) buffer.push(n);
    expect(buffer.getAll()).toEqual([3, 4, 5]);
    expect(buffer.getLast(2)).toEqual([4, 5]);
  });
});

describe("ConsoleTransport", () => {
  it("formats a single line without colors", () => {
    const transport = new ConsoleTransport({ colors: false, timestamps: false });
    const line = transport.format({
      timestamp: "2026-01-01T10:20:30.000Z",
      level: "info",
      component: "gateway.session",
      message: "turn appended",
      sessionId: "sess_1",
      data: { turns: 2 },
    });
    expect(line).toBe('INF [gateway.session] (session=sess_1) turn appended {"turns":2}');
  });
});
