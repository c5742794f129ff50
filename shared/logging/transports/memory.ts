/**
 * Memory Transport
 *
 * Keeps entries in an array. Used by tests to assert on emitted logs and by
 * embedders that forward logs elsewhere on their own schedule.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface MemoryTransportOptions {
  minLevel?: LogLevel;
  /** Drop the oldest entry beyond this many (default: 500) */
  limit?: number;
}

export class MemoryTransport implements LogTransport {
  name = "memory";
  minLevel: LogLevel;
  readonly entries: LogEntry[] = [];
  private readonly limit: number;

  constructor(options: MemoryTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "trace";
    this.limit = options.limit ?? 500;
  }

  log(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.limit) this.entries.shift();
  }

  /** Entries whose message contains `text` */
  find(text: string): LogEntry[] {
    return this.entries.filter((e) => e.message.includes(text));
  }

  clear(): void {
    this.entries.length = 0;
  }
}
