/**
 * Server-Sent Events reader.
 *
 * Decodes a byte stream into dispatched events: `event:` and `data:` fields
 * accumulate until a blank line; a trailing partial line stays buffered
 * until more bytes arrive. Data left undispatched when the stream ends is
 * still yielded, flagged `truncated`.
 */

import type { SseEvent } from "./types.js";

export async function* readServerSentEvents(
  body: ReadableStream<Uint8Array>,
  signal?: AbortSignal,
): AsyncGenerator<SseEvent, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let eventName: string | undefined;
  let dataLines: string[] = [];

  const onAbort = () => {
    reader.cancel().catch(() => undefined);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  const dispatch = (): SseEvent | null => {
    if (dataLines.length === 0) {
      eventName = undefined;
      return null;
    }
    const event: SseEvent = eventName ? { event: eventName, data: dataLines.join("\n") } : { data: dataLines.join("\n") };
    eventName = undefined;
    dataLines = [];
    return event;
  };

  const feed = (line: string): SseEvent | null => {
    if (line === "") return dispatch();
    if (line.startsWith(":")) return null;
    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);
    if (field === "data") dataLines.push(value);
    else if (field === "event") eventName = value;
    return null;
  };

  try {
    while (true) {
      if (signal?.aborted) return;
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const rawLine of lines) {
        const event = feed(rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine);
        if (event) yield event;
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) feed(buffer);
    const last = dispatch();
    if (last) yield { ...last, truncated: true };
  } finally {
    signal?.removeEventListener("abort", onAbort);
    reader.releaseLock();
  }
}
