/**
 * Size estimation for the compaction budget.
 *
 * Budget units approximate tokens without a tokenizer: the mean of a
 * character-based estimate (chars / 4) counted twice and a word-based one
 * (words × 1.3). Each message adds a fixed overhead; inlined attachments
 * count as a flat block.
 */

import type { ContentSegment, Message, Turn } from "./types.js";

export const MESSAGE_OVERHEAD = 4;
export const ATTACHMENT_SIZE = 1000;

export function estimateTextSize(text: string): number {
  if (text.length === 0) return 0;
  const charEstimate = text.length / 4;
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.round((charEstimate * 2 + words * 1.3) / 3);
}

function segmentSize(segment: ContentSegment): number {
  switch (segment.type) {
    case "text":
    case "reasoning":
      return estimateTextSize(segment.text);
    case "tool_call":
      return estimateTextSize(segment.name) + estimateTextSize(JSON.stringify(segment.input));
    case "tool_result":
      return estimateTextSize(segment.content);
    case "attachment":
      return ATTACHMENT_SIZE;
  }
}

export function estimateMessageSize(message: Message): number {
  return message.content.reduce((sum, segment) => sum + segmentSize(segment), MESSAGE_OVERHEAD);
}

export function estimateMessagesSize(messages: readonly Message[]): number {
  return messages.reduce((sum, m) => sum + estimateMessageSize(m), 0);
}

export function totalTurnSize(turns: readonly Turn[]): number {
  return turns.reduce((sum, t) => sum + t.size, 0);
}
