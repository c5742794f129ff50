/**
 * Streaming Reassembly
 *
 * Adapters feed provider events into a StreamAccumulator, which keeps
 * blocks in first-seen order and builds the final CanonicalResponse. A
 * stream that ends without its terminal event still yields everything
 * received so far, flagged `incomplete`.
 */

import type {
  CanonicalResponse,
  ContentSegment,
  JsonObject,
  StopReason,
  TokenUsage,
} from "../canonical/types.js";
import { emptyUsage } from "../canonical/types.js";
import { createMessage, parseJsonObject } from "../canonical/messages.js";
import { TranslationError } from "../errors.js";

type Block =
  | { kind: "text"; text: string }
  | { kind: "reasoning"; text: string; signature?: string }
  | { kind: "tool_call"; index: number; id: string; name: string; args: string; input?: JsonObject };

export class StreamAccumulator {
  id = "";
  model: string;
  usage: TokenUsage = emptyUsage();
  stopReason: StopReason | null = null;
  private completed = false;
  private readonly blocks: Block[] = [];
  private readonly keyed = new Map<string, Block>();
  private toolCount = 0;

  constructor(readonly provider: string, model: string) {
    this.model = model;
  }

  get isComplete(): boolean {
    return this.completed;
  }

  get toolCallCount(): number {
    return this.toolCount;
  }

  /** Append text; without a key, extends the trailing text block */
  appendText(text: string, key?: string): void {
    const block = this.blockFor(key, "text");
    if (block.kind === "text") block.text += text;
  }

  appendReasoning(text: string, key?: string): void {
    const block = this.blockFor(key, "reasoning");
    if (block.kind === "reasoning") block.text += text;
  }

  setSignature(signature: string, key?: string): void {
    const block = this.blockFor(key, "reasoning");
    if (block.kind === "reasoning") block.signature = (block.signature ?? "") + signature;
  }

  /**
   * Get or start the tool call under `key`. Returns the call's index and
   * whether it was created by this call.
   */
  startToolCall(key: string, id: string | undefined, name: string | undefined): { index: number; created: boolean } {
    const existing = this.keyed.get(key);
    if (existing?.kind === "tool_call") {
      if (id && !existing.id) existing.id = id;
      if (name && !existing.name) existing.name = name;
      return { index: existing.index, created: false };
    }
    const block: Block = { kind: "tool_call", index: this.toolCount++, id: id ?? "", name: name ?? "", args: "" };
    this.blocks.push(block);
    this.keyed.set(key, block);
    return { index: block.index, created: true };
  }

  appendToolArguments(key: string, fragment: string): number {
    const { index } = this.startToolCall(key, undefined, undefined);
    const block = this.keyed.get(key);
    if (block?.kind === "tool_call") block.args += fragment;
    return index;
  }

  /** Record a tool call that arrived whole (providers that don't stream arguments) */
  addToolCall(id: string, name: string, input: JsonObject): number {
    const block: Block = { kind: "tool_call", index: this.toolCount++, id, name, args: "", input };
    this.blocks.push(block);
    return block.index;
  }

  addUsage(partial: Partial<TokenUsage>): void {
    this.usage = { ...this.usage, ...partial };
  }

  setStopReason(reason: StopReason): void {
    this.stopReason = reason;
  }

  markComplete(): void {
    this.completed = true;
  }

  finish(): CanonicalResponse {
    const notes: string[] = [];
    const content: ContentSegment[] = [];

    for (const block of this.blocks) {
      switch (block.kind) {
        case "text":
          if (block.text) content.push({ type: "text", text: block.text });
          break;
        case "reasoning":
          if (block.text || block.signature) {
            content.push(block.signature
              ? { type: "reasoning", text: block.text, signature: block.signature }
              : { type: "reasoning", text: block.text });
          }
          break;
        case "tool_call": {
          let input = block.input ?? (block.args.trim() === "" ? {} : parseJsonObject(block.args));
          if (input === null) {
            if (this.completed) {
              throw new TranslationError(this.provider, `tool call ${block.name} arguments are not a JSON object`);
            }
            notes.push(`tool call ${block.id || block.name} arguments truncated; input left empty`);
            input = {};
          }
          content.push({ type: "tool_call", id: block.id, name: block.name, input });
          break;
        }
      }
    }

    if (!this.completed) {
      notes.push("stream ended before the provider's terminal event");
    }

    const hasToolCalls = content.some((s) => s.type === "tool_call");
    return {
      id: this.id,
      model: this.model,
      provider: this.provider,
      message: createMessage("assistant", content),
      stopReason: this.stopReason ?? (!this.completed ? "unknown" : hasToolCalls ? "tool_use" : "end_turn"),
      usage: this.usage,
      incomplete: !this.completed,
      notes,
    };
  }

  private blockFor(key: string | undefined, kind: "text" | "reasoning"): Block {
    if (key !== undefined) {
      const existing = this.keyed.get(key);
      if (existing) return existing;
      const block: Block = kind === "text" ? { kind, text: "" } : { kind, text: "" };
      this.blocks.push(block);
      this.keyed.set(key, block);
      return block;
    }
    const last = this.blocks[this.blocks.length - 1];
    if (last?.kind === kind) return last;
    const block: Block = kind === "text" ? { kind, text: "" } : { kind, text: "" };
    this.blocks.push(block);
    return block;
  }
}
