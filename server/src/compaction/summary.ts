/**
 * Structured summary: the prompt that asks for it, the parser that reads it
 * back and the canonical rendering stored in the summary turn.
 */

import type { Message, Turn } from "../canonical/index.js";
import { CompactionFailure } from "../errors.js";

export const SUMMARY_SECTIONS = [
  "Primary Request and Intent",
  "Key Technical Concepts",
  "Files and Code Sections",
  "Errors and Fixes",
  "Problem Solving",
  "Verbatim User Messages",
  "Pending Tasks",
  "Current Work",
  "Optional Next Step",
] as const;

export type SummarySection = (typeof SUMMARY_SECTIONS)[number];

export type SummarySections = Record<SummarySection, string>;

export const MISSING_SECTION = "None.";

const MAX_SEGMENT_CHARS = 4000;

export const SUMMARY_SYSTEM_PROMPT = [
  "You summarize a conversation between a user and an AI coding assistant so the assistant can continue the work without the original transcript.",
  "Reply with exactly these nine sections, in this order, each introduced by a markdown heading of the form \"## <Section Name>\":",
  ...SUMMARY_SECTIONS.map((name, i) => `${i + 1}. ${name}`),
  "Under Verbatim User Messages, quote every user message that is not a tool result, word for word.",
  "Under Files and Code Sections, name each file touched and the code that matters, with short snippets.",
  "Write \"None.\" for a section with nothing to report. Do not add other sections or any text outside them.",
].join("\n");

function clip(text: string): string {
  return text.length > MAX_SEGMENT_CHARS ? `${text.slice(0, MAX_SEGMENT_CHARS)}… [truncated]` : text;
}

function renderMessage(message: Message): string[] {
  return message.content.flatMap((segment): string[] => {
    switch (segment.type) {
      case "text":
        return segment.text ? [`[${message.role}] ${clip(segment.text)}`] : [];
      case "tool_call":
        return [`[${message.role} called ${segment.name} (${segment.id})] ${clip(JSON.stringify(segment.input))}`];
      case "tool_result":
        return [`[tool result ${segment.toolCallId}${segment.isError ? ", error" : ""}] ${clip(segment.content)}`];
      case "attachment":
        return [`[${message.role} attached ${segment.name ?? segment.ref} (${segment.mediaType})]`];
      case "reasoning":
        return [];
    }
  });
}

/** Plain-text transcript of the turns being compacted */
export function renderTranscript(turns: readonly Turn[]): string {
  return turns
    .map((turn) => {
      const lines = turn.messages.flatMap(renderMessage);
      return turn.kind === "summary" ? `[summary of earlier conversation]\n${lines.join("\n")}` : lines.join("\n");
    })
    .filter(Boolean)
    .join("\n\n");
}

export function buildSummaryPrompt(turns: readonly Turn[]): { system: string; prompt: string } {
  return {
    system: SUMMARY_SYSTEM_PROMPT,
    prompt: `Summarize the conversation below.\n\n<conversation>\n${renderTranscript(turns)}\n</conversation>`,
  };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// "## 3. Files and Code Sections", "**Files and Code Sections:**", "Files and Code Sections: none"
const HEADINGS = SUMMARY_SECTIONS.map((name) => ({
  name,
  pattern: new RegExp(`^\\s*(?:#{1,6}\\s*)?(?:\\*\\*)?(?:\\d+[.)]\\s*)?(?:\\*\\*)?${escapeRegExp(name)}(?:\\*\\*)?\\s*(?::(?:\\*\\*)?\\s*(.*))?$`, "i"),
}));

/**
 * Split a summary reply into the nine sections. Missing sections become
 * "None."; a reply with no recognizable section throws CompactionFailure.
 */
export function parseSummary(reply: string): SummarySections {
  const collected = new Map<SummarySection, string[]>();
  let current: string[] | null = null;

  for (const line of reply.split(/\r?\n/)) {
    const heading = HEADINGS.find((h) => h.pattern.test(line));
    if (heading) {
      current = [];
      collected.set(heading.name, current);
      const rest = heading.pattern.exec(line)?.[1]?.trim();
      if (rest) current.push(rest);
      continue;
    }
    current?.push(line);
  }

  if (collected.size === 0) {
    throw new CompactionFailure("Summary reply has none of the expected sections");
  }

  const section = (name: SummarySection): string => collected.get(name)?.join("\n").trim() || MISSING_SECTION;
  return {
    "Primary Request and Intent": section("Primary Request and Intent"),
    "Key Technical Concepts": section("Key Technical Concepts"),
    "Files and Code Sections": section("Files and Code Sections"),
    "Errors and Fixes": section("Errors and Fixes"),
    "Problem Solving": section("Problem Solving"),
    "Verbatim User Messages": section("Verbatim User Messages"),
    "Pending Tasks": section("Pending Tasks"),
    "Current Work": section("Current Work"),
    "Optional Next Step": section("Optional Next Step"),
  };
}

export function renderSummary(sections: SummarySections): string {
  const body = SUMMARY_SECTIONS.map((name) => `## ${name}\n${sections[name]}`).join("\n\n");
  return `<conversation_summary>\nThe conversation so far, summarized:\n\n${body}\n</conversation_summary>`;
}
