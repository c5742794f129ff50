export {
  CompactionEngine,
  clientSummarizer,
  DEFAULT_RESPONSE_RESERVE,
  DEFAULT_THRESHOLD,
  DEFAULT_WARN_THRESHOLD,
  type CompactionEngineOptions,
  type CompactionOutcome,
  type CompactionSettings,
  type CompactOptions,
  type Summarizer,
} from "./engine.js";
export {
  SUMMARY_SECTIONS,
  SUMMARY_SYSTEM_PROMPT,
  MISSING_SECTION,
  buildSummaryPrompt,
  parseSummary,
  renderSummary,
  renderTranscript,
  type SummarySection,
  type SummarySections,
} from "./summary.js";
