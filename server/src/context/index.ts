export {
  ContextInjector,
  injectSystemPrefix,
  wrapSystemReminder,
  DEFAULT_SOURCE_TIMEOUT_MS,
  type AssembleInput,
  type AssembledContext,
  type AttachmentResolver,
  type ContextInjectorOptions,
  type CoreMemorySource,
  type RecentSessionsSource,
  type RulesSource,
} from "./injector.js";
export { FileRulesSource, ProjectFileResolver } from "./sources.js";
