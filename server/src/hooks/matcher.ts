/**
 * Matcher selection: which field of an event a group's `matcher` is
 * tested against.
 */

import { compileSafePattern, type PatternTester } from "../utils/safe-regex.js";
import type { HookEvent } from "./types.js";

/** The string a matcher is tested against, or null when the event ignores matchers */
export function matcherSubject(event: HookEvent): string | null {
  switch (event.kind) {
    case "pre_tool_use":
    case "post_tool_use":
    case "post_tool_use_failure":
    case "permission_request":
      return event.payload.toolName;
    case "pre_compact":
      return event.payload.trigger;
    case "session_start":
      return event.payload.source;
    case "notification":
      return event.payload.level;
    default:
      return null;
  }
}

const MATCH_ALL: PatternTester = () => true;

/** Compile a group matcher; throws when the pattern is invalid */
export function compileMatcher(matcher: string | undefined): PatternTester {
  if (matcher === undefined || matcher === "" || matcher === "*") return MATCH_ALL;
  return compileSafePattern(matcher);
}

export function matchesEvent(tester: PatternTester, event: HookEvent): boolean {
  const subject = matcherSubject(event);
  return subject === null || tester(subject);
}
