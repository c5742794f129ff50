/**
 * Safe Regex (ReDoS Protection)
 *
 * User-supplied patterns (hook matchers) are compiled with RE2, which runs
 * in linear time with no catastrophic backtracking.
 */

import RE2 from "re2";

const MAX_PATTERN_LENGTH = 500;

export type PatternTester = (input: string) => boolean;

/**
 * Compile a pattern that must match the whole input.
 * Throws on an invalid or oversized pattern.
 */
export function compileSafePattern(pattern: string, flags = ""): PatternTester {
  if (pattern.length > MAX_PATTERN_LENGTH) {
    throw new Error(`pattern is ${pattern.length} characters; the limit is ${MAX_PATTERN_LENGTH}`);
  }
  const regex = new RE2(`^(?:${pattern})$`, flags);
  return (input) => regex.test(input);
}

