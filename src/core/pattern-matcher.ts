/**
 * Pattern Matcher
 * Compiles include/exclude glob lists into a single matcher
 */

import path from "node:path";
import picomatch from "picomatch";
import { ValidationError, formatError } from "../utils/error-handler.js";
import { normalizePath } from "../utils/path.js";

export interface PatternMatcher {
  readonly patterns: readonly string[];
  matches(candidatePath: string): boolean;
}

// ".jozin" and other dot directories are matched like any other name
const PICOMATCH_OPTIONS: picomatch.PicomatchOptions = { dot: true };

/**
 * True when a "[" opens a character class that is never closed.
 * A "]" right after "[", "[!" or "[^" is a literal member of the class.
 */
const hasUnclosedBracket = (pattern: string): boolean => {
  let index = 0;
  while (index < pattern.length) {
    const char = pattern[index];
    if (char === "\\") {
      index += 2;
      continue;
    }
    if (char === "[") {
      let cursor = index + 1;
      if (pattern[cursor] === "!" || pattern[cursor] === "^") {
        cursor++;
      }
      if (pattern[cursor] === "]") {
        cursor++;
      }
      const close = pattern.indexOf("]", cursor);
      if (close === -1) {
        return true;
      }
      index = close + 1;
      continue;
    }
    index++;
  }
  return false;
};

const compileOne = (pattern: string): picomatch.Matcher => {
  if (hasUnclosedBracket(pattern)) {
    throw new ValidationError(`Invalid glob pattern '${pattern}': unclosed character class`);
  }
  try {
    return picomatch(pattern, PICOMATCH_OPTIONS);
  } catch (error) {
    throw new ValidationError(`Invalid glob pattern '${pattern}': ${formatError(error)}`);
  }
};

/**
 * Compile glob patterns. `*` stays within one path segment, `**` spans
 * segments, `?` is a single character and `[...]` a character class.
 * Patterns with a "/" match the whole relative path; patterns without one
 * match the whole path or its base name.
 * @throws {ValidationError} when any pattern is malformed
 */
export const compilePatterns = (patterns: readonly string[]): PatternMatcher => {
  const pathMatchers: picomatch.Matcher[] = [];
  const nameMatchers: picomatch.Matcher[] = [];
  for (const pattern of patterns) {
    const isMatch = compileOne(pattern);
    (pattern.includes("/") ? pathMatchers : nameMatchers).push(isMatch);
  }

  return {
    patterns: [...patterns],
    matches: (candidatePath: string): boolean => {
      const normalized = normalizePath(candidatePath);
      if (pathMatchers.some((isMatch) => isMatch(normalized))) {
        return true;
      }
      const baseName = path.posix.basename(normalized);
      return nameMatchers.some((isMatch) => isMatch(normalized) || isMatch(baseName));
    },
  };
};

/**
 * Compile an optional pattern list; absent lists yield no matcher
 */
export const compileOptionalPatterns = (patterns?: readonly string[]): PatternMatcher | null =>
  patterns === undefined ? null : compilePatterns(patterns);
