import type { Logger } from "../logger";

/**
 * An exclusion pattern as typed by the operator, plus its case-insensitive
 * regex. `regex` is null when the source does not compile; the pattern then
 * only takes part in exact matching.
 */
export interface CompiledPattern {
  source: string;
  regex: RegExp | null;
}

export function compilePatterns(patterns: readonly string[], logger: Logger): CompiledPattern[] {
  return patterns.map((source) => {
    try {
      return { source, regex: new RegExp(source, "i") };
    } catch {
      logger.warn(`Invalid regex pattern: ${source}`);
      return { source, regex: null };
    }
  });
}

/**
 * Return the first pattern that excludes `name`, or undefined.
 *
 * Exact comparison is case-insensitive; regex matching is a search, so
 * unanchored patterns match anywhere in the name.
 */
export function matchExclusion(
  name: string,
  patterns: readonly CompiledPattern[],
): CompiledPattern | undefined {
  const lower = name.toLowerCase();
  for (const pattern of patterns) {
    if (lower === pattern.source.toLowerCase()) return pattern;
    if (pattern.regex?.test(name)) return pattern;
  }
  return undefined;
}
