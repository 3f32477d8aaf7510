/**
 * One independent way of pulling a value out of semi-structured text.
 */
export interface PatternMatcher {
  readonly name: string;
  match(text: string): string | undefined;
}

export interface MatchResult {
  value: string;
  matcher: string;
}

/**
 * Builds a matcher returning the first capture group of `pattern`.
 */
export function regexMatcher(name: string, pattern: RegExp): PatternMatcher {
  return {
    name,
    match(text: string): string | undefined {
      const found = pattern.exec(text);
      return found?.[1] || undefined;
    },
  };
}

/**
 * Applies `matchers` in order and returns the first hit.
 */
export function firstMatch(
  matchers: readonly PatternMatcher[],
  text: string,
): MatchResult | undefined {
  for (const matcher of matchers) {
    const value = matcher.match(text);
    if (value !== undefined) {
      return { value, matcher: matcher.name };
    }
  }
  return undefined;
}
