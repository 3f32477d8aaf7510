import { firstMatch, regexMatcher, type MatchResult, type PatternMatcher } from "./pattern-matcher";

/**
 * Ordered strategies for the activity page's anti-CSRF token. The page has no
 * machine contract, so a new layout usually means adding a matcher here.
 */
export const ACTIVITY_CSRF_MATCHERS: readonly PatternMatcher[] = [
  regexMatcher("meta-tag", /<meta name="csrf-token" content="([^"]+)"/),
  regexMatcher("data-attribute", /data-csrf="([^"]+)"/),
  regexMatcher("script-variable", /"csrfToken"\s*:\s*"([^"]+)"/),
  regexMatcher("anti-csrf-marker", /anti-csrftoken-a2z['":\s]+['"]([^'"]+)['"]/),
];

export function extractActivityCsrf(html: string): MatchResult | undefined {
  return firstMatch(ACTIVITY_CSRF_MATCHERS, html);
}
