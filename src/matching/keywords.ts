/**
 * GrantRadar — Keyword Matching
 */

/**
 * Distinct keywords found as substrings of an already-lowercased text.
 */
export function matchKeywords(text: string, keywords: readonly string[]): string[] {
  const matches: string[] = [];
  for (const kw of new Set(keywords)) {
    if (text.includes(kw)) {
      matches.push(kw);
    }
  }
  return matches;
}

export function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some(kw => text.includes(kw));
}
