/**
 * GrantRadar — Pattern Rules
 *
 * Extraction is an ordered list of rules folded until one matches.
 * The first matching rule wins, not the best match.
 */

export interface PatternRule {
  name: string;
  pattern: RegExp;
  /** Capture group returned on match (0 = whole match) */
  group: number;
}

export interface RuleMatch {
  rule: string;
  value: string;
}

/**
 * Apply rules in order and return the first capture.
 */
export function firstMatch(text: string, rules: readonly PatternRule[]): RuleMatch | null {
  for (const rule of rules) {
    const match = rule.pattern.exec(text);
    const value = match?.[rule.group]?.trim();
    if (value) {
      return { rule: rule.name, value };
    }
  }
  return null;
}
