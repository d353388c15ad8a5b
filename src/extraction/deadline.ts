/**
 * GrantRadar — Deadline Extraction
 */

import { firstMatch, type PatternRule } from './rules';

const NUMERIC_DATE = String.raw`(\d{1,2}[-/]\d{1,2}[-/]\d{2,4})`;
const MONTH =
  String.raw`(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)`;

function labelled(name: string, label: string): PatternRule {
  return {
    name,
    pattern: new RegExp(`${label}[:\\s]+${NUMERIC_DATE}`, 'i'),
    group: 1,
  };
}

/**
 * Ordered deadline rules. Labelled numeric dates come before bare
 * written-out dates, so "deadline: 3/1/2026 ... event on june 5, 2026"
 * yields the labelled one.
 */
export const DEADLINE_RULES: readonly PatternRule[] = [
  labelled('deadline_label', 'deadline'),
  labelled('due_label', 'due'),
  labelled('closes_label', 'closes?'),
  labelled('submit_by', 'submit by'),
  labelled('apply_by', 'apply by'),
  {
    name: 'month_day_year',
    pattern: new RegExp(String.raw`\b(${MONTH}\.?\s+\d{1,2},?\s+\d{4})`, 'i'),
    group: 1,
  },
  {
    name: 'day_month_year',
    pattern: new RegExp(String.raw`\b(\d{1,2}\s+${MONTH}\.?\s+\d{4})`, 'i'),
    group: 1,
  },
];

/**
 * Best-effort deadline from free text, or null.
 */
export function extractDeadline(text: string): string | null {
  return firstMatch(text, DEADLINE_RULES)?.value ?? null;
}
