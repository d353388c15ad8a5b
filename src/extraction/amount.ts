/**
 * GrantRadar — Funding Amount Extraction
 */

import { firstMatch, type PatternRule } from './rules';

const NUMBER = String.raw`\d+(?:,\d{3})*(?:\.\d+)?`;
const MAGNITUDE = String.raw`(?:\s?(?:million|billion|thousand|[kmb])\b)?`;
const CURRENCY_CODE = '(?:usd|eur|gbp|tzs)';

export const AMOUNT_RULES: readonly PatternRule[] = [
  {
    name: 'capped_dollar',
    pattern: new RegExp(String.raw`(?:up to|maximum|max|worth)\s+\$\s?${NUMBER}${MAGNITUDE}`, 'i'),
    group: 0,
  },
  {
    name: 'dollar',
    pattern: new RegExp(String.raw`\$\s?${NUMBER}${MAGNITUDE}`, 'i'),
    group: 0,
  },
  {
    name: 'code_prefix',
    pattern: new RegExp(String.raw`\b${CURRENCY_CODE}\s?${NUMBER}${MAGNITUDE}`, 'i'),
    group: 0,
  },
  {
    name: 'code_suffix',
    pattern: new RegExp(String.raw`\b${NUMBER}${MAGNITUDE}\s+${CURRENCY_CODE}\b`, 'i'),
    group: 0,
  },
];

/**
 * Best-effort funding amount phrase from free text, or null.
 */
export function extractAmount(text: string): string | null {
  return firstMatch(text, AMOUNT_RULES)?.value ?? null;
}
