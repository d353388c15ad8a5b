/**
 * GrantRadar — Keyword Tables
 *
 * Loads config/keywords.json once and validates its shape.
 */

import { z } from 'zod';
import keywordData from '../../config/keywords.json';
import { ConfigurationError, formatIssues } from './errors';

const lowercaseList = z
  .array(z.string().trim().min(1))
  .transform(list => list.map(k => k.toLowerCase()));

export const KeywordTablesSchema = z.object({
  domainKeywords: lowercaseList,
  fundingKeywords: lowercaseList.refine(list => list.length > 0, 'funding keywords cannot be empty'),
  urgencyKeywords: lowercaseList,
  sectors: z.record(z.string().min(1), lowercaseList),
});
export type KeywordTables = z.infer<typeof KeywordTablesSchema>;

/** Sector tag -> keywords, in classification order. */
export type SectorTable = KeywordTables['sectors'];

export function parseKeywordTables(data: unknown): KeywordTables {
  const parsed = KeywordTablesSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid keyword tables', formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

export const KEYWORDS: KeywordTables = parseKeywordTables(keywordData);
