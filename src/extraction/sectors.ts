/**
 * GrantRadar — Sector Classification
 */

import { KEYWORDS, type SectorTable } from '../lib/keywords';

export const GENERAL_SECTOR = 'general';

/**
 * Sector tags whose keywords appear in the text, in table order.
 * Never empty: falls back to ["general"].
 */
export function classifySectors(text: string, table: SectorTable = KEYWORDS.sectors): string[] {
  const lower = text.toLowerCase();
  const sectors = Object.entries(table)
    .filter(([, keywords]) => keywords.some(kw => lower.includes(kw)))
    .map(([sector]) => sector);

  return sectors.length > 0 ? sectors : [GENERAL_SECTOR];
}
