/**
 * GrantRadar — CSV Export
 *
 * Writes the scan result as timestamped CSV files: the full list plus
 * domain-match, high-priority and deadline subsets.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { OpportunityRecord } from '../types';
import { logger, errorMessage } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface CsvExportOptions {
  dir: string;
  /** Stamped into file names as YYYYMMDD_HHmm (UTC) */
  timestamp?: Date;
  /** Minimum relevance for the high-priority file */
  highPriorityMin?: number;
}

export interface CsvExportResult {
  success: boolean;
  files: string[];
  error?: string;
}

export const DEFAULT_HIGH_PRIORITY_MIN = 7;

// ============================================================
// CSV
// ============================================================

export const CSV_COLUMNS = [
  { key: 'source', header: 'source' },
  { key: 'category', header: 'category' },
  { key: 'priority', header: 'priority' },
  { key: 'title', header: 'title' },
  { key: 'description', header: 'description' },
  { key: 'url', header: 'url' },
  { key: 'publishedAt', header: 'published_at' },
  { key: 'discoveredAt', header: 'discovered_at' },
  { key: 'deadline', header: 'deadline' },
  { key: 'amount', header: 'amount' },
  { key: 'sectors', header: 'sectors' },
  { key: 'relevanceScore', header: 'relevance_score' },
  { key: 'domainMatch', header: 'domain_match' },
  { key: 'isNew', header: 'is_new' },
] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number]['key'], string>;

function toCsvRow(record: OpportunityRecord): CsvRow {
  return {
    source: record.sourceName,
    category: record.sourceCategory,
    priority: record.priorityTier,
    title: record.title,
    description: record.description,
    url: record.url,
    publishedAt: record.publishedAt ?? '',
    discoveredAt: record.discoveredAt,
    deadline: record.deadline ?? '',
    amount: record.amount ?? '',
    sectors: record.sectors.join('; '),
    relevanceScore: record.relevanceScore.toFixed(1),
    domainMatch: record.isDomainMatch ? 'yes' : 'no',
    isNew: record.isNew ? 'yes' : 'no',
  };
}

/**
 * CSV document with a header row, one line per record.
 */
export function opportunitiesToCsv(records: OpportunityRecord[]): string {
  return stringify(records.map(toCsvRow), {
    header: true,
    columns: CSV_COLUMNS.map(c => ({ key: c.key, header: c.header })),
  });
}

/**
 * YYYYMMDD_HHmm in UTC.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`
  );
}

// ============================================================
// FILE EXPORT
// ============================================================

/**
 * Write the full CSV and each non-empty subset into `dir`.
 */
export async function exportScanResults(
  records: OpportunityRecord[],
  options: CsvExportOptions
): Promise<CsvExportResult> {
  const ts = formatTimestamp(options.timestamp ?? new Date());
  const highMin = options.highPriorityMin ?? DEFAULT_HIGH_PRIORITY_MIN;

  const outputs: Array<[string, OpportunityRecord[]]> = [
    [`donor_opportunities_${ts}.csv`, records],
    [`domain_matches_${ts}.csv`, records.filter(r => r.isDomainMatch)],
    [`high_priority_${ts}.csv`, records.filter(r => r.relevanceScore >= highMin)],
    [`urgent_deadlines_${ts}.csv`, records.filter(r => r.deadline !== null)],
  ];

  const files: string[] = [];

  try {
    await mkdir(options.dir, { recursive: true });

    for (const [index, [filename, subset]] of outputs.entries()) {
      // The full export is always written, subsets only when non-empty
      if (index > 0 && subset.length === 0) continue;

      const path = join(options.dir, filename);
      await writeFile(path, opportunitiesToCsv(subset), 'utf-8');
      files.push(path);
    }

    logger.info('CSV export written', { dir: options.dir, files: files.length, records: records.length });
    return { success: true, files };
  } catch (error) {
    const message = errorMessage(error);
    logger.error('CSV export failed', { dir: options.dir, error: message });
    return { success: false, files, error: message };
  }
}
