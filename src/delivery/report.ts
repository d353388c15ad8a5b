/**
 * GrantRadar — Scan Report
 *
 * Summary statistics and a plain-text report for a finished scan.
 */

import type { OpportunityRecord, ScanResult } from '../types';

export interface SectorCount {
  sector: string;
  count: number;
}

export interface ScanSummary {
  total: number;
  newCount: number;
  domainMatches: number;
  /** relevance >= 8 */
  highRelevance: number;
  /** 5 <= relevance < 8 */
  mediumRelevance: number;
  withDeadline: number;
  withAmount: number;
  byCategory: Record<string, number>;
  topSectors: SectorCount[];
}

export const HIGH_RELEVANCE_MIN = 8;
export const MEDIUM_RELEVANCE_MIN = 5;
const TOP_SECTORS = 5;

export function summarizeScan(records: OpportunityRecord[]): ScanSummary {
  const byCategory: Record<string, number> = {};
  const sectorCounts = new Map<string, number>();

  for (const record of records) {
    byCategory[record.sourceCategory] = (byCategory[record.sourceCategory] ?? 0) + 1;
    for (const sector of record.sectors) {
      sectorCounts.set(sector, (sectorCounts.get(sector) ?? 0) + 1);
    }
  }

  // Count desc, then name for a stable order
  const topSectors = [...sectorCounts.entries()]
    .map(([sector, count]) => ({ sector, count }))
    .sort((a, b) => b.count - a.count || a.sector.localeCompare(b.sector))
    .slice(0, TOP_SECTORS);

  return {
    total: records.length,
    newCount: records.filter(r => r.isNew).length,
    domainMatches: records.filter(r => r.isDomainMatch).length,
    highRelevance: records.filter(r => r.relevanceScore >= HIGH_RELEVANCE_MIN).length,
    mediumRelevance: records.filter(
      r => r.relevanceScore >= MEDIUM_RELEVANCE_MIN && r.relevanceScore < HIGH_RELEVANCE_MIN
    ).length,
    withDeadline: records.filter(r => r.deadline !== null).length,
    withAmount: records.filter(r => r.amount !== null).length,
    byCategory,
    topSectors,
  };
}

// ============================================================
// TEXT RENDERING
// ============================================================

const RULE = '='.repeat(60);

function renderItem(record: OpportunityRecord, index: number): string[] {
  const lines = [`  ${index + 1}. [${record.relevanceScore.toFixed(1)}] ${record.title}`];
  const details = [record.sourceName];
  if (record.deadline) details.push(`deadline ${record.deadline}`);
  if (record.amount) details.push(record.amount);
  lines.push(`     ${details.join(' | ')}`);
  lines.push(`     ${record.url}`);
  return lines;
}

function renderSection(title: string, records: OpportunityRecord[]): string[] {
  if (records.length === 0) return [];
  return ['', title, ...records.flatMap(renderItem)];
}

export function renderScanReport(result: ScanResult): string {
  const records = result.opportunities;
  const summary = summarizeScan(records);
  const { profile, totals } = result;

  const lines: string[] = [
    RULE,
    'DONOR OPPORTUNITY SCAN',
    RULE,
    `Scan: ${result.scanId} (${result.startedAt})`,
    `Profile: ${profile.country} | ${profile.sectors.join(', ')}${profile.showAll ? ' | show all' : ''}`,
    `Sources: ${totals.sourcesScanned} scanned, ${totals.sourcesFailed} failed`,
  ];

  if (result.failedSources.length > 0) {
    lines.push(`Failed: ${result.failedSources.join(', ')}`);
  }
  if (!result.persisted) {
    lines.push('Warning: seen set was not saved');
  }

  lines.push(
    '',
    'SUMMARY',
    `  Opportunities: ${summary.total} (${summary.newCount} new)`,
    `  Domain matches: ${summary.domainMatches}`,
    `  High relevance (8+): ${summary.highRelevance}`,
    `  Medium relevance (5-8): ${summary.mediumRelevance}`,
    `  With deadline: ${summary.withDeadline}`,
    `  With amount: ${summary.withAmount}`
  );

  if (summary.topSectors.length > 0) {
    lines.push(`  Top sectors: ${summary.topSectors.map(s => `${s.sector} (${s.count})`).join(', ')}`);
  }

  const categories = Object.entries(summary.byCategory).sort((a, b) => b[1] - a[1]);
  if (categories.length > 0) {
    lines.push(`  By category: ${categories.map(([c, n]) => `${c} (${n})`).join(', ')}`);
  }

  lines.push(
    ...renderSection('TOP DOMAIN MATCHES', records.filter(r => r.isDomainMatch).slice(0, 5)),
    ...renderSection('TOP OPPORTUNITIES', records.slice(0, 10)),
    ...renderSection('UPCOMING DEADLINES', records.filter(r => r.deadline !== null).slice(0, 10))
  );

  if (records.length === 0) {
    lines.push('', 'No new opportunities found.');
  }

  return lines.join('\n');
}
