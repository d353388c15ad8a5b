/**
 * GrantRadar — Opportunity & Scan Result Types
 */

import type { PriorityTier } from './feed-item';
import type { InterestProfile } from './interest-profile';

// ============================================================
// OPPORTUNITY RECORD
// ============================================================

/**
 * A funding announcement that passed the inclusion rules.
 * `url` is the identity across all scans.
 */
export interface OpportunityRecord {
  sourceName: string;
  sourceCategory: string;
  priorityTier: PriorityTier;

  title: string;
  description: string;
  url: string;

  publishedAt: string | null;
  discoveredAt: string;

  deadline: string | null;
  amount: string | null;
  sectors: string[];

  relevanceScore: number;
  /** Matched the configured high-value keyword set */
  isDomainMatch: boolean;
  /** URL was absent from the seen set loaded at scan start */
  isNew: boolean;
}

// ============================================================
// SCAN RESULT
// ============================================================

export type ScanPhase =
  | 'init'
  | 'loading_seen'
  | 'scanning'
  | 'persisting_seen'
  | 'done';

export interface SourceScanResult {
  sourceName: string;
  tier: PriorityTier;
  entriesFetched: number;
  opportunitiesFound: number;
  duplicatesSkipped: number;
  partial: boolean;
  durationMs: number;
  error?: string;
}

export interface ScanTotals {
  sourcesScanned: number;
  sourcesFailed: number;
  entriesFetched: number;
  duplicatesSkipped: number;
  opportunities: number;
  newOpportunities: number;
  domainMatches: number;
}

export interface ScanResult {
  scanId: string;
  profile: InterestProfile;
  /** Sorted: domain matches first, then relevance descending */
  opportunities: OpportunityRecord[];
  sourceResults: SourceScanResult[];
  failedSources: string[];
  totals: ScanTotals;
  /** False when the seen set could not be written */
  persisted: boolean;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}
