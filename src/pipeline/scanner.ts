/**
 * GrantRadar — Scan Pipeline
 *
 * One scan, phase by phase:
 * 1. init: validate the profile, resolve sources and scoring
 * 2. loading_seen: load the seen set (always, show-all included)
 * 3. scanning: fetch sources in tier order, filter, score, extract
 * 4. persisting_seen: flush the seen set once
 * 5. done: sort domain matches first, then by relevance
 */

import { nanoid } from 'nanoid';
import {
  InterestProfileSchema,
  PRIORITY_TIER_ORDER,
  type InterestProfile,
  type InterestProfileInput,
  type OpportunityRecord,
  type PriorityTier,
  type RawFeedEntry,
  type ScanPhase,
  type ScanResult,
  type ScanTotals,
  type ScoringConfig,
  type SourceDescriptor,
  type SourceScanResult,
} from '../types';
import { ConfigurationError, formatIssues } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';
import { createDefaultRegistry, type SourceRegistry } from '../feeds/registry';
import { FeedFetcher, RssFeedFetcher } from '../feeds/fetcher';
import type { SeenItemStore } from '../store/seen-store';
import {
  computeSignals,
  decideInclusion,
  entryText,
  resolveScoringConfig,
  scoreRelevance,
  type ScoringOverrides,
} from '../matching';
import { classifySectors, extractAmount, extractDeadline } from '../extraction';

// ============================================================
// TYPES
// ============================================================

export interface ScanOptions {
  store: SeenItemStore;
  /** Defaults to the bundled catalogue */
  registry?: SourceRegistry;
  /** Explicit source list; takes precedence over `registry` */
  sources?: SourceDescriptor[];
  /** Only scan these tiers */
  tiers?: PriorityTier[];
  /** Defaults to an RssFeedFetcher */
  fetcher?: FeedFetcher;
  scoring?: ScoringOverrides;
  /** Pause between sources, in ms */
  interSourceDelayMs?: number;
  onPhase?: (phase: ScanPhase) => void;
  now?: () => Date;
}

export const DEFAULT_INTER_SOURCE_DELAY_MS = 500;
export const DESCRIPTION_MAX_LENGTH = 600;

// ============================================================
// HELPERS
// ============================================================

export function resolveProfile(input: InterestProfileInput): InterestProfile {
  const parsed = InterestProfileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid interest profile', formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

function resolveSources(options: ScanOptions): SourceDescriptor[] {
  const sources = options.sources ?? (options.registry ?? createDefaultRegistry()).listSources();
  const tiers = options.tiers ?? PRIORITY_TIER_ORDER;

  return PRIORITY_TIER_ORDER
    .filter(tier => tiers.includes(tier))
    .flatMap(tier => sources.filter(s => s.priority === tier));
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Domain matches first, then relevance descending. Stable.
 */
export function sortOpportunities(records: OpportunityRecord[]): OpportunityRecord[] {
  return [...records].sort(
    (a, b) =>
      Number(b.isDomainMatch) - Number(a.isDomainMatch) ||
      b.relevanceScore - a.relevanceScore
  );
}

/**
 * Fields are extracted from the lowercased entry text, so captures come
 * back lowercased (`usd 5,000`).
 */
function buildRecord(
  entry: RawFeedEntry,
  text: string,
  source: SourceDescriptor,
  score: number,
  isDomainMatch: boolean,
  isNew: boolean,
  discoveredAt: string
): OpportunityRecord {
  return {
    sourceName: source.name,
    sourceCategory: source.category,
    priorityTier: source.priority,
    title: entry.title,
    description: entry.summary.slice(0, DESCRIPTION_MAX_LENGTH),
    url: entry.link,
    publishedAt: entry.publishedAt,
    discoveredAt,
    deadline: extractDeadline(text),
    amount: extractAmount(text),
    sectors: classifySectors(text),
    relevanceScore: score,
    isDomainMatch,
    isNew,
  };
}

// ============================================================
// SCAN
// ============================================================

/**
 * Run a full scan and return the detailed result.
 *
 * @throws ConfigurationError when the profile or scoring overrides are invalid
 */
export async function runScan(
  profileInput: InterestProfileInput,
  options: ScanOptions
): Promise<ScanResult> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const startTime = Date.now();
  const scanId = nanoid();
  const log = logger.child({ scanId });

  let phase: ScanPhase = 'init';
  const enter = (next: ScanPhase): void => {
    phase = next;
    log.debug('Scan phase', { phase });
    options.onPhase?.(phase);
  };

  // ---- init ----
  enter('init');
  const profile = resolveProfile(profileInput);
  const scoring: ScoringConfig = resolveScoringConfig(options.scoring);
  const sources = resolveSources(options);
  const fetcher = options.fetcher ?? new RssFeedFetcher();
  const delayMs = options.interSourceDelayMs ?? DEFAULT_INTER_SOURCE_DELAY_MS;
  const { store } = options;

  log.info('Starting scan', {
    country: profile.country,
    sectors: profile.sectors,
    showAll: profile.showAll,
    sources: sources.length,
  });

  // ---- loading_seen ----
  enter('loading_seen');
  const seenAtStart = await store.load();
  log.info('Seen set loaded', { count: seenAtStart.size });

  // ---- scanning ----
  enter('scanning');
  const discoveredAt = startedAt.toISOString();
  const records: OpportunityRecord[] = [];
  const emitted = new Set<string>();
  const sourceResults: SourceScanResult[] = [];

  for (const [index, source] of sources.entries()) {
    if (index > 0 && delayMs > 0) {
      await sleep(delayMs);
    }

    const fetched = await fetcher.safeFetch(source);
    let found = 0;
    let duplicates = 0;

    for (const entry of fetched.entries) {
      const url = entry.link;
      if (!url) continue;

      if (emitted.has(url)) {
        duplicates++;
        continue;
      }

      const isNew = !seenAtStart.has(url);
      if (!isNew && !profile.showAll) {
        duplicates++;
        continue;
      }

      const text = entryText(entry);
      const { score } = scoreRelevance(text, source, profile, scoring);
      const decision = decideInclusion(computeSignals(text, source, profile, scoring), score, scoring);
      if (!decision.include) continue;

      records.push(buildRecord(entry, text, source, score, decision.signals.domain, isNew, discoveredAt));
      emitted.add(url);
      store.record(url);
      found++;
    }

    sourceResults.push({
      sourceName: source.name,
      tier: source.priority,
      entriesFetched: fetched.entries.length,
      opportunitiesFound: found,
      duplicatesSkipped: duplicates,
      partial: fetched.partial,
      durationMs: fetched.durationMs,
      error: fetched.error,
    });

    log.info('Source scanned', {
      source: source.name,
      entries: fetched.entries.length,
      found,
      duplicates,
      ...(fetched.error ? { error: fetched.error } : {}),
    });
  }

  // ---- persisting_seen ----
  enter('persisting_seen');
  let persisted = true;
  try {
    await store.flush();
  } catch (error) {
    persisted = false;
    log.error('Failed to persist seen set', { error: errorMessage(error) });
  }

  // ---- done ----
  enter('done');
  const opportunities = sortOpportunities(records);
  const failedSources = sourceResults.filter(r => r.error !== undefined).map(r => r.sourceName);

  const totals: ScanTotals = {
    sourcesScanned: sources.length,
    sourcesFailed: failedSources.length,
    entriesFetched: sourceResults.reduce((sum, r) => sum + r.entriesFetched, 0),
    duplicatesSkipped: sourceResults.reduce((sum, r) => sum + r.duplicatesSkipped, 0),
    opportunities: opportunities.length,
    newOpportunities: opportunities.filter(o => o.isNew).length,
    domainMatches: opportunities.filter(o => o.isDomainMatch).length,
  };

  log.info('Scan completed', { ...totals, persisted });

  return {
    scanId,
    profile,
    opportunities,
    sourceResults,
    failedSources,
    totals,
    persisted,
    startedAt: discoveredAt,
    completedAt: now().toISOString(),
    durationMs: Date.now() - startTime,
  };
}

/**
 * Run a scan and return only the sorted opportunities.
 */
export async function scan(
  profileInput: InterestProfileInput,
  options: ScanOptions
): Promise<OpportunityRecord[]> {
  const result = await runScan(profileInput, options);
  return result.opportunities;
}
