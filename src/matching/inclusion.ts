/**
 * GrantRadar — Inclusion Rules
 *
 * Funding vocabulary gates every path: an entry without grant/call/tender
 * language is never included, whatever its score.
 */

import type { InterestProfile, RawFeedEntry, ScoringConfig, SourceDescriptor } from '../types';
import { DEFAULT_SCORING_CONFIG } from './config';
import { containsAny } from './keywords';

export interface InclusionSignals {
  /** Any high-value domain keyword */
  domain: boolean;
  /** Any of the source's own geo/topic keywords */
  geo: boolean;
  /** Any profile sector */
  sector: boolean;
  /** Any funding vocabulary */
  funding: boolean;
}

export type InclusionPath = 'domain' | 'geo_sector' | 'score_threshold';

export interface InclusionDecision {
  include: boolean;
  path: InclusionPath | null;
  signals: InclusionSignals;
}

/**
 * Lowercased title + summary, the text every rule reads.
 */
export function entryText(entry: Pick<RawFeedEntry, 'title' | 'summary'>): string {
  return `${entry.title} ${entry.summary}`.toLowerCase();
}

export function computeSignals(
  text: string,
  source: Pick<SourceDescriptor, 'keywords'>,
  profile: Pick<InterestProfile, 'sectors'>,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): InclusionSignals {
  return {
    domain: containsAny(text, config.domainKeywords),
    geo: containsAny(text, source.keywords),
    sector: containsAny(text, profile.sectors),
    funding: containsAny(text, config.fundingKeywords),
  };
}

/**
 * Paths are checked in order; the first satisfied one is reported.
 */
export function decideInclusion(
  signals: InclusionSignals,
  score: number,
  config: Pick<ScoringConfig, 'inclusionThreshold'> = DEFAULT_SCORING_CONFIG
): InclusionDecision {
  let path: InclusionPath | null = null;

  if (signals.funding) {
    if (signals.domain) {
      path = 'domain';
    } else if (signals.geo && signals.sector) {
      path = 'geo_sector';
    } else if (score >= config.inclusionThreshold) {
      path = 'score_threshold';
    }
  }

  return { include: path !== null, path, signals };
}
