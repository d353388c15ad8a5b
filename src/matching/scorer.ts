/**
 * GrantRadar — Relevance Scorer
 *
 * Additive, deterministic score in [0, 10]:
 * - Domain keyword density (tiered)
 * - Geography: country > region > continent (exclusive)
 * - Profile sector overlap (capped)
 * - Source priority tier
 * - Urgency language
 */

import type { InterestProfile, ScoringConfig, SourceDescriptor } from '../types';
import { MAX_RELEVANCE_SCORE } from '../types';
import { DEFAULT_SCORING_CONFIG } from './config';
import { containsAny, matchKeywords } from './keywords';

export type GeographyMatch = 'country' | 'region' | 'continent';

export interface ScoreBreakdown {
  domain: number;
  domainMatches: string[];
  geography: number;
  geographyMatch: GeographyMatch | null;
  sector: number;
  sectorMatches: string[];
  priority: number;
  urgency: number;
}

export interface RelevanceScore {
  /** Rounded to one decimal, capped at 10 */
  score: number;
  breakdown: ScoreBreakdown;
  reasons: string[];
}

// ============================================================
// SCORE TERMS
// ============================================================

function domainBonus(
  matchCount: number,
  tiers: ScoringConfig['domainTiers']
): number {
  if (matchCount === 0) return 0;

  const tier = [...tiers]
    .sort((a, b) => b.minMatches - a.minMatches)
    .find(t => matchCount >= t.minMatches);

  return tier?.bonus ?? 0;
}

function geographyBonus(
  text: string,
  country: string,
  geography: ScoringConfig['geography']
): { bonus: number; match: GeographyMatch | null } {
  if (text.includes(country)) {
    return { bonus: geography.countryBonus, match: 'country' };
  }
  if (containsAny(text, geography.regions)) {
    return { bonus: geography.regionBonus, match: 'region' };
  }
  if (containsAny(text, geography.continents)) {
    return { bonus: geography.continentBonus, match: 'continent' };
  }
  return { bonus: 0, match: null };
}

// ============================================================
// MAIN SCORER
// ============================================================

/**
 * Score a lowercased entry text for a profile and source.
 */
export function scoreRelevance(
  text: string,
  source: Pick<SourceDescriptor, 'priority'>,
  profile: Pick<InterestProfile, 'country' | 'sectors'>,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): RelevanceScore {
  const domainMatches = matchKeywords(text, config.domainKeywords);
  const domain = domainBonus(domainMatches.length, config.domainTiers);

  const geo = geographyBonus(text, profile.country, config.geography);

  const sectorMatches = matchKeywords(text, profile.sectors);
  const sector = Math.min(sectorMatches.length * config.sectorMatchBonus, config.sectorBonusCap);

  const priority = config.priorityBonus[source.priority];
  const urgency = containsAny(text, config.urgencyKeywords) ? config.urgencyBonus : 0;

  const raw = domain + geo.bonus + sector + priority + urgency;
  const score = Math.min(Math.round(raw * 10) / 10, MAX_RELEVANCE_SCORE);

  const reasons: string[] = [];
  if (domainMatches.length > 0) reasons.push(`Domain keywords: ${domainMatches.join(', ')}`);
  if (geo.match) reasons.push(`Geography: ${geo.match}`);
  if (sectorMatches.length > 0) reasons.push(`Sectors: ${sectorMatches.join(', ')}`);
  if (urgency > 0) reasons.push('Urgency language');

  return {
    score,
    breakdown: {
      domain,
      domainMatches,
      geography: geo.bonus,
      geographyMatch: geo.match,
      sector,
      sectorMatches,
      priority,
      urgency,
    },
    reasons,
  };
}
