/**
 * GrantRadar — Interest Profile & Scoring Configuration
 *
 * The caller-supplied profile (country + sectors) and the tunable tables
 * the scorer and inclusion rules read.
 */

import { z } from 'zod';
import type { PriorityTier } from './feed-item';

// ============================================================
// INTEREST PROFILE
// ============================================================

export const InterestProfileSchema = z.object({
  country: z.string().trim().min(1, 'country is required').transform(c => c.toLowerCase()),
  sectors: z
    .array(z.string().trim().min(1))
    .min(1, 'at least one sector is required')
    .transform(sectors => sectors.map(s => s.toLowerCase())),
  showAll: z.boolean().default(false),
});

/** Profile as supplied by a caller (showAll optional, any casing). */
export type InterestProfileInput = z.input<typeof InterestProfileSchema>;
/** Profile after validation: lowercased, showAll resolved. */
export type InterestProfile = z.infer<typeof InterestProfileSchema>;

// ============================================================
// SCORING CONFIGURATION
// ============================================================

export interface DomainTier {
  /** Minimum number of distinct domain keywords found in the text */
  minMatches: number;
  bonus: number;
}

export interface GeographyConfig {
  countryBonus: number;
  /** Regional phrases, e.g. "east africa" */
  regions: string[];
  regionBonus: number;
  /** Continental phrases, e.g. "africa" */
  continents: string[];
  continentBonus: number;
}

export interface ScoringConfig {
  /** High-value keywords (child welfare terms by default) */
  domainKeywords: string[];
  /** Bonus tiers by match count; the highest satisfied tier applies */
  domainTiers: DomainTier[];
  geography: GeographyConfig;
  sectorMatchBonus: number;
  sectorBonusCap: number;
  priorityBonus: Record<PriorityTier, number>;
  urgencyKeywords: string[];
  urgencyBonus: number;
  /** Grant/RFP/tender vocabulary gating every inclusion path */
  fundingKeywords: string[];
  /** Score at or above which an entry with funding language is included */
  inclusionThreshold: number;
}

/** Ceiling of the relevance score. */
export const MAX_RELEVANCE_SCORE = 10;
