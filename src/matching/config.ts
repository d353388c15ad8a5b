/**
 * GrantRadar — Scoring Defaults
 *
 * Weights merged from the earlier aggregator variants. Deployments
 * override any part through `resolveScoringConfig`.
 */

import type { ScoringConfig } from '../types';
import { KEYWORDS } from '../lib/keywords';
import { ConfigurationError } from '../lib/errors';

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  domainKeywords: KEYWORDS.domainKeywords,
  domainTiers: [
    { minMatches: 3, bonus: 5 },
    { minMatches: 2, bonus: 4 },
    { minMatches: 1, bonus: 3 },
  ],
  geography: {
    countryBonus: 4,
    regions: ['east africa'],
    regionBonus: 3,
    continents: ['africa'],
    continentBonus: 1,
  },
  sectorMatchBonus: 0.5,
  sectorBonusCap: 2,
  priorityBonus: {
    very_high: 1.5,
    high: 1,
    medium: 0.5,
    low: 0,
  },
  urgencyKeywords: KEYWORDS.urgencyKeywords,
  urgencyBonus: 1,
  fundingKeywords: KEYWORDS.fundingKeywords,
  inclusionThreshold: 6,
};

export type ScoringOverrides = Partial<Omit<ScoringConfig, 'geography' | 'priorityBonus'>> & {
  geography?: Partial<ScoringConfig['geography']>;
  priorityBonus?: Partial<ScoringConfig['priorityBonus']>;
};

// Entry text is matched lowercased
function normalizeKeywords(keywords: string[]): string[] {
  return keywords.map(k => k.trim().toLowerCase()).filter(k => k.length > 0);
}

/**
 * Merge overrides onto the defaults, lowercase every keyword list and
 * validate the result.
 */
export function resolveScoringConfig(overrides: ScoringOverrides = {}): ScoringConfig {
  const geography = { ...DEFAULT_SCORING_CONFIG.geography, ...overrides.geography };

  const config: ScoringConfig = {
    ...DEFAULT_SCORING_CONFIG,
    ...overrides,
    domainKeywords: normalizeKeywords(overrides.domainKeywords ?? DEFAULT_SCORING_CONFIG.domainKeywords),
    urgencyKeywords: normalizeKeywords(overrides.urgencyKeywords ?? DEFAULT_SCORING_CONFIG.urgencyKeywords),
    fundingKeywords: normalizeKeywords(overrides.fundingKeywords ?? DEFAULT_SCORING_CONFIG.fundingKeywords),
    geography: {
      ...geography,
      regions: normalizeKeywords(geography.regions),
      continents: normalizeKeywords(geography.continents),
    },
    priorityBonus: { ...DEFAULT_SCORING_CONFIG.priorityBonus, ...overrides.priorityBonus },
  };

  validateScoringConfig(config);
  return config;
}

/**
 * Every scoring term must be non-negative so scores never drop below 0.
 * Throws on misconfiguration rather than running with broken weights.
 */
export function validateScoringConfig(config: ScoringConfig): void {
  const issues: string[] = [];

  const bonuses: Array<[string, number]> = [
    ['geography.countryBonus', config.geography.countryBonus],
    ['geography.regionBonus', config.geography.regionBonus],
    ['geography.continentBonus', config.geography.continentBonus],
    ['sectorMatchBonus', config.sectorMatchBonus],
    ['sectorBonusCap', config.sectorBonusCap],
    ['urgencyBonus', config.urgencyBonus],
    ...Object.entries(config.priorityBonus).map(
      ([tier, bonus]): [string, number] => [`priorityBonus.${tier}`, bonus]
    ),
    ...config.domainTiers.map((tier, i): [string, number] => [`domainTiers.${i}.bonus`, tier.bonus]),
  ];

  for (const [name, value] of bonuses) {
    if (!Number.isFinite(value) || value < 0) {
      issues.push(`${name} must be a non-negative number`);
    }
  }

  if (config.domainTiers.some(t => !Number.isInteger(t.minMatches) || t.minMatches < 1)) {
    issues.push('domainTiers.minMatches must be a positive integer');
  }
  if (config.fundingKeywords.length === 0) {
    issues.push('fundingKeywords cannot be empty');
  }
  if (!Number.isFinite(config.inclusionThreshold) || config.inclusionThreshold < 0) {
    issues.push('inclusionThreshold must be a non-negative number');
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid scoring configuration', issues);
  }
}
