/**
 * GrantRadar — Matching Module
 *
 * Deterministic relevance scoring and inclusion rules.
 */

export {
  DEFAULT_SCORING_CONFIG,
  resolveScoringConfig,
  validateScoringConfig,
  type ScoringOverrides,
} from './config';

export {
  scoreRelevance,
  type RelevanceScore,
  type ScoreBreakdown,
  type GeographyMatch,
} from './scorer';

export {
  entryText,
  computeSignals,
  decideInclusion,
  type InclusionSignals,
  type InclusionDecision,
  type InclusionPath,
} from './inclusion';

export { matchKeywords, containsAny } from './keywords';
