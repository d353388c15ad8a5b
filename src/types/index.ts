/**
 * GrantRadar — Type Exports
 */

export {
  PriorityTierSchema,
  PRIORITY_TIER_ORDER,
  KNOWN_SOURCE_CATEGORIES,
  SourceDescriptorSchema,
  SourceCatalogSchema,
} from './feed-item';
export type {
  PriorityTier,
  SourceDescriptor,
  SourceCatalog,
  RawFeedEntry,
  FeedFetchResult,
} from './feed-item';

export { InterestProfileSchema, MAX_RELEVANCE_SCORE } from './interest-profile';
export type {
  InterestProfileInput,
  InterestProfile,
  DomainTier,
  GeographyConfig,
  ScoringConfig,
} from './interest-profile';

export type {
  OpportunityRecord,
  ScanPhase,
  SourceScanResult,
  ScanTotals,
  ScanResult,
} from './opportunity';
