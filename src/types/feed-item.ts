/**
 * GrantRadar — Feed Types
 *
 * Donor feed catalogue entries and the raw entries a fetch produces.
 */

import { z } from 'zod';

// ============================================================
// PRIORITY TIERS
// ============================================================

export const PriorityTierSchema = z.enum(['very_high', 'high', 'medium', 'low']);
export type PriorityTier = z.infer<typeof PriorityTierSchema>;

/** Scan order, highest tier first. */
export const PRIORITY_TIER_ORDER: readonly PriorityTier[] = ['very_high', 'high', 'medium', 'low'];

// ============================================================
// SOURCE DESCRIPTOR
// ============================================================

/**
 * Known source categories. The field stays an open string because
 * catalogues grow faster than this list; it is only used for grouping.
 */
export const KNOWN_SOURCE_CATEGORIES = [
  'aggregator',
  'bilateral',
  'multilateral',
  'un_agency',
  'foundation',
  'platform',
  'regional',
  'faith_based',
  'children',
  'education',
] as const;

export const SourceDescriptorSchema = z.object({
  name: z.string().trim().min(1),
  endpoint: z.string().url(),
  category: z.string().trim().min(1),
  keywords: z.array(z.string().trim().min(1)).transform(kws => kws.map(k => k.toLowerCase())),
  priority: PriorityTierSchema,
});
export type SourceDescriptor = z.infer<typeof SourceDescriptorSchema>;

export const SourceCatalogSchema = z.object({
  sources: z.array(SourceDescriptorSchema),
});
export type SourceCatalog = z.infer<typeof SourceCatalogSchema>;

// ============================================================
// RAW FEED ENTRY
// ============================================================

/**
 * One item as read from a feed, before any relevance work.
 */
export interface RawFeedEntry {
  title: string;
  summary: string;
  link: string;
  /** ISO timestamp when the feed date parses, otherwise the raw value */
  publishedAt: string | null;
}

/**
 * Outcome of fetching one source.
 */
export interface FeedFetchResult {
  sourceName: string;
  entries: RawFeedEntry[];
  /** Set when the fetch degraded to zero entries */
  error?: string;
  /** True when entries were salvaged from a document that failed to parse */
  partial: boolean;
  fetchedAt: string;
  durationMs: number;
}
