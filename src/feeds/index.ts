/**
 * GrantRadar — Feeds Module
 *
 * Donor source catalogue, RSS/Atom fetching and feed health checks.
 */

export {
  SourceRegistry,
  createDefaultRegistry,
  type RegistryStats,
} from './registry';

export {
  FeedFetcher,
  RssFeedFetcher,
  parseFeedDocument,
  requestFeed,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_ENTRIES,
  DEFAULT_USER_AGENT,
  type ParsedFeed,
  type FeedResponse,
  type FeedFetcherOptions,
  type RssFeedFetcherOptions,
} from './fetcher';

export {
  probeFeed,
  probeAll,
  type ProbeResult,
  type ProbeOptions,
} from './probe';
