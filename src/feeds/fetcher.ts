/**
 * GrantRadar — Feed Fetcher
 *
 * Fetches one donor feed and turns it into raw entries.
 * `fetchEntries` may throw; `safeFetch` never does, so one broken
 * source cannot abort a scan.
 */

import Parser from 'rss-parser';
import type { FeedFetchResult, RawFeedEntry, SourceDescriptor } from '../types';
import { logger, errorMessage } from '../lib/logger';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_ENTRIES = 30;
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';

export interface ParsedFeed {
  title: string | null;
  entries: RawFeedEntry[];
  /** Entries were salvaged from a document that failed to parse as a whole */
  partial: boolean;
}

export interface FeedFetcherOptions {
  maxEntriesPerSource?: number;
}

export interface RssFeedFetcherOptions extends FeedFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
}

// ============================================================
// PARSING
// ============================================================

const parser = new Parser();

type ParserItem = Parser.Item;

function toRawEntry(item: ParserItem): RawFeedEntry {
  return {
    title: item.title?.trim() ?? '',
    summary: (item.contentSnippet ?? item.summary ?? item.content ?? '').trim(),
    link: item.link?.trim() ?? '',
    publishedAt: item.isoDate ?? item.pubDate ?? null,
  };
}

function withLinks(items: ParserItem[]): RawFeedEntry[] {
  return items.map(toRawEntry).filter(entry => entry.link.length > 0);
}

// A block may not run into the next opening tag, so an unclosed item
// cannot swallow its neighbour
const ITEM_BLOCK = /<item\b[^>]*>(?:(?!<item\b)[\s\S])*?<\/item>/gi;
const ENTRY_BLOCK = /<entry\b[^>]*>(?:(?!<entry\b)[\s\S])*?<\/entry>/gi;

/**
 * Parse each complete <item>/<entry> block on its own. Blocks that
 * still fail are dropped.
 */
async function salvageEntries(xml: string): Promise<RawFeedEntry[]> {
  const wrapped = [
    ...(xml.match(ITEM_BLOCK) ?? []).map(
      block => `<rss version="2.0"><channel>${block}</channel></rss>`
    ),
    ...(xml.match(ENTRY_BLOCK) ?? []).map(
      block => `<feed xmlns="http://www.w3.org/2005/Atom">${block}</feed>`
    ),
  ];

  const entries: RawFeedEntry[] = [];
  for (const doc of wrapped) {
    try {
      const feed = await parser.parseString(doc);
      entries.push(...withLinks(feed.items));
    } catch (error) {
      logger.debug('Dropped unparseable feed block', { error: errorMessage(error) });
    }
  }
  return entries;
}

/**
 * Parse an RSS or Atom document. A document that fails as a whole
 * yields whatever blocks parse individually; when none do, the
 * original parse error is rethrown.
 */
export async function parseFeedDocument(xml: string): Promise<ParsedFeed> {
  try {
    const feed = await parser.parseString(xml);
    return {
      title: feed.title?.trim() || null,
      entries: withLinks(feed.items),
      partial: false,
    };
  } catch (error) {
    const salvaged = await salvageEntries(xml);
    if (salvaged.length === 0) {
      throw error;
    }
    return { title: null, entries: salvaged, partial: true };
  }
}

// ============================================================
// HTTP
// ============================================================

export interface FeedResponse {
  status: number;
  ok: boolean;
  body: string;
}

/**
 * GET a feed endpoint and read its body. The timeout covers the whole
 * exchange, so a server that stalls mid-body is aborted too.
 */
export async function requestFeed(
  endpoint: string,
  options: { timeoutMs?: number; userAgent?: string } = {}
): Promise<FeedResponse> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(endpoint, {
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8',
      },
      signal: controller.signal,
    });

    return { status: res.status, ok: res.ok, body: await res.text() };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================
// FETCHERS
// ============================================================

export abstract class FeedFetcher {
  protected readonly maxEntriesPerSource: number;
  protected logger = logger.child({ component: this.constructor.name });

  constructor(options: FeedFetcherOptions = {}) {
    this.maxEntriesPerSource = options.maxEntriesPerSource ?? DEFAULT_MAX_ENTRIES;
  }

  /**
   * Fetch and parse one source. May throw.
   */
  abstract fetchEntries(source: SourceDescriptor): Promise<ParsedFeed>;

  /**
   * Fetch with error handling: failures become an empty result with `error` set.
   */
  async safeFetch(source: SourceDescriptor): Promise<FeedFetchResult> {
    const startTime = Date.now();
    const log = this.logger.child({ source: source.name });

    try {
      const feed = await this.fetchEntries(source);
      const entries = feed.entries.slice(0, this.maxEntriesPerSource);

      if (feed.partial) {
        log.warn('Feed only partially parsed', { salvaged: feed.entries.length });
      }
      log.debug('Fetch completed', {
        entries: entries.length,
        durationMs: Date.now() - startTime,
      });

      return {
        sourceName: source.name,
        entries,
        partial: feed.partial,
        fetchedAt: new Date().toISOString(),
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const message = errorMessage(error);
      log.warn('Fetch failed', { error: message });

      return {
        sourceName: source.name,
        entries: [],
        error: message,
        partial: false,
        fetchedAt: new Date().toISOString(),
        durationMs: Date.now() - startTime,
      };
    }
  }
}

/**
 * HTTP + rss-parser fetcher for live feeds.
 */
export class RssFeedFetcher extends FeedFetcher {
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: RssFeedFetcherOptions = {}) {
    super(options);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async fetchEntries(source: SourceDescriptor): Promise<ParsedFeed> {
    const res = await requestFeed(source.endpoint, {
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
    });

    if (!res.ok) {
      throw new Error(`HTTP ${res.status} from ${source.endpoint}`);
    }

    if (res.body.trim().length === 0) {
      throw new Error(`Empty response from ${source.endpoint}`);
    }

    return parseFeedDocument(res.body);
  }
}
