/**
 * GrantRadar — Feed Probe
 *
 * Health check for registered feeds: HTTP status, whether the body
 * parses, and how many entries it carries.
 */

import type { SourceDescriptor } from '../types';
import { logger, errorMessage } from '../lib/logger';
import { parseFeedDocument, requestFeed } from './fetcher';

export interface ProbeResult {
  name: string;
  endpoint: string;
  httpStatus: number | null;
  ok: boolean;
  entries: number;
  feedTitle: string | null;
  error: string | null;
  durationMs: number;
}

export interface ProbeOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export async function probeFeed(
  source: Pick<SourceDescriptor, 'name' | 'endpoint'>,
  options: ProbeOptions = {}
): Promise<ProbeResult> {
  const startTime = Date.now();
  let httpStatus: number | null = null;

  try {
    const res = await requestFeed(source.endpoint, options);
    httpStatus = res.status;

    if (!res.ok) {
      throw new Error(`HTTP ${res.status}`);
    }

    const feed = await parseFeedDocument(res.body);

    return {
      name: source.name,
      endpoint: source.endpoint,
      httpStatus,
      ok: feed.entries.length > 0,
      entries: feed.entries.length,
      feedTitle: feed.title,
      error: feed.entries.length === 0 ? 'Feed has no entries' : null,
      durationMs: Date.now() - startTime,
    };
  } catch (error) {
    return {
      name: source.name,
      endpoint: source.endpoint,
      httpStatus,
      ok: false,
      entries: 0,
      feedTitle: null,
      error: errorMessage(error),
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Probe sources one after another.
 */
export async function probeAll(
  sources: ReadonlyArray<Pick<SourceDescriptor, 'name' | 'endpoint'>>,
  options: ProbeOptions = {}
): Promise<ProbeResult[]> {
  const results: ProbeResult[] = [];

  for (const source of sources) {
    const result = await probeFeed(source, options);
    results.push(result);
    logger.info(result.ok ? 'Feed OK' : 'Feed failed', {
      source: result.name,
      status: result.httpStatus,
      entries: result.entries,
      error: result.error ?? undefined,
    });
  }

  return results;
}
