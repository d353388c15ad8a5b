/**
 * Tests for feed timeouts against a live local server
 */

import { createServer, type Server } from 'node:http';
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { RssFeedFetcher } from '../../src/feeds/fetcher';
import { probeFeed } from '../../src/feeds/probe';
import type { SourceDescriptor } from '../../src/types';

let server: Server;
let endpoint = '';

describe('Feed timeouts', () => {
  beforeAll(async () => {
    // Headers and half a document, then nothing
    server = createServer((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/rss+xml' });
      res.write('<?xml version="1.0"?><rss version="2.0"><channel><title>Stalled</title>');
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server has no port');
    }
    endpoint = `http://127.0.0.1:${address.port}/feed.xml`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should abort a feed whose body stalls after the headers', async () => {
    const source: SourceDescriptor = {
      name: 'Stalled Donor',
      endpoint,
      category: 'foundation',
      keywords: [],
      priority: 'low',
    };

    const result = await new RssFeedFetcher({ timeoutMs: 200 }).safeFetch(source);

    expect(result.error).toBe('Request timed out after 200ms');
    expect(result.entries).toEqual([]);
  });

  it('should report a stalled body as a failed health check', async () => {
    const result = await probeFeed({ name: 'Stalled Donor', endpoint }, { timeoutMs: 200 });

    expect(result.ok).toBe(false);
    expect(result.error).toBe('Request timed out after 200ms');
  });
});
