/**
 * GrantRadar — Supabase Seen-Item Store
 *
 * Backs the seen set with the `seen_opportunities` table:
 *
 *   create table seen_opportunities (
 *     url text primary key,
 *     first_seen_at timestamptz not null default now()
 *   );
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { logger, errorMessage } from '../lib/logger';
import type { SeenItemStore } from './seen-store';

export const SEEN_TABLE = 'seen_opportunities';
const PAGE_SIZE = 1000;

const SeenRowSchema = z.object({ url: z.string() });

export class SupabaseSeenStore implements SeenItemStore {
  private urls = new Set<string>();
  private pending = new Set<string>();
  private readonly log = logger.child({ store: 'supabase' });

  constructor(private readonly client: SupabaseClient) {}

  async load(): Promise<Set<string>> {
    try {
      this.urls = new Set(await this.selectAll());
      this.log.debug('Seen set loaded', { count: this.urls.size });
    } catch (error) {
      this.log.warn('Seen table unreadable, starting empty', { error: errorMessage(error) });
      this.urls = new Set();
    }
    this.pending = new Set();
    return new Set(this.urls);
  }

  private async selectAll(): Promise<string[]> {
    const urls: string[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(SEEN_TABLE)
        .select('url')
        .order('url')
        .range(from, from + PAGE_SIZE - 1);

      if (error) {
        throw new Error(`Failed to load seen URLs: ${error.message}`);
      }

      const rows = z.array(SeenRowSchema).parse(data ?? []);
      urls.push(...rows.map(r => r.url));

      if (rows.length < PAGE_SIZE) {
        return urls;
      }
    }
  }

  contains(url: string): boolean {
    return this.urls.has(url);
  }

  record(url: string): void {
    if (!this.urls.has(url)) {
      this.urls.add(url);
      this.pending.add(url);
    }
  }

  /**
   * Upsert URLs recorded since the last load or flush.
   */
  async flush(): Promise<void> {
    if (this.pending.size === 0) return;

    const firstSeenAt = new Date().toISOString();
    const rows = [...this.pending].map(url => ({ url, first_seen_at: firstSeenAt }));

    const { error } = await this.client
      .from(SEEN_TABLE)
      .upsert(rows, { onConflict: 'url', ignoreDuplicates: true });

    if (error) {
      throw new Error(`Failed to store seen URLs: ${error.message}`);
    }

    this.log.debug('Seen URLs stored', { count: rows.length });
    this.pending.clear();
  }

  get size(): number {
    return this.urls.size;
  }
}

/**
 * Service-role client for the scanner; sessions are not persisted.
 */
export function createSupabaseSeenStore(url: string, serviceRoleKey: string): SupabaseSeenStore {
  const client = createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
  return new SupabaseSeenStore(client);
}
