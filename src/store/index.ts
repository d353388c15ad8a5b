/**
 * GrantRadar — Store Module
 */

import type { AppConfig } from '../lib/config';
import { JsonFileSeenStore, type SeenItemStore } from './seen-store';
import { createSupabaseSeenStore } from './supabase-seen-store';

export {
  MemorySeenStore,
  JsonFileSeenStore,
  type SeenItemStore,
} from './seen-store';

export {
  SupabaseSeenStore,
  createSupabaseSeenStore,
  SEEN_TABLE,
} from './supabase-seen-store';

/**
 * Seen store for the configured backend.
 */
export function createSeenStore(config: AppConfig['seenStore']): SeenItemStore {
  if (config.backend === 'supabase' && config.supabaseUrl && config.supabaseKey) {
    return createSupabaseSeenStore(config.supabaseUrl, config.supabaseKey);
  }
  return new JsonFileSeenStore(config.path);
}
