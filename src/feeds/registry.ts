/**
 * GrantRadar — Source Registry
 *
 * Validated, read-only catalogue of donor feeds. Scan order is
 * very_high → high → medium → low, catalogue order within a tier.
 */

import catalogData from '../../config/donor-sources.json';
import {
  KNOWN_SOURCE_CATEGORIES,
  PRIORITY_TIER_ORDER,
  SourceCatalogSchema,
  type PriorityTier,
  type SourceDescriptor,
} from '../types';
import { ConfigurationError, formatIssues } from '../lib/errors';
import { logger } from '../lib/logger';

export interface RegistryStats {
  total: number;
  byTier: Record<PriorityTier, number>;
  byCategory: Record<string, number>;
}

const knownCategories: ReadonlySet<string> = new Set(KNOWN_SOURCE_CATEGORIES);

export class SourceRegistry {
  private readonly sources: readonly SourceDescriptor[];
  private readonly byName: ReadonlyMap<string, SourceDescriptor>;

  /**
   * @param catalog - raw catalogue data, e.g. the parsed donor-sources.json
   * @throws ConfigurationError on invalid descriptors, duplicate names or an empty catalogue
   */
  constructor(catalog: unknown) {
    const parsed = SourceCatalogSchema.safeParse(catalog);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid source catalogue', formatIssues(parsed.error.issues));
    }

    const { sources } = parsed.data;
    if (sources.length === 0) {
      throw new ConfigurationError('Invalid source catalogue', ['catalogue has no sources']);
    }

    const byName = new Map<string, SourceDescriptor>();
    const duplicates: string[] = [];
    for (const source of sources) {
      if (byName.has(source.name)) {
        duplicates.push(`duplicate source name: ${source.name}`);
        continue;
      }
      byName.set(source.name, source);

      if (!knownCategories.has(source.category)) {
        logger.debug('Source has an uncommon category', {
          source: source.name,
          category: source.category,
        });
      }
    }

    if (duplicates.length > 0) {
      throw new ConfigurationError('Invalid source catalogue', duplicates);
    }

    // Tier order first, catalogue order within a tier
    this.sources = PRIORITY_TIER_ORDER.flatMap(tier => sources.filter(s => s.priority === tier));
    this.byName = byName;
  }

  listSources(): SourceDescriptor[] {
    return [...this.sources];
  }

  getSource(name: string): SourceDescriptor | undefined {
    return this.byName.get(name);
  }

  getSourcesByTier(tier: PriorityTier): SourceDescriptor[] {
    return this.sources.filter(s => s.priority === tier);
  }

  get size(): number {
    return this.sources.length;
  }

  getStats(): RegistryStats {
    const byTier: Record<PriorityTier, number> = { very_high: 0, high: 0, medium: 0, low: 0 };
    const byCategory: Record<string, number> = {};

    for (const source of this.sources) {
      byTier[source.priority]++;
      byCategory[source.category] = (byCategory[source.category] ?? 0) + 1;
    }

    return { total: this.sources.length, byTier, byCategory };
  }
}

/**
 * Registry over the bundled config/donor-sources.json catalogue.
 */
export function createDefaultRegistry(): SourceRegistry {
  return new SourceRegistry(catalogData);
}
