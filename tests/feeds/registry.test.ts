/**
 * Tests for Source Registry
 */

import { describe, it, expect } from 'vitest';
import { SourceRegistry, createDefaultRegistry } from '../../src/feeds/registry';
import { ConfigurationError } from '../../src/lib/errors';
import { PRIORITY_TIER_ORDER } from '../../src/types';

const entry = (name: string, priority: string, category = 'foundation') => ({
  name,
  endpoint: `https://example.org/${name}.xml`,
  category,
  keywords: ['Tanzania', 'Africa'],
  priority,
});

describe('Source Registry', () => {
  describe('listSources', () => {
    it('should order by tier, keeping catalogue order within a tier', () => {
      const registry = new SourceRegistry({
        sources: [
          entry('a', 'medium'),
          entry('b', 'very_high'),
          entry('c', 'low'),
          entry('d', 'very_high'),
          entry('e', 'high'),
        ],
      });

      expect(registry.listSources().map(s => s.name)).toEqual(['b', 'd', 'e', 'a', 'c']);
    });

    it('should lowercase keywords', () => {
      const registry = new SourceRegistry({ sources: [entry('a', 'high')] });
      expect(registry.getSource('a')?.keywords).toEqual(['tanzania', 'africa']);
    });

    it('should return a copy', () => {
      const registry = new SourceRegistry({ sources: [entry('a', 'high')] });
      registry.listSources().pop();
      expect(registry.size).toBe(1);
    });
  });

  describe('lookups', () => {
    const registry = new SourceRegistry({
      sources: [entry('a', 'medium', 'aggregator'), entry('b', 'very_high'), entry('c', 'medium')],
    });

    it('should find sources by name', () => {
      expect(registry.getSource('b')?.priority).toBe('very_high');
      expect(registry.getSource('missing')).toBeUndefined();
    });

    it('should filter by tier', () => {
      expect(registry.getSourcesByTier('medium').map(s => s.name)).toEqual(['a', 'c']);
      expect(registry.getSourcesByTier('low')).toEqual([]);
    });

    it('should count by tier and category', () => {
      expect(registry.getStats()).toEqual({
        total: 3,
        byTier: { very_high: 1, high: 0, medium: 2, low: 0 },
        byCategory: { foundation: 2, aggregator: 1 },
      });
    });
  });

  describe('validation', () => {
    it('should reject an empty catalogue', () => {
      expect(() => new SourceRegistry({ sources: [] })).toThrow(ConfigurationError);
    });

    it('should reject duplicate names', () => {
      expect(
        () => new SourceRegistry({ sources: [entry('a', 'high'), entry('a', 'low')] })
      ).toThrow('duplicate source name: a');
    });

    it('should reject unknown tiers and invalid endpoints', () => {
      expect(() => new SourceRegistry({ sources: [entry('a', 'urgent')] })).toThrow(
        ConfigurationError
      );
      expect(
        () => new SourceRegistry({ sources: [{ ...entry('a', 'high'), endpoint: 'not a url' }] })
      ).toThrow(ConfigurationError);
    });

    it('should reject data that is not a catalogue', () => {
      expect(() => new SourceRegistry([])).toThrow('Invalid source catalogue');
    });
  });

  describe('createDefaultRegistry', () => {
    it('should load the bundled catalogue in tier order', () => {
      const registry = createDefaultRegistry();
      const ranks = registry.listSources().map(s => PRIORITY_TIER_ORDER.indexOf(s.priority));

      expect(registry.size).toBe(34);
      expect(ranks).toEqual([...ranks].sort((a, b) => a - b));
      expect(registry.getStats().byTier.very_high).toBe(5);
    });
  });
});
