/**
 * Opportunity records for delivery tests.
 */

import type { OpportunityRecord } from '../../src/types';

export function makeRecord(overrides: Partial<OpportunityRecord> = {}): OpportunityRecord {
  return {
    sourceName: 'FundsForNGOs',
    sourceCategory: 'aggregator',
    priorityTier: 'high',
    title: 'Tanzania Education Grant',
    description: 'Apply by 12/31/2025',
    url: 'https://example.org/grants/1',
    publishedAt: null,
    discoveredAt: '2026-10-19T08:00:00.000Z',
    deadline: '12/31/2025',
    amount: 'up to $50,000',
    sectors: ['education', 'health'],
    relevanceScore: 5.5,
    isDomainMatch: false,
    isNew: true,
    ...overrides,
  };
}
