/**
 * Tests for Field Extraction
 */

import { describe, it, expect } from 'vitest';
import {
  extractDeadline,
  extractAmount,
  classifySectors,
  firstMatch,
  GENERAL_SECTOR,
} from '../../src/extraction';

describe('Field Extraction', () => {
  describe('extractDeadline', () => {
    it('should read a labelled numeric date', () => {
      expect(extractDeadline('Deadline: 15/03/2026')).toBe('15/03/2026');
      expect(extractDeadline('Applications due 3-1-26')).toBe('3-1-26');
      expect(extractDeadline('Call closes: 30/06/2026')).toBe('30/06/2026');
      expect(extractDeadline('Please submit by 01/09/2026')).toBe('01/09/2026');
    });

    it('should read an "apply by" date', () => {
      expect(
        extractDeadline('Tanzania Education Grant — Apply by 12/31/2025, up to $50,000')
      ).toBe('12/31/2025');
    });

    it('should read written-out dates', () => {
      expect(extractDeadline('Proposals accepted until March 15, 2026')).toBe('March 15, 2026');
      expect(extractDeadline('Closing date 30 June 2026')).toBe('30 June 2026');
      expect(extractDeadline('Open until Sept. 4 2026')).toBe('Sept. 4 2026');
    });

    it('should keep the first rule that matches', () => {
      expect(
        extractDeadline('Info session on March 3, 2026. Deadline: 01/02/2026')
      ).toBe('01/02/2026');
    });

    it('should not treat words starting with a month as dates', () => {
      expect(extractDeadline('Market 12, 2020 edition')).toBeNull();
    });

    it('should return null without a date', () => {
      expect(extractDeadline('Grants for schools')).toBeNull();
    });
  });

  describe('extractAmount', () => {
    it('should prefer capped dollar phrases', () => {
      expect(extractAmount('Awards of up to $50,000 per school')).toBe('up to $50,000');
      expect(extractAmount('Grants worth $1.5 million')).toBe('worth $1.5 million');
    });

    it('should read bare dollar amounts with magnitudes', () => {
      expect(extractAmount('A pool of $2.5 million is available')).toBe('$2.5 million');
      expect(extractAmount('Small grants of $500 for books')).toBe('$500');
      expect(extractAmount('$10 mobile vouchers')).toBe('$10');
    });

    it('should read currency codes before or after the number', () => {
      expect(extractAmount('Grants of USD 25,000 per project')).toBe('USD 25,000');
      expect(extractAmount('Budget 10,000 EUR in total')).toBe('10,000 EUR');
      expect(extractAmount('TZS 5,000,000 for community projects')).toBe('TZS 5,000,000');
    });

    it('should return null without an amount', () => {
      expect(extractAmount('No budget stated')).toBeNull();
    });
  });

  describe('classifySectors', () => {
    it('should tag every sector with a keyword present, in table order', () => {
      expect(classifySectors('Water and sanitation for schools')).toEqual([
        'education',
        'water_sanitation',
      ]);
    });

    it('should match case-insensitively', () => {
      expect(classifySectors('ORPHANAGE renovation')).toEqual(['orphan_care']);
    });

    it('should fall back to general', () => {
      expect(classifySectors('Quarterly newsletter')).toEqual([GENERAL_SECTOR]);
      expect(classifySectors('')).toEqual(['general']);
    });

    it('should accept a custom table', () => {
      const table = { arts: ['music', 'theatre'], sport: ['football'] };
      expect(classifySectors('Football and music camp', table)).toEqual(['arts', 'sport']);
    });
  });

  describe('firstMatch', () => {
    it('should report the rule name and trimmed capture', () => {
      const rules = [
        { name: 'never', pattern: /zzz(\d+)/, group: 1 },
        { name: 'code', pattern: /code:\s*(\w+ )/, group: 1 },
      ];
      expect(firstMatch('code: abc def', rules)).toEqual({ rule: 'code', value: 'abc' });
    });

    it('should return null when no rule matches', () => {
      expect(firstMatch('nothing', [{ name: 'x', pattern: /\d/, group: 0 }])).toBeNull();
    });
  });
});
