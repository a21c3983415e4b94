/**
 * Address Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import { normalizeName } from '../../../normalization/address-normalizer.js';

describe('normalizeName', () => {
  describe('Empty input', () => {
    it('should return empty string for null, undefined and blank input', () => {
      expect(normalizeName(null)).toBe('');
      expect(normalizeName(undefined)).toBe('');
      expect(normalizeName('')).toBe('');
      expect(normalizeName('   \t ')).toBe('');
    });
  });

  describe('Punctuation and whitespace', () => {
    it('should lowercase and drop periods and commas', () => {
      expect(normalizeName('St. Louis')).toBe('st louis');
      expect(normalizeName('Washington, D.C.')).toBe('washington dc');
    });

    it('should collapse internal whitespace and trim', () => {
      expect(normalizeName('  New   York\tCity  ')).toBe('new york city');
    });

    it('should keep hyphens and accented letters', () => {
      expect(normalizeName('Saint-Jean-sur-Richelieu')).toBe('saint-jean-sur-richelieu');
      expect(normalizeName('Montréal')).toBe('montréal');
    });
  });

  describe('Filler tokens', () => {
    it('should strip "city of" and "town of" prefixes', () => {
      expect(normalizeName('City of Boston')).toBe('boston');
      expect(normalizeName('Town of  Cary')).toBe('cary');
      expect(normalizeName('  City of St. Louis ')).toBe('st louis');
    });

    it('should strip fillers exposed by an earlier removal', () => {
      expect(normalizeName('city city of of Springfield')).toBe('springfield');
    });

    it('should strip fillers written with repeated or tab whitespace', () => {
      expect(normalizeName('City  of Boston')).toBe('boston');
      expect(normalizeName('Town\tof Cary')).toBe('cary');
      expect(normalizeName('City of\n Springfield')).toBe('springfield');
    });

    it('should leave "city" alone when it is part of the name', () => {
      expect(normalizeName('Kansas City')).toBe('kansas city');
      expect(normalizeName('Salt Lake City')).toBe('salt lake city');
    });
  });

  describe('Country codes', () => {
    it('should map United States spellings to "us"', () => {
      expect(normalizeName('United States')).toBe('us');
      expect(normalizeName('United States of America')).toBe('us');
      expect(normalizeName('USA')).toBe('us');
      expect(normalizeName('U.S.A.')).toBe('us');
    });

    it('should map Canada to "ca"', () => {
      expect(normalizeName('Canada')).toBe('ca');
    });

    it('should only replace whole words', () => {
      expect(normalizeName('Busan')).toBe('busan');
    });
  });

  describe('Region abbreviations', () => {
    it('should expand US state codes with a US country context', () => {
      expect(normalizeName('IL', 'US')).toBe('illinois');
      expect(normalizeName('ny', 'United States')).toBe('new york');
      expect(normalizeName('DC', 'USA')).toBe('district of columbia');
    });

    it('should expand Canadian province codes with a Canadian context', () => {
      expect(normalizeName('QC', 'CA')).toBe('quebec');
      expect(normalizeName('BC', 'Canada')).toBe('british columbia');
    });

    it('should resolve the same code differently per country', () => {
      expect(normalizeName('CA', 'US')).toBe('california');
      expect(normalizeName('ON', 'US')).toBe('on');
    });

    it('should not expand without a country context or for other countries', () => {
      expect(normalizeName('IL')).toBe('il');
      expect(normalizeName('IL', 'FR')).toBe('il');
    });

    it('should pass full names through unchanged apart from casing', () => {
      expect(normalizeName('Illinois', 'US')).toBe('illinois');
    });
  });

  describe('Idempotence', () => {
    const samples = [
      'City of St. Louis',
      'United States of America',
      'Town of  Cary',
      'City  of Boston',
      'Town\tof Cary',
      'Saint-Jean, Québec',
      'Kansas City',
      'Washington, D.C.',
      'usa',
    ];

    it.each(samples)('should be stable under a second pass: %s', (sample) => {
      const once = normalizeName(sample);
      expect(normalizeName(once)).toBe(once);
    });
  });
});
