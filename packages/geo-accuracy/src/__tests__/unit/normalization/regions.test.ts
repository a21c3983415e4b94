/**
 * Region Table Tests
 */

import { describe, it, expect } from 'vitest';
import {
  abbreviateRegion,
  expandRegionAbbreviation,
  resolveRegionTable,
} from '../../../normalization/regions.js';

describe('resolveRegionTable', () => {
  it('should resolve country codes and long forms', () => {
    expect(resolveRegionTable('US')).toBe('US');
    expect(resolveRegionTable('usa')).toBe('US');
    expect(resolveRegionTable('U.S.A.')).toBe('US');
    expect(resolveRegionTable('United  States of America')).toBe('US');
    expect(resolveRegionTable('Canada')).toBe('CA');
    expect(resolveRegionTable('can')).toBe('CA');
  });

  it('should return undefined for countries without a table', () => {
    expect(resolveRegionTable('FR')).toBeUndefined();
    expect(resolveRegionTable('')).toBeUndefined();
    expect(resolveRegionTable(null)).toBeUndefined();
  });
});

describe('expandRegionAbbreviation', () => {
  it('should expand case-insensitively', () => {
    expect(expandRegionAbbreviation('tx', 'US')).toBe('Texas');
    expect(expandRegionAbbreviation(' NL ', 'CA')).toBe('Newfoundland and Labrador');
  });

  it('should return undefined for unknown codes', () => {
    expect(expandRegionAbbreviation('ZZ', 'US')).toBeUndefined();
    expect(expandRegionAbbreviation('TX', 'MX')).toBeUndefined();
  });
});

describe('abbreviateRegion', () => {
  it('should map full names back to their codes', () => {
    expect(abbreviateRegion('Illinois', 'US')).toBe('IL');
    expect(abbreviateRegion('british columbia', 'Canada')).toBe('BC');
  });

  it('should return undefined for names outside the table', () => {
    expect(abbreviateRegion('Bavaria', 'US')).toBeUndefined();
  });
});
