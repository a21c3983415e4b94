/**
 * Reconciler Tests
 *
 * Decision table and the match rules feeding it.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Reconciler, extractCityName } from '../../../reconciliation/reconciler.js';
import type { ExpectedLocation } from '../../../core/types.js';
import { SPRINGFIELD_ADDRESS } from '../../setup.js';

const SPRINGFIELD_IL: ExpectedLocation = { city: 'Springfield', state: 'IL', country: 'US' };

describe('Reconciler', () => {
  let reconciler: Reconciler;

  beforeEach(() => {
    reconciler = new Reconciler();
  });

  describe('Verdicts', () => {
    it('should be accurate when city, state and country match', () => {
      expect(reconciler.reconcile(SPRINGFIELD_IL, SPRINGFIELD_ADDRESS)).toBe('accurate');
    });

    it('should be unknown when there is no address', () => {
      expect(reconciler.reconcile(SPRINGFIELD_IL, null)).toBe('unknown');
      expect(reconciler.reconcile(SPRINGFIELD_IL, undefined)).toBe('unknown');
    });

    it('should be unknown for an address without any field', () => {
      expect(reconciler.reconcile(SPRINGFIELD_IL, {})).toBe('unknown');
    });

    it('should be unknown when every address field is blank', () => {
      const outcome = reconciler.reconcileDetailed(SPRINGFIELD_IL, {
        city: '  ',
        state: '',
        country: ' ',
      });

      expect(outcome.verdict).toBe('unknown');
      expect(outcome.actual).toBeUndefined();
    });

    it('should be inaccurate_country when countries differ', () => {
      expect(
        reconciler.reconcile(SPRINGFIELD_IL, { ...SPRINGFIELD_ADDRESS, country: 'France' })
      ).toBe('inaccurate_country');
    });

    it('should be state_only_match when the address has no city-like field', () => {
      expect(
        reconciler.reconcile(SPRINGFIELD_IL, { state: 'Illinois', country: 'United States' })
      ).toBe('state_only_match');
    });

    it('should be state_match_city_mismatch when the address names another city', () => {
      expect(
        reconciler.reconcile(SPRINGFIELD_IL, { ...SPRINGFIELD_ADDRESS, city: 'Chicago' })
      ).toBe('state_match_city_mismatch');
    });

    it('should be inaccurate when the state differs', () => {
      expect(
        reconciler.reconcile(SPRINGFIELD_IL, { ...SPRINGFIELD_ADDRESS, state: 'Texas' })
      ).toBe('inaccurate');
    });

    it('should be inaccurate when the row has no state', () => {
      expect(
        reconciler.reconcile({ city: 'Springfield', country: 'US' }, SPRINGFIELD_ADDRESS)
      ).toBe('inaccurate');
    });
  });

  describe('State matching', () => {
    it('should match an abbreviation against the full state name', () => {
      expect(
        reconciler.reconcile(
          { city: 'Los Angeles', state: 'CA', country: 'US' },
          { city: 'Los Angeles', state: 'California', country: 'United States' }
        )
      ).toBe('accurate');
    });

    it('should match Canadian provinces', () => {
      expect(
        reconciler.reconcile(
          { city: 'Montreal', state: 'QC', country: 'Canada' },
          { city: 'Montréal', state: 'Quebec', country: 'Canada' }
        )
      ).toBe('accurate');
    });
  });

  describe('City matching', () => {
    it('should accept spelling variants above the city threshold', () => {
      // "st louis" vs "saint louis" scores 84
      expect(
        reconciler.reconcile(
          { city: 'St. Louis', state: 'MO', country: 'US' },
          { city: 'Saint Louis', state: 'Missouri', country: 'United States' }
        )
      ).toBe('accurate');
    });

    it('should accept containment in either direction', () => {
      expect(
        reconciler.reconcile(SPRINGFIELD_IL, { ...SPRINGFIELD_ADDRESS, city: 'City of Springfield' })
      ).toBe('accurate');
      expect(
        reconciler.reconcile(
          { city: 'West Springfield', state: 'IL', country: 'US' },
          SPRINGFIELD_ADDRESS
        )
      ).toBe('accurate');
    });

    it('should use the most specific city-like field', () => {
      expect(
        reconciler.reconcile(SPRINGFIELD_IL, { ...SPRINGFIELD_ADDRESS, neighbourhood: 'Downtown' })
      ).toBe('state_match_city_mismatch');
    });

    it('should never match an empty claimed city', () => {
      expect(
        reconciler.reconcile({ city: '', state: 'IL', country: 'US' }, SPRINGFIELD_ADDRESS)
      ).toBe('state_match_city_mismatch');
    });
  });

  describe('Thresholds', () => {
    it('should treat thresholds as strict lower bounds', () => {
      const strict = new Reconciler({ city: 84 });
      expect(
        strict.reconcile(
          { city: 'St. Louis', state: 'MO', country: 'US' },
          { city: 'Saint Louis', state: 'Missouri', country: 'United States' }
        )
      ).toBe('state_match_city_mismatch');
    });

    it('should accept fuzzy country names above the country threshold', () => {
      // "deutchland" vs "deutschland": 200 * 10 / 21 = 95
      expect(
        reconciler.reconcile(
          { city: 'Berlin', state: 'Berlin', country: 'Deutchland' },
          { city: 'Berlin', state: 'Berlin', country: 'Deutschland' }
        )
      ).toBe('accurate');
    });
  });

  describe('reconcileDetailed', () => {
    it('should expose normalized triples and match flags', () => {
      const outcome = reconciler.reconcileDetailed(SPRINGFIELD_IL, {
        ...SPRINGFIELD_ADDRESS,
        city: 'Chicago',
      });

      expect(outcome).toEqual({
        verdict: 'state_match_city_mismatch',
        expected: { city: 'springfield', state: 'illinois', country: 'us' },
        actual: { city: 'chicago', state: 'illinois', country: 'us' },
        countryMatch: true,
        stateMatch: true,
        cityMatch: false,
      });
    });

    it('should omit the actual triple when there is no address', () => {
      const outcome = reconciler.reconcileDetailed(SPRINGFIELD_IL, null);
      expect(outcome.verdict).toBe('unknown');
      expect(outcome.actual).toBeUndefined();
    });
  });
});

describe('extractCityName', () => {
  it('should prefer the most specific populated field', () => {
    expect(extractCityName({ city: 'Springfield', town: 'Riverton' })).toBe('Riverton');
    expect(extractCityName({ suburb: 'Eastside', city: 'Springfield' })).toBe('Eastside');
  });

  it('should fall back to county', () => {
    expect(extractCityName({ county: 'Sangamon County', state: 'Illinois' })).toBe('Sangamon County');
  });

  it('should skip blank fields', () => {
    expect(extractCityName({ village: '  ', city: 'Springfield' })).toBe('Springfield');
  });

  it('should return empty string when no field is populated', () => {
    expect(extractCityName({ state: 'Illinois' })).toBe('');
  });
});
