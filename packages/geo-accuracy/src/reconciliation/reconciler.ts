/**
 * Address Reconciler
 *
 * Compares a claimed (city, state, country) triple against a reverse-geocoded
 * address and produces a verdict.
 *
 * ALGORITHM:
 * 1. No address payload (missing, or every field blank) -> `unknown`
 * 2. Country must match (exact or fuzzy), else `inaccurate_country`
 * 3. State matches on exact, abbreviation, or fuzzy comparison
 * 4. City matches on containment or fuzzy comparison
 * 5. Decision table over (city match, state match, geocoded city present)
 *
 * Fuzzy thresholds are strict lower bounds: a score must exceed them.
 */

import type {
  ExpectedLocation,
  GeocodedAddress,
  ReconciliationVerdict,
} from '../core/types.js';
import { CITY_FIELD_PREFERENCE, hasAnyAddressField } from '../core/types.js';
import { DEFAULT_THRESHOLDS, type ReconcilerThresholds } from '../core/config.js';
import { normalizeName } from '../normalization/address-normalizer.js';
import { abbreviateRegion } from '../normalization/regions.js';
import { similarityRatio } from '../normalization/similarity.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Normalized (city, state, country) triple
 */
export interface NormalizedLocation {
  readonly city: string;
  readonly state: string;
  readonly country: string;
}

/**
 * Verdict plus the comparisons that produced it
 */
export interface ReconciliationOutcome {
  readonly verdict: ReconciliationVerdict;
  readonly expected: NormalizedLocation;
  /** Undefined when the geocoder returned no address */
  readonly actual?: NormalizedLocation;
  readonly countryMatch: boolean;
  readonly stateMatch: boolean;
  readonly cityMatch: boolean;
}

// ============================================================================
// Reconciler
// ============================================================================

/**
 * @example
 * ```typescript
 * const reconciler = new Reconciler();
 * reconciler.reconcile(
 *   { city: 'Springfield', state: 'IL', country: 'US' },
 *   { city: 'Springfield', state: 'Illinois', country: 'United States' }
 * ); // 'accurate'
 * ```
 */
export class Reconciler {
  private readonly thresholds: ReconcilerThresholds;

  constructor(thresholds: Partial<ReconcilerThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
  }

  /**
   * Verdict for one record
   */
  reconcile(
    expected: ExpectedLocation,
    actual: GeocodedAddress | null | undefined
  ): ReconciliationVerdict {
    return this.reconcileDetailed(expected, actual).verdict;
  }

  /**
   * Verdict with the normalized values and match flags behind it
   */
  reconcileDetailed(
    expected: ExpectedLocation,
    actual: GeocodedAddress | null | undefined
  ): ReconciliationOutcome {
    const expectedNormalized: NormalizedLocation = {
      city: normalizeName(expected.city),
      state: normalizeName(expected.state, expected.country),
      country: normalizeName(expected.country),
    };

    if (!actual || !hasAnyAddressField(actual)) {
      return {
        verdict: 'unknown',
        expected: expectedNormalized,
        countryMatch: false,
        stateMatch: false,
        cityMatch: false,
      };
    }

    const actualNormalized: NormalizedLocation = {
      city: normalizeName(extractCityName(actual)),
      state: normalizeName(actual.state),
      country: normalizeName(actual.country),
    };

    const countryMatch = this.countriesMatch(expectedNormalized.country, actualNormalized.country);
    if (!countryMatch) {
      return {
        verdict: 'inaccurate_country',
        expected: expectedNormalized,
        actual: actualNormalized,
        countryMatch: false,
        stateMatch: false,
        cityMatch: false,
      };
    }

    const stateMatch = this.statesMatch(
      expectedNormalized.state,
      actualNormalized.state,
      expected.state,
      expected.country
    );
    const cityMatch = this.citiesMatch(expectedNormalized.city, actualNormalized.city);

    return {
      verdict: decide(cityMatch, stateMatch, actualNormalized.city.length > 0),
      expected: expectedNormalized,
      actual: actualNormalized,
      countryMatch,
      stateMatch,
      cityMatch,
    };
  }

  private countriesMatch(expected: string, actual: string): boolean {
    return expected === actual || similarityRatio(expected, actual) > this.thresholds.country;
  }

  private statesMatch(
    expected: string,
    actual: string,
    claimedState: string | undefined,
    claimedCountry: string
  ): boolean {
    if (!expected || !actual) {
      return false;
    }
    if (expected === actual) {
      return true;
    }

    // Geocoder spelled the region out, dataset holds its abbreviation
    const actualAbbreviation = abbreviateRegion(actual, claimedCountry);
    if (
      actualAbbreviation !== undefined &&
      claimedState !== undefined &&
      actualAbbreviation === claimedState.trim().toUpperCase()
    ) {
      return true;
    }

    return similarityRatio(expected, actual) > this.thresholds.state;
  }

  private citiesMatch(expected: string, actual: string): boolean {
    // An empty string is contained in everything; it must not count as a match
    if (!actual || !expected) {
      return false;
    }
    return (
      actual.includes(expected) ||
      expected.includes(actual) ||
      similarityRatio(expected, actual) > this.thresholds.city
    );
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * First non-empty city-like field, most specific first
 */
export function extractCityName(address: GeocodedAddress): string {
  for (const field of CITY_FIELD_PREFERENCE) {
    const value = address[field];
    if (value !== undefined && value.trim().length > 0) {
      return value;
    }
  }
  return '';
}

/**
 * Decision table; country is already known to match
 */
function decide(
  cityMatch: boolean,
  stateMatch: boolean,
  actualCityPresent: boolean
): ReconciliationVerdict {
  if (cityMatch && stateMatch) {
    return 'accurate';
  }
  if (stateMatch && !actualCityPresent) {
    return 'state_only_match';
  }
  if (stateMatch) {
    return 'state_match_city_mismatch';
  }
  return 'inaccurate';
}
