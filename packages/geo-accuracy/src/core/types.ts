/**
 * Core domain types for geo-accuracy
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

// ============================================================================
// Verification Status
// ============================================================================

/**
 * Every status a dataset row can carry, in persistence order
 */
export const VERIFICATION_STATUSES = [
  'unchecked',
  'accurate',
  'inaccurate',
  'inaccurate_country',
  'state_only_match',
  'state_match_city_mismatch',
  'unknown',
  'timeout',
  'error',
] as const;

export type VerificationStatus = (typeof VERIFICATION_STATUSES)[number];

/**
 * Verdicts the reconciler can produce from an address payload
 */
export type ReconciliationVerdict = Extract<
  VerificationStatus,
  | 'accurate'
  | 'inaccurate'
  | 'inaccurate_country'
  | 'state_only_match'
  | 'state_match_city_mismatch'
  | 'unknown'
>;

/**
 * Statuses assigned when the remote lookup itself did not produce an address
 */
export type LookupFailureStatus = Extract<VerificationStatus, 'timeout' | 'error' | 'unknown'>;

/**
 * Any status a processed row can end a run with
 */
export type TerminalStatus = Exclude<VerificationStatus, 'unchecked'>;

export function isVerificationStatus(value: string): value is VerificationStatus {
  return VERIFICATION_STATUSES.some((status) => status === value);
}

// ============================================================================
// Records
// ============================================================================

/**
 * One dataset row's claim: coordinates plus the place they should resolve to
 */
export interface LocationRecord {
  readonly id: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly claimedCity: string;
  /** Secondary city column; carried through persistence untouched */
  readonly claimedCityAlt?: string;
  readonly claimedCountry: string;
  readonly claimedStateOrProvince?: string;
}

/**
 * A record and its current verification status.
 *
 * The dataset is an ordered array of these; `status` is the only mutable field
 * and is written exclusively by the batch scheduler's coordinator.
 */
export interface DatasetRow {
  readonly record: LocationRecord;
  status: VerificationStatus;
}

/**
 * Expected place triple used by the reconciler
 */
export interface ExpectedLocation {
  readonly city: string;
  readonly state?: string;
  readonly country: string;
}

// ============================================================================
// Geocoded Address
// ============================================================================

/**
 * Structured address returned by a reverse geocoder.
 *
 * Field names follow OpenStreetMap / Nominatim address details.
 */
export interface GeocodedAddress {
  readonly city?: string;
  readonly town?: string;
  readonly village?: string;
  readonly municipality?: string;
  readonly suburb?: string;
  readonly neighbourhood?: string;
  readonly hamlet?: string;
  readonly county?: string;
  readonly state?: string;
  readonly country?: string;
}

/**
 * Whether any address field holds a non-blank value; an address without one
 * counts as no address at all
 */
export function hasAnyAddressField(address: GeocodedAddress): boolean {
  return Object.values(address).some(
    (value) => typeof value === 'string' && value.trim().length > 0
  );
}

/**
 * Address fields scanned for a city name, most specific first
 */
export const CITY_FIELD_PREFERENCE = [
  'neighbourhood',
  'suburb',
  'hamlet',
  'village',
  'town',
  'city',
  'municipality',
  'county',
] as const satisfies readonly (keyof GeocodedAddress)[];
