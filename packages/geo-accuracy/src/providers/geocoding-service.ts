/**
 * Geocoding Service Contract
 *
 * The remote reverse-geocoding capability the pipeline verifies against.
 * Implementations are constructed explicitly and handed to the retrying
 * client; nothing in the pipeline reaches for a shared geocoder instance.
 */

import type { GeocodedAddress } from '../core/types.js';

/**
 * Raw reverse-geocoding response
 *
 * `address` is absent when the service found the point but could not
 * describe it; a `null` response means nothing was found at all.
 */
export interface GeocodeResponse {
  readonly address?: GeocodedAddress;
  readonly displayName?: string;
}

export interface ReverseGeocodeOptions {
  /** Aborted when the caller stops waiting for this lookup */
  readonly signal?: AbortSignal;
}

/**
 * Reverse geocoder
 *
 * Error contract:
 * - throw `GeocodeTimeoutError` for timeouts (transient, retried)
 * - throw anything else for failures that retrying will not fix
 */
export interface GeocodingService {
  readonly name: string;

  reverseGeocode(
    latitude: number,
    longitude: number,
    options?: ReverseGeocodeOptions
  ): Promise<GeocodeResponse | null>;
}
