/**
 * Global Test Setup for geo-accuracy
 *
 * SCOPE: Shared fixtures and fakes for all unit tests
 *
 * Nothing here touches the network: geocoders are scripted fakes and fetch
 * is replaced by in-process Response objects.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { DatasetRow, GeocodedAddress, LocationRecord, VerificationStatus } from '../core/types.js';
import type {
  GeocodeResponse,
  GeocodingService,
  ReverseGeocodeOptions,
} from '../providers/geocoding-service.js';
import { Logger } from '../core/utils/logger.js';

// ============================================================================
// Logging
// ============================================================================

export const silentLogger = new Logger({ level: 'silent', service: 'test', pretty: true });

// ============================================================================
// Dataset Fixtures
// ============================================================================

export function makeRecord(overrides: Partial<LocationRecord> = {}): LocationRecord {
  return {
    id: 'row-1',
    latitude: 39.7817,
    longitude: -89.6501,
    claimedCity: 'Springfield',
    claimedCountry: 'US',
    claimedStateOrProvince: 'IL',
    ...overrides,
  };
}

export function makeRow(
  overrides: Partial<LocationRecord> = {},
  status: VerificationStatus = 'unchecked'
): DatasetRow {
  return { record: makeRecord(overrides), status };
}

/**
 * `count` unchecked rows with ids row-0 .. row-(count-1)
 */
export function makeRows(count: number): DatasetRow[] {
  return Array.from({ length: count }, (_, i) => makeRow({ id: `row-${i}` }));
}

export const SPRINGFIELD_ADDRESS: GeocodedAddress = {
  city: 'Springfield',
  state: 'Illinois',
  country: 'United States',
};

// ============================================================================
// Fakes
// ============================================================================

export type ScriptedReply = GeocodeResponse | null | Error | 'hang';

/**
 * Geocoder that plays back a script, one entry per call
 *
 * - `Error` entries are thrown
 * - `'hang'` never settles unless the call's signal aborts
 * - after the script runs out, `fallback` answers every call
 */
export class FakeGeocodingService implements GeocodingService {
  readonly name = 'fake';
  readonly calls: Array<{ latitude: number; longitude: number }> = [];
  abortedCalls = 0;

  constructor(
    private readonly script: ScriptedReply[] = [],
    private readonly fallback: ScriptedReply = { address: SPRINGFIELD_ADDRESS }
  ) {}

  async reverseGeocode(
    latitude: number,
    longitude: number,
    options?: ReverseGeocodeOptions
  ): Promise<GeocodeResponse | null> {
    this.calls.push({ latitude, longitude });
    const reply = this.script.length > 0 ? this.script.shift() : this.fallback;

    if (reply === 'hang') {
      return new Promise<GeocodeResponse | null>((_, reject) => {
        options?.signal?.addEventListener(
          'abort',
          () => {
            this.abortedCalls++;
            reject(new Error('aborted'));
          },
          { once: true }
        );
      });
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply ?? null;
  }
}

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * Delay execution
 */
export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * In-process JSON Response for fetch stubs
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
