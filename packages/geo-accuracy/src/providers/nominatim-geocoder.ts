/**
 * Nominatim Reverse Geocoder
 *
 * Default `GeocodingService` backed by the OpenStreetMap Nominatim
 * `/reverse` endpoint.
 *
 * USAGE POLICY (nominatim.openstreetmap.org):
 * - Max 1 request per second (enforced by the retrying client's rate limiter)
 * - Identify the application with a User-Agent
 *
 * Responses are validated with zod; a payload that does not look like a
 * Nominatim address is treated as "no address" rather than trusted.
 */

import { z } from 'zod';
import type { GeocodedAddress } from '../core/types.js';
import { GeocodeServiceError, GeocodeTimeoutError } from '../core/errors.js';
import {
  HTTPClient,
  HTTPError,
  HTTPTimeoutError,
  type FetchFunction,
} from '../core/http-client.js';
import type { GeocodeResponse, GeocodingService, ReverseGeocodeOptions } from './geocoding-service.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'nominatim' });

export const NOMINATIM_DEFAULT_ENDPOINT = 'https://nominatim.openstreetmap.org';

// ============================================================================
// Response Schema
// ============================================================================

const optionalName = z.string().optional();

const NominatimAddressSchema = z
  .object({
    city: optionalName,
    town: optionalName,
    village: optionalName,
    municipality: optionalName,
    suburb: optionalName,
    neighbourhood: optionalName,
    hamlet: optionalName,
    county: optionalName,
    state: optionalName,
    province: optionalName,
    country: optionalName,
  })
  .passthrough();

const NominatimReverseSchema = z
  .object({
    display_name: z.string().optional(),
    address: NominatimAddressSchema.optional(),
    error: z.string().optional(),
  })
  .passthrough();

// ============================================================================
// Configuration
// ============================================================================

export interface NominatimGeocoderConfig {
  /** Base URL without trailing slash (default: public OSM instance) */
  readonly endpoint: string;
  /** Identifies this application to the service */
  readonly userAgent: string;
  /** Address language (default: 'en') */
  readonly language: string;
  /** HTTP timeout in milliseconds (default: 10000) */
  readonly timeoutMs: number;
  /** fetch implementation, for tests */
  readonly fetch?: FetchFunction;
}

// ============================================================================
// Geocoder
// ============================================================================

export class NominatimGeocoder implements GeocodingService {
  readonly name = 'nominatim';
  private readonly config: NominatimGeocoderConfig;
  private readonly http: HTTPClient;

  constructor(config?: Partial<NominatimGeocoderConfig>) {
    this.config = {
      endpoint: NOMINATIM_DEFAULT_ENDPOINT,
      userAgent: 'geo-accuracy/1.0',
      language: 'en',
      timeoutMs: 10000,
      ...config,
    };
    this.http = new HTTPClient({
      timeoutMs: this.config.timeoutMs,
      userAgent: this.config.userAgent,
      ...(this.config.fetch ? { fetch: this.config.fetch } : {}),
    });
  }

  async reverseGeocode(
    latitude: number,
    longitude: number,
    options?: ReverseGeocodeOptions
  ): Promise<GeocodeResponse | null> {
    const url = this.buildReverseUrl(latitude, longitude);

    let body: unknown;
    try {
      body = await this.http.fetchJSON(url, { signal: options?.signal });
    } catch (error) {
      if (error instanceof HTTPTimeoutError) {
        throw new GeocodeTimeoutError(error.message, latitude, longitude, error.timeoutMs);
      }
      if (error instanceof HTTPError) {
        throw new GeocodeServiceError(error.message, error.statusCode, error);
      }
      throw new GeocodeServiceError(
        error instanceof Error ? error.message : String(error),
        undefined,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = NominatimReverseSchema.safeParse(body);
    if (!parsed.success) {
      log.warn('Malformed reverse geocoding payload', {
        latitude,
        longitude,
        issues: parsed.error.issues.length,
      });
      return { address: undefined };
    }

    // Nominatim answers 200 with {"error": "Unable to geocode"} for open sea etc.
    if (parsed.data.error !== undefined) {
      return null;
    }

    return {
      displayName: parsed.data.display_name,
      address: parsed.data.address ? toGeocodedAddress(parsed.data.address) : undefined,
    };
  }

  buildReverseUrl(latitude: number, longitude: number): string {
    const params = new URLSearchParams({
      format: 'jsonv2',
      lat: String(latitude),
      lon: String(longitude),
      addressdetails: '1',
      'accept-language': this.config.language,
    });
    return `${this.config.endpoint}/reverse?${params.toString()}`;
  }
}

/**
 * Keep the fields the reconciler reads. Canadian responses sometimes carry the
 * region under `province` instead of `state`.
 */
function toGeocodedAddress(address: z.infer<typeof NominatimAddressSchema>): GeocodedAddress {
  return {
    city: address.city,
    town: address.town,
    village: address.village,
    municipality: address.municipality,
    suburb: address.suburb,
    neighbourhood: address.neighbourhood,
    hamlet: address.hamlet,
    county: address.county,
    state: address.state ?? address.province,
    country: address.country,
  };
}
