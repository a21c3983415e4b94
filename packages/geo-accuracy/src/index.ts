/**
 * geo-accuracy
 *
 * Verifies that each row's coordinates reverse-geocode to the city, state and
 * country the row claims, in checkpointed, resumable, rate-limited batches.
 *
 * @packageDocumentation
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export {
  VerificationOptionsSchema,
  ReconcilerThresholdsSchema,
  DEFAULT_VERIFICATION_OPTIONS,
  DEFAULT_THRESHOLDS,
  resolveVerificationOptions,
  resolveRuntimeConfig,
  type VerificationOptions,
  type VerificationOptionsInput,
  type ReconcilerThresholds,
  type RuntimeConfig,
} from './core/config.js';
export { Logger, logger, createLogger, type LogLevel, type LogMetadata } from './core/utils/logger.js';

// Normalization
export { normalizeName } from './normalization/address-normalizer.js';
export { similarityRatio } from './normalization/similarity.js';
export {
  resolveRegionTable,
  expandRegionAbbreviation,
  abbreviateRegion,
} from './normalization/regions.js';

// Reconciliation
export {
  Reconciler,
  extractCityName,
  type NormalizedLocation,
  type ReconciliationOutcome,
} from './reconciliation/reconciler.js';

// Providers
export type {
  GeocodingService,
  GeocodeResponse,
  ReverseGeocodeOptions,
} from './providers/geocoding-service.js';
export {
  NominatimGeocoder,
  NOMINATIM_DEFAULT_ENDPOINT,
  type NominatimGeocoderConfig,
} from './providers/nominatim-geocoder.js';

// Resilience
export {
  RetryingGeocodeClient,
  DEFAULT_RETRY_POLICY,
  type AttemptOutcome,
  type LookupResult,
  type LocationLookup,
  type RetryPolicy,
  type RetryingGeocodeClientOptions,
} from './resilience/retrying-geocode-client.js';
export { RateLimiter, createUnlimitedRateLimiter, type RateLimiterConfig } from './resilience/rate-limiter.js';

// Persistence and scheduling
export {
  parseDataset,
  readDatasetFile,
  serializeDataset,
  DATASET_COLUMNS,
  STATUS_COLUMN,
} from './persistence/dataset-csv.js';
export { CsvCheckpointWriter, type CheckpointWriter } from './services/checkpoint-writer.js';
export { BatchScheduler, countStatuses, type BatchSchedulerDeps } from './services/batch-scheduler.js';
export * from './services/batch-scheduler.types.js';
