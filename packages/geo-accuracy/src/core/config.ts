/**
 * Verification options
 *
 * The options record recognized by the pipeline, its defaults, and the zod
 * schema that validates it. Durations are given in seconds (as operators
 * write them) and converted to milliseconds once, in `resolveRuntimeConfig`.
 *
 * Defaults follow the Nominatim usage policy: at most one request per second,
 * very few parallel clients.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Schema
// ============================================================================

const ThresholdSchema = z.number().min(0).max(100);

export const ReconcilerThresholdsSchema = z.object({
  /** Country similarity must exceed this (0-100) */
  country: ThresholdSchema.default(85),
  /** State/province similarity must exceed this (0-100) */
  state: ThresholdSchema.default(70),
  /** City similarity must exceed this (0-100) */
  city: ThresholdSchema.default(70),
});

export const VerificationOptionsSchema = z.object({
  batchSize: z.number().int().positive().default(500),
  maxConcurrent: z
    .number()
    .int()
    .positive()
    .max(10, 'maxConcurrent above 10 violates geocoder usage policies')
    .default(2),
  requestDelaySeconds: z.number().nonnegative().default(1.1),
  maxRetries: z.number().int().positive().default(3),
  perTaskTimeoutSeconds: z.number().positive().default(30),
  batchTimeoutSeconds: z.number().positive().default(600),
  backoffFactor: z.number().min(1).default(1.5),
  callTimeoutSeconds: z.number().positive().default(10),
  requestsPerSecond: z.number().positive().default(1),
  thresholds: ReconcilerThresholdsSchema.default({}),
});

export type ReconcilerThresholds = z.infer<typeof ReconcilerThresholdsSchema>;
export type VerificationOptions = z.infer<typeof VerificationOptionsSchema>;

/**
 * Options as accepted from callers, config files and flags (every field optional)
 */
export type VerificationOptionsInput = z.input<typeof VerificationOptionsSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_VERIFICATION_OPTIONS: VerificationOptions = VerificationOptionsSchema.parse({});

export const DEFAULT_THRESHOLDS: ReconcilerThresholds = DEFAULT_VERIFICATION_OPTIONS.thresholds;

// ============================================================================
// Runtime configuration
// ============================================================================

/**
 * Validated options with durations in milliseconds
 */
export interface RuntimeConfig {
  readonly batchSize: number;
  readonly maxConcurrent: number;
  readonly requestDelayMs: number;
  readonly maxRetries: number;
  readonly perTaskTimeoutMs: number;
  readonly batchTimeoutMs: number;
  readonly backoffFactor: number;
  readonly callTimeoutMs: number;
  readonly requestsPerSecond: number;
  readonly thresholds: ReconcilerThresholds;
}

/**
 * Fill unset options with defaults and validate the result
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveVerificationOptions(
  input: VerificationOptionsInput = {}
): VerificationOptions {
  const parsed = VerificationOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError('Invalid verification options', issues);
  }
  return parsed.data;
}

/**
 * Convert validated options to the millisecond-based runtime form
 */
export function resolveRuntimeConfig(options: VerificationOptions): RuntimeConfig {
  return {
    batchSize: options.batchSize,
    maxConcurrent: options.maxConcurrent,
    requestDelayMs: Math.round(options.requestDelaySeconds * 1000),
    maxRetries: options.maxRetries,
    perTaskTimeoutMs: Math.round(options.perTaskTimeoutSeconds * 1000),
    batchTimeoutMs: Math.round(options.batchTimeoutSeconds * 1000),
    backoffFactor: options.backoffFactor,
    callTimeoutMs: Math.round(options.callTimeoutSeconds * 1000),
    requestsPerSecond: options.requestsPerSecond,
    thresholds: options.thresholds,
  };
}
