/**
 * geo-accuracy CLI Configuration Management
 *
 * Loads configuration from .geo-accuracyrc (YAML) with environment variable
 * overrides and defaults from `core/config.ts`.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (GEO_ACCURACY_*)
 * 3. Config file (.geo-accuracyrc or --config path)
 * 4. Default values
 *
 * Example .geo-accuracyrc:
 * ```yaml
 * verification:
 *   batchSize: 200
 *   maxConcurrent: 2
 *   requestDelaySeconds: 1.1
 *   thresholds:
 *     city: 75
 * geocoder:
 *   endpoint: https://nominatim.example.org
 *   userAgent: my-team-geo-audit/1.0 (ops@example.org)
 * output: tagged_geolocations.csv
 * ```
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  VerificationOptionsSchema,
  resolveVerificationOptions,
  type VerificationOptions,
} from '../../core/config.js';
import { ConfigurationError, toError } from '../../core/errors.js';
import { NOMINATIM_DEFAULT_ENDPOINT } from '../../providers/nominatim-geocoder.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Geocoder connection settings
 */
export interface GeocoderConfig {
  readonly endpoint: string;
  readonly userAgent: string;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Validated pipeline options */
  readonly verification: VerificationOptions;

  /** Geocoder connection */
  readonly geocoder: GeocoderConfig;

  /** Default checkpoint / output file */
  readonly output: string;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z
  .object({
    verification: VerificationOptionsSchema.partial().optional(),
    geocoder: z
      .object({
        endpoint: z.string().url().optional(),
        userAgent: z.string().min(1).optional(),
      })
      .optional(),
    output: z.string().min(1).optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_OUTPUT_FILE = 'tagged_geolocations.csv';

export const DEFAULT_USER_AGENT = 'geo-accuracy/1.0';

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.geo-accuracyrc',
  '.geo-accuracyrc.yaml',
  '.geo-accuracyrc.yml',
  '.geo-accuracyrc.json',
] as const;

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigurationError when the file is unreadable or invalid
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${filePath}: ${toError(error).message}`
    );
  }

  // An empty file parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid config file ${filePath}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Get environment variable with prefix
 */
function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`GEO_ACCURACY_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Get boolean environment variable
 */
function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get numeric environment variable
 *
 * @throws ConfigurationError for values that are not numbers
 */
function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (Number.isNaN(num)) {
    throw new ConfigurationError(`GEO_ACCURACY_${name} must be a number, got "${value}"`);
  }
  return num;
}

/**
 * Values settable from the command line
 */
export interface CLIOverrides {
  verbose?: boolean;
  json?: boolean;
  output?: string;
  batchSize?: number;
  maxConcurrent?: number;
  requestDelaySeconds?: number;
  maxRetries?: number;
  perTaskTimeoutSeconds?: number;
  batchTimeoutSeconds?: number;
  endpoint?: string;
  userAgent?: string;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: CLIOverrides;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: Env;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError when any layer is invalid or the merged options
 *         fail validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const file = fileConfig.verification ?? {};

  const verification = resolveVerificationOptions({
    batchSize: overrides.batchSize ?? getEnvNumber(env, 'BATCH_SIZE') ?? file.batchSize,
    maxConcurrent:
      overrides.maxConcurrent ?? getEnvNumber(env, 'MAX_CONCURRENT') ?? file.maxConcurrent,
    requestDelaySeconds:
      overrides.requestDelaySeconds ??
      getEnvNumber(env, 'REQUEST_DELAY') ??
      file.requestDelaySeconds,
    maxRetries: overrides.maxRetries ?? getEnvNumber(env, 'MAX_RETRIES') ?? file.maxRetries,
    perTaskTimeoutSeconds:
      overrides.perTaskTimeoutSeconds ??
      getEnvNumber(env, 'TASK_TIMEOUT') ??
      file.perTaskTimeoutSeconds,
    batchTimeoutSeconds:
      overrides.batchTimeoutSeconds ??
      getEnvNumber(env, 'BATCH_TIMEOUT') ??
      file.batchTimeoutSeconds,
    backoffFactor: file.backoffFactor,
    callTimeoutSeconds: file.callTimeoutSeconds,
    requestsPerSecond: file.requestsPerSecond,
    thresholds: file.thresholds,
  });

  const geocoder: GeocoderConfig = {
    endpoint: stripTrailingSlash(
      overrides.endpoint ??
        getEnvVar(env, 'ENDPOINT') ??
        fileConfig.geocoder?.endpoint ??
        NOMINATIM_DEFAULT_ENDPOINT
    ),
    userAgent:
      overrides.userAgent ??
      getEnvVar(env, 'USER_AGENT') ??
      fileConfig.geocoder?.userAgent ??
      DEFAULT_USER_AGENT,
  };

  return {
    verification,
    geocoder,
    output: overrides.output ?? getEnvVar(env, 'OUTPUT') ?? fileConfig.output ?? DEFAULT_OUTPUT_FILE,
    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
