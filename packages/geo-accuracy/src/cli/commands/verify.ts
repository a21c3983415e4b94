/**
 * Verify Command
 *
 * Runs the verification pipeline over a dataset file and writes the tagged
 * checkpoint after every batch.
 *
 * Usage:
 *   geo-accuracy verify <input> [options]
 *
 * Options:
 *   --output <file>       Checkpoint / result file (default: tagged_geolocations.csv)
 *   --no-resume           Start from <input> even if the output file exists
 *   --batch-size <n>      Rows per checkpoint
 *   --max-concurrent <n>  Parallel lookups per batch
 *
 * When the output file already exists it is loaded instead of <input>, so rows
 * tagged by an earlier (interrupted) run are not looked up again.
 *
 * @module cli/commands/verify
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { CLIConfig } from '../lib/config.js';
import { formatJson, formatStatusTable, printOutput } from '../lib/output.js';
import { resolveRuntimeConfig } from '../../core/config.js';
import type { Logger } from '../../core/utils/logger.js';
import type { DatasetRow } from '../../core/types.js';
import { readDatasetFile } from '../../persistence/dataset-csv.js';
import { NominatimGeocoder } from '../../providers/nominatim-geocoder.js';
import type { GeocodingService } from '../../providers/geocoding-service.js';
import { RateLimiter } from '../../resilience/rate-limiter.js';
import { RetryingGeocodeClient } from '../../resilience/retrying-geocode-client.js';
import { Reconciler } from '../../reconciliation/reconciler.js';
import { BatchScheduler } from '../../services/batch-scheduler.js';
import { CsvCheckpointWriter } from '../../services/checkpoint-writer.js';
import type { ProgressUpdate, RunSummary } from '../../services/batch-scheduler.types.js';

/**
 * Verify command options
 */
export interface VerifyOptions {
  /** Resume from the output file when it exists (default: true) */
  readonly resume?: boolean;
  /** Geocoder override, for tests */
  readonly geocoder?: GeocodingService;
}

export interface VerifyContext {
  readonly config: CLIConfig;
  readonly logger: Logger;
}

/**
 * Execute verify command
 */
export async function verifyCommand(
  input: string,
  options: VerifyOptions,
  context: VerifyContext
): Promise<RunSummary> {
  const { config, logger } = context;
  const log = logger.child('verify');
  const outputPath = resolve(config.output);

  const dataset = await loadDataset(resolve(input), outputPath, options.resume ?? true, log);
  const runtime = resolveRuntimeConfig(config.verification);

  const geocoder =
    options.geocoder ??
    new NominatimGeocoder({
      endpoint: config.geocoder.endpoint,
      userAgent: config.geocoder.userAgent,
      timeoutMs: runtime.callTimeoutMs,
    });

  const client = new RetryingGeocodeClient(geocoder, {
    policy: {
      maxRetries: runtime.maxRetries,
      requestDelayMs: runtime.requestDelayMs,
      backoffFactor: runtime.backoffFactor,
      callTimeoutMs: runtime.callTimeoutMs,
    },
    rateLimiter: new RateLimiter({ requestsPerSecond: runtime.requestsPerSecond }),
    logger,
  });

  const scheduler = new BatchScheduler({
    lookup: client,
    checkpointWriter: new CsvCheckpointWriter(outputPath),
    reconciler: new Reconciler(runtime.thresholds),
    options: {
      batchSize: runtime.batchSize,
      maxConcurrent: runtime.maxConcurrent,
      perTaskTimeoutMs: runtime.perTaskTimeoutMs,
      batchTimeoutMs: runtime.batchTimeoutMs,
    },
    logger,
    onProgress: (update) => reportProgress(update, log),
  });

  log.info('Verifying dataset', {
    geocoder: geocoder.name,
    rows: dataset.length,
    output: outputPath,
  });

  const summary = await scheduler.process(dataset);

  if (config.json) {
    printOutput(formatJson(summary));
  } else {
    printOutput(
      `\nProcessed ${summary.processedRows} rows in ${summary.batches.length} batches ` +
        `(${summary.skippedRows} already tagged), ${(summary.durationMs / 1000).toFixed(1)}s\n`
    );
    printOutput(formatStatusTable(summary.counts));
    printOutput(`\nResults written to ${outputPath}`);
  }

  return summary;
}

async function loadDataset(
  inputPath: string,
  outputPath: string,
  resume: boolean,
  log: Logger
): Promise<DatasetRow[]> {
  if (resume && existsSync(outputPath)) {
    const rows = await readDatasetFile(outputPath);
    log.info('Resuming from checkpoint', {
      checkpoint: outputPath,
      pending: rows.filter((row) => row.status === 'unchecked').length,
    });
    return rows;
  }
  return readDatasetFile(inputPath);
}

function reportProgress(update: ProgressUpdate, log: Logger): void {
  if (update.type === 'batch_checkpointed') {
    log.info(`Batch ${update.report.batchNumber}/${update.totalBatches} saved`, {
      rows: update.report.size,
      forcedTimeouts: update.report.forcedTimeouts,
    });
  }
}
