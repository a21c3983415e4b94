/**
 * Batch Scheduler - checkpointed verification runs
 *
 * Drives a run over a dataset:
 * - Only rows still `unchecked` are processed (re-runs resume)
 * - Rows are grouped into fixed-size batches, processed strictly in sequence
 * - Each batch runs on a bounded worker pool
 * - Per-row deadline and whole-batch deadline
 * - Whole dataset checkpointed after every batch
 *
 * OWNERSHIP:
 * - Workers never touch the dataset; they report (row, status) pairs
 * - The coordinator writes statuses once the batch is closed, then persists
 * - Reports arriving after a row's deadline or the batch deadline are dropped
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type {
  DatasetRow,
  LocationRecord,
  TerminalStatus,
} from '../core/types.js';
import { PersistenceError, toError } from '../core/errors.js';
import type { LocationLookup } from '../resilience/retrying-geocode-client.js';
import { Reconciler } from '../reconciliation/reconciler.js';
import type { CheckpointWriter } from './checkpoint-writer.js';
import type {
  BatchReport,
  ProgressUpdate,
  RunSummary,
  SchedulerOptions,
  SchedulerState,
  StatusCounts,
} from './batch-scheduler.types.js';
import { DEFAULT_SCHEDULER_OPTIONS } from './batch-scheduler.types.js';
import { raceDeadline } from '../core/utils/timers.js';
import { logger as rootLogger, type Logger } from '../core/utils/logger.js';

export interface BatchSchedulerDeps {
  readonly lookup: LocationLookup;
  readonly checkpointWriter: CheckpointWriter;
  readonly reconciler?: Reconciler;
  readonly options?: Partial<SchedulerOptions>;
  readonly logger?: Logger;
  readonly onProgress?: (update: ProgressUpdate) => void;
}

/**
 * @example
 * ```typescript
 * const scheduler = new BatchScheduler({
 *   lookup: new RetryingGeocodeClient(new NominatimGeocoder()),
 *   checkpointWriter: new CsvCheckpointWriter('tagged_geolocations.csv'),
 *   options: { batchSize: 500, maxConcurrent: 2 },
 * });
 *
 * const summary = await scheduler.process(rows);
 * console.log(summary.counts.accurate);
 * ```
 */
export class BatchScheduler {
  private readonly lookup: LocationLookup;
  private readonly checkpointWriter: CheckpointWriter;
  private readonly reconciler: Reconciler;
  private readonly options: SchedulerOptions;
  private readonly log: Logger;
  private readonly onProgress?: (update: ProgressUpdate) => void;
  private state: SchedulerState = 'idle';

  constructor(deps: BatchSchedulerDeps) {
    this.lookup = deps.lookup;
    this.checkpointWriter = deps.checkpointWriter;
    this.reconciler = deps.reconciler ?? new Reconciler();
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...deps.options };
    this.log = (deps.logger ?? rootLogger).child('scheduler');
    this.onProgress = deps.onProgress;

    if (!Number.isInteger(this.options.batchSize) || this.options.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.options.batchSize}`);
    }
    if (!Number.isInteger(this.options.maxConcurrent) || this.options.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${this.options.maxConcurrent}`);
    }
  }

  getState(): SchedulerState {
    return this.state;
  }

  /**
   * Verify every `unchecked` row of `dataset`, updating statuses in place
   *
   * @throws PersistenceError when a checkpoint cannot be written; batches
   *         after the failing one are not started
   */
  async process(dataset: DatasetRow[]): Promise<RunSummary> {
    if (this.state !== 'idle' && this.state !== 'done' && this.state !== 'failed') {
      throw new Error(`Scheduler is already running (state: ${this.state})`);
    }

    const startTime = Date.now();
    const pending: number[] = [];
    dataset.forEach((row, index) => {
      if (row.status === 'unchecked') {
        pending.push(index);
      }
    });

    const totalBatches = Math.ceil(pending.length / this.options.batchSize);
    const reports: BatchReport[] = [];

    this.log.info('Starting verification run', {
      totalRows: dataset.length,
      pendingRows: pending.length,
      totalBatches,
      batchSize: this.options.batchSize,
      maxConcurrent: this.options.maxConcurrent,
    });

    let batch: number[] = [];
    this.state = 'filling';

    for (let i = 0; i < pending.length; i++) {
      batch.push(pending[i]);

      if (batch.length < this.options.batchSize && i < pending.length - 1) {
        continue;
      }

      const batchNumber = reports.length + 1;
      const report = await this.runBatch(dataset, batch, batchNumber, totalBatches);
      reports.push(report);

      batch = [];
      this.state = 'filling';
    }

    this.state = 'done';

    const summary: RunSummary = {
      totalRows: dataset.length,
      skippedRows: dataset.length - pending.length,
      processedRows: pending.length,
      batches: reports,
      counts: countStatuses(dataset),
      durationMs: Date.now() - startTime,
    };

    this.log.info('Verification run complete', {
      processedRows: summary.processedRows,
      skippedRows: summary.skippedRows,
      batches: reports.length,
      durationMs: summary.durationMs,
    });

    return summary;
  }

  // ============================================================================
  // Batch execution
  // ============================================================================

  private async runBatch(
    dataset: DatasetRow[],
    rowIndices: readonly number[],
    batchNumber: number,
    totalBatches: number
  ): Promise<BatchReport> {
    const startTime = Date.now();
    const outcomes = new Map<number, TerminalStatus>();
    const batchController = new AbortController();
    let closed = false;
    let cursor = 0;

    this.log.info('Starting batch', { batchNumber, totalBatches, size: rowIndices.length });
    this.emit({ type: 'batch_started', batchNumber, totalBatches, size: rowIndices.length });

    // Only accepted while the batch is open; first report for a row wins
    const report = (rowIndex: number, status: TerminalStatus): void => {
      if (closed || outcomes.has(rowIndex)) {
        return;
      }
      outcomes.set(rowIndex, status);
      this.emit({
        type: 'row_completed',
        batchNumber,
        recordId: dataset[rowIndex].record.id,
        status,
      });
    };

    const worker = async (): Promise<void> => {
      while (!closed && cursor < rowIndices.length) {
        const rowIndex = rowIndices[cursor++];
        const status = await this.runTask(dataset[rowIndex].record, batchController.signal);
        report(rowIndex, status);
      }
    };

    this.state = 'dispatched';
    const poolSize = Math.min(this.options.maxConcurrent, rowIndices.length);
    const workers = Array.from({ length: poolSize }, () => worker());

    this.state = 'draining';
    const drained = await raceDeadline(Promise.all(workers), this.options.batchTimeoutMs);
    closed = true;

    if (!drained.settled) {
      batchController.abort();
      this.log.warn('Batch deadline exceeded, marking unfinished rows as timeout', {
        batchNumber,
        finished: outcomes.size,
        unfinished: rowIndices.length - outcomes.size,
        batchTimeoutMs: this.options.batchTimeoutMs,
      });
    }

    const counts: Partial<Record<TerminalStatus, number>> = {};
    let forcedTimeouts = 0;
    for (const rowIndex of rowIndices) {
      let status = outcomes.get(rowIndex);
      if (status === undefined) {
        status = 'timeout';
        forcedTimeouts++;
      }
      dataset[rowIndex].status = status;
      counts[status] = (counts[status] ?? 0) + 1;
    }

    await this.checkpoint(dataset, batchNumber);
    this.state = 'checkpointed';

    const batchReport: BatchReport = {
      batchNumber,
      size: rowIndices.length,
      counts,
      deadlineExceeded: !drained.settled,
      forcedTimeouts,
      durationMs: Date.now() - startTime,
    };

    this.log.info('Batch checkpointed', {
      batchNumber,
      totalBatches,
      location: this.checkpointWriter.location,
      durationMs: batchReport.durationMs,
      counts,
    });
    this.emit({ type: 'batch_checkpointed', totalBatches, report: batchReport });

    return batchReport;
  }

  /**
   * Look up and reconcile one row under the per-task deadline
   *
   * Never rejects: every failure maps to a status.
   */
  private async runTask(record: LocationRecord, batchSignal: AbortSignal): Promise<TerminalStatus> {
    if (!hasValidCoordinates(record)) {
      this.log.warn('Invalid coordinates', {
        id: record.id,
        latitude: record.latitude,
        longitude: record.longitude,
      });
      return 'error';
    }

    const taskController = new AbortController();
    const onBatchAbort = (): void => taskController.abort();
    batchSignal.addEventListener('abort', onBatchAbort, { once: true });

    try {
      const result = await raceDeadline(
        this.verifyRecord(record, taskController.signal),
        this.options.perTaskTimeoutMs
      );

      if (!result.settled) {
        // The call may still finish in the background; its result is discarded
        taskController.abort();
        this.log.warn('Task timed out', {
          id: record.id,
          perTaskTimeoutMs: this.options.perTaskTimeoutMs,
        });
        return 'timeout';
      }
      return result.value;
    } finally {
      batchSignal.removeEventListener('abort', onBatchAbort);
    }
  }

  private async verifyRecord(record: LocationRecord, signal: AbortSignal): Promise<TerminalStatus> {
    try {
      const result = await this.lookup.lookup(record.latitude, record.longitude, signal);
      if (!result.ok) {
        return result.status;
      }

      const outcome = this.reconciler.reconcileDetailed(
        {
          city: record.claimedCity,
          state: record.claimedStateOrProvince,
          country: record.claimedCountry,
        },
        result.address
      );

      this.log.debug('Reconciled', {
        id: record.id,
        verdict: outcome.verdict,
        expected: outcome.expected,
        actual: outcome.actual,
        countryMatch: outcome.countryMatch,
        stateMatch: outcome.stateMatch,
        cityMatch: outcome.cityMatch,
      });

      return outcome.verdict;
    } catch (error) {
      this.log.error('Unexpected failure while verifying record', {
        id: record.id,
        error: toError(error).message,
      });
      return 'error';
    }
  }

  private async checkpoint(dataset: readonly DatasetRow[], batchNumber: number): Promise<void> {
    try {
      await this.checkpointWriter.persist(dataset);
    } catch (error) {
      this.state = 'failed';
      const persistenceError =
        error instanceof PersistenceError
          ? error
          : new PersistenceError(
              `Checkpoint after batch ${batchNumber} failed: ${toError(error).message}`,
              this.checkpointWriter.location,
              toError(error)
            );
      this.log.error('Checkpoint failed, stopping run', {
        batchNumber,
        location: this.checkpointWriter.location,
        error: persistenceError.message,
      });
      throw persistenceError;
    }
  }

  private emit(update: ProgressUpdate): void {
    if (!this.onProgress) {
      return;
    }
    try {
      this.onProgress(update);
    } catch (error) {
      this.log.warn('Progress callback failed', { error: toError(error).message });
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function hasValidCoordinates(record: LocationRecord): boolean {
  return (
    Number.isFinite(record.latitude) &&
    Number.isFinite(record.longitude) &&
    Math.abs(record.latitude) <= 90 &&
    Math.abs(record.longitude) <= 180
  );
}

/**
 * Count statuses across a dataset
 */
export function countStatuses(rows: readonly DatasetRow[]): StatusCounts {
  const counts: StatusCounts = {
    unchecked: 0,
    accurate: 0,
    inaccurate: 0,
    inaccurate_country: 0,
    state_only_match: 0,
    state_match_city_mismatch: 0,
    unknown: 0,
    timeout: 0,
    error: 0,
  };
  for (const row of rows) {
    counts[row.status]++;
  }
  return counts;
}
