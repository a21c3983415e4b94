/**
 * Batch Scheduler Types
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { TerminalStatus, VerificationStatus } from '../core/types.js';

/**
 * Scheduler lifecycle
 *
 * idle -> filling -> dispatched -> draining -> checkpointed -> filling ... -> done
 * Any state -> failed when a checkpoint cannot be written.
 */
export type SchedulerState =
  | 'idle'
  | 'filling'
  | 'dispatched'
  | 'draining'
  | 'checkpointed'
  | 'done'
  | 'failed';

export interface SchedulerOptions {
  /** Rows per batch (one checkpoint per batch) */
  readonly batchSize: number;
  /** Worker pool size per batch */
  readonly maxConcurrent: number;
  /** Deadline for one row, lookup and reconciliation included */
  readonly perTaskTimeoutMs: number;
  /** Deadline for a whole batch to drain */
  readonly batchTimeoutMs: number;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  batchSize: 500,
  maxConcurrent: 2,
  perTaskTimeoutMs: 30_000,
  batchTimeoutMs: 600_000,
};

export type StatusCounts = Record<VerificationStatus, number>;

/**
 * Result of one batch
 */
export interface BatchReport {
  /** 1-based */
  readonly batchNumber: number;
  readonly size: number;
  readonly counts: Readonly<Partial<Record<TerminalStatus, number>>>;
  /** The batch deadline fired before every worker finished */
  readonly deadlineExceeded: boolean;
  /** Rows marked `timeout` because the batch deadline fired */
  readonly forcedTimeouts: number;
  readonly durationMs: number;
}

/**
 * Progress event (informational only; never affects control flow)
 */
export type ProgressUpdate =
  | {
      readonly type: 'batch_started';
      readonly batchNumber: number;
      readonly totalBatches: number;
      readonly size: number;
    }
  | {
      readonly type: 'row_completed';
      readonly batchNumber: number;
      readonly recordId: string;
      readonly status: TerminalStatus;
    }
  | {
      readonly type: 'batch_checkpointed';
      readonly totalBatches: number;
      readonly report: BatchReport;
    };

/**
 * Result of a whole run
 */
export interface RunSummary {
  readonly totalRows: number;
  /** Rows that were already past `unchecked` and left alone */
  readonly skippedRows: number;
  readonly processedRows: number;
  readonly batches: readonly BatchReport[];
  /** Status counts across the whole dataset after the run */
  readonly counts: StatusCounts;
  readonly durationMs: number;
}
