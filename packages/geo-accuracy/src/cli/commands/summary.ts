/**
 * Summary Command
 *
 * Per-status counts of a tagged dataset (checkpoint) file.
 *
 * Usage:
 *   geo-accuracy summary <file> [--json]
 *
 * @module cli/commands/summary
 */

import { resolve } from 'node:path';
import { readDatasetFile } from '../../persistence/dataset-csv.js';
import { countStatuses } from '../../services/batch-scheduler.js';
import type { StatusCounts } from '../../services/batch-scheduler.types.js';
import { formatJson, formatStatusTable, printOutput } from '../lib/output.js';

export interface SummaryOptions {
  readonly json?: boolean;
}

export interface DatasetSummary {
  readonly file: string;
  readonly totalRows: number;
  /** Rows no run has tagged yet */
  readonly pendingRows: number;
  readonly counts: StatusCounts;
}

/**
 * Execute summary command
 */
export async function summaryCommand(
  file: string,
  options: SummaryOptions = {}
): Promise<DatasetSummary> {
  const filePath = resolve(file);
  const rows = await readDatasetFile(filePath);
  const counts = countStatuses(rows);

  const summary: DatasetSummary = {
    file: filePath,
    totalRows: rows.length,
    pendingRows: counts.unchecked,
    counts,
  };

  if (options.json) {
    printOutput(formatJson(summary));
  } else {
    printOutput(`${filePath}: ${summary.totalRows} rows, ${summary.pendingRows} unchecked\n`);
    printOutput(formatStatusTable(counts));
  }

  return summary;
}
