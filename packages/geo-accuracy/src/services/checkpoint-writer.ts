/**
 * Checkpoint Writer
 *
 * Persists the whole dataset after every batch. The file is overwritten in
 * full (not appended), via temp-file-then-rename, so readers see either the
 * previous checkpoint or the new one.
 */

import type { DatasetRow } from '../core/types.js';
import { PersistenceError, toError } from '../core/errors.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { serializeDataset } from '../persistence/dataset-csv.js';

/**
 * Contract consumed by the batch scheduler
 *
 * `persist` must reject (never resolve) when the snapshot was not stored.
 */
export interface CheckpointWriter {
  /** Where checkpoints go, for logs and errors */
  readonly location: string;

  persist(snapshot: readonly DatasetRow[]): Promise<void>;
}

export class CsvCheckpointWriter implements CheckpointWriter {
  private writes = 0;

  constructor(readonly location: string) {}

  /**
   * @throws PersistenceError wrapping the underlying I/O failure
   */
  async persist(snapshot: readonly DatasetRow[]): Promise<void> {
    try {
      await atomicWriteFile(this.location, serializeDataset(snapshot));
      this.writes++;
    } catch (error) {
      const cause = toError(error);
      throw new PersistenceError(
        `Failed to write checkpoint ${this.location}: ${cause.message}`,
        this.location,
        cause
      );
    }
  }

  get checkpointsWritten(): number {
    return this.writes;
  }
}
