/**
 * Dataset CSV codec
 *
 * Input rows are positional: id, city, city_alt, country, latitude,
 * longitude, state. Checkpoints add a header row and a trailing
 * `geo_accuracy` column holding the verification status; both shapes are
 * accepted on read so a run can start from the raw export or resume from its
 * own checkpoint.
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { DatasetRow, LocationRecord, VerificationStatus } from '../core/types.js';
import { isVerificationStatus } from '../core/types.js';
import { DatasetFormatError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'dataset-csv' });

export const DATASET_COLUMNS = [
  'id',
  'city',
  'city_alt',
  'country',
  'latitude',
  'longitude',
  'state',
] as const;

export const STATUS_COLUMN = 'geo_accuracy';

/** id..longitude must be present; state and status may be missing */
const MIN_COLUMNS = 6;

const CsvRowsSchema = z.array(z.array(z.string()));

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse CSV text into dataset rows
 *
 * @param content - CSV text, with or without header row
 * @param source - File name used in error messages
 * @throws DatasetFormatError on malformed CSV or rows with too few columns
 */
export function parseDataset(content: string, source = '<memory>'): DatasetRow[] {
  let raw: unknown;
  try {
    raw = parse(content, {
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new DatasetFormatError(
      `Malformed CSV: ${error instanceof Error ? error.message : String(error)}`,
      source
    );
  }

  const table = CsvRowsSchema.parse(raw);
  const body = table.length > 0 && isHeaderRow(table[0]) ? table.slice(1) : table;
  const lineOffset = table.length - body.length + 1;

  let unrecognizedStatuses = 0;
  const rows = body.map((columns, index): DatasetRow => {
    if (columns.length < MIN_COLUMNS) {
      throw new DatasetFormatError(
        `Expected at least ${MIN_COLUMNS} columns, found ${columns.length}`,
        source,
        index + lineOffset
      );
    }

    const statusText = columns[7];
    let status: VerificationStatus = 'unchecked';
    if (statusText !== undefined && statusText !== '') {
      if (isVerificationStatus(statusText)) {
        status = statusText;
      } else {
        unrecognizedStatuses++;
      }
    }

    return { record: toRecord(columns), status };
  });

  if (unrecognizedStatuses > 0) {
    log.warn('Unrecognized status values reset to unchecked', {
      source,
      count: unrecognizedStatuses,
    });
  }

  return rows;
}

/**
 * Read and parse a dataset file
 */
export async function readDatasetFile(filePath: string): Promise<DatasetRow[]> {
  const content = await readFile(filePath, 'utf-8');
  return parseDataset(content, filePath);
}

function isHeaderRow(columns: readonly string[]): boolean {
  return columns[0]?.toLowerCase() === 'id' && columns[4]?.toLowerCase() === 'latitude';
}

function toRecord(columns: readonly string[]): LocationRecord {
  const [id, city, cityAlt, country, latitude, longitude, state] = columns;
  return {
    id,
    claimedCity: city,
    claimedCityAlt: cityAlt || undefined,
    claimedCountry: country,
    latitude: parseCoordinate(latitude),
    longitude: parseCoordinate(longitude),
    claimedStateOrProvince: state || undefined,
  };
}

/**
 * Blank cells become NaN (not 0) so the scheduler can flag them
 */
function parseCoordinate(text: string | undefined): number {
  if (text === undefined || text.trim() === '') {
    return Number.NaN;
  }
  return Number(text);
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Serialize the full dataset, header row and status column included
 */
export function serializeDataset(rows: readonly DatasetRow[]): string {
  const records = rows.map(({ record, status }) => [
    record.id,
    record.claimedCity,
    record.claimedCityAlt ?? '',
    record.claimedCountry,
    formatCoordinate(record.latitude),
    formatCoordinate(record.longitude),
    record.claimedStateOrProvince ?? '',
    status,
  ]);

  return stringify([[...DATASET_COLUMNS, STATUS_COLUMN], ...records]);
}

function formatCoordinate(value: number): string {
  return Number.isFinite(value) ? String(value) : '';
}
