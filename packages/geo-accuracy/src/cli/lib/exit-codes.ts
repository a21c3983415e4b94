/**
 * CLI exit codes
 *
 * @module cli/lib/exit-codes
 */

import {
  ConfigurationError,
  DatasetFormatError,
  GeocodeServiceError,
  GeocodeTimeoutError,
  PersistenceError,
} from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that ended a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof DatasetFormatError || error instanceof PersistenceError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  if (error instanceof GeocodeTimeoutError || error instanceof GeocodeServiceError) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
