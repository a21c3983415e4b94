/**
 * CLI logger factory
 *
 * Same structured logger the library uses, with level and format chosen by
 * the global `--verbose` / `--json` flags instead of LOG_LEVEL / NODE_ENV.
 *
 * @module cli/lib/logger
 */

import { Logger } from '../../core/utils/logger.js';

export interface CLILoggerOptions {
  readonly verbose: boolean;
  readonly json: boolean;
}

export function createCLILogger(options: CLILoggerOptions): Logger {
  return new Logger({
    level: options.verbose ? 'debug' : 'info',
    service: 'geo-accuracy',
    pretty: !options.json,
  });
}
