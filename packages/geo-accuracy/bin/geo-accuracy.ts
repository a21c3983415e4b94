#!/usr/bin/env tsx
/**
 * geo-accuracy CLI Entry Point
 *
 * Verifies dataset coordinates against a reverse geocoder and summarizes
 * tagged result files.
 *
 * @module geo-accuracy-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig, type CLIConfig, type CLIOverrides } from '../src/cli/lib/config.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { EXIT_CODES, exitCodeFor } from '../src/cli/lib/exit-codes.js';
import { printError } from '../src/cli/lib/output.js';
import { ConfigurationError } from '../src/core/errors.js';
import type { Logger } from '../src/core/utils/logger.js';
import { verifyCommand } from '../src/cli/commands/verify.js';
import { summaryCommand } from '../src/cli/commands/summary.js';

// ============================================================================
// Global State
// ============================================================================

interface GlobalContext {
  config: CLIConfig;
  logger: Logger;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    printError(`Cannot read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

async function initializeContext(
  globalOptions: { verbose?: boolean; json?: boolean; config?: string },
  overrides: CLIOverrides = {}
): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: globalOptions.config,
    overrides: {
      ...overrides,
      verbose: globalOptions.verbose,
      json: globalOptions.json,
    },
  });

  const logger = createCLILogger({ verbose: config.verbose, json: config.json });
  if (config.configPath) {
    logger.debug('Loaded config file', { path: config.configPath });
  }

  globalContext = { config, logger, startTime };
  return globalContext;
}

interface VerifyFlags {
  output?: string;
  resume: boolean;
  batchSize?: number;
  maxConcurrent?: number;
  requestDelay?: number;
  maxRetries?: number;
  taskTimeout?: number;
  batchTimeout?: number;
  userAgent?: string;
  endpoint?: string;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('geo-accuracy')
    .description('Verify that dataset coordinates resolve to the places the rows claim')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output (per-row verdict explanations)')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .geo-accuracyrc)');

  // ============================================================================
  // verify
  // ============================================================================

  program
    .command('verify <input>')
    .description('Reverse-geocode every unchecked row and tag it with a verdict')
    .option('--output <file>', 'Checkpoint / result file (default: tagged_geolocations.csv)')
    .option('--no-resume', 'Ignore an existing output file and start from <input>')
    .option('--batch-size <n>', 'Rows per batch (one checkpoint per batch)', parseInteger)
    .option('--max-concurrent <n>', 'Parallel lookups per batch (max 10)', parseInteger)
    .option('--request-delay <seconds>', 'Base wait before each geocoder call', parseNumber)
    .option('--max-retries <n>', 'Attempts per row, first call included', parseInteger)
    .option('--task-timeout <seconds>', 'Deadline for one row', parseNumber)
    .option('--batch-timeout <seconds>', 'Deadline for one batch', parseNumber)
    .option('--user-agent <ua>', 'User-Agent sent to the geocoder')
    .option('--endpoint <url>', 'Geocoder base URL')
    .action(async (input: string, options: VerifyFlags, command: Command) => {
      const { config, logger } = await initializeContext(command.optsWithGlobals(), {
        output: options.output,
        batchSize: options.batchSize,
        maxConcurrent: options.maxConcurrent,
        requestDelaySeconds: options.requestDelay,
        maxRetries: options.maxRetries,
        perTaskTimeoutSeconds: options.taskTimeout,
        batchTimeoutSeconds: options.batchTimeout,
        userAgent: options.userAgent,
        endpoint: options.endpoint,
      });
      await verifyCommand(input, { resume: options.resume }, { config, logger });
    });

  // ============================================================================
  // summary
  // ============================================================================

  program
    .command('summary <file>')
    .description('Per-status counts of a tagged dataset file')
    .action(async (file: string, _options: object, command: Command) => {
      const { config } = await initializeContext(command.optsWithGlobals());
      await summaryCommand(file, { json: config.json });
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError(`Configuration error: ${error.getSummary()}`);
    } else if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
