#!/usr/bin/env node
import { parseArgs } from 'util';
import { loadConfig } from './config';
import { createRosterReportService } from './services/rosterReportService';
import { logger } from './utils/logger';

export const USAGE = 'Usage: on-duty-roster <roster.xlsx...> [--out-dir <dir>] [--separator <text>]';

export interface CliOptions {
  inputs: string[];
  outDir?: string;
  separator?: string;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'out-dir': { type: 'string', short: 'o' },
      separator: { type: 'string', short: 's' },
      help: { type: 'boolean', short: 'h' }
    }
  });

  return {
    inputs: positionals,
    outDir: values['out-dir'],
    separator: values.separator,
    help: values.help ?? false
  };
}

/**
 * Exit codes: 0 all reports written, 1 at least one input failed, 2 usage error.
 */
export async function runCli(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    logger.error(USAGE);
    return 2;
  }

  if (options.help) {
    logger.info(USAGE);
    return 0;
  }
  if (options.inputs.length === 0) {
    logger.error('No input file selected');
    logger.error(USAGE);
    return 2;
  }

  const service = createRosterReportService(loadConfig());
  const result = await service.processFiles(options.inputs, {
    outDir: options.outDir,
    groupSeparator: options.separator
  });

  logger.info(`Processed ${result.results.length} roster file(s): ${result.successCount} succeeded, ${result.failureCount} failed`, {
    durationMs: result.totalProcessingTime
  });
  return result.success ? 0 : 1;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Roster report run failed:', error);
      process.exitCode = 1;
    });
}
