/**
 * fx-regime CLI program
 *
 * Usage:
 *   fx-regime run --input market.json [--config engine.json] [--date 2025-06-30] [--out snapshot.csv] [--json]
 *   fx-regime history --input market.json --pair EURUSD [--from 2025-01-01] [--to 2025-06-30]
 */

import { Command } from 'commander';
import type { Logger } from 'pino';
import { isIsoDate } from '@fx-regime/engine';
import { CliInputError } from './config/loadConfig.js';
import { historyCommand } from './commands/history.js';
import { runCommand } from './commands/run.js';

function isoDateOption(value: string): string {
  if (!isIsoDate(value)) {
    throw new CliInputError(`Invalid date ${value}; expected YYYY-MM-DD`);
  }
  return value;
}

/**
 * Exit code 1 for bad input; anything else propagates
 */
async function guard(logger: Logger, action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (!(error instanceof CliInputError)) throw error;
    logger.error({ problems: error.problems }, error.message);
    process.exitCode = 1;
  }
}

export function createProgram(logger: Logger): Command {
  const program = new Command();

  program
    .name('fx-regime')
    .description('Classify FX pairs into rate, positioning or risk driven regimes')
    .version('0.1.0');

  program
    .command('run')
    .description('Run one batch and print the regime of every configured pair')
    .requiredOption('-i, --input <file>', 'Market data JSON file')
    .option('-c, --config <file>', 'Engine configuration overrides (JSON)')
    .option('-d, --date <date>', 'Run date (YYYY-MM-DD), default: latest price date')
    .option('-o, --out <file>', 'Write the snapshot table as CSV')
    .option('--json', 'Print records and issues as JSON', false)
    .action(async (options: { input: string; config?: string; date?: string; out?: string; json: boolean }) => {
      await guard(logger, async () => {
        const date = options.date === undefined ? undefined : isoDateOption(options.date);
        await runCommand({ ...options, date }, logger);
      });
    });

  program
    .command('history')
    .description('Print the regime of one pair on every price date')
    .requiredOption('-i, --input <file>', 'Market data JSON file')
    .requiredOption('-p, --pair <pairId>', 'Pair to replay')
    .option('-c, --config <file>', 'Engine configuration overrides (JSON)')
    .option('--from <date>', 'First date (YYYY-MM-DD)')
    .option('--to <date>', 'Last date (YYYY-MM-DD)')
    .option('--json', 'Print records as JSON', false)
    .action(async (options: { input: string; pair: string; config?: string; from?: string; to?: string; json: boolean }) => {
      await guard(logger, async () => {
        await historyCommand(
          {
            ...options,
            from: options.from === undefined ? undefined : isoDateOption(options.from),
            to: options.to === undefined ? undefined : isoDateOption(options.to),
          },
          logger
        );
      });
    });

  return program;
}

export { CliInputError } from './config/loadConfig.js';
export { runCommand, type RunCommandOptions } from './commands/run.js';
export { historyCommand, type HistoryCommandOptions } from './commands/history.js';
export { JsonFileDataSource, fetchMarketData } from './sources/JsonFileDataSource.js';
