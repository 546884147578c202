/**
 * history command - regime record for every price date of one pair
 */

import type { Logger } from 'pino';
import { RegimeEngine, type RegimeRecord } from '@fx-regime/engine';
import { CliInputError, loadEngineConfig } from '../config/loadConfig.js';
import { fetchMarketData, JsonFileDataSource } from '../sources/JsonFileDataSource.js';
import { historyTable, paint } from '../utils/display.js';

export interface HistoryCommandOptions {
  input: string;
  pair: string;
  config?: string;
  from?: string;
  to?: string;
  json?: boolean;
  computedAt?: string;
}

export async function historyCommand(options: HistoryCommandOptions, logger: Logger): Promise<RegimeRecord[]> {
  const config = await loadEngineConfig(options.config);
  if (!config.pairs.some(p => p.pairId === options.pair)) {
    throw new CliInputError(`Pair ${options.pair} is not configured`);
  }

  const source = new JsonFileDataSource(options.input, logger);
  const input = await fetchMarketData(config, source, source, source, source);
  const dates = (input.prices[options.pair] ?? [])
    .map(p => p.date)
    .filter(date => (!options.from || date >= options.from) && (!options.to || date <= options.to));

  const records = new RegimeEngine(config).classifyHistory(input, options.pair, dates, {
    computedAt: options.computedAt,
  });
  logger.debug({ pairId: options.pair, dates: dates.length }, 'History classified');

  if (options.json) {
    console.log(JSON.stringify(records, null, 2));
  } else {
    console.log();
    console.log(paint('bold', `${options.pair} regime history`));
    console.log(historyTable(records));
    console.log();
  }

  return records;
}
