/**
 * run command - classify every configured pair for one date
 */

import { writeFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { formatSnapshotCsv, RegimeEngine, type EngineRunResult } from '@fx-regime/engine';
import { loadEngineConfig } from '../config/loadConfig.js';
import { fetchMarketData, JsonFileDataSource } from '../sources/JsonFileDataSource.js';
import { issueLine, paint, regimeTable } from '../utils/display.js';
import { latestDate } from './shared.js';

export interface RunCommandOptions {
  input: string;
  config?: string;
  /** Defaults to the latest price date in the input */
  date?: string;
  out?: string;
  json?: boolean;
  computedAt?: string;
}

export async function runCommand(options: RunCommandOptions, logger: Logger): Promise<EngineRunResult> {
  const config = await loadEngineConfig(options.config);
  const source = new JsonFileDataSource(options.input, logger);
  const input = await fetchMarketData(config, source, source, source, source);
  const runDate = options.date ?? latestDate(input.prices);

  const engine = new RegimeEngine(config);
  engine.on('pair:failed', (pairId, issue) => {
    logger.warn({ pairId, code: issue.code }, 'Pair failed');
  });

  const result = engine.run(input, runDate, { computedAt: options.computedAt });

  if (options.out) {
    await writeFile(options.out, formatSnapshotCsv(result.snapshots), 'utf8');
    logger.info({ path: options.out, rows: result.snapshots.length }, 'Snapshot written');
  }

  if (options.json) {
    console.log(JSON.stringify({ records: result.records, issues: result.issues }, null, 2));
    return result;
  }

  console.log();
  console.log(paint('bold', `Regimes as of ${result.runDate}`));
  console.log(regimeTable(result.records, result.snapshots));

  if (result.issues.length > 0) {
    console.log();
    console.log(paint('bold', 'Issues'));
    for (const issue of result.issues) {
      console.log(`  ${issueLine(issue)}`);
    }
  }
  console.log(paint('dim', `computed at ${result.computedAt}`));
  console.log();

  return result;
}
