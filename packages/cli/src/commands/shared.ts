import type { SeriesPoint } from '@fx-regime/engine';
import { CliInputError } from '../config/loadConfig.js';

/**
 * Most recent date across all series
 */
export function latestDate(seriesById: Readonly<Record<string, readonly SeriesPoint[]>>): string {
  let latest: string | undefined;
  for (const series of Object.values(seriesById)) {
    const last = series[series.length - 1];
    if (last && (latest === undefined || last.date > latest)) latest = last.date;
  }
  if (latest === undefined) {
    throw new CliInputError('No price data to infer a run date from; pass --date');
  }
  return latest;
}
