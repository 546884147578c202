/**
 * JSON File Data Source
 *
 * Serves yields, prices and positioning from one market data file. Rows
 * may appear in any order; each returned series is sorted by date.
 */

import type { Logger } from 'pino';
import type {
  EngineConfig,
  MarketDataInput,
  PositioningObservation,
  PositioningSource,
  PriceSource,
  SeriesPoint,
  YieldSource,
} from '@fx-regime/engine';
import { loadMarketDataFile } from '../config/loadConfig.js';
import type { MarketDataFile } from '../config/schema.js';

function byDate<T extends { date: string }>(a: T, b: T): number {
  return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
}

function groupSeries<R extends { date: string }>(
  rows: readonly R[],
  key: (row: R) => string,
  value: (row: R) => number,
  ids: readonly string[]
): Record<string, SeriesPoint[]> {
  const wanted = new Set(ids);
  const result: Record<string, SeriesPoint[]> = {};

  for (const row of rows) {
    const id = key(row);
    if (!wanted.has(id)) continue;
    (result[id] ??= []).push({ date: row.date, value: value(row) });
  }

  for (const series of Object.values(result)) {
    series.sort(byDate);
  }
  return result;
}

export class JsonFileDataSource implements YieldSource, PriceSource, PositioningSource {
  private file: Promise<MarketDataFile> | null = null;

  constructor(private readonly path: string, private readonly logger?: Logger) {}

  async getYields(instrumentIds: string[]): Promise<Record<string, SeriesPoint[]>> {
    const { yields } = await this.load();
    return groupSeries(yields, r => r.instrumentId, r => r.value, instrumentIds);
  }

  async getPrices(pairIds: string[]): Promise<Record<string, SeriesPoint[]>> {
    const { prices } = await this.load();
    return groupSeries(prices, r => r.pairId, r => r.price, pairIds);
  }

  async getPositioning(pairIds: string[]): Promise<Record<string, Record<string, PositioningObservation[]>>> {
    const { positioning } = await this.load();
    const wanted = new Set(pairIds);
    const result: Record<string, Record<string, PositioningObservation[]>> = {};

    for (const { category, ...observation } of positioning) {
      if (!wanted.has(observation.pairId)) continue;
      const byCategory = (result[observation.pairId] ??= {});
      (byCategory[category] ??= []).push(observation);
    }

    for (const byCategory of Object.values(result)) {
      for (const reports of Object.values(byCategory)) {
        reports.sort(byDate);
      }
    }
    return result;
  }

  async getVolatilitySignals(pairIds: string[]): Promise<Record<string, SeriesPoint[]>> {
    const { volatilitySignals } = await this.load();
    return groupSeries(volatilitySignals ?? [], r => r.pairId, r => r.value, pairIds);
  }

  private load(): Promise<MarketDataFile> {
    if (!this.file) {
      this.logger?.debug({ path: this.path }, 'Loading market data file');
      this.file = loadMarketDataFile(this.path);
    }
    return this.file;
  }
}

/**
 * Fetch everything the configured spreads and pairs need
 */
export async function fetchMarketData(
  config: Readonly<EngineConfig>,
  yieldSource: YieldSource,
  priceSource: PriceSource,
  positioningSource: PositioningSource,
  volatilitySource?: { getVolatilitySignals(pairIds: string[]): Promise<Record<string, SeriesPoint[]>> }
): Promise<MarketDataInput> {
  const instrumentIds = [
    ...new Set([...config.spreads.flatMap(s => [s.minuend, s.subtrahend]), ...config.snapshot.instrumentIds]),
  ];
  const pairIds = config.pairs.map(p => p.pairId);

  const [yields, prices, positioning, volatilitySignals] = await Promise.all([
    yieldSource.getYields(instrumentIds),
    priceSource.getPrices(pairIds),
    positioningSource.getPositioning(pairIds),
    volatilitySource?.getVolatilitySignals(pairIds),
  ]);

  return { yields, prices, positioning, volatilitySignals };
}
