/**
 * Realized Volatility Calculator
 *
 * Rolling annualized volatility of daily log returns and its trailing
 * percentile. Informational only: the classifier's risk-sentiment rule
 * takes an externally supplied signal instead.
 */

import type { EngineConfig, VolatilityConfig } from '../core/config.js';
import type { PercentileRank, SeriesPoint, VolatilityFlag, VolatilityPoint } from '../core/types/regime.types.js';
import { rollingPercentile } from '../positioning/PositioningPercentileEngine.js';
import { assertAscending } from '../series/SeriesUtils.js';

export class RealizedVolatilityCalculator {
  private settings: Readonly<VolatilityConfig>;

  constructor(config: Readonly<EngineConfig>) {
    this.settings = config.volatility;
  }

  /**
   * Volatility series; the first point appears once `window` returns exist
   */
  compute(prices: readonly SeriesPoint[], seriesId: string): VolatilityPoint[] {
    assertAscending(prices, seriesId);

    const returns: SeriesPoint[] = [];
    for (let i = 1; i < prices.length; i++) {
      const prev = prices[i - 1].value;
      const curr = prices[i].value;
      if (prev > 0 && curr > 0) {
        returns.push({ date: prices[i].date, value: Math.log(curr / prev) });
      }
    }

    const { window, annualizationDays } = this.settings;
    const volatility: SeriesPoint[] = [];
    for (let i = window - 1; i < returns.length; i++) {
      const slice = returns.slice(i - window + 1, i + 1).map(r => r.value);
      volatility.push({
        date: returns[i].date,
        value: this.sampleStdDev(slice) * Math.sqrt(annualizationDays) * 100,
      });
    }

    const ranks = rollingPercentile(volatility, {
      windowSize: this.settings.rankWindow,
      minObservations: this.settings.rankMinObservations,
    });

    return volatility.map((point, i) => ({
      date: point.date,
      volatility: point.value,
      rank: ranks[i],
    }));
  }

  flag(rank: PercentileRank): VolatilityFlag | null {
    if (rank.status === 'insufficient') return null;
    if (rank.rank >= this.settings.extreme) return 'EXTREME';
    if (rank.rank >= this.settings.elevated) return 'ELEVATED';
    return 'NORMAL';
  }

  /**
   * Sample standard deviation (N-1)
   */
  private sampleStdDev(values: number[]): number {
    const mean = values.reduce((a, b) => a + b, 0) / values.length;
    const variance = values.reduce((sum, v) => sum + Math.pow(v - mean, 2), 0) / (values.length - 1);
    return Math.sqrt(variance);
  }
}
