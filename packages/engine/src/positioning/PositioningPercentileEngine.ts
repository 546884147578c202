/**
 * Positioning Percentile Engine
 *
 * Ranks net speculative positioning against a trailing window of its own
 * history. The whole rank series is recomputed on every run.
 *
 * Rank convention (average rank, as a percentage of the window):
 *   rank = (strictlyBelow + 1 + 0.5 * otherTies) / n * 100
 * The current observation is a full member of the window; every other
 * observation equal to it counts half.
 */

import type { Logger } from 'pino';
import type { EngineConfig, PositioningConfig } from '../core/config.js';
import { InsufficientHistoryWarning } from '../core/errors.js';
import type {
  CrowdingLabel,
  IsoDate,
  PercentileRank,
  PositioningMetric,
  PositioningObservation,
  PositioningRankPoint,
  SeriesPoint,
} from '../core/types/regime.types.js';
import { asOf, assertAscending } from '../series/SeriesUtils.js';
import { createLogger } from '../utils/logger.js';

export interface RankWindow {
  windowSize: number;
  minObservations: number;
}

/**
 * Average-rank percentile of the last value in `window`
 */
export function percentileOfLast(window: readonly number[]): number {
  const current = window[window.length - 1];
  let below = 0;
  let ties = 0;

  for (let i = 0; i < window.length - 1; i++) {
    if (window[i] < current) below++;
    else if (window[i] === current) ties++;
  }

  return ((below + 1 + 0.5 * ties) / window.length) * 100;
}

/**
 * Trailing-window rank for every point of a series
 */
export function rollingPercentile(series: readonly SeriesPoint[], window: RankWindow): PercentileRank[] {
  const values = series.map(p => p.value);

  return series.map((point, i) => {
    const start = Math.max(0, i - window.windowSize + 1);
    const slice = values.slice(start, i + 1);

    if (slice.length < window.minObservations) {
      return {
        status: 'insufficient' as const,
        date: point.date,
        windowSize: window.windowSize,
        observationCount: slice.length,
      };
    }

    return {
      status: 'ranked' as const,
      date: point.date,
      rank: percentileOfLast(slice),
      windowSize: window.windowSize,
      observationCount: slice.length,
    };
  });
}

export function positioningValue(observation: PositioningObservation, metric: PositioningMetric): number {
  if (metric === 'netPctOpenInterest') {
    return observation.openInterest > 0
      ? (observation.netContracts / observation.openInterest) * 100
      : Number.NaN;
  }
  return observation.netContracts;
}

export interface CategoryRanks {
  category: string;
  points: PositioningRankPoint[];
}

export interface PositioningAnalysis {
  pairId: string;
  primary: CategoryRanks | null;
  categories: CategoryRanks[];
  warnings: InsufficientHistoryWarning[];
}

export class PositioningPercentileEngine {
  private logger: Logger;
  private settings: Readonly<PositioningConfig>;

  constructor(config: Readonly<EngineConfig>) {
    this.logger = createLogger('PositioningPercentileEngine');
    this.settings = config.positioning;
  }

  /**
   * Rank one trader category's reports for a pair
   */
  rankSeries(
    pairId: string,
    category: string,
    observations: readonly PositioningObservation[]
  ): PositioningRankPoint[] {
    assertAscending(observations, `${pairId}:${category}`);

    const usable = observations.filter(o => Number.isFinite(positioningValue(o, this.settings.metric)));
    const series = usable.map(o => ({ date: o.date, value: positioningValue(o, this.settings.metric) }));
    const ranks = rollingPercentile(series, this.settings);

    return usable.map((observation, i) => ({
      pairId,
      category,
      date: observation.date,
      observation,
      value: series[i].value,
      rank: ranks[i],
    }));
  }

  /**
   * Rank every supplied category for a pair
   */
  analyze(
    pairId: string,
    byCategory: Readonly<Record<string, readonly PositioningObservation[]>>
  ): PositioningAnalysis {
    const categories = Object.keys(byCategory)
      .sort()
      .map(category => ({ category, points: this.rankSeries(pairId, category, byCategory[category]) }));

    const warnings: InsufficientHistoryWarning[] = [];
    for (const { category, points } of categories) {
      const latest = points[points.length - 1];
      if (latest && latest.rank.status === 'insufficient') {
        warnings.push(new InsufficientHistoryWarning(
          pairId,
          `positioning:${category}`,
          latest.rank.observationCount,
          this.settings.minObservations
        ));
      }
    }

    const primary = categories.find(c => c.category === this.settings.primaryCategory) ?? null;
    if (!primary) {
      this.logger.warn(
        { pairId, primaryCategory: this.settings.primaryCategory },
        'No primary positioning category supplied'
      );
    }

    return { pairId, primary, categories, warnings };
  }

  /**
   * Latest ranked report on or before `date`, within the staleness bound
   */
  rankAsOf(points: readonly PositioningRankPoint[], date: IsoDate): PositioningRankPoint | undefined {
    return asOf(points, date, { maxLagDays: this.settings.maxLagDays });
  }

  /**
   * True when two categories hold net positions of opposite sign
   */
  static isDivergent(a: PositioningRankPoint | undefined, b: PositioningRankPoint | undefined): boolean {
    if (!a || !b) return false;
    const netA = a.observation.netContracts;
    const netB = b.observation.netContracts;
    return (netA > 0 && netB < 0) || (netA < 0 && netB > 0);
  }
}

/**
 * Label a rank against the crowding thresholds
 */
export function classifyCrowding(
  rank: PercentileRank | undefined,
  netContracts: number | undefined,
  thresholds: { highCrowding: number; lowCrowding: number }
): CrowdingLabel {
  if (!rank || rank.status === 'insufficient' || netContracts === undefined) return 'NO_DATA';
  if (rank.rank >= thresholds.highCrowding) return 'CROWDED_LONG';
  if (rank.rank <= thresholds.lowCrowding) return 'CROWDED_SHORT';
  return netContracts > 0 ? 'NEUTRAL_LONG' : 'NEUTRAL_SHORT';
}
