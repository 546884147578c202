/**
 * Snapshot Assembler
 *
 * Joins the latest spread values, positioning rank, volatility and regime
 * record for a pair into one flat row per run date, plus the
 * 1D/1W/1M/3M/12M delta table. Market-wide series (the curve and the raw
 * yields) are repeated in every row.
 */

import type { CalendarPeriod, EngineConfig, PairConfig } from '../core/config.js';
import {
  INSUFFICIENT_HISTORY,
  NOT_AVAILABLE,
  type EngineIssue,
  type IsoDate,
  type PercentileRank,
  type RegimeRecord,
  type SeriesPoint,
  type SnapshotRow,
  type SnapshotValue,
  type SpreadSeries,
  type VolatilityPoint,
} from '../core/types/regime.types.js';
import {
  classifyCrowding,
  PositioningPercentileEngine,
  type PositioningAnalysis,
} from '../positioning/PositioningPercentileEngine.js';
import { RealizedVolatilityCalculator } from '../volatility/RealizedVolatilityCalculator.js';
import { asOf, lookbackPair, type AsOfOptions } from '../series/SeriesUtils.js';

export type ChangeKind = 'percent' | 'points';

export interface SnapshotInput {
  pair: Readonly<PairConfig>;
  runDate: IsoDate;
  prices: readonly SeriesPoint[] | undefined;
  /** Successfully computed spreads by id; failed spreads are absent */
  spreads: Readonly<Record<string, SpreadSeries>>;
  yields: Readonly<Record<string, readonly SeriesPoint[]>>;
  positioning: PositioningAnalysis | null;
  volatility: readonly VolatilityPoint[] | null;
  record: RegimeRecord;
  issues: readonly EngineIssue[];
}

/**
 * Change between two values; percent for prices, percentage points for yields and spreads
 */
export function change(current: number, past: number, kind: ChangeKind): number | null {
  if (kind === 'points') return current - past;
  if (past === 0) return null;
  return (current / past - 1) * 100;
}

function rankValue(rank: PercentileRank | undefined): SnapshotValue {
  if (!rank) return NOT_AVAILABLE;
  return rank.status === 'ranked' ? rank.rank : INSUFFICIENT_HISTORY;
}

function orNA(value: number | null | undefined): SnapshotValue {
  return value === null || value === undefined || !Number.isFinite(value) ? NOT_AVAILABLE : value;
}

export class SnapshotAssembler {
  private readonly volatility: RealizedVolatilityCalculator;
  private readonly positioning: PositioningPercentileEngine;
  private readonly fresh: AsOfOptions;

  constructor(private readonly config: Readonly<EngineConfig>) {
    this.volatility = new RealizedVolatilityCalculator(config);
    this.positioning = new PositioningPercentileEngine(config);
    this.fresh = { maxLagDays: config.classifier.maxStaleDays };
  }

  /**
   * Latest value and delta columns for one series
   */
  deltas(
    prefix: string,
    series: readonly SeriesPoint[] | undefined,
    date: IsoDate,
    kind: ChangeKind
  ): SnapshotRow {
    const row: SnapshotRow = {};
    const latest = series ? asOf(series, date, this.fresh) : undefined;
    row[prefix] = orNA(latest?.value);

    for (const period of this.config.deltaPeriods) {
      row[`${prefix}_chg_${period.label}`] = this.delta(series, date, period, kind);
    }
    return row;
  }

  assemble(input: SnapshotInput): SnapshotRow {
    const { pair, runDate, record } = input;
    const { classifier, positioning: positioningConfig } = this.config;

    const row: SnapshotRow = {
      pair_id: pair.pairId,
      date: runDate,
      ...this.deltas('price', input.prices, runDate, 'percent'),
    };

    for (const spreadId of pair.spreadIds) {
      Object.assign(row, this.deltas(spreadId, input.spreads[spreadId]?.observations, runDate, 'points'));
    }
    for (const spreadId of this.config.snapshot.spreadIds) {
      if (pair.spreadIds.includes(spreadId)) continue;
      Object.assign(row, this.deltas(spreadId, input.spreads[spreadId]?.observations, runDate, 'points'));
    }
    for (const instrumentId of this.config.snapshot.instrumentIds) {
      Object.assign(row, this.deltas(instrumentId, input.yields[instrumentId], runDate, 'points'));
    }

    // Positioning
    const engine = this.positioning;
    const primaryPoint = input.positioning?.primary
      ? engine.rankAsOf(input.positioning.primary.points, runDate)
      : undefined;
    const net = primaryPoint?.observation.netContracts;
    const oi = primaryPoint?.observation.openInterest;

    row.positioning_date = primaryPoint?.date ?? NOT_AVAILABLE;
    row.net_contracts = orNA(net);
    row.net_pct_oi = net !== undefined && oi !== undefined && oi > 0 ? (net / oi) * 100 : NOT_AVAILABLE;
    row.percentile_rank = rankValue(primaryPoint?.rank);
    row.crowding = classifyCrowding(primaryPoint?.rank, net, classifier);

    for (const category of input.positioning?.categories ?? []) {
      if (category.category === positioningConfig.primaryCategory) continue;
      row[`${category.category}_percentile`] = rankValue(engine.rankAsOf(category.points, runDate)?.rank);
    }

    const divergenceCategory = positioningConfig.divergenceCategory;
    if (divergenceCategory !== null) {
      const other = input.positioning?.categories.find(c => c.category === divergenceCategory);
      const otherPoint = other ? engine.rankAsOf(other.points, runDate) : undefined;
      row.divergence = primaryPoint && otherPoint
        ? (PositioningPercentileEngine.isDivergent(primaryPoint, otherPoint) ? 'YES' : 'NO')
        : NOT_AVAILABLE;
    }

    // Realized volatility
    const vol = input.volatility ? asOf(input.volatility, runDate, this.fresh) : undefined;
    row.realized_vol = orNA(vol?.volatility);
    row.vol_percentile = rankValue(vol?.rank);
    row.vol_flag = vol ? this.volatility.flag(vol.rank) ?? INSUFFICIENT_HISTORY : NOT_AVAILABLE;

    // Regime
    row.trend_spread = record.spreadId;
    row.trend_spread_chg = orNA(record.spreadChange);
    row.price_chg_lookback = orNA(record.priceChangePct);
    row.spread_trend = record.spreadTrend;
    row.regime_label = record.regime;
    row.matched_rule = record.matchedRule;
    row.flags = input.issues.length > 0
      ? input.issues.map(i => (i.spreadId ? `${i.code}:${i.spreadId}` : i.code)).join(';')
      : '';

    return row;
  }

  private delta(
    series: readonly SeriesPoint[] | undefined,
    date: IsoDate,
    period: CalendarPeriod,
    kind: ChangeKind
  ): SnapshotValue {
    if (!series) return NOT_AVAILABLE;
    const { current, past } = lookbackPair(series, date, period, this.fresh);
    if (!current || !past) return NOT_AVAILABLE;
    return orNA(change(current.value, past.value, kind));
  }
}
