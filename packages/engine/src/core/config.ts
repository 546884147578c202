/**
 * Engine Configuration
 *
 * Thresholds, windows and spread definitions live in one immutable object
 * that every component receives at construction.
 */

import { InvalidConfigError } from './errors.js';
import type { PositioningMetric, PriceSign } from './types/regime.types.js';

export type PeriodUnit = 'days' | 'months';

export interface CalendarPeriod {
  label: string;
  unit: PeriodUnit;
  amount: number;
}

/** spread = minuend - subtrahend */
export interface SpreadDefinition {
  spreadId: string;
  minuend: string;
  subtrahend: string;
}

export interface PairConfig {
  pairId: string;
  /** Spread whose trend drives classification */
  trendSpreadId: string;
  /** Spreads reported in the pair's snapshot row */
  spreadIds: string[];
  /** Price direction implied by a widening spread */
  spreadPriceSign: PriceSign;
  /** Price direction implied by crowded-long positioning in the pair's futures */
  positioningPriceSign: PriceSign;
}

export interface PositioningConfig {
  /** Trailing window length in observations - default: 156 (3 years weekly) */
  windowSize: number;
  /** Minimum observations in window for a numeric rank - default: 52 */
  minObservations: number;
  /** Value that gets ranked - default: netContracts */
  metric: PositioningMetric;
  /** Trader category used for classification - default: leveragedMoney */
  primaryCategory: string;
  /** Category compared against the primary one for the divergence flag */
  divergenceCategory: string | null;
  /** Oldest acceptable report when joining onto a daily date - default: 14 */
  maxLagDays: number;
}

export interface ClassifierConfig {
  /** Trend lookback for spread and price - default: 12 months */
  lookback: CalendarPeriod;
  /** Percentile at or above which positioning is crowded long - default: 85 */
  highCrowding: number;
  /** Percentile at or below which positioning is crowded short - default: 15 */
  lowCrowding: number;
  /** Absolute spread change (pp) treated as flat - default: 0.10 */
  spreadFlatThreshold: number;
  /** External volatility level above which risk sentiment dominates; null disables the rule */
  crisisThreshold: number | null;
  /** Oldest acceptable daily observation (prices, spreads, yields) in calendar days - default: 7 */
  maxStaleDays: number;
}

export interface VolatilityConfig {
  /** Rolling window of daily returns - default: 30 */
  window: number;
  /** Trading days per year for annualization - default: 252 */
  annualizationDays: number;
  /** Percentile window - default: 756 (3 years daily) */
  rankWindow: number;
  /** Minimum observations for a volatility percentile - default: 126 */
  rankMinObservations: number;
  /** Percentile flagged ELEVATED - default: 75 */
  elevated: number;
  /** Percentile flagged EXTREME - default: 90 */
  extreme: number;
}

/** Market-wide series repeated in every pair's snapshot row */
export interface SnapshotConfig {
  spreadIds: string[];
  instrumentIds: string[];
}

export interface EngineConfig {
  spreads: SpreadDefinition[];
  pairs: PairConfig[];
  positioning: PositioningConfig;
  classifier: ClassifierConfig;
  deltaPeriods: CalendarPeriod[];
  volatility: VolatilityConfig;
  snapshot: SnapshotConfig;
}

export interface EngineConfigOverrides {
  spreads?: SpreadDefinition[];
  pairs?: PairConfig[];
  positioning?: Partial<PositioningConfig>;
  classifier?: Partial<ClassifierConfig>;
  deltaPeriods?: CalendarPeriod[];
  volatility?: Partial<VolatilityConfig>;
  snapshot?: Partial<SnapshotConfig>;
}

export const DEFAULT_SPREADS: SpreadDefinition[] = [
  { spreadId: 'US_DE_10Y_spread', minuend: 'US_2Y', subtrahend: 'DE_10Y' },
  { spreadId: 'US_DE_2Y_spread', minuend: 'US_2Y', subtrahend: 'DE_2Y' },
  { spreadId: 'US_JP_10Y_spread', minuend: 'US_2Y', subtrahend: 'JP_10Y' },
  { spreadId: 'US_JP_2Y_spread', minuend: 'US_2Y', subtrahend: 'JP_2Y' },
  { spreadId: 'US_curve', minuend: 'US_10Y', subtrahend: 'US_2Y' },
];

export const DEFAULT_PAIRS: PairConfig[] = [
  {
    pairId: 'EURUSD',
    trendSpreadId: 'US_DE_10Y_spread',
    spreadIds: ['US_DE_10Y_spread', 'US_DE_2Y_spread'],
    spreadPriceSign: -1,
    positioningPriceSign: 1,
  },
  {
    pairId: 'USDJPY',
    trendSpreadId: 'US_JP_10Y_spread',
    spreadIds: ['US_JP_10Y_spread', 'US_JP_2Y_spread'],
    spreadPriceSign: 1,
    positioningPriceSign: -1,
  },
];

export const DEFAULT_DELTA_PERIODS: CalendarPeriod[] = [
  { label: '1D', unit: 'days', amount: 1 },
  { label: '1W', unit: 'days', amount: 7 },
  { label: '1M', unit: 'months', amount: 1 },
  { label: '3M', unit: 'months', amount: 3 },
  { label: '12M', unit: 'months', amount: 12 },
];

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  spreads: DEFAULT_SPREADS,
  pairs: DEFAULT_PAIRS,
  positioning: {
    windowSize: 156,
    minObservations: 52,
    metric: 'netContracts',
    primaryCategory: 'leveragedMoney',
    divergenceCategory: 'assetManager',
    maxLagDays: 14,
  },
  classifier: {
    lookback: { label: '12M', unit: 'months', amount: 12 },
    highCrowding: 85,
    lowCrowding: 15,
    spreadFlatThreshold: 0.1,
    crisisThreshold: null,
    maxStaleDays: 7,
  },
  deltaPeriods: DEFAULT_DELTA_PERIODS,
  volatility: {
    window: 30,
    annualizationDays: 252,
    rankWindow: 756,
    rankMinObservations: 126,
    elevated: 75,
    extreme: 90,
  },
  snapshot: {
    spreadIds: ['US_curve'],
    instrumentIds: ['US_2Y', 'US_10Y', 'DE_2Y', 'DE_10Y', 'JP_2Y', 'JP_10Y'],
  },
};

/**
 * Recursively freeze a configuration object
 */
function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function validate(config: EngineConfig): string[] {
  const problems: string[] = [];
  const { positioning, classifier, volatility } = config;

  if (!Number.isInteger(positioning.windowSize) || positioning.windowSize < 1) {
    problems.push('positioning.windowSize must be a positive integer');
  }
  if (!Number.isInteger(positioning.minObservations) || positioning.minObservations < 1) {
    problems.push('positioning.minObservations must be a positive integer');
  }
  if (positioning.minObservations > positioning.windowSize) {
    problems.push('positioning.minObservations cannot exceed positioning.windowSize');
  }
  if (classifier.lowCrowding < 0 || classifier.highCrowding > 100) {
    problems.push('crowding thresholds must lie within [0, 100]');
  }
  if (classifier.lowCrowding >= classifier.highCrowding) {
    problems.push('classifier.lowCrowding must be below classifier.highCrowding');
  }
  if (classifier.spreadFlatThreshold < 0) {
    problems.push('classifier.spreadFlatThreshold cannot be negative');
  }
  if (!Number.isInteger(classifier.maxStaleDays) || classifier.maxStaleDays < 0) {
    problems.push('classifier.maxStaleDays must be a non-negative integer');
  }
  if (volatility.window < 2) {
    problems.push('volatility.window must be at least 2');
  }
  if (volatility.rankMinObservations > volatility.rankWindow) {
    problems.push('volatility.rankMinObservations cannot exceed volatility.rankWindow');
  }

  const spreadIds = new Set<string>();
  for (const spread of config.spreads) {
    if (spreadIds.has(spread.spreadId)) {
      problems.push(`duplicate spread definition ${spread.spreadId}`);
    }
    spreadIds.add(spread.spreadId);
  }

  const pairIds = new Set<string>();
  for (const pair of config.pairs) {
    if (pairIds.has(pair.pairId)) {
      problems.push(`duplicate pair ${pair.pairId}`);
    }
    pairIds.add(pair.pairId);
    for (const spreadId of [pair.trendSpreadId, ...pair.spreadIds]) {
      if (!spreadIds.has(spreadId)) {
        problems.push(`pair ${pair.pairId} references unknown spread ${spreadId}`);
      }
    }
  }

  for (const spreadId of config.snapshot.spreadIds) {
    if (!spreadIds.has(spreadId)) {
      problems.push(`snapshot references unknown spread ${spreadId}`);
    }
  }

  const labels = new Set<string>();
  for (const period of [...config.deltaPeriods, classifier.lookback]) {
    if (!Number.isInteger(period.amount) || period.amount < 1) {
      problems.push(`period ${period.label} must have a positive integer amount`);
    }
  }
  for (const period of config.deltaPeriods) {
    if (labels.has(period.label)) {
      problems.push(`duplicate delta period ${period.label}`);
    }
    labels.add(period.label);
  }

  return problems;
}

/**
 * Build an immutable engine configuration from defaults plus overrides
 */
export function createEngineConfig(overrides: EngineConfigOverrides = {}): Readonly<EngineConfig> {
  const config: EngineConfig = {
    spreads: (overrides.spreads ?? DEFAULT_ENGINE_CONFIG.spreads).map(s => ({ ...s })),
    pairs: (overrides.pairs ?? DEFAULT_ENGINE_CONFIG.pairs).map(p => ({
      ...p,
      spreadIds: [...p.spreadIds],
    })),
    positioning: { ...DEFAULT_ENGINE_CONFIG.positioning, ...overrides.positioning },
    classifier: {
      ...DEFAULT_ENGINE_CONFIG.classifier,
      ...overrides.classifier,
      lookback: { ...(overrides.classifier?.lookback ?? DEFAULT_ENGINE_CONFIG.classifier.lookback) },
    },
    deltaPeriods: (overrides.deltaPeriods ?? DEFAULT_ENGINE_CONFIG.deltaPeriods).map(p => ({ ...p })),
    volatility: { ...DEFAULT_ENGINE_CONFIG.volatility, ...overrides.volatility },
    snapshot: {
      spreadIds: [...(overrides.snapshot?.spreadIds ?? DEFAULT_ENGINE_CONFIG.snapshot.spreadIds)],
      instrumentIds: [...(overrides.snapshot?.instrumentIds ?? DEFAULT_ENGINE_CONFIG.snapshot.instrumentIds)],
    },
  };

  const problems = validate(config);
  if (problems.length > 0) {
    throw new InvalidConfigError(problems);
  }

  return deepFreeze(config);
}
