/**
 * FX Regime Engine
 *
 * Turns yield, price and futures-positioning series into rate-differential
 * spreads, positioning percentile ranks and a regime label per currency pair.
 *
 * @example
 * ```typescript
 * import { RegimeEngine, createEngineConfig, formatSnapshotCsv } from '@fx-regime/engine';
 *
 * const engine = new RegimeEngine(createEngineConfig({ classifier: { highCrowding: 80 } }));
 * const result = engine.run(marketData, '2025-06-30');
 *
 * for (const record of result.records) {
 *   console.log(record.pairId, record.regime);
 * }
 * const csv = formatSnapshotCsv(result.snapshots);
 * ```
 */

// Types
export * from './core/types/regime.types.js';

// Configuration & errors
export * from './core/config.js';
export {
  RegimeEngineError,
  DataAlignmentError,
  UnsortedSeriesError,
  MissingInstrumentError,
  InvalidConfigError,
  InsufficientHistoryWarning,
  toIssue,
  type EngineErrorCode,
} from './core/errors.js';

// Series utilities
export {
  isIsoDate,
  assertAscending,
  asOf,
  asOfIndex,
  alignAsOf,
  shiftDate,
  daysBetween,
  lookbackPair,
  type Dated,
  type AsOfOptions,
} from './series/SeriesUtils.js';

// Components
export { SpreadCalculator, type SpreadResult } from './spreads/SpreadCalculator.js';
export {
  PositioningPercentileEngine,
  percentileOfLast,
  rollingPercentile,
  positioningValue,
  classifyCrowding,
  type RankWindow,
  type CategoryRanks,
  type PositioningAnalysis,
} from './positioning/PositioningPercentileEngine.js';
export { RealizedVolatilityCalculator } from './volatility/RealizedVolatilityCalculator.js';
export { RegimeClassifier, type ClassifierInput, type ClassifierSeries } from './regime/RegimeClassifier.js';
export { REGIME_RULES, FALLBACK_RULE, type RegimeRule, type RuleContext, type Direction } from './regime/rules.js';
export { SnapshotAssembler, change, type SnapshotInput, type ChangeKind } from './snapshot/SnapshotAssembler.js';
export { formatSnapshotCsv, snapshotColumns } from './snapshot/csv.js';

// Batch runner
export { RegimeEngine, type RegimeEngineEvents, type RunOptions } from './engine/RegimeEngine.js';
