/**
 * Core type definitions for the regime engine
 */

// ============================================
// Dates & Series
// ============================================

/** Calendar date in `YYYY-MM-DD` form; compares correctly as a string */
export type IsoDate = string;

export interface SeriesPoint {
  date: IsoDate;
  value: number;
}

export interface YieldObservation {
  /** Country + tenor, e.g. `US_2Y` */
  instrumentId: string;
  date: IsoDate;
  value: number;
}

export interface PriceObservation {
  pairId: string;
  date: IsoDate;
  price: number;
}

export interface PositioningObservation {
  pairId: string;
  /** Week-ending report date */
  date: IsoDate;
  netContracts: number;
  openInterest: number;
  longContracts?: number;
  shortContracts?: number;
}

export interface SpreadSeries {
  spreadId: string;
  minuend: string;
  subtrahend: string;
  observations: SeriesPoint[];
}

// ============================================
// Positioning
// ============================================

export type PositioningMetric = 'netContracts' | 'netPctOpenInterest';

export type PercentileRank =
  | { status: 'ranked'; date: IsoDate; rank: number; windowSize: number; observationCount: number }
  | { status: 'insufficient'; date: IsoDate; windowSize: number; observationCount: number };

export interface PositioningRankPoint {
  pairId: string;
  category: string;
  date: IsoDate;
  observation: PositioningObservation;
  /** Value that was ranked (net contracts or net % of open interest) */
  value: number;
  rank: PercentileRank;
}

export type CrowdingLabel =
  | 'CROWDED_LONG'
  | 'CROWDED_SHORT'
  | 'NEUTRAL_LONG'
  | 'NEUTRAL_SHORT'
  | 'NO_DATA';

// ============================================
// Regime
// ============================================

export enum RegimeLabel {
  RATE_DIFFERENTIAL_DOMINANT = 'RateDifferentialDominant',
  POSITIONING_DOMINANT = 'PositioningDominant',
  RISK_SENTIMENT_DOMINANT = 'RiskSentimentDominant',
  INDETERMINATE = 'Indeterminate',
}

export type SpreadTrend = 'widening' | 'narrowing' | 'flat' | 'unavailable';

/** +1 or -1: direction the pair price moves for a positive driver */
export type PriceSign = 1 | -1;

export interface RegimeRecord {
  pairId: string;
  date: IsoDate;
  spreadId: string;
  spreadTrend: SpreadTrend;
  /** Spread change over the lookback in percentage points */
  spreadChange: number | null;
  /** Price change over the lookback in percent */
  priceChangePct: number | null;
  /** Primary positioning rank as of the date; null when no report is available */
  percentileRank: PercentileRank | null;
  regime: RegimeLabel;
  /** Name of the classification rule that matched */
  matchedRule: string;
  computedAt: string;
}

// ============================================
// Volatility
// ============================================

export type VolatilityFlag = 'NORMAL' | 'ELEVATED' | 'EXTREME';

export interface VolatilityPoint {
  date: IsoDate;
  /** Annualized realized volatility in percent */
  volatility: number;
  rank: PercentileRank;
}

// ============================================
// Batch input / output
// ============================================

export interface MarketDataInput {
  yields: Record<string, SeriesPoint[]>;
  prices: Record<string, SeriesPoint[]>;
  /** pairId -> trader category -> weekly positioning reports */
  positioning: Record<string, Record<string, PositioningObservation[]>>;
  /** Optional externally supplied volatility/dispersion signal per pair */
  volatilitySignals?: Record<string, SeriesPoint[]>;
}

/** Marker emitted where a value cannot be computed */
export const NOT_AVAILABLE = 'N/A';
export const INSUFFICIENT_HISTORY = 'insufficient history';

export type SnapshotValue = string | number;

/** Flat row: one pair on one run date */
export type SnapshotRow = Record<string, SnapshotValue>;

export type IssueSeverity = 'error' | 'warning';

export interface EngineIssue {
  severity: IssueSeverity;
  code: string;
  message: string;
  pairId?: string;
  spreadId?: string;
}

export interface EngineRunResult {
  runDate: IsoDate;
  computedAt: string;
  spreads: Record<string, SpreadSeries>;
  records: RegimeRecord[];
  snapshots: SnapshotRow[];
  issues: EngineIssue[];
}

// ============================================
// Data source ports
// ============================================

export interface YieldSource {
  getYields(instrumentIds: string[]): Promise<Record<string, SeriesPoint[]>>;
}

export interface PriceSource {
  getPrices(pairIds: string[]): Promise<Record<string, SeriesPoint[]>>;
}

export interface PositioningSource {
  getPositioning(
    pairIds: string[]
  ): Promise<Record<string, Record<string, PositioningObservation[]>>>;
}
