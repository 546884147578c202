/**
 * Regime Classifier
 *
 * Stateless decision function: spread trend, price trend and positioning
 * rank for one pair on one date map to exactly one regime label.
 */

import type { ClassifierConfig, EngineConfig, PairConfig } from '../core/config.js';
import { InvalidConfigError } from '../core/errors.js';
import type {
  IsoDate,
  PercentileRank,
  RegimeRecord,
  SeriesPoint,
  SpreadTrend,
} from '../core/types/regime.types.js';
import { asOf, lookbackPair } from '../series/SeriesUtils.js';
import { FALLBACK_RULE, REGIME_RULES, type Direction, type RegimeRule, type RuleContext } from './rules.js';

export interface ClassifierInput {
  pairId: string;
  date: IsoDate;
  spreadId: string;
  /** Spread change over the lookback (pp); null when the lookback is not covered */
  spreadChange: number | null;
  /** Price change over the lookback (%); null when the lookback is not covered */
  priceChangePct: number | null;
  /** Positioning rank as of the date; null when no report is available */
  percentileRank: PercentileRank | null;
  /** External volatility/dispersion signal as of the date */
  volatilitySignal: number | null;
}

export interface ClassifierSeries {
  spread: readonly SeriesPoint[] | undefined;
  prices: readonly SeriesPoint[] | undefined;
  percentileRank: PercentileRank | null;
  volatilitySignals?: readonly SeriesPoint[];
}

function sign(value: number): Direction {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

export class RegimeClassifier {
  private settings: Readonly<ClassifierConfig>;
  private pairs: Map<string, Readonly<PairConfig>>;

  constructor(
    config: Readonly<EngineConfig>,
    private readonly rules: readonly RegimeRule[] = REGIME_RULES
  ) {
    this.settings = config.classifier;
    this.pairs = new Map(config.pairs.map(p => [p.pairId, p]));
  }

  /**
   * Gather the lookback changes for a pair on a date
   */
  buildInput(pairId: string, date: IsoDate, series: ClassifierSeries): ClassifierInput {
    const pair = this.getPair(pairId);
    const lookback = this.settings.lookback;
    const fresh = { maxLagDays: this.settings.maxStaleDays };

    let spreadChange: number | null = null;
    if (series.spread) {
      const { current, past } = lookbackPair(series.spread, date, lookback, fresh);
      if (current && past) spreadChange = current.value - past.value;
    }

    let priceChangePct: number | null = null;
    if (series.prices) {
      const { current, past } = lookbackPair(series.prices, date, lookback, fresh);
      if (current && past && past.value !== 0) {
        priceChangePct = (current.value / past.value - 1) * 100;
      }
    }

    const volatility = series.volatilitySignals ? asOf(series.volatilitySignals, date, fresh) : undefined;

    return {
      pairId,
      date,
      spreadId: pair.trendSpreadId,
      spreadChange,
      priceChangePct,
      percentileRank: series.percentileRank,
      volatilitySignal: volatility ? volatility.value : null,
    };
  }

  spreadTrend(spreadChange: number | null): SpreadTrend {
    if (spreadChange === null) return 'unavailable';
    if (Math.abs(spreadChange) <= this.settings.spreadFlatThreshold) return 'flat';
    return spreadChange > 0 ? 'widening' : 'narrowing';
  }

  /**
   * Evaluate the rule list; first match wins
   */
  classify(input: ClassifierInput, computedAt: string): RegimeRecord {
    const ctx = this.createContext(input);
    const rule = this.rules.find(r => r.when(ctx)) ?? FALLBACK_RULE;

    return {
      pairId: input.pairId,
      date: input.date,
      spreadId: input.spreadId,
      spreadTrend: ctx.spreadTrend,
      spreadChange: input.spreadChange,
      priceChangePct: input.priceChangePct,
      percentileRank: input.percentileRank,
      regime: rule.label,
      matchedRule: rule.name,
      computedAt,
    };
  }

  private createContext(input: ClassifierInput): RuleContext {
    const pair = this.getPair(input.pairId);
    const spreadTrend = this.spreadTrend(input.spreadChange);
    const rank = input.percentileRank?.status === 'ranked' ? input.percentileRank.rank : null;

    let spreadImpliedDirection: Direction = 0;
    if (spreadTrend === 'widening') spreadImpliedDirection = pair.spreadPriceSign;
    else if (spreadTrend === 'narrowing') spreadImpliedDirection = sign(-pair.spreadPriceSign);

    let crowdingImpliedDirection: Direction = 0;
    if (rank !== null && rank >= this.settings.highCrowding) {
      crowdingImpliedDirection = pair.positioningPriceSign;
    } else if (rank !== null && rank <= this.settings.lowCrowding) {
      crowdingImpliedDirection = sign(-pair.positioningPriceSign);
    }

    return {
      input,
      pair,
      settings: this.settings,
      spreadTrend,
      priceDirection: input.priceChangePct === null ? 0 : sign(input.priceChangePct),
      spreadImpliedDirection,
      crowdingImpliedDirection,
      rank,
    };
  }

  private getPair(pairId: string): Readonly<PairConfig> {
    const pair = this.pairs.get(pairId);
    if (!pair) {
      throw new InvalidConfigError([`pair ${pairId} is not configured`]);
    }
    return pair;
  }
}
