/**
 * Regime Rules
 *
 * Ordered (predicate, label) pairs. The classifier evaluates them in order
 * and the first match wins; a new regime is added by inserting a rule.
 */

import type { ClassifierConfig, PairConfig } from '../core/config.js';
import { RegimeLabel, type SpreadTrend } from '../core/types/regime.types.js';
import type { ClassifierInput } from './RegimeClassifier.js';

export type Direction = -1 | 0 | 1;

export interface RuleContext {
  input: ClassifierInput;
  pair: Readonly<PairConfig>;
  settings: Readonly<ClassifierConfig>;
  spreadTrend: SpreadTrend;
  /** Sign of the price change over the lookback */
  priceDirection: Direction;
  /** Price direction implied by the spread trend (0 when flat or unavailable) */
  spreadImpliedDirection: Direction;
  /** Price direction implied by crowded positioning (0 when not crowded) */
  crowdingImpliedDirection: Direction;
  /** Numeric percentile, null when insufficient or absent */
  rank: number | null;
}

export interface RegimeRule {
  name: string;
  label: RegimeLabel;
  when(ctx: RuleContext): boolean;
}

export const REGIME_RULES: readonly RegimeRule[] = [
  {
    name: 'insufficient-data',
    label: RegimeLabel.INDETERMINATE,
    when: ctx =>
      ctx.rank === null ||
      ctx.input.spreadChange === null ||
      ctx.input.priceChangePct === null,
  },
  {
    name: 'crowded-positioning',
    label: RegimeLabel.POSITIONING_DOMINANT,
    when: ctx =>
      ctx.crowdingImpliedDirection !== 0 &&
      ctx.priceDirection === ctx.crowdingImpliedDirection,
  },
  {
    name: 'rate-differential',
    label: RegimeLabel.RATE_DIFFERENTIAL_DOMINANT,
    when: ctx =>
      ctx.rank !== null &&
      ctx.rank > ctx.settings.lowCrowding &&
      ctx.rank < ctx.settings.highCrowding &&
      ctx.spreadImpliedDirection !== 0 &&
      ctx.priceDirection === ctx.spreadImpliedDirection,
  },
  {
    // Unreachable without both an external signal and a configured threshold
    name: 'risk-sentiment',
    label: RegimeLabel.RISK_SENTIMENT_DOMINANT,
    when: ctx =>
      ctx.settings.crisisThreshold !== null &&
      ctx.input.volatilitySignal !== null &&
      ctx.input.volatilitySignal > ctx.settings.crisisThreshold,
  },
];

export const FALLBACK_RULE: RegimeRule = {
  name: 'no-match',
  label: RegimeLabel.INDETERMINATE,
  when: () => true,
};
