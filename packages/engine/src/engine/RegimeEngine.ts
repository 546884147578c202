/**
 * Regime Engine
 *
 * Runs one batch: spreads first, then for every configured pair the
 * positioning ranks, classification and snapshot row. A failure for one
 * pair is recorded as an issue and never stops the other pairs.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { createEngineConfig, type EngineConfig, type PairConfig } from '../core/config.js';
import { InvalidConfigError, toIssue } from '../core/errors.js';
import {
  RegimeLabel,
  type EngineIssue,
  type EngineRunResult,
  type IsoDate,
  type MarketDataInput,
  type PercentileRank,
  type RegimeRecord,
  type SeriesPoint,
  type SnapshotRow,
  type SpreadSeries,
} from '../core/types/regime.types.js';
import { PositioningPercentileEngine, type PositioningAnalysis } from '../positioning/PositioningPercentileEngine.js';
import { RegimeClassifier } from '../regime/RegimeClassifier.js';
import { asOf, assertAscending } from '../series/SeriesUtils.js';
import { SnapshotAssembler } from '../snapshot/SnapshotAssembler.js';
import { SpreadCalculator } from '../spreads/SpreadCalculator.js';
import { createLogger } from '../utils/logger.js';
import { RealizedVolatilityCalculator } from '../volatility/RealizedVolatilityCalculator.js';

export interface RegimeEngineEvents {
  'pair:classified': (record: RegimeRecord, row: SnapshotRow) => void;
  'pair:failed': (pairId: string, issue: EngineIssue) => void;
  'run:completed': (result: EngineRunResult) => void;
}

export interface RunOptions {
  /** Timestamp stamped on every record - default: now */
  computedAt?: string;
}

interface PairContext {
  pair: Readonly<PairConfig>;
  positioning: PositioningAnalysis | null;
}

export class RegimeEngine extends EventEmitter<RegimeEngineEvents> {
  private logger: Logger;
  private spreads: SpreadCalculator;
  private positioning: PositioningPercentileEngine;
  private volatility: RealizedVolatilityCalculator;
  private classifier: RegimeClassifier;
  private assembler: SnapshotAssembler;

  constructor(private readonly config: Readonly<EngineConfig> = createEngineConfig()) {
    super();
    this.logger = createLogger('RegimeEngine');
    this.spreads = new SpreadCalculator(config);
    this.positioning = new PositioningPercentileEngine(config);
    this.volatility = new RealizedVolatilityCalculator(config);
    this.classifier = new RegimeClassifier(config);
    this.assembler = new SnapshotAssembler(config);
  }

  /**
   * Process every configured pair for one run date
   */
  run(input: MarketDataInput, runDate: IsoDate, options: RunOptions = {}): EngineRunResult {
    const computedAt = options.computedAt ?? new Date().toISOString();
    this.logger.info({ runDate, pairs: this.config.pairs.length }, 'Starting regime run');

    const { spreads, issues: spreadIssues } = this.computeSpreads(input);
    const records: RegimeRecord[] = [];
    const snapshots: SnapshotRow[] = [];
    const issues: EngineIssue[] = [...spreadIssues];

    for (const pair of this.config.pairs) {
      // Spread failures are global issues; the pair's row repeats the ones it depends on
      const inherited = spreadIssues
        .filter(i => i.spreadId !== undefined && (pair.spreadIds.includes(i.spreadId) || pair.trendSpreadId === i.spreadId))
        .map(i => ({ ...i, pairId: pair.pairId }));
      const pairIssues: EngineIssue[] = [...inherited];

      let record: RegimeRecord;
      let row: SnapshotRow;
      let failure: EngineIssue | undefined;

      try {
        ({ record, row } = this.processPair(input, pair, spreads, runDate, computedAt, pairIssues));
      } catch (error) {
        failure = toIssue(error, { pairId: pair.pairId });
        pairIssues.push(failure);
        this.logger.error({ pairId: pair.pairId, code: failure.code }, failure.message);
        record = this.failedRecord(pair, runDate, computedAt);
        row = this.assembler.assemble({
          pair,
          runDate,
          prices: undefined,
          spreads: {},
          yields: {},
          positioning: null,
          volatility: null,
          record,
          issues: pairIssues,
        });
      }

      // Listeners run outside the pair's failure boundary
      if (failure) {
        const issue = failure;
        this.notify('pair:failed', () => this.emit('pair:failed', pair.pairId, issue));
      } else {
        this.notify('pair:classified', () => this.emit('pair:classified', record, row));
      }

      records.push(record);
      snapshots.push(row);
      issues.push(...pairIssues.slice(inherited.length));
    }

    const result: EngineRunResult = { runDate, computedAt, spreads, records, snapshots, issues };
    this.logger.info(
      {
        runDate,
        regimes: Object.fromEntries(records.map(r => [r.pairId, r.regime])),
        issues: issues.length,
      },
      'Regime run completed'
    );
    this.notify('run:completed', () => this.emit('run:completed', result));
    return result;
  }

  /**
   * Invoke listeners; a throwing listener is logged and never alters the run
   */
  private notify(event: keyof RegimeEngineEvents, fire: () => void): void {
    try {
      fire();
    } catch (error) {
      this.logger.error(
        { event, error: error instanceof Error ? error.message : String(error) },
        'Event listener failed'
      );
    }
  }

  /**
   * Regime record for each date of one pair (replay/audit)
   */
  classifyHistory(
    input: MarketDataInput,
    pairId: string,
    dates?: readonly IsoDate[],
    options: RunOptions = {}
  ): RegimeRecord[] {
    const computedAt = options.computedAt ?? new Date().toISOString();
    const pair = this.config.pairs.find(p => p.pairId === pairId);
    if (!pair) {
      throw new InvalidConfigError([`pair ${pairId} is not configured`]);
    }

    const { spreads } = this.computeSpreads(input);
    const context = this.preparePair(input, pair, []);
    const prices = input.prices[pairId];
    const targetDates = dates ?? (prices ?? []).map(p => p.date);

    return targetDates.map(date => {
      const classifierInput = this.classifier.buildInput(pairId, date, {
        spread: spreads[pair.trendSpreadId]?.observations,
        prices,
        percentileRank: this.primaryRankAsOf(context, date),
        volatilitySignals: input.volatilitySignals?.[pairId],
      });
      return this.classifier.classify(classifierInput, computedAt);
    });
  }

  private computeSpreads(input: MarketDataInput): { spreads: Record<string, SpreadSeries>; issues: EngineIssue[] } {
    const spreads: Record<string, SpreadSeries> = {};
    const issues: EngineIssue[] = [];

    try {
      for (const result of this.spreads.computeAll(input.yields)) {
        if (result.ok) {
          spreads[result.spread.spreadId] = result.spread;
        } else {
          issues.push(toIssue(result.error, { spreadId: result.spreadId }));
        }
      }
    } catch (error) {
      // Unexpected failure: every pair proceeds without spreads
      const issue = toIssue(error);
      this.logger.error({ code: issue.code }, issue.message);
      issues.push(issue);
    }

    return { spreads, issues };
  }

  private preparePair(input: MarketDataInput, pair: Readonly<PairConfig>, issues: EngineIssue[]): PairContext {
    const prices = input.prices[pair.pairId];
    if (prices) {
      assertAscending(prices, pair.pairId);
    } else {
      issues.push({
        severity: 'warning',
        code: 'MISSING_SERIES',
        message: `No price series supplied for ${pair.pairId}`,
        pairId: pair.pairId,
      });
    }

    const signals = input.volatilitySignals?.[pair.pairId];
    if (signals) {
      assertAscending(signals, `${pair.pairId}:volatility`);
    }

    const byCategory = input.positioning[pair.pairId];
    let positioning: PositioningAnalysis | null = null;
    if (byCategory) {
      positioning = this.positioning.analyze(pair.pairId, byCategory);
      issues.push(...positioning.warnings.map(w => w.toIssue()));
    } else {
      issues.push({
        severity: 'warning',
        code: 'MISSING_SERIES',
        message: `No positioning supplied for ${pair.pairId}`,
        pairId: pair.pairId,
      });
    }

    return { pair, positioning };
  }

  private primaryRankAsOf(context: PairContext, date: IsoDate): PercentileRank | null {
    const primary = context.positioning?.primary;
    if (!primary) return null;
    return this.positioning.rankAsOf(primary.points, date)?.rank ?? null;
  }

  private processPair(
    input: MarketDataInput,
    pair: Readonly<PairConfig>,
    spreads: Record<string, SpreadSeries>,
    runDate: IsoDate,
    computedAt: string,
    issues: EngineIssue[]
  ): { record: RegimeRecord; row: SnapshotRow } {
    const context = this.preparePair(input, pair, issues);
    const prices = input.prices[pair.pairId];
    this.checkFreshness(pair, prices, spreads, runDate, issues);

    const classifierInput = this.classifier.buildInput(pair.pairId, runDate, {
      spread: spreads[pair.trendSpreadId]?.observations,
      prices,
      percentileRank: this.primaryRankAsOf(context, runDate),
      volatilitySignals: input.volatilitySignals?.[pair.pairId],
    });
    const record = this.classifier.classify(classifierInput, computedAt);

    this.logger.debug(
      { pairId: pair.pairId, regime: record.regime, rule: record.matchedRule },
      'Pair classified'
    );

    const row = this.assembler.assemble({
      pair,
      runDate,
      prices,
      spreads,
      yields: input.yields,
      positioning: context.positioning,
      volatility: prices ? this.volatility.compute(prices, pair.pairId) : null,
      record,
      issues,
    });

    return { record, row };
  }

  /**
   * Warn about series that exist but have nothing within the staleness
   * bound of the run date
   */
  private checkFreshness(
    pair: Readonly<PairConfig>,
    prices: readonly SeriesPoint[] | undefined,
    spreads: Record<string, SpreadSeries>,
    runDate: IsoDate,
    issues: EngineIssue[]
  ): void {
    const fresh = { maxLagDays: this.config.classifier.maxStaleDays };
    const stale = (series: readonly SeriesPoint[]) =>
      asOf(series, runDate) !== undefined && asOf(series, runDate, fresh) === undefined;

    if (prices && stale(prices)) {
      issues.push({
        severity: 'warning',
        code: 'STALE_SERIES',
        message: `Latest ${pair.pairId} price is older than ${fresh.maxLagDays} days at ${runDate}`,
        pairId: pair.pairId,
      });
    }

    for (const spreadId of new Set([pair.trendSpreadId, ...pair.spreadIds])) {
      const spread = spreads[spreadId];
      if (spread && stale(spread.observations)) {
        issues.push({
          severity: 'warning',
          code: 'STALE_SERIES',
          message: `Latest ${spreadId} observation is older than ${fresh.maxLagDays} days at ${runDate}`,
          pairId: pair.pairId,
          spreadId,
        });
      }
    }
  }

  private failedRecord(pair: Readonly<PairConfig>, runDate: IsoDate, computedAt: string): RegimeRecord {
    return {
      pairId: pair.pairId,
      date: runDate,
      spreadId: pair.trendSpreadId,
      spreadTrend: 'unavailable',
      spreadChange: null,
      priceChangePct: null,
      percentileRank: null,
      regime: RegimeLabel.INDETERMINATE,
      matchedRule: 'pair-failed',
      computedAt,
    };
  }
}
