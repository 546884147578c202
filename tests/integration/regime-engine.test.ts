/**
 * regime-engine.test.ts - Integration tests for a full regime run
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  InvalidConfigError,
  RegimeEngine,
  RegimeLabel,
  type EngineRunResult,
  type MarketDataInput,
} from '../../packages/engine/src/index.js';
import { buildMarketData, COMPUTED_AT, RUN_DATE, weeklyReports } from '../fixtures/marketData.js';

function recordFor(result: EngineRunResult, pairId: string) {
  const record = result.records.find(r => r.pairId === pairId);
  if (!record) throw new Error(`no record for ${pairId}`);
  return record;
}

function rowFor(result: EngineRunResult, pairId: string) {
  const row = result.snapshots.find(r => r.pair_id === pairId);
  if (!row) throw new Error(`no snapshot row for ${pairId}`);
  return row;
}

describe('RegimeEngine', () => {
  let engine: RegimeEngine;
  let input: MarketDataInput;

  beforeEach(() => {
    engine = new RegimeEngine();
    input = buildMarketData();
  });

  describe('run', () => {
    it('should classify every configured pair', () => {
      const result = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });

      expect(result.records.map(r => r.pairId)).toEqual(['EURUSD', 'USDJPY']);
      expect(result.issues).toEqual([]);
      expect(Object.keys(result.spreads)).toEqual([
        'US_DE_10Y_spread',
        'US_DE_2Y_spread',
        'US_JP_10Y_spread',
        'US_JP_2Y_spread',
        'US_curve',
      ]);
    });

    it('should attribute a record long with price following to positioning', () => {
      const record = recordFor(engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT }), 'EURUSD');

      expect(record.spreadTrend).toBe('narrowing');
      expect(record.spreadChange).toBeCloseTo(-0.74, 10);
      expect(record.priceChangePct).toBeCloseTo((1.15 / 1.05 - 1) * 100, 10);
      expect(record.percentileRank).toEqual({
        status: 'ranked',
        date: '2025-06-24',
        rank: 100,
        windowSize: 156,
        observationCount: 78,
      });
      expect(record.regime).toBe(RegimeLabel.POSITIONING_DOMINANT);
      expect(record.computedAt).toBe(COMPUTED_AT);
    });

    it('should attribute mid-range positioning with price following the spread to rates', () => {
      const record = recordFor(engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT }), 'USDJPY');

      expect(record.spreadTrend).toBe('narrowing');
      expect(record.percentileRank?.status === 'ranked' && record.percentileRank.rank).toBe(50);
      expect(record.regime).toBe(RegimeLabel.RATE_DIFFERENTIAL_DOMINANT);
      expect(record.matchedRule).toBe('rate-differential');
    });

    it('should write a snapshot row per pair', () => {
      const row = rowFor(engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT }), 'EURUSD');

      expect(row).toMatchObject({
        pair_id: 'EURUSD',
        date: RUN_DATE,
        price: 1.15,
        price_chg_1D: 0,
        positioning_date: '2025-06-24',
        net_contracts: 7800,
        percentile_rank: 100,
        crowding: 'CROWDED_LONG',
        divergence: 'N/A',
        regime_label: 'PositioningDominant',
        flags: '',
      });
      expect(row.US_DE_10Y_spread).toBeCloseTo(1.76, 10);
    });

    it('should be idempotent for identical inputs', () => {
      const first = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });
      const second = new RegimeEngine().run(buildMarketData(), RUN_DATE, { computedAt: COMPUTED_AT });

      expect(second).toEqual(first);
    });
  });

  describe('isolation', () => {
    it('should record a failing pair and finish the others', () => {
      input.prices.EURUSD = [...input.prices.EURUSD].reverse();
      const failed: string[] = [];
      engine.on('pair:failed', pairId => failed.push(pairId));

      const result = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });
      const record = recordFor(result, 'EURUSD');

      expect(failed).toEqual(['EURUSD']);
      expect(record.regime).toBe(RegimeLabel.INDETERMINATE);
      expect(record.matchedRule).toBe('pair-failed');
      expect(rowFor(result, 'EURUSD')).toMatchObject({ price: 'N/A', crowding: 'NO_DATA', flags: 'UNSORTED_SERIES' });
      expect(result.issues.map(i => [i.code, i.pairId])).toEqual([['UNSORTED_SERIES', 'EURUSD']]);
      expect(recordFor(result, 'USDJPY').regime).toBe(RegimeLabel.RATE_DIFFERENTIAL_DOMINANT);
    });

    it('should flag spreads whose instruments are missing', () => {
      delete input.yields.JP_10Y;
      delete input.yields.JP_2Y;

      const result = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });

      expect(result.issues.map(i => [i.code, i.spreadId])).toEqual([
        ['MISSING_INSTRUMENT', 'US_JP_10Y_spread'],
        ['MISSING_INSTRUMENT', 'US_JP_2Y_spread'],
      ]);
      expect('US_JP_10Y_spread' in result.spreads).toBe(false);
      expect(recordFor(result, 'USDJPY').matchedRule).toBe('insufficient-data');
      expect(rowFor(result, 'USDJPY').flags).toBe(
        'MISSING_INSTRUMENT:US_JP_10Y_spread;MISSING_INSTRUMENT:US_JP_2Y_spread'
      );
      expect(recordFor(result, 'EURUSD').regime).toBe(RegimeLabel.POSITIONING_DOMINANT);
    });

    it('should warn about a missing price series', () => {
      delete input.prices.USDJPY;

      const result = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });

      expect(recordFor(result, 'USDJPY').matchedRule).toBe('insufficient-data');
      expect(rowFor(result, 'USDJPY')).toMatchObject({ price: 'N/A', realized_vol: 'N/A', flags: 'MISSING_SERIES' });
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0]).toMatchObject({ severity: 'warning', code: 'MISSING_SERIES', pairId: 'USDJPY' });
    });

    it('should not classify on a price series that stopped updating', () => {
      input.prices.USDJPY = input.prices.USDJPY.filter(p => p.date < '2025-01-11');

      const result = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });

      expect(recordFor(result, 'USDJPY').priceChangePct).toBeNull();
      expect(recordFor(result, 'USDJPY').matchedRule).toBe('insufficient-data');
      expect(rowFor(result, 'USDJPY')).toMatchObject({
        price: 'N/A',
        price_chg_1D: 'N/A',
        realized_vol: 'N/A',
        flags: 'STALE_SERIES',
      });
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0]).toMatchObject({ severity: 'warning', code: 'STALE_SERIES', pairId: 'USDJPY' });
      expect(recordFor(result, 'EURUSD').regime).toBe(RegimeLabel.POSITIONING_DOMINANT);
    });

    it('should leave the rank empty without positioning', () => {
      delete input.positioning.EURUSD;

      const result = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });
      const record = recordFor(result, 'EURUSD');

      expect(record.percentileRank).toBeNull();
      expect(record.regime).toBe(RegimeLabel.INDETERMINATE);
      expect(record.matchedRule).toBe('insufficient-data');
      expect(rowFor(result, 'EURUSD')).toMatchObject({
        percentile_rank: 'N/A',
        crowding: 'NO_DATA',
        flags: 'MISSING_SERIES',
      });
    });

    it('should mark short positioning history', () => {
      input.positioning.EURUSD = {
        leveragedMoney: weeklyReports('EURUSD', Array.from({ length: 30 }, (_, i) => i), '2024-12-03'),
      };

      const result = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });

      expect(recordFor(result, 'EURUSD').regime).toBe(RegimeLabel.INDETERMINATE);
      expect(rowFor(result, 'EURUSD')).toMatchObject({
        positioning_date: '2025-06-24',
        percentile_rank: 'insufficient history',
        crowding: 'NO_DATA',
        flags: 'INSUFFICIENT_HISTORY',
      });
      expect(result.issues.map(i => [i.severity, i.code, i.pairId])).toEqual([
        ['warning', 'INSUFFICIENT_HISTORY', 'EURUSD'],
      ]);
    });
  });

  describe('events', () => {
    it('should emit one event per pair and one per run', () => {
      const classified: string[] = [];
      let completed: EngineRunResult | undefined;
      engine.on('pair:classified', record => classified.push(record.pairId));
      engine.on('run:completed', result => {
        completed = result;
      });

      const result = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });

      expect(classified).toEqual(['EURUSD', 'USDJPY']);
      expect(completed).toBe(result);
    });

    it('should keep a classified pair when a listener throws', () => {
      const failed: string[] = [];
      engine.on('pair:classified', () => {
        throw new Error('listener failed');
      });
      engine.on('pair:failed', pairId => failed.push(pairId));

      const result = engine.run(input, RUN_DATE, { computedAt: COMPUTED_AT });

      expect(failed).toEqual([]);
      expect(result.issues).toEqual([]);
      expect(result.records.map(r => r.regime)).toEqual([
        RegimeLabel.POSITIONING_DOMINANT,
        RegimeLabel.RATE_DIFFERENTIAL_DOMINANT,
      ]);
      expect(rowFor(result, 'EURUSD').flags).toBe('');
    });
  });

  describe('classifyHistory', () => {
    it('should classify each requested date', () => {
      const records = engine.classifyHistory(input, 'EURUSD', ['2024-06-28', RUN_DATE], { computedAt: COMPUTED_AT });

      expect(records.map(r => [r.date, r.matchedRule])).toEqual([
        ['2024-06-28', 'insufficient-data'],
        [RUN_DATE, 'crowded-positioning'],
      ]);
      expect(records[0].percentileRank?.status).toBe('insufficient');
    });

    it('should default to every price date', () => {
      const records = engine.classifyHistory(input, 'USDJPY', undefined, { computedAt: COMPUTED_AT });
      expect(records).toHaveLength(input.prices.USDJPY.length);
      expect(records[records.length - 1].regime).toBe(RegimeLabel.RATE_DIFFERENTIAL_DOMINANT);
    });

    it('should reject an unconfigured pair', () => {
      expect(() => engine.classifyHistory(input, 'GBPUSD')).toThrow(InvalidConfigError);
    });
  });
});
