import { describe, it, expect, beforeEach } from 'vitest';
import { SnapshotAssembler, change, type SnapshotInput } from './SnapshotAssembler.js';
import { formatSnapshotCsv, snapshotColumns } from './csv.js';
import { createEngineConfig, type EngineConfig } from '../core/config.js';
import { PositioningPercentileEngine } from '../positioning/PositioningPercentileEngine.js';
import {
  RegimeLabel,
  type PositioningObservation,
  type RegimeRecord,
  type SeriesPoint,
  type SnapshotRow,
} from '../core/types/regime.types.js';

const PRICES: SeriesPoint[] = [
  { date: '2024-06-28', value: 1.0 },
  { date: '2025-03-28', value: 1.1 },
  { date: '2025-05-30', value: 1.2 },
  { date: '2025-06-23', value: 1.25 },
  { date: '2025-06-27', value: 1.3 },
  { date: '2025-06-30', value: 1.32 },
];

const RECORD: RegimeRecord = {
  pairId: 'EURUSD',
  date: '2025-06-30',
  spreadId: 'US_DE_10Y_spread',
  spreadTrend: 'narrowing',
  spreadChange: -0.5,
  priceChangePct: 32,
  percentileRank: { status: 'ranked', date: '2025-06-24', rank: 100, windowSize: 4, observationCount: 4 },
  regime: RegimeLabel.POSITIONING_DOMINANT,
  matchedRule: 'crowded-positioning',
  computedAt: '2025-07-01T06:00:00.000Z',
};

function reports(dates: string[], nets: number[]): PositioningObservation[] {
  return dates.map((date, i) => ({ pairId: 'EURUSD', date, netContracts: nets[i], openInterest: 1_000 }));
}

describe('change', () => {
  it('should use percent for prices and points for spreads', () => {
    expect(change(1.1, 1.0, 'percent')).toBeCloseTo(10, 10);
    expect(change(0.5, 0.75, 'points')).toBe(-0.25);
    expect(change(1.1, 0, 'percent')).toBeNull();
  });
});

describe('SnapshotAssembler', () => {
  let config: Readonly<EngineConfig>;
  let assembler: SnapshotAssembler;
  let input: SnapshotInput;

  beforeEach(() => {
    config = createEngineConfig({ positioning: { windowSize: 4, minObservations: 2 } });
    assembler = new SnapshotAssembler(config);

    const positioning = new PositioningPercentileEngine(config).analyze('EURUSD', {
      leveragedMoney: reports(
        ['2025-05-27', '2025-06-03', '2025-06-10', '2025-06-17', '2025-06-24'],
        [100, 200, 300, 400, 500]
      ),
      assetManager: reports(['2025-06-17', '2025-06-24'], [-10, -20]),
    });

    input = {
      pair: config.pairs[0],
      runDate: '2025-06-30',
      prices: PRICES,
      spreads: {
        US_DE_10Y_spread: {
          spreadId: 'US_DE_10Y_spread',
          minuend: 'US_2Y',
          subtrahend: 'DE_10Y',
          observations: [
            { date: '2025-06-27', value: 1.5 },
            { date: '2025-06-30', value: 1.25 },
          ],
        },
      },
      yields: {
        US_2Y: [
          { date: '2025-06-27', value: 4.5 },
          { date: '2025-06-30', value: 4.25 },
        ],
      },
      positioning,
      volatility: [
        {
          date: '2025-06-30',
          volatility: 8.5,
          rank: { status: 'ranked', date: '2025-06-30', rank: 92, windowSize: 756, observationCount: 756 },
        },
      ],
      record: RECORD,
      issues: [
        {
          severity: 'error',
          code: 'MISSING_INSTRUMENT',
          message: 'Spread US_DE_2Y_spread references missing instrument(s): DE_2Y',
          pairId: 'EURUSD',
          spreadId: 'US_DE_2Y_spread',
        },
        { severity: 'warning', code: 'INSUFFICIENT_HISTORY', message: 'short', pairId: 'EURUSD' },
      ],
    };
  });

  describe('deltas', () => {
    it('should look back each period from the latest observation', () => {
      const row = assembler.deltas('price', PRICES, '2025-06-30', 'percent');

      expect(row.price).toBe(1.32);
      expect(row.price_chg_1D).toBeCloseTo((1.32 / 1.3 - 1) * 100, 10);
      expect(row.price_chg_1W).toBeCloseTo((1.32 / 1.25 - 1) * 100, 10);
      expect(row.price_chg_1M).toBeCloseTo(10, 10);
      expect(row.price_chg_3M).toBeCloseTo(20, 10);
      expect(row.price_chg_12M).toBeCloseTo(32, 10);
    });

    it('should mark periods the history does not reach', () => {
      const row = assembler.deltas('US_DE_10Y_spread', [
        { date: '2025-06-02', value: 1.5 },
        { date: '2025-06-30', value: 1.25 },
      ], '2025-06-30', 'points');

      expect(row).toEqual({
        US_DE_10Y_spread: 1.25,
        US_DE_10Y_spread_chg_1D: -0.25,
        US_DE_10Y_spread_chg_1W: -0.25,
        US_DE_10Y_spread_chg_1M: 'N/A',
        US_DE_10Y_spread_chg_3M: 'N/A',
        US_DE_10Y_spread_chg_12M: 'N/A',
      });
    });

    it('should mark a missing series', () => {
      const row = assembler.deltas('price', undefined, '2025-06-30', 'percent');
      expect(row.price).toBe('N/A');
      expect(row.price_chg_12M).toBe('N/A');
    });
  });

  describe('assemble', () => {
    it('should lay columns out in a fixed order', () => {
      const row = assembler.assemble(input);
      const deltaKeys = (prefix: string) => [prefix, ...['1D', '1W', '1M', '3M', '12M'].map(l => `${prefix}_chg_${l}`)];

      expect(Object.keys(row)).toEqual([
        'pair_id',
        'date',
        ...deltaKeys('price'),
        ...deltaKeys('US_DE_10Y_spread'),
        ...deltaKeys('US_DE_2Y_spread'),
        ...deltaKeys('US_curve'),
        ...deltaKeys('US_2Y'),
        ...deltaKeys('US_10Y'),
        ...deltaKeys('DE_2Y'),
        ...deltaKeys('DE_10Y'),
        ...deltaKeys('JP_2Y'),
        ...deltaKeys('JP_10Y'),
        'positioning_date',
        'net_contracts',
        'net_pct_oi',
        'percentile_rank',
        'crowding',
        'assetManager_percentile',
        'divergence',
        'realized_vol',
        'vol_percentile',
        'vol_flag',
        'trend_spread',
        'trend_spread_chg',
        'price_chg_lookback',
        'spread_trend',
        'regime_label',
        'matched_rule',
        'flags',
      ]);
    });

    it('should fill positioning, volatility and regime columns', () => {
      const row = assembler.assemble(input);

      expect(row).toMatchObject({
        pair_id: 'EURUSD',
        date: '2025-06-30',
        US_DE_10Y_spread: 1.25,
        US_DE_10Y_spread_chg_1D: -0.25,
        US_DE_2Y_spread: 'N/A',
        positioning_date: '2025-06-24',
        net_contracts: 500,
        net_pct_oi: 50,
        percentile_rank: 100,
        crowding: 'CROWDED_LONG',
        assetManager_percentile: 50,
        divergence: 'YES',
        realized_vol: 8.5,
        vol_percentile: 92,
        vol_flag: 'EXTREME',
        trend_spread: 'US_DE_10Y_spread',
        trend_spread_chg: -0.5,
        price_chg_lookback: 32,
        spread_trend: 'narrowing',
        regime_label: 'PositioningDominant',
        matched_rule: 'crowded-positioning',
        flags: 'MISSING_INSTRUMENT:US_DE_2Y_spread;INSUFFICIENT_HISTORY',
      });
    });

    it('should repeat the curve and raw yields in every row', () => {
      const row = assembler.assemble(input);

      expect(row.US_2Y).toBe(4.25);
      expect(row.US_2Y_chg_1D).toBe(-0.25);
      expect(row.US_2Y_chg_1M).toBe('N/A');
      expect(row.US_curve).toBe('N/A');
      expect(row.JP_10Y).toBe('N/A');
    });

    it('should not repeat a market-wide spread the pair already reports', () => {
      const curvePair = new SnapshotAssembler(
        createEngineConfig({ positioning: { windowSize: 4, minObservations: 2 }, snapshot: { spreadIds: ['US_DE_10Y_spread'], instrumentIds: [] } })
      );
      const keys = Object.keys(curvePair.assemble(input));

      expect(keys.filter(k => k === 'US_DE_10Y_spread')).toHaveLength(1);
      expect(keys).not.toContain('US_2Y');
    });

    it('should blank values older than the staleness bound', () => {
      const row = assembler.assemble({ ...input, runDate: '2025-07-09' });

      expect(row.price).toBe('N/A');
      expect(row.price_chg_1D).toBe('N/A');
      expect(row.US_DE_10Y_spread).toBe('N/A');
      expect(row.US_2Y).toBe('N/A');
      expect(row.realized_vol).toBe('N/A');

      const withinBound = assembler.assemble({ ...input, runDate: '2025-07-07' });
      expect(withinBound.price).toBe(1.32);
    });

    it('should drop stale positioning reports', () => {
      const row = assembler.assemble({ ...input, runDate: '2025-07-09' });

      expect(row.positioning_date).toBe('N/A');
      expect(row.percentile_rank).toBe('N/A');
      expect(row.crowding).toBe('NO_DATA');
      expect(row.divergence).toBe('N/A');
    });

    it('should label ranks that lack history', () => {
      const volatility = [
        {
          date: '2025-06-30',
          volatility: 8.5,
          rank: { status: 'insufficient' as const, date: '2025-06-30', windowSize: 756, observationCount: 40 },
        },
      ];
      const row = assembler.assemble({ ...input, volatility, runDate: '2025-06-03' });

      // only two leveragedMoney reports exist by 2025-06-03
      expect(row.percentile_rank).toBe(100);
      expect(row.assetManager_percentile).toBe('N/A');
      expect(row.vol_percentile).toBe('N/A');

      const latest = assembler.assemble({ ...input, volatility });
      expect(latest.vol_percentile).toBe('insufficient history');
      expect(latest.vol_flag).toBe('insufficient history');
    });

    it('should omit the divergence column when it is disabled', () => {
      const noDivergence = new SnapshotAssembler(
        createEngineConfig({ positioning: { divergenceCategory: null } })
      );
      const row = noDivergence.assemble({ ...input, issues: [] });

      expect('divergence' in row).toBe(false);
      expect(row.flags).toBe('');
    });
  });
});

describe('formatSnapshotCsv', () => {
  it('should union columns and quote special characters', () => {
    const rows: SnapshotRow[] = [
      { a: 1, b: 'x,y' },
      { a: 2, c: 'he said "hi"' },
    ];

    expect(snapshotColumns(rows)).toEqual(['a', 'b', 'c']);
    expect(formatSnapshotCsv(rows)).toBe('a,b,c\n1,"x,y",\n2,,"he said ""hi"""\n');
  });

  it('should write only a header for no columns', () => {
    expect(formatSnapshotCsv([])).toBe('\n');
  });
});
