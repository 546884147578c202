import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createEngineConfig } from '@fx-regime/engine';
import { fetchMarketData, JsonFileDataSource } from './JsonFileDataSource.js';
import { CliInputError } from '../config/loadConfig.js';

describe('JsonFileDataSource', () => {
  let dir: string;
  let path: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fx-regime-source-'));
    path = join(dir, 'market.json');
    await writeFile(path, JSON.stringify({
      yields: [
        { instrumentId: 'US_2Y', date: '2025-06-30', value: 4.26 },
        { instrumentId: 'US_2Y', date: '2025-06-27', value: 4.3 },
        { instrumentId: 'DE_10Y', date: '2025-06-27', value: 2.55 },
        { instrumentId: 'UK_10Y', date: '2025-06-27', value: 4.5 },
      ],
      prices: [
        { pairId: 'EURUSD', date: '2025-06-30', price: 1.17 },
        { pairId: 'EURUSD', date: '2025-06-27', price: 1.16 },
      ],
      positioning: [
        { pairId: 'EURUSD', category: 'leveragedMoney', date: '2025-06-24', netContracts: 500, openInterest: 1000 },
        { pairId: 'EURUSD', category: 'assetManager', date: '2025-06-24', netContracts: -200, openInterest: 1000 },
        { pairId: 'EURUSD', category: 'leveragedMoney', date: '2025-06-17', netContracts: 400, openInterest: 1000 },
      ],
      volatilitySignals: [{ pairId: 'EURUSD', date: '2025-06-30', value: 7.5 }],
    }));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should group yields by instrument in date order', async () => {
    const yields = await new JsonFileDataSource(path).getYields(['US_2Y', 'DE_10Y']);

    expect(yields).toEqual({
      US_2Y: [
        { date: '2025-06-27', value: 4.3 },
        { date: '2025-06-30', value: 4.26 },
      ],
      DE_10Y: [{ date: '2025-06-27', value: 2.55 }],
    });
  });

  it('should group positioning by pair and category', async () => {
    const positioning = await new JsonFileDataSource(path).getPositioning(['EURUSD']);

    expect(Object.keys(positioning.EURUSD).sort()).toEqual(['assetManager', 'leveragedMoney']);
    expect(positioning.EURUSD.leveragedMoney.map(r => [r.date, r.netContracts])).toEqual([
      ['2025-06-17', 400],
      ['2025-06-24', 500],
    ]);
    expect(positioning.EURUSD.assetManager[0]).toEqual({
      pairId: 'EURUSD',
      date: '2025-06-24',
      netContracts: -200,
      openInterest: 1000,
    });
  });

  it('should fetch only what the configuration needs', async () => {
    const source = new JsonFileDataSource(path);
    const input = await fetchMarketData(createEngineConfig(), source, source, source, source);

    expect(Object.keys(input.yields).sort()).toEqual(['DE_10Y', 'US_2Y']);
    expect(input.prices.EURUSD.map(p => p.value)).toEqual([1.16, 1.17]);
    expect(input.volatilitySignals).toEqual({ EURUSD: [{ date: '2025-06-30', value: 7.5 }] });
  });

  it('should fetch the yields the snapshot repeats', async () => {
    const source = new JsonFileDataSource(path);
    const config = createEngineConfig({ snapshot: { instrumentIds: ['UK_10Y'] } });
    const input = await fetchMarketData(config, source, source, source, source);

    expect(Object.keys(input.yields).sort()).toEqual(['DE_10Y', 'UK_10Y', 'US_2Y']);
  });

  it('should reject a file that does not match the schema', async () => {
    const bad = join(dir, 'bad.json');
    await writeFile(bad, JSON.stringify({ yields: [{ instrumentId: 'US_2Y', date: '30/06/2025', value: 4.26 }], prices: [], positioning: [] }));

    await expect(new JsonFileDataSource(bad).getYields(['US_2Y'])).rejects.toThrow(
      'Invalid contents in ' + bad + ': yields.0.date: expected YYYY-MM-DD'
    );
  });

  it('should report a missing file', async () => {
    await expect(new JsonFileDataSource(join(dir, 'absent.json')).getPrices(['EURUSD'])).rejects.toBeInstanceOf(CliInputError);
  });
});
