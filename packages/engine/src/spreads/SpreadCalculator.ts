/**
 * Spread Calculator
 *
 * Derives rate-differential series from raw yield series using the
 * declarative spread definitions in the engine config.
 */

import type { Logger } from 'pino';
import type { EngineConfig, SpreadDefinition } from '../core/config.js';
import { DataAlignmentError, MissingInstrumentError, RegimeEngineError } from '../core/errors.js';
import type { SeriesPoint, SpreadSeries } from '../core/types/regime.types.js';
import { assertAscending } from '../series/SeriesUtils.js';
import { createLogger } from '../utils/logger.js';

export type SpreadResult =
  | { ok: true; spread: SpreadSeries }
  | { ok: false; spreadId: string; error: RegimeEngineError };

export class SpreadCalculator {
  private logger: Logger;

  constructor(private readonly config: Readonly<EngineConfig>) {
    this.logger = createLogger('SpreadCalculator');
  }

  /**
   * Inner join on date: dates missing from either input are dropped
   */
  compute(
    definition: SpreadDefinition,
    minuend: readonly SeriesPoint[],
    subtrahend: readonly SeriesPoint[]
  ): SpreadSeries {
    assertAscending(minuend, definition.minuend);
    assertAscending(subtrahend, definition.subtrahend);

    const observations: SeriesPoint[] = [];
    let i = 0;
    let j = 0;

    while (i < minuend.length && j < subtrahend.length) {
      const a = minuend[i];
      const b = subtrahend[j];
      if (a.date === b.date) {
        observations.push({ date: a.date, value: a.value - b.value });
        i++;
        j++;
      } else if (a.date < b.date) {
        i++;
      } else {
        j++;
      }
    }

    if (observations.length === 0) {
      throw new DataAlignmentError(definition.spreadId, definition.minuend, definition.subtrahend);
    }

    return {
      spreadId: definition.spreadId,
      minuend: definition.minuend,
      subtrahend: definition.subtrahend,
      observations,
    };
  }

  /**
   * Evaluate every configured spread; each failure is isolated to its spread
   */
  computeAll(yields: Readonly<Record<string, readonly SeriesPoint[]>>): SpreadResult[] {
    return this.config.spreads.map(definition => {
      const minuend = yields[definition.minuend];
      const subtrahend = yields[definition.subtrahend];

      try {
        if (!minuend || !subtrahend) {
          const missing = [definition.minuend, definition.subtrahend].filter(id => !yields[id]);
          throw new MissingInstrumentError(definition.spreadId, missing);
        }

        const spread = this.compute(definition, minuend, subtrahend);
        const latest = spread.observations[spread.observations.length - 1];
        this.logger.debug(
          { spreadId: spread.spreadId, points: spread.observations.length, latest },
          'Spread computed'
        );
        return { ok: true as const, spread };
      } catch (error) {
        if (!(error instanceof RegimeEngineError)) throw error;
        this.logger.warn({ spreadId: definition.spreadId, code: error.code }, error.message);
        return { ok: false as const, spreadId: definition.spreadId, error };
      }
    });
  }
}
