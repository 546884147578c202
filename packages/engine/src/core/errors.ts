/**
 * Engine error taxonomy
 *
 * Fatal errors extend RegimeEngineError and are thrown by the component that
 * detects them; the batch runner catches them per pair or per spread and
 * turns them into issues. Warnings are never thrown.
 */

import type { EngineIssue, IsoDate } from './types/regime.types.js';

export type EngineErrorCode =
  | 'DATA_ALIGNMENT'
  | 'UNSORTED_SERIES'
  | 'MISSING_INSTRUMENT'
  | 'INVALID_CONFIG';

export abstract class RegimeEngineError extends Error {
  abstract readonly code: EngineErrorCode;
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }
}

/** Two series feeding a spread share no date */
export class DataAlignmentError extends RegimeEngineError {
  readonly code = 'DATA_ALIGNMENT';

  constructor(readonly spreadId: string, readonly minuend: string, readonly subtrahend: string) {
    super(`No overlapping dates between ${minuend} and ${subtrahend} for ${spreadId}`, {
      spreadId,
      minuend,
      subtrahend,
    });
  }
}

/** A series violates the strictly ascending date invariant */
export class UnsortedSeriesError extends RegimeEngineError {
  readonly code = 'UNSORTED_SERIES';

  constructor(readonly seriesId: string, readonly index: number, previous: IsoDate, current: IsoDate) {
    super(`Series ${seriesId} is not strictly ascending at index ${index} (${previous} -> ${current})`, {
      seriesId,
      index,
      previous,
      current,
    });
  }
}

/** A spread references an instrument that was not supplied at all */
export class MissingInstrumentError extends RegimeEngineError {
  readonly code = 'MISSING_INSTRUMENT';

  constructor(readonly spreadId: string, readonly instrumentIds: string[]) {
    super(`Spread ${spreadId} references missing instrument(s): ${instrumentIds.join(', ')}`, {
      spreadId,
      instrumentIds,
    });
  }
}

export class InvalidConfigError extends RegimeEngineError {
  readonly code = 'INVALID_CONFIG';

  constructor(readonly problems: string[]) {
    super(`Invalid engine configuration: ${problems.join('; ')}`, { problems });
  }
}

/**
 * Non-fatal: a rank window holds fewer observations than required.
 * Produces a flagged rank rather than aborting the run.
 */
export class InsufficientHistoryWarning {
  readonly code = 'INSUFFICIENT_HISTORY';
  readonly severity = 'warning';
  readonly message: string;

  constructor(
    readonly pairId: string,
    readonly seriesId: string,
    readonly observationCount: number,
    readonly required: number
  ) {
    this.message = `${seriesId} for ${pairId} has ${observationCount} observations in window, ${required} required`;
  }

  toIssue(): EngineIssue {
    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      pairId: this.pairId,
    };
  }
}

/**
 * Convert anything caught at an isolation boundary into an issue
 */
export function toIssue(error: unknown, scope: { pairId?: string; spreadId?: string } = {}): EngineIssue {
  if (error instanceof RegimeEngineError) {
    return { severity: 'error', code: error.code, message: error.message, ...scope };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { severity: 'error', code: 'UNEXPECTED', message, ...scope };
}
