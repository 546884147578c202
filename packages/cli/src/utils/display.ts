/**
 * CLI Display Utilities
 *
 * Formatting and table helpers for regime output.
 */

import Table from 'cli-table3';
import {
  INSUFFICIENT_HISTORY,
  NOT_AVAILABLE,
  RegimeLabel,
  type EngineIssue,
  type PercentileRank,
  type RegimeRecord,
  type SnapshotRow,
  type SnapshotValue,
} from '@fx-regime/engine';

export type Tone = 'bold' | 'dim' | 'red' | 'green' | 'yellow' | 'magenta' | 'cyan';

// SGR parameter per tone
const SGR: Record<Tone, number> = {
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  magenta: 35,
  cyan: 36,
};

export function paint(tone: Tone, text: string): string {
  return `\x1b[${SGR[tone]}m${text}\x1b[0m`;
}

const REGIME_TONES: Record<RegimeLabel, Tone> = {
  [RegimeLabel.RATE_DIFFERENTIAL_DOMINANT]: 'cyan',
  [RegimeLabel.POSITIONING_DOMINANT]: 'magenta',
  [RegimeLabel.RISK_SENTIMENT_DOMINANT]: 'red',
  [RegimeLabel.INDETERMINATE]: 'dim',
};

/**
 * Numbers to fixed decimals; markers such as N/A pass through dimmed
 */
export function formatValue(value: SnapshotValue | undefined, decimals: number = 2): string {
  if (value === undefined) return '';
  if (typeof value === 'number') return value.toFixed(decimals);
  return value === NOT_AVAILABLE || value === INSUFFICIENT_HISTORY ? paint('dim', value) : value;
}

export function formatChange(value: number | null, suffix: string): string {
  if (value === null) return paint('dim', NOT_AVAILABLE);
  const text = `${value > 0 ? '+' : ''}${value.toFixed(2)}${suffix}`;
  if (value === 0) return text;
  return paint(value > 0 ? 'green' : 'red', text);
}

/** Positioning rank cell, with the same markers the snapshot uses */
export function formatRank(rank: PercentileRank | null): string {
  if (rank === null) return paint('dim', NOT_AVAILABLE);
  if (rank.status === 'insufficient') return paint('dim', INSUFFICIENT_HISTORY);
  return rank.rank.toFixed(1);
}

export function regimeBadge(regime: RegimeLabel): string {
  return paint(REGIME_TONES[regime], regime);
}

export function issueLine(issue: EngineIssue): string {
  const scope = [issue.pairId, issue.spreadId].filter(Boolean).join(' ');
  const text = `${issue.code}${scope ? ` [${scope}]` : ''}: ${issue.message}`;
  return paint(issue.severity === 'error' ? 'red' : 'yellow', text);
}

export function createTable(headers: string[]): Table.Table {
  return new Table({
    head: headers,
    style: { head: ['cyan'], border: ['grey'], compact: true },
  });
}

/**
 * One line per pair: regime, drivers and flags
 */
export function regimeTable(records: readonly RegimeRecord[], rows: readonly SnapshotRow[]): string {
  const table = createTable(['Pair', 'Regime', 'Spread', 'Trend', 'Spread Δ', 'Price Δ', 'Positioning', 'Crowding', 'Flags']);

  for (const record of records) {
    const row = rows.find(r => r.pair_id === record.pairId);
    table.push([
      paint('bold', record.pairId),
      regimeBadge(record.regime),
      record.spreadId,
      record.spreadTrend,
      formatChange(record.spreadChange, 'pp'),
      formatChange(record.priceChangePct, '%'),
      formatRank(record.percentileRank),
      formatValue(row?.crowding),
      formatValue(row?.flags) || paint('dim', '-'),
    ]);
  }

  return table.toString();
}

export function historyTable(records: readonly RegimeRecord[]): string {
  const table = createTable(['Date', 'Regime', 'Rule', 'Trend', 'Spread Δ', 'Price Δ', 'Positioning']);

  for (const record of records) {
    table.push([
      record.date,
      regimeBadge(record.regime),
      record.matchedRule,
      record.spreadTrend,
      formatChange(record.spreadChange, 'pp'),
      formatChange(record.priceChangePct, '%'),
      formatRank(record.percentileRank),
    ]);
  }

  return table.toString();
}
