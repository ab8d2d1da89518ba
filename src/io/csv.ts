import type { SessionSeries } from '../engine/types';
import { centsToUnits } from '../engine/money';

export type CsvValue = string | number | null;

function cell(value: CsvValue | undefined): string {
  if (typeof value === 'number') return String(value);
  return `"${(value ?? '').replace(/"/g, '""')}"`;
}

export function toCSV(rows: Record<string, CsvValue>[]): string {
  if (!rows.length) return '';
  const cols = Object.keys(rows[0]);
  const head = cols.join(',');
  const body = rows.map(r => cols.map(c => cell(r[c])).join(',')).join('\n');
  return head + '\n' + body + '\n';
}

const units = (cents: number) => centsToUnits(cents).toFixed(2);

/** One row per point of the series, money in currency units. */
export function sessionRows(series: SessionSeries): Record<string, CsvValue>[] {
  return series.points.map(p => ({
    hand_number_total: p.handNumber,
    date: p.timestamp.toISOString(),
    website: p.site,
    table: p.tableName,
    game_id: p.handId,
    hand_number_table: p.handNumberAtTable,
    start_stack: units(p.startStack),
    result: p.outcome,
    win: units(p.result),
    win_cumulative: units(p.cumulative),
    showdown: p.showdown,
  }));
}
