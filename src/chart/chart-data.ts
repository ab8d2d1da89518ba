import type { SessionSeries } from '../engine/types';
import { centsToUnits } from '../engine/money';

export interface ChartPoint {
  time: number;
  cumulative: number;
  handNumber: number;
}

export function toChartPoints(series: SessionSeries): ChartPoint[] {
  return series.points.map(p => ({
    time: p.timestamp.getTime(),
    cumulative: centsToUnits(p.cumulative),
    handNumber: p.handNumber,
  }));
}

/** `YYYY-MM-DD` of the first hand, in UTC */
export function sessionDate(series: SessionSeries): string {
  return series.firstTimestamp.toISOString().slice(0, 10);
}

export function chartTitle(series: SessionSeries): string {
  return `Session results (${sessionDate(series)})`;
}

export function outputBaseName(series: SessionSeries): string {
  return `${sessionDate(series).replace(/-/g, '')}_session_results`;
}

export function chartFileName(series: SessionSeries): string {
  return `${outputBaseName(series)}.svg`;
}

export function formatTick(time: number): string {
  return new Date(time).toISOString().slice(11, 16);
}
