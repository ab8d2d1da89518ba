import { ZONE_ABBREVIATIONS } from './constants';

export interface LocalDateTime {
  year: number;
  month: number;   // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/** Offset of `timeZone` from UTC at the given instant, in milliseconds. */
function zoneOffsetMs(instant: number, timeZone: string): number {
  const parts = formatterFor(timeZone).formatToParts(new Date(instant));
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find(p => p.type === type)?.value ?? 0);

  const asUtc = Date.UTC(
    get('year'), get('month') - 1, get('day'),
    get('hour'), get('minute'), get('second'),
  );
  return asUtc - Math.floor(instant / 1000) * 1000;
}

/**
 * Interpret a wall-clock time in an IANA zone and return the UTC instant.
 * The offset is looked up twice so times next to a DST switch land right.
 */
export function zonedTimeToUtc(local: LocalDateTime, timeZone: string): Date {
  const wall = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second);
  if (timeZone === 'UTC') return new Date(wall);

  const firstGuess = wall - zoneOffsetMs(wall, timeZone);
  const offset = zoneOffsetMs(firstGuess, timeZone);
  return new Date(wall - offset);
}

/** IANA zone for a site's zone abbreviation, or null when unknown. */
export function zoneForAbbreviation(abbreviation: string): string | null {
  return ZONE_ABBREVIATIONS[abbreviation.toUpperCase()] ?? null;
}

/** Builds a LocalDateTime and rejects impossible calendar values. */
export function toLocalDateTime(
  year: number, month: number, day: number,
  hour: number, minute: number, second: number,
): LocalDateTime | null {
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return { year, month, day, hour, minute, second };
}
