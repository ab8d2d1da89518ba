import { CURRENCY_SYMBOLS } from './constants';

const AMOUNT_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parse a printed amount such as `$1,234.5` or `2` into integer cents.
 * Returns null for anything that is not a plain non-negative amount.
 */
export function parseAmount(raw: string): number | null {
  let text = raw.trim();
  for (const symbol of CURRENCY_SYMBOLS) {
    if (text.startsWith(symbol)) {
      text = text.slice(symbol.length).trim();
      break;
    }
  }
  text = text.replace(/,/g, '');

  const match = AMOUNT_PATTERN.exec(text);
  if (!match) return null;

  const whole = Number(match[1]);
  const fraction = match[2] ? Number(match[2].padEnd(2, '0')) : 0;
  return whole * 100 + fraction;
}

/** Currency symbol an amount is printed with, if any. */
export function currencyOf(raw: string): string | null {
  const text = raw.trim();
  return CURRENCY_SYMBOLS.find(symbol => text.startsWith(symbol)) ?? null;
}

export function centsToUnits(cents: number): number {
  return cents / 100;
}

export function formatAmount(cents: number, currency: string | null = '$'): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const units = `${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
  return `${sign}${currency ?? ''}${units}`;
}
