/**
 * Shared helpers for the per-bank statement parsers.
 */

import { format, isValid, parse } from 'date-fns';

/**
 * Decimal amount as printed on statements: 1,234.56
 */
export const AMOUNT_SOURCE = '[\\d,]+\\.\\d{2}';

/**
 * Matches an amount that makes up a whole line.
 */
export const BARE_AMOUNT_PATTERN = new RegExp(`^(${AMOUNT_SOURCE})(\\s*CR)?$`, 'i');

/**
 * Month abbreviations used by DD MMM YYYY dates.
 */
const MONTH_MAP: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

// Fixed so that parsing never depends on the wall clock.
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse a printed amount ("1,234.56") into a number.
 * Returns null when the text is not numeric.
 */
export function parseAmount(text: string): number | null {
  const cleaned = text.replace(/,/g, '').trim();
  if (!/^-?\d+(?:\.\d+)?$/.test(cleaned)) return null;

  const value = parseFloat(cleaned);
  return Number.isFinite(value) ? value : null;
}

/**
 * Build an ISO date (YYYY-MM-DD) from numeric parts.
 * Returns null for impossible calendar dates such as 31/02.
 */
export function toIsoDate(day: number, month: number, year: number): string | null {
  if (year < 1900 || year > 2100) return null;

  const dd = String(day).padStart(2, '0');
  const mm = String(month).padStart(2, '0');
  const parsed = parse(`${dd}/${mm}/${year}`, 'dd/MM/yyyy', REFERENCE_DATE);

  return isValid(parsed) ? format(parsed, 'yyyy-MM-dd') : null;
}

/**
 * Parse a DD/MM/YYYY string into an ISO date.
 */
export function parseSlashDate(text: string): string | null {
  const match = text.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (!match) return null;

  return toIsoDate(
    parseInt(match[1] ?? '0', 10),
    parseInt(match[2] ?? '0', 10),
    parseInt(match[3] ?? '0', 10)
  );
}

/**
 * Resolve a month abbreviation ("Jan", "SEPT") to its number.
 */
export function monthFromName(name: string): number | null {
  return MONTH_MAP[name.slice(0, 3).toLowerCase()] ?? null;
}

/**
 * Expand a two-digit year into the 2000s.
 */
export function expandYear(year: string): number {
  const value = parseInt(year, 10);
  return year.length <= 2 ? 2000 + value : value;
}

/**
 * Check whether a line contains any of the given markers (case-sensitive).
 */
export function containsAny(line: string, markers: readonly string[]): boolean {
  return markers.some((marker) => line.includes(marker));
}

/**
 * Collapse runs of whitespace and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
