import { InvalidDateError } from '../errors.js';
import type { FilterVariant, GameFilters } from '../types.js';

const DAY_MS = 86_400_000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * UTC midnight of a YYYY-MM-DD date, in epoch milliseconds
 * @throws InvalidDateError for malformed or impossible dates
 */
export function dateToEpochMs(date: string): number {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new InvalidDateError(date);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);

  // Date.UTC rolls 2024-02-30 over to March; reject instead
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new InvalidDateError(date);
  }
  return ms;
}

/**
 * Last millisecond of a YYYY-MM-DD date (UTC)
 */
export function endOfDayEpochMs(date: string): number {
  return dateToEpochMs(date) + DAY_MS - 1;
}

/**
 * Check the date filters before any request is made
 * @throws InvalidDateError for a malformed date or a range that ends before it starts
 */
export function validateFilters(filters: GameFilters): void {
  const since = filters.since ? dateToEpochMs(filters.since) : undefined;
  const until = filters.until ? endOfDayEpochMs(filters.until) : undefined;
  if (since !== undefined && until !== undefined && filters.until && since > until) {
    throw new InvalidDateError(filters.until);
  }
}

/**
 * Query parameters for the game export endpoint
 */
export function buildGameQuery(filters: GameFilters, variant: FilterVariant): URLSearchParams {
  const params = new URLSearchParams({
    max: String(filters.max),
    moves: 'true',
    opening: 'true',
    clocks: 'false',
    evals: 'false',
  });

  if (filters.since) {
    params.set('since', String(dateToEpochMs(filters.since)));
  }
  if (filters.until) {
    params.set('until', String(endOfDayEpochMs(filters.until)));
  }
  if (variant === 'full' && filters.perfTypes.length > 0) {
    params.set('perfType', filters.perfTypes.join(','));
  }

  return params;
}
