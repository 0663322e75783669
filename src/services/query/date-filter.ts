/**
 * PubMed publication date filter.
 *
 * @module services/query/date-filter
 */

import { validationError } from '../../server/errors.js';

const DATE_PATTERN = /^\d{4}(\/\d{2}(\/\d{2})?)?$/;

/** Lower bound used when only an end date is given */
export const OPEN_START_DATE = '1800/01/01';

function checkDate(value: string, field: 'start' | 'end'): string {
  const trimmed = value.trim();
  if (!DATE_PATTERN.test(trimmed)) {
    throw validationError(`Invalid ${field} date "${value}": expected YYYY, YYYY/MM or YYYY/MM/DD`, {
      field,
      value,
    });
  }
  return trimmed;
}

/**
 * Build a `start:end[PDAT]` clause, or null when neither bound is given.
 *
 * An open end runs to the end of next year so in-press articles dated
 * ahead are still included.
 */
export function buildDateFilter(start?: string, end?: string, now: Date = new Date()): string | null {
  const startValue = start?.trim() ?? '';
  const endValue = end?.trim() ?? '';
  if (startValue === '' && endValue === '') return null;

  const from = startValue === '' ? OPEN_START_DATE : checkDate(startValue, 'start');
  const to = endValue === '' ? `${now.getFullYear() + 1}/12/31` : checkDate(endValue, 'end');
  return `${from}:${to}[PDAT]`;
}

/**
 * AND a date filter onto a query. Returns the query unchanged when there is no filter.
 */
export function applyDateFilter(query: string, filter: string | null): string {
  return filter === null ? query : `(${query}) AND ${filter}`;
}
