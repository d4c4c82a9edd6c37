/**
 * Calendar helpers
 *
 * All months are UTC calendar months. Timestamps written without an offset
 * are read as UTC.
 */

import type { MonthKey, Result } from '../types/index.js';
import { failure, success } from '../types/index.js';

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})?$/;
const ZONE_PATTERN = /(Z|[+-]\d{2}:\d{2})$/;
const PERIOD_PATTERN = /^(\d{4})-(\d{2})$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Fields as written must name a real date and time (no 02-30, no 24:00)
 */
function isCalendarTime(match: RegExpExecArray): boolean {
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = Number(match[6] ?? '0');
  return (
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour <= 23 &&
    minute <= 59 &&
    second <= 59
  );
}

/**
 * Parse an ISO-8601 date-time such as 2060-04-01T00:00
 */
export function parseTimestamp(raw: string): Result<Date> {
  const match = TIMESTAMP_PATTERN.exec(raw);
  if (!match || !isCalendarTime(match)) {
    return failure('VALIDATION_ERROR', `Invalid timestamp: ${raw}`, {
      timestamp: raw,
    });
  }

  const date = new Date(ZONE_PATTERN.test(raw) ? raw : `${raw}Z`);
  if (Number.isNaN(date.getTime())) {
    return failure('VALIDATION_ERROR', `Invalid timestamp: ${raw}`, {
      timestamp: raw,
    });
  }
  return success(date);
}

export function monthKeyOf(at: Date): MonthKey {
  return { year: at.getUTCFullYear(), month: at.getUTCMonth() + 1 };
}

export function formatPeriod(key: MonthKey): string {
  return `${String(key.year).padStart(4, '0')}-${String(key.month).padStart(2, '0')}`;
}

export function periodOf(at: Date): string {
  return formatPeriod(monthKeyOf(at));
}

/**
 * Parse a YYYY-MM period
 */
export function parsePeriod(raw: string): Result<MonthKey> {
  const match = PERIOD_PATTERN.exec(raw);
  const month = match ? Number(match[2]) : 0;
  if (!match || month < 1 || month > 12) {
    return failure('VALIDATION_ERROR', `Invalid period: ${raw}`, {
      period: raw,
    });
  }
  return success({ year: Number(match[1]), month });
}
