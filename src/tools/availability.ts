import type { ScheduleRegistry } from '../adapters/calendar';
import { parseDateKey } from '../adapters/calendar/dates';
import type { AvailabilityResult, RangeAvailabilityResult } from '../adapters/calendar/types';

export type { AvailabilityResult, RangeAvailabilityResult } from '../adapters/calendar/types';

/** Longest range, in dates, a caller may ask about in one request. */
export const MAX_RANGE_DAYS = 366;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface AvailabilityQuery {
  officeId?: string;
  date: string;
}

export interface AvailabilityRangeQuery {
  officeId: string;
  startDate: string;
  endDate: string;
}

export function listOfficeAvailability(registry: ScheduleRegistry, query: AvailabilityQuery): AvailabilityResult {
  return registry.resolve(query.officeId).listAvailability(query.date);
}

export function checkOfficeAvailabilityRange(
  registry: ScheduleRegistry,
  query: AvailabilityRangeQuery,
): RangeAvailabilityResult {
  return registry.resolve(query.officeId).checkAvailabilityRange(query.startDate, query.endDate);
}

/**
 * Split a free-form range such as `2024-07-28 to 2024-07-30` into its ends.
 * A single date yields a one-day range. The parts are not validated here.
 */
export function parseDateRange(input: string): { startDate: string; endDate: string } {
  const parts = input
    .split(/\s+to\s+/i)
    .map((part) => part.trim())
    .filter(Boolean);
  const startDate = parts[0] ?? '';
  const endDate = parts[parts.length - 1] ?? startDate;
  return { startDate, endDate };
}

/**
 * Number of dates in the inclusive range, or `null` when either end is not a
 * valid date. A reversed range yields zero or less.
 */
export function countRangeDays(startDate: string, endDate: string): number | null {
  const start = parseDateKey(startDate);
  const end = parseDateKey(endDate);
  if (!start || !end) {
    return null;
  }
  return Math.round((end.getTime() - start.getTime()) / MS_PER_DAY) + 1;
}

export function isRangeTooLong(startDate: string, endDate: string): boolean {
  const days = countRangeDays(startDate, endDate);
  return days !== null && days > MAX_RANGE_DAYS;
}
