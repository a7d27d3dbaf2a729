const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

const MINUTES_PER_DAY = 24 * 60;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Parse a `YYYY-MM-DD` calendar date in the local zone. Returns `null` for
 * malformed strings and for dates that do not exist (e.g. `2024-02-30`).
 */
export function parseDateKey(value: string): Date | null {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [, yearText, monthText, dayText] = match;
  const year = Number(yearText);
  const monthIndex = Number(monthText) - 1;
  const day = Number(dayText);
  const parsed = new Date(year, monthIndex, day);
  if (parsed.getFullYear() !== year || parsed.getMonth() !== monthIndex || parsed.getDate() !== day) {
    return null;
  }
  return parsed;
}

export function formatDateKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/** Inclusive list of date keys from `start` to `end`. */
export function eachDateKey(start: Date, end: Date): string[] {
  const keys: string[] = [];
  for (let current = start; current.getTime() <= end.getTime(); current = addDays(current, 1)) {
    keys.push(formatDateKey(current));
  }
  return keys;
}

/**
 * Minutes since midnight for a 24-hour `H:MM` or `HH:MM` time, or `null`.
 * `24:00` is accepted as the end of the day.
 */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (minutes > 59 || hours * 60 + minutes > MINUTES_PER_DAY) {
    return null;
  }
  return hours * 60 + minutes;
}

export function formatTimeOfDay(minutes: number): string {
  const clamped = Math.min(Math.max(minutes, 0), MINUTES_PER_DAY);
  return `${pad(Math.floor(clamped / 60))}:${pad(clamped % 60)}`;
}
