import { describe, expect, it } from 'vitest';
import { addDays, eachDateKey, formatDateKey, formatTimeOfDay, parseDateKey, parseTimeOfDay } from '../dates';

describe('parseDateKey', () => {
  it('parses a zero-padded calendar date in the local zone', () => {
    const parsed = parseDateKey('2024-02-29');
    expect(parsed && formatDateKey(parsed)).toBe('2024-02-29');
  });

  it('rejects impossible dates and other layouts', () => {
    expect(parseDateKey('2023-02-29')).toBeNull();
    expect(parseDateKey('2024-13-01')).toBeNull();
    expect(parseDateKey('2024-7-1')).toBeNull();
    expect(parseDateKey('2024-07-01T00:00:00')).toBeNull();
  });
});

describe('day arithmetic', () => {
  it('crosses month and year boundaries', () => {
    expect(formatDateKey(addDays(new Date(2024, 11, 30), 3))).toBe('2025-01-02');
  });

  it('lists every date in an inclusive range', () => {
    expect(eachDateKey(new Date(2024, 1, 28), new Date(2024, 2, 1))).toEqual([
      '2024-02-28',
      '2024-02-29',
      '2024-03-01',
    ]);
  });
});

describe('time of day', () => {
  it('parses 24-hour times with one or two hour digits', () => {
    expect(parseTimeOfDay('09:30')).toBe(570);
    expect(parseTimeOfDay('9:30')).toBe(570);
    expect(parseTimeOfDay('23:59')).toBe(1439);
  });

  it('accepts 24:00 as the end of the day', () => {
    expect(parseTimeOfDay('24:00')).toBe(1440);
  });

  it('rejects out-of-range and malformed times', () => {
    expect(parseTimeOfDay('24:01')).toBeNull();
    expect(parseTimeOfDay('25:00')).toBeNull();
    expect(parseTimeOfDay('10:60')).toBeNull();
    expect(parseTimeOfDay('10.30')).toBeNull();
    expect(parseTimeOfDay('')).toBeNull();
  });

  it('formats minutes as HH:MM', () => {
    expect(formatTimeOfDay(480)).toBe('08:00');
    expect(formatTimeOfDay(1020)).toBe('17:00');
  });
});
