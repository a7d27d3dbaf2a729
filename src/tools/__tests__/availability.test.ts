import { describe, expect, it } from 'vitest';
import { createScheduleRegistry } from '../../adapters/calendar';
import type { OfficeConfig } from '../../adapters/calendar/types';
import { UnknownOfficeError } from '../../utils/errors';
import {
  checkOfficeAvailabilityRange,
  countRangeDays,
  isRangeTooLong,
  listOfficeAvailability,
  parseDateRange,
} from '../availability';

const offices: OfficeConfig[] = [
  {
    id: 'pulmonology',
    name: 'Pulmonology',
    bookable: false,
    startHour: 8,
    endHour: 12,
    slotDurationMinutes: 60,
    daysAhead: 2,
    slotsPerDay: 2,
    defaultAppointmentType: 'consultation',
  },
  {
    id: 'general',
    name: 'General Practice',
    bookable: true,
    startHour: 9,
    endHour: 12,
    slotDurationMinutes: 60,
    daysAhead: 3,
    defaultAppointmentType: 'consultation',
  },
];

function createRegistry() {
  return createScheduleRegistry(offices, { referenceDate: new Date(2024, 6, 1, 9, 0), random: () => 0 });
}

describe('listOfficeAvailability', () => {
  it('uses the first bookable office when no office is given', () => {
    const result = listOfficeAvailability(createRegistry(), { date: '2024-07-01' });

    expect(result).toMatchObject({
      status: 'success',
      message: 'Appointment schedule for General Practice on 2024-07-01.',
      availableSlots: ['09:00', '10:00', '11:00'],
    });
  });

  it('reads a specific office', () => {
    const result = listOfficeAvailability(createRegistry(), { officeId: 'pulmonology', date: '2024-07-02' });

    expect(result).toMatchObject({ status: 'success', availableSlots: ['08:00', '09:00'], totalSlots: 4 });
  });

  it('throws for an unknown office', () => {
    expect(() => listOfficeAvailability(createRegistry(), { officeId: 'cardiology', date: '2024-07-01' })).toThrow(
      UnknownOfficeError,
    );
  });
});

describe('checkOfficeAvailabilityRange', () => {
  it('summarises a specialist office over a range', () => {
    const result = checkOfficeAvailabilityRange(createRegistry(), {
      officeId: 'pulmonology',
      startDate: '2024-07-01',
      endDate: '2024-07-03',
    });

    expect(result.status === 'success' && result.summary).toBe(
      [
        'On 2024-07-01, Pulmonology has available appointment slots at: 08:00, 09:00.',
        'On 2024-07-02, Pulmonology has available appointment slots at: 08:00, 09:00.',
        'No appointment slots available on 2024-07-03.',
      ].join('\n'),
    );
  });
});

describe('parseDateRange', () => {
  it('splits "start to end"', () => {
    expect(parseDateRange('2024-07-28 to 2024-07-30')).toEqual({ startDate: '2024-07-28', endDate: '2024-07-30' });
  });

  it('treats a single date as a one-day range', () => {
    expect(parseDateRange(' 2024-07-28 ')).toEqual({ startDate: '2024-07-28', endDate: '2024-07-28' });
  });
});

describe('countRangeDays', () => {
  it('counts both ends of the range', () => {
    expect(countRangeDays('2024-07-01', '2024-07-01')).toBe(1);
    expect(countRangeDays('2024-02-28', '2024-03-01')).toBe(3);
  });

  it('returns null for malformed dates', () => {
    expect(countRangeDays('2024-07-01', 'soon')).toBeNull();
  });
});

describe('isRangeTooLong', () => {
  it('allows up to 366 dates', () => {
    expect(isRangeTooLong('2024-07-01', '2025-07-01')).toBe(false);
    expect(isRangeTooLong('2024-07-01', '2025-07-02')).toBe(true);
  });

  it('leaves reversed and malformed ranges to the calendar', () => {
    expect(isRangeTooLong('9999-12-31', '1000-01-01')).toBe(false);
    expect(isRangeTooLong('1000-01-01', 'later')).toBe(false);
  });
});
