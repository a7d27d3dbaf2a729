import { describe, expect, it } from 'vitest';
import { createScheduleRegistry } from '../../adapters/calendar';
import type { OfficeConfig } from '../../adapters/calendar/types';
import { listOfficeAvailability } from '../availability';
import { bookOfficeAppointment, summarizeBookingForLog } from '../booking';

const offices: OfficeConfig[] = [
  {
    id: 'general',
    name: 'General Practice',
    bookable: true,
    startHour: 8,
    endHour: 17,
    slotDurationMinutes: 60,
    daysAhead: 7,
    defaultAppointmentType: 'consultation',
  },
  {
    id: 'neurology',
    name: 'Neurology',
    bookable: false,
    startHour: 8,
    endHour: 17,
    slotDurationMinutes: 60,
    daysAhead: 7,
    slotsPerDay: 6,
    defaultAppointmentType: 'consultation',
  },
];

function createRegistry() {
  return createScheduleRegistry(offices, {
    referenceDate: new Date(2024, 6, 1, 9, 0),
    generateBookingId: () => 'abcd1234',
  });
}

describe('bookOfficeAppointment', () => {
  it('books the default office under the patient name', () => {
    const registry = createRegistry();

    const result = bookOfficeAppointment(registry, {
      date: '2024-07-01',
      startTime: '09:00',
      endTime: '11:00',
      patientName: 'Jane Doe',
    });

    expect(result).toMatchObject({
      status: 'success',
      appointment: { bookingId: 'abcd1234', officeId: 'general', occupant: 'Jane Doe', bookedSlots: ['09:00', '10:00'] },
    });
    const report = listOfficeAvailability(registry, { officeId: 'general', date: '2024-07-01' });
    expect(report).toMatchObject({ availableCount: 7, bookedCount: 2 });
  });

  it('passes engine failures through as results', () => {
    const result = bookOfficeAppointment(createRegistry(), {
      date: '2024-07-01',
      startTime: '09:00',
      endTime: '10:00',
      patientName: '',
    });

    expect(result).toEqual({
      status: 'error',
      errorCode: 'MISSING_OCCUPANT',
      message: 'Patient name is required to book an appointment.',
    });
  });

  it('refuses read-only offices', () => {
    const result = bookOfficeAppointment(createRegistry(), {
      officeId: 'neurology',
      date: '2024-07-01',
      startTime: '09:00',
      endTime: '10:00',
      patientName: 'Jane Doe',
    });

    expect(result).toMatchObject({ status: 'error', errorCode: 'BOOKING_NOT_SUPPORTED' });
  });

  it('keeps office calendars independent', () => {
    const registry = createRegistry();
    bookOfficeAppointment(registry, {
      officeId: 'general',
      date: '2024-07-02',
      startTime: '08:00',
      endTime: '09:00',
      patientName: 'Jane Doe',
    });

    expect(registry.get('neurology')?.listAvailability('2024-07-02')).toMatchObject({ bookedCount: 0 });
  });
});

describe('summarizeBookingForLog', () => {
  const booking = { date: '2024-07-01', startTime: '09:00', endTime: '10:00' };

  it('keeps only the booking id of a confirmation', () => {
    const result = bookOfficeAppointment(createRegistry(), { ...booking, patientName: 'Jane Doe' });

    expect(summarizeBookingForLog(result)).toEqual({ status: 'success', bookingId: 'abcd1234' });
  });

  it('keeps the conflicting slot but not the existing patient', () => {
    const registry = createRegistry();
    bookOfficeAppointment(registry, { ...booking, patientName: 'Jane Doe' });

    const conflict = bookOfficeAppointment(registry, { ...booking, patientName: 'John Roe' });

    expect(summarizeBookingForLog(conflict)).toEqual({
      status: 'error',
      errorCode: 'SLOT_ALREADY_BOOKED',
      conflictingSlot: '09:00',
    });
  });

  it('keeps the error code of other failures', () => {
    const result = bookOfficeAppointment(createRegistry(), { ...booking, officeId: 'neurology', patientName: 'Jane Doe' });

    expect(summarizeBookingForLog(result)).toEqual({ status: 'error', errorCode: 'BOOKING_NOT_SUPPORTED' });
  });
});
