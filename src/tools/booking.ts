import type { ScheduleRegistry } from '../adapters/calendar';
import type { BookingResult, ScheduleErrorCode } from '../adapters/calendar/types';

export type { BookingResult } from '../adapters/calendar/types';

export interface AppointmentInput {
  officeId?: string;
  date: string;
  startTime: string;
  endTime: string;
  patientName: string;
  appointmentType?: string;
}

export function bookOfficeAppointment(registry: ScheduleRegistry, input: AppointmentInput): BookingResult {
  return registry.resolve(input.officeId).bookAppointment({
    date: input.date,
    startTime: input.startTime,
    endTime: input.endTime,
    occupant: input.patientName,
    appointmentType: input.appointmentType,
  });
}

export interface BookingLogSummary {
  status: BookingResult['status'];
  errorCode?: ScheduleErrorCode;
  conflictingSlot?: string;
  bookingId?: string;
}

/**
 * Booking outcome without patient names. Result messages embed the occupant in
 * free text, so only identifiers are kept.
 */
export function summarizeBookingForLog(result: BookingResult): BookingLogSummary {
  if (result.status === 'success') {
    return { status: result.status, bookingId: result.appointment.bookingId };
  }
  if (result.errorCode === 'SLOT_ALREADY_BOOKED') {
    return {
      status: result.status,
      errorCode: result.errorCode,
      conflictingSlot: result.conflictingSlot,
    };
  }
  return { status: result.status, errorCode: result.errorCode };
}
