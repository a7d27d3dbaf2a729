export interface OfficeConfig {
  id: string;
  name: string;
  startHour: number;
  endHour: number;
  slotDurationMinutes: number;
  daysAhead: number;
  bookable: boolean;
  /** Read-only offices only: how many slots per day the generator opens. */
  slotsPerDay?: number;
  defaultAppointmentType: string;
}

export type SlotState =
  | { kind: 'available' }
  | { kind: 'booked'; occupant: string; appointmentType: string; bookingId: string }
  | { kind: 'blocked' };

export type BookedSlot = Extract<SlotState, { kind: 'booked' }>;

/** Slot start time (HH:MM) to state, in ascending time order. */
export type DaySchedule = Map<string, SlotState>;

/** Date (YYYY-MM-DD) to that day's schedule. */
export type Calendar = Map<string, DaySchedule>;

export type ScheduleErrorCode =
  | 'INVALID_DATE_FORMAT'
  | 'PAST_DATE_NOT_ALLOWED'
  | 'INVALID_DATE_RANGE'
  | 'ALL_PAST_DATES'
  | 'BOOKING_NOT_SUPPORTED'
  | 'MISSING_OCCUPANT'
  | 'INVALID_DATETIME_FORMAT'
  | 'INVALID_TIME_RANGE'
  | 'DATE_NOT_AVAILABLE'
  | 'SLOT_ALREADY_BOOKED';

export interface SlotOccupant {
  occupant: string;
  appointmentType: string;
  bookingId: string;
}

export interface ScheduleFailure {
  status: 'error';
  errorCode: Exclude<ScheduleErrorCode, 'SLOT_ALREADY_BOOKED'>;
  message: string;
}

export interface SlotConflictFailure {
  status: 'error';
  errorCode: 'SLOT_ALREADY_BOOKED';
  message: string;
  conflictingSlot: string;
  /** `null` when the slot is not offered on that day at all. */
  existingOccupant: SlotOccupant | null;
}

export interface AvailabilityReport {
  status: 'success';
  message: string;
  date: string;
  availableSlots: string[];
  bookedAppointments: Record<string, SlotOccupant>;
  totalSlots: number;
  availableCount: number;
  bookedCount: number;
}

export interface DayAvailability {
  date: string;
  availableSlots: string[];
}

export interface RangeAvailabilityReport {
  status: 'success';
  officeId: string;
  startDate: string;
  endDate: string;
  days: DayAvailability[];
  summary: string;
}

export interface BookingRequest {
  date: string;
  startTime: string;
  endTime: string;
  occupant: string;
  appointmentType?: string;
}

export interface AppointmentDetails {
  bookingId: string;
  officeId: string;
  occupant: string;
  appointmentType: string;
  date: string;
  startTime: string;
  endTime: string;
  durationSlots: number;
  bookedSlots: string[];
}

export interface BookingConfirmation {
  status: 'success';
  message: string;
  appointment: AppointmentDetails;
}

export type AvailabilityResult = AvailabilityReport | ScheduleFailure;
export type RangeAvailabilityResult = RangeAvailabilityReport | ScheduleFailure;
export type BookingResult = BookingConfirmation | ScheduleFailure | SlotConflictFailure;

export interface ScheduleStoreOptions {
  config: OfficeConfig;
  /** Day the calendar starts on; fixes "today" for past-date checks. Defaults to now. */
  referenceDate?: Date;
  /** Random source for read-only slot generation. */
  random?: () => number;
  generateBookingId?: () => string;
}

export interface ScheduleStore {
  readonly config: OfficeConfig;
  readonly today: string;
  initialize(referenceDate?: Date): void;
  listDates(): string[];
  listAvailability(date: string): AvailabilityResult;
  checkAvailabilityRange(startDate: string, endDate: string): RangeAvailabilityResult;
  bookAppointment(request: BookingRequest): BookingResult;
}
