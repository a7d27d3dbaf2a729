import { randomUUID } from 'node:crypto';
import { addDays, eachDateKey, formatDateKey, formatTimeOfDay, parseDateKey, parseTimeOfDay } from './dates';
import type {
  AvailabilityResult,
  BookedSlot,
  BookingRequest,
  BookingResult,
  Calendar,
  DaySchedule,
  OfficeConfig,
  RangeAvailabilityResult,
  ScheduleFailure,
  ScheduleStore,
  ScheduleStoreOptions,
  SlotOccupant,
  SlotState,
} from './types';

const BOOKING_ID_LENGTH = 8;

function failure(errorCode: ScheduleFailure['errorCode'], message: string): ScheduleFailure {
  return { status: 'error', errorCode, message };
}

function defaultBookingId(): string {
  return randomUUID().slice(0, BOOKING_ID_LENGTH);
}

function slotStartMinutes(config: OfficeConfig): number[] {
  const opening = config.startHour * 60;
  const closing = config.endHour * 60;
  const starts: number[] = [];
  for (let start = opening; start + config.slotDurationMinutes <= closing; start += config.slotDurationMinutes) {
    starts.push(start);
  }
  return starts;
}

/** Pick `count` entries without replacement, keeping their original order. */
function sampleInOrder(items: string[], count: number, random: () => number): Set<string> {
  const pool = [...items];
  const picked = Math.min(count, pool.length);
  for (let i = 0; i < picked; i += 1) {
    const j = Math.min(pool.length - 1, i + Math.floor(random() * (pool.length - i)));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return new Set(pool.slice(0, picked));
}

function buildDaySchedule(config: OfficeConfig, slotKeys: string[], random: () => number): DaySchedule {
  const open =
    config.bookable || config.slotsPerDay === undefined
      ? new Set(slotKeys)
      : sampleInOrder(slotKeys, config.slotsPerDay, random);

  return new Map(
    slotKeys.map((key): [string, SlotState] => [key, open.has(key) ? { kind: 'available' } : { kind: 'blocked' }]),
  );
}

/**
 * Grid-aligned slot keys covering `[start, end)`. The first key is the grid
 * point at or before `start`, so a 09:30 start on an hourly grid claims 09:00.
 */
function spanSlotKeys(config: OfficeConfig, start: number, end: number): string[] {
  const step = config.slotDurationMinutes;
  const opening = config.startHour * 60;
  const first = Math.max(opening + Math.floor((start - opening) / step) * step, 0);
  const keys: string[] = [];
  for (let slot = first; slot < end; slot += step) {
    keys.push(formatTimeOfDay(slot));
  }
  return keys;
}

function toOccupant(state: BookedSlot): SlotOccupant {
  return { occupant: state.occupant, appointmentType: state.appointmentType, bookingId: state.bookingId };
}

export function describeOccupant(occupant: SlotOccupant): string {
  return `${occupant.occupant} (${occupant.appointmentType})`;
}

function availableTimes(day: DaySchedule | undefined): string[] {
  if (!day) {
    return [];
  }
  return [...day].filter(([, state]) => state.kind === 'available').map(([time]) => time);
}

/**
 * In-memory calendar for one office. Every operation is synchronous, so a
 * booking's validate-then-commit pass can never interleave with another call.
 */
export function createScheduleStore(options: ScheduleStoreOptions): ScheduleStore {
  const config: OfficeConfig = Object.freeze({ ...options.config });
  const random = options.random ?? Math.random;
  const generateBookingId = options.generateBookingId ?? defaultBookingId;
  const slotKeys = slotStartMinutes(config).map(formatTimeOfDay);

  let calendar: Calendar = new Map();
  let today = '';

  function initialize(referenceDate: Date = new Date()): void {
    const firstDay = addDays(referenceDate, 0);
    const next: Calendar = new Map();
    for (let offset = 0; offset < config.daysAhead; offset += 1) {
      next.set(formatDateKey(addDays(firstDay, offset)), buildDaySchedule(config, slotKeys, random));
    }
    calendar = next;
    today = formatDateKey(firstDay);
  }

  function listAvailability(date: string): AvailabilityResult {
    const parsed = parseDateKey(date);
    if (!parsed) {
      return failure('INVALID_DATE_FORMAT', 'Invalid date format. Please provide date in YYYY-MM-DD format.');
    }

    const dateKey = formatDateKey(parsed);
    if (dateKey < today) {
      return failure('PAST_DATE_NOT_ALLOWED', `Cannot check availability for past date: ${dateKey}`);
    }

    const day = calendar.get(dateKey);
    if (!day) {
      return {
        status: 'success',
        message: `No appointment slots configured for ${dateKey}.`,
        date: dateKey,
        availableSlots: [],
        bookedAppointments: {},
        totalSlots: 0,
        availableCount: 0,
        bookedCount: 0,
      };
    }

    const availableSlots: string[] = [];
    const bookedAppointments: Record<string, SlotOccupant> = {};
    for (const [time, state] of day) {
      if (state.kind === 'available') {
        availableSlots.push(time);
      } else if (state.kind === 'booked') {
        bookedAppointments[time] = toOccupant(state);
      }
    }

    return {
      status: 'success',
      message: `Appointment schedule for ${config.name} on ${dateKey}.`,
      date: dateKey,
      availableSlots,
      bookedAppointments,
      totalSlots: day.size,
      availableCount: availableSlots.length,
      bookedCount: Object.keys(bookedAppointments).length,
    };
  }

  function checkAvailabilityRange(startDate: string, endDate: string): RangeAvailabilityResult {
    const start = parseDateKey(startDate);
    const end = parseDateKey(endDate);
    if (!start || !end) {
      return failure(
        'INVALID_DATE_FORMAT',
        'Invalid date format. Please use YYYY-MM-DD for both start and end dates.',
      );
    }
    if (start.getTime() > end.getTime()) {
      return failure('INVALID_DATE_RANGE', 'Start date cannot be after end date. Please provide a valid date range.');
    }

    // Only ranges that end before today are rejected; a range straddling today
    // still lists its past days (they have no schedule).
    if (formatDateKey(end) < today) {
      return failure('ALL_PAST_DATES', 'Cannot check availability for past dates. Please provide future dates.');
    }

    const days = eachDateKey(start, end).map((date) => ({ date, availableSlots: availableTimes(calendar.get(date)) }));
    const summary = days
      .map((day) =>
        day.availableSlots.length
          ? `On ${day.date}, ${config.name} has available appointment slots at: ${day.availableSlots.join(', ')}.`
          : `No appointment slots available on ${day.date}.`,
      )
      .join('\n');

    return {
      status: 'success',
      officeId: config.id,
      startDate: formatDateKey(start),
      endDate: formatDateKey(end),
      days,
      summary,
    };
  }

  function bookAppointment(request: BookingRequest): BookingResult {
    if (!config.bookable) {
      return failure('BOOKING_NOT_SUPPORTED', `${config.name} does not accept bookings; availability is read-only.`);
    }

    const occupant = request.occupant.trim();
    if (!occupant) {
      return failure('MISSING_OCCUPANT', 'Patient name is required to book an appointment.');
    }

    const parsedDate = parseDateKey(request.date);
    const start = parseTimeOfDay(request.startTime);
    const end = parseTimeOfDay(request.endTime);
    if (!parsedDate || start === null || end === null) {
      return failure(
        'INVALID_DATETIME_FORMAT',
        'Invalid date or time format. Please use YYYY-MM-DD for date and HH:MM for time.',
      );
    }

    if (start >= end) {
      return failure('INVALID_TIME_RANGE', 'Appointment start time must be before end time.');
    }

    const dateKey = formatDateKey(parsedDate);
    const day = calendar.get(dateKey);
    if (!day) {
      return failure('DATE_NOT_AVAILABLE', `No appointment slots available on ${dateKey}.`);
    }

    const requiredSlots = spanSlotKeys(config, start, end);

    // Validate the whole span before touching any slot.
    for (const slot of requiredSlots) {
      const state = day.get(slot);
      if (state?.kind === 'available') {
        continue;
      }
      const existingOccupant = state?.kind === 'booked' ? toOccupant(state) : null;
      return {
        status: 'error',
        errorCode: 'SLOT_ALREADY_BOOKED',
        message: existingOccupant
          ? `Appointment slot ${slot} on ${dateKey} is already booked for ${describeOccupant(existingOccupant)}.`
          : `Appointment slot ${slot} on ${dateKey} is not offered.`,
        conflictingSlot: slot,
        existingOccupant,
      };
    }

    const appointmentType = request.appointmentType?.trim() || config.defaultAppointmentType;
    const bookingId = generateBookingId();
    for (const slot of requiredSlots) {
      day.set(slot, { kind: 'booked', occupant, appointmentType, bookingId });
    }

    return {
      status: 'success',
      message: `Appointment successfully booked for ${occupant}.`,
      appointment: {
        bookingId,
        officeId: config.id,
        occupant,
        appointmentType,
        date: dateKey,
        startTime: formatTimeOfDay(start),
        endTime: formatTimeOfDay(end),
        durationSlots: requiredSlots.length,
        bookedSlots: requiredSlots,
      },
    };
  }

  initialize(options.referenceDate);

  return {
    config,
    get today() {
      return today;
    },
    initialize,
    listDates: () => [...calendar.keys()],
    listAvailability,
    checkAvailabilityRange,
    bookAppointment,
  };
}
