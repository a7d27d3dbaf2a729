import { UnknownOfficeError } from '../../utils/errors';
import { createScheduleStore } from './local';
import type { OfficeConfig, ScheduleStore, ScheduleStoreOptions } from './types';

export interface ScheduleRegistry {
  get(officeId: string): ScheduleStore | undefined;
  list(): ScheduleStore[];
  /** Look up an office, falling back to the first bookable one when no id is given. */
  resolve(officeId?: string): ScheduleStore;
}

export type ScheduleRegistryOptions = Omit<ScheduleStoreOptions, 'config'>;

export function createScheduleRegistry(
  offices: OfficeConfig[],
  options: ScheduleRegistryOptions = {},
): ScheduleRegistry {
  const referenceDate = options.referenceDate ?? new Date();
  const stores = new Map<string, ScheduleStore>();
  for (const config of offices) {
    stores.set(config.id, createScheduleStore({ ...options, config, referenceDate }));
  }

  return {
    get(officeId) {
      return stores.get(officeId);
    },
    list() {
      return [...stores.values()];
    },
    resolve(officeId) {
      if (officeId === undefined) {
        const fallback = [...stores.values()].find((store) => store.config.bookable);
        if (!fallback) {
          throw new UnknownOfficeError('(default bookable office)');
        }
        return fallback;
      }
      const store = stores.get(officeId);
      if (!store) {
        throw new UnknownOfficeError(officeId);
      }
      return store;
    },
  };
}

export { createScheduleStore, describeOccupant } from './local';
export type {
  AppointmentDetails,
  AvailabilityReport,
  AvailabilityResult,
  BookingConfirmation,
  BookingRequest,
  BookingResult,
  DayAvailability,
  OfficeConfig,
  RangeAvailabilityReport,
  RangeAvailabilityResult,
  ScheduleErrorCode,
  ScheduleFailure,
  ScheduleStore,
  SlotConflictFailure,
  SlotOccupant,
} from './types';
