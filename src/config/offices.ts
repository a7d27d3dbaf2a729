import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { parse } from 'yaml';
import type { OfficeConfig } from '../adapters/calendar/types';
import { env } from './env';

const DEFAULT_OFFICES_PATH = resolve(__dirname, '../../config/offices.yml');

export const OFFICES_PATH = env.OFFICES_CONFIG_PATH ? resolve(env.OFFICES_CONFIG_PATH) : DEFAULT_OFFICES_PATH;

const officeSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'id must be lowercase letters, digits, "-" or "_"'),
    name: z.string().min(1),
    bookable: z.boolean().default(true),
    start_hour: z.number().int().min(0).max(23),
    end_hour: z.number().int().min(1).max(24),
    slot_duration_minutes: z.number().int().positive().default(60),
    days_ahead: z.number().int().min(1).max(366).default(7),
    slots_per_day: z.number().int().positive().optional(),
    default_appointment_type: z.string().min(1).default('consultation'),
  })
  .superRefine((office, ctx) => {
    if (office.end_hour <= office.start_hour) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_hour'],
        message: 'end_hour must be after start_hour',
      });
      return;
    }
    const slotCount = Math.floor(((office.end_hour - office.start_hour) * 60) / office.slot_duration_minutes);
    if (slotCount === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slot_duration_minutes'],
        message: 'slot_duration_minutes is longer than the office day',
      });
    }
    if (office.slots_per_day !== undefined) {
      if (office.bookable) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['slots_per_day'],
          message: 'slots_per_day only applies to read-only offices',
        });
      } else if (office.slots_per_day > slotCount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['slots_per_day'],
          message: `slots_per_day cannot exceed the ${slotCount} slots in a day`,
        });
      }
    }
  });

const officeDirectorySchema = z
  .object({
    clinic: z.object({
      name: z.string().min(1),
    }),
    offices: z.array(officeSchema).min(1),
  })
  .superRefine((directory, ctx) => {
    const seen = new Set<string>();
    directory.offices.forEach((office, index) => {
      if (seen.has(office.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['offices', index, 'id'],
          message: `duplicate office id "${office.id}"`,
        });
      }
      seen.add(office.id);
    });
  });

export interface OfficeDirectory {
  clinicName: string;
  offices: OfficeConfig[];
}

/**
 * Validate a YAML office directory and map it onto engine configs.
 */
export function parseOfficeDirectory(source: string): OfficeDirectory {
  const parsedResult = officeDirectorySchema.safeParse(parse(source));

  if (!parsedResult.success) {
    const messages = parsedResult.error.errors
      .map((issue) => `${issue.path.length ? issue.path.join('.') : 'root'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Failed to load office directory: ${messages}`);
  }

  const { clinic, offices } = parsedResult.data;
  return {
    clinicName: clinic.name,
    offices: offices.map((office) => ({
      id: office.id,
      name: office.name,
      bookable: office.bookable,
      startHour: office.start_hour,
      endHour: office.end_hour,
      slotDurationMinutes: office.slot_duration_minutes,
      daysAhead: office.days_ahead,
      slotsPerDay: office.slots_per_day,
      defaultAppointmentType: office.default_appointment_type,
    })),
  };
}

export function loadOfficeDirectory(filePath: string = OFFICES_PATH): OfficeDirectory {
  return parseOfficeDirectory(readFileSync(filePath, 'utf8'));
}

let officeDirectoryCache: OfficeDirectory | undefined;

export function getOfficeDirectory(): OfficeDirectory {
  if (!officeDirectoryCache) {
    officeDirectoryCache = loadOfficeDirectory();
  }
  return officeDirectoryCache;
}

export function reloadOfficeDirectory(): OfficeDirectory {
  officeDirectoryCache = loadOfficeDirectory();
  return officeDirectoryCache;
}
