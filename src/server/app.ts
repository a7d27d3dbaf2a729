import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ScheduleRegistry } from '../adapters/calendar';
import type { ScheduleErrorCode } from '../adapters/calendar/types';
import { handleChatRequest } from '../ai/router';
import {
  checkOfficeAvailabilityRange,
  isRangeTooLong,
  listOfficeAvailability,
  MAX_RANGE_DAYS,
} from '../tools/availability';
import { bookOfficeAppointment, summarizeBookingForLog } from '../tools/booking';
import { AppError } from '../utils/errors';
import { logError, logEvent } from '../utils/log';

export interface AppDependencies {
  registry: ScheduleRegistry;
  clinicName: string;
  rateLimitMaxRequests?: number;
}

const rateLimitWindowMs = 60_000;

const ERROR_STATUS: Record<ScheduleErrorCode, number> = {
  INVALID_DATE_FORMAT: 400,
  INVALID_DATE_RANGE: 400,
  INVALID_DATETIME_FORMAT: 400,
  INVALID_TIME_RANGE: 400,
  MISSING_OCCUPANT: 400,
  PAST_DATE_NOT_ALLOWED: 422,
  ALL_PAST_DATES: 422,
  DATE_NOT_AVAILABLE: 404,
  SLOT_ALREADY_BOOKED: 409,
  BOOKING_NOT_SUPPORTED: 405,
};

export function statusForResult(result: { status: 'success' } | { status: 'error'; errorCode: ScheduleErrorCode }): number {
  return result.status === 'success' ? 200 : ERROR_STATUS[result.errorCode];
}

const availabilityRequestSchema = z.object({
  officeId: z.string().min(1).optional(),
  date: z.string().min(1, 'date is required'),
});

const availabilityRangeRequestSchema = z
  .object({
    officeId: z.string().min(1, 'officeId is required'),
    startDate: z.string().min(1, 'startDate is required'),
    endDate: z.string().min(1, 'endDate is required'),
  })
  .superRefine((query, ctx) => {
    if (isRangeTooLong(query.startDate, query.endDate)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endDate'],
        message: `date range cannot span more than ${MAX_RANGE_DAYS} days`,
      });
    }
  });

const bookingRequestSchema = z.object({
  officeId: z.string().min(1).optional(),
  date: z.string().min(1, 'date is required'),
  startTime: z.string().min(1, 'startTime is required'),
  endTime: z.string().min(1, 'endTime is required'),
  patientName: z.string(),
  appointmentType: z.string().optional(),
});

const chatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string().nullable(),
  name: z.string().optional(),
  tool_call_id: z.string().optional(),
});

const chatRequestSchema = z.object({
  messages: z.array(chatMessageSchema).min(1, 'messages must not be empty'),
});

function issueDetails(error: z.ZodError): { path: (string | number)[]; message: string }[] {
  return error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
}

export function createApp({ registry, clinicName, rateLimitMaxRequests = 60 }: AppDependencies): Express {
  const app = express();
  const rateLimitStore = new Map<string, { count: number; resetAt: number }>();

  function rateLimitMiddleware(req: Request, res: Response, next: NextFunction): void {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();
    const entry = rateLimitStore.get(ip);

    if (!entry || entry.resetAt < now) {
      rateLimitStore.set(ip, { count: 1, resetAt: now + rateLimitWindowMs });
      next();
      return;
    }

    if (entry.count >= rateLimitMaxRequests) {
      res.status(429).json({ error: 'Too many requests. Please slow down.' });
      return;
    }

    entry.count += 1;
    next();
  }

  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS'],
    }),
  );
  app.use(rateLimitMiddleware);
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', service: clinicName, timestamp: new Date().toISOString() });
  });

  app.get('/offices', (_req: Request, res: Response) => {
    res.json({
      data: registry.list().map((store) => ({
        ...store.config,
        today: store.today,
        dates: store.listDates(),
      })),
    });
  });

  app.post('/tools/availability', (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = availabilityRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid availability request', details: issueDetails(parsed.error) });
        return;
      }

      logEvent('tools.availability.request', parsed.data);
      const result = listOfficeAvailability(registry, parsed.data);
      logEvent('tools.availability.response', { status: result.status });

      res.status(statusForResult(result)).json({ data: result });
    } catch (error) {
      next(error);
    }
  });

  app.post('/tools/availability-range', (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = availabilityRangeRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid availability range request', details: issueDetails(parsed.error) });
        return;
      }

      logEvent('tools.availability_range.request', parsed.data);
      const result = checkOfficeAvailabilityRange(registry, parsed.data);
      logEvent('tools.availability_range.response', { status: result.status });

      res.status(statusForResult(result)).json({ data: result });
    } catch (error) {
      next(error);
    }
  });

  app.post('/tools/book', (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = bookingRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid booking request', details: issueDetails(parsed.error) });
        return;
      }

      logEvent('tools.book.request', parsed.data);
      const result = bookOfficeAppointment(registry, parsed.data);
      logEvent('tools.book.response', summarizeBookingForLog(result));

      res.status(statusForResult(result)).json({ data: result });
    } catch (error) {
      next(error);
    }
  });

  app.post('/chat', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid chat request', details: issueDetails(parsed.error) });
        return;
      }

      const requestStarted = Date.now();
      logEvent('chat.request', { messageCount: parsed.data.messages.length });

      const result = await handleChatRequest(parsed.data, { registry, clinicName });

      logEvent('chat.response', { toolsUsed: result.toolsUsed, durationMs: Date.now() - requestStarted });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof AppError) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }
    logError('Server error', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
