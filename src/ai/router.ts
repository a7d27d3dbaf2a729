import OpenAI, { APIConnectionError, APIError } from 'openai';
import type {
  ChatCompletionAssistantMessageParam,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { z } from 'zod';
import type { ScheduleRegistry } from '../adapters/calendar';
import { env } from '../config/env';
import {
  checkOfficeAvailabilityRange,
  isRangeTooLong,
  listOfficeAvailability,
  MAX_RANGE_DAYS,
  parseDateRange,
} from '../tools/availability';
import { bookOfficeAppointment, summarizeBookingForLog } from '../tools/booking';
import { ConfigurationError } from '../utils/errors';
import { logEvent } from '../utils/log';
import { executeWithRetry } from './retry';

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  role: ChatRole;
  content: string | null;
  name?: string;
  tool_call_id?: string;
}

export interface ChatRequest {
  messages: ChatMessage[];
}

export interface ChatResponse {
  message: ChatMessage;
  toolsUsed: string[];
  toolResults: Record<string, unknown[]>;
}

export interface ChatContext {
  registry: ScheduleRegistry;
  clinicName: string;
}

const availabilityInputSchema = z.object({
  office_id: z.string().min(1).optional(),
  date: z.string().min(1),
});

const specialistAvailabilityInputSchema = z
  .object({
    office_id: z.string().min(1),
    date_range: z.string().min(1),
  })
  .superRefine((input, ctx) => {
    const { startDate, endDate } = parseDateRange(input.date_range);
    if (isRangeTooLong(startDate, endDate)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['date_range'],
        message: `date range cannot span more than ${MAX_RANGE_DAYS} days`,
      });
    }
  });

const bookingInputSchema = z.object({
  office_id: z.string().min(1).optional(),
  date: z.string().min(1),
  start_time: z.string().min(1),
  end_time: z.string().min(1),
  patient_name: z.string(),
  appointment_type: z.string().optional(),
});

type ToolExecutor = (args: unknown, context: ChatContext) => unknown;

const toolExecutors: Record<string, ToolExecutor> = {
  list_appointment_availabilities: (args, context) => {
    const parsed = availabilityInputSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(parsed.error.message);
    }
    return listOfficeAvailability(context.registry, {
      officeId: parsed.data.office_id,
      date: parsed.data.date,
    });
  },
  check_specialist_availability: (args, context) => {
    const parsed = specialistAvailabilityInputSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(parsed.error.message);
    }
    const { startDate, endDate } = parseDateRange(parsed.data.date_range);
    return checkOfficeAvailabilityRange(context.registry, {
      officeId: parsed.data.office_id,
      startDate,
      endDate,
    });
  },
  book_appointment: (args, context) => {
    const parsed = bookingInputSchema.safeParse(args);
    if (!parsed.success) {
      throw new Error(parsed.error.message);
    }
    const result = bookOfficeAppointment(context.registry, {
      officeId: parsed.data.office_id,
      date: parsed.data.date,
      startTime: parsed.data.start_time,
      endTime: parsed.data.end_time,
      patientName: parsed.data.patient_name,
      appointmentType: parsed.data.appointment_type,
    });
    logEvent('chat.booking', summarizeBookingForLog(result));
    return result;
  },
};

const toolDefinitions: ChatCompletionTool[] = [
  {
    type: 'function',
    function: {
      name: 'list_appointment_availabilities',
      description:
        'List the available and booked appointment slots for one date at a bookable office. Omit office_id for the general practice.',
      parameters: {
        type: 'object',
        required: ['date'],
        properties: {
          office_id: { type: 'string' },
          date: { type: 'string', description: 'Date in YYYY-MM-DD format' },
        },
      },
    },
  },
  {
    type: 'function',
    function: {
      name: 'check_specialist_availability',
      description: "Check a specialist office's open appointment slots for a date or a date range.",
      parameters: {
        type: 'object',
        required: ['office_id', 'date_range'],
        properties: {
          office_id: { type: 'string' },
          date_range: {
            type: 'string',
            description: "A date like '2024-07-28' or a range like '2024-07-28 to 2024-07-30'",
          },
        },
      },
    },
  },
  {
    type: 'function',
    function: {
      name: 'book_appointment',
      description:
        'Book an appointment for a patient. Only call this after the patient has confirmed their name, the date and the time.',
      parameters: {
        type: 'object',
        required: ['date', 'start_time', 'end_time', 'patient_name'],
        properties: {
          office_id: { type: 'string' },
          date: { type: 'string', description: 'Date in YYYY-MM-DD format' },
          start_time: { type: 'string', description: 'Start time in HH:MM, 24-hour' },
          end_time: { type: 'string', description: 'End time in HH:MM, 24-hour' },
          patient_name: { type: 'string' },
          appointment_type: { type: 'string', description: 'Defaults to consultation' },
        },
      },
    },
  },
];

const MAX_TOOL_EXECUTIONS = 6;

const RETRYABLE_STATUS_CODES = new Set([408, 409, 429]);

function isTransientCompletionError(error: unknown): boolean {
  if (error instanceof APIConnectionError) {
    return true;
  }
  if (error instanceof APIError) {
    const status = error.status ?? 0;
    return RETRYABLE_STATUS_CODES.has(status) || status >= 500;
  }
  return false;
}

let openaiClient: OpenAI | undefined;

function getOpenAIClient(): OpenAI {
  if (!env.OPENAI_API_KEY) {
    throw new ConfigurationError('OPENAI_API_KEY is required for the scheduling assistant');
  }
  if (!openaiClient) {
    openaiClient = new OpenAI({ apiKey: env.OPENAI_API_KEY });
  }
  return openaiClient;
}

export function buildSystemPrompt(context: ChatContext): string {
  const offices = context.registry
    .list()
    .map(
      (store) =>
        `${store.config.id} (${store.config.name}, ${
          store.config.bookable ? 'bookable' : 'availability only'
        }, ${String(store.config.startHour).padStart(2, '0')}:00-${String(store.config.endHour).padStart(2, '0')}:00)`,
    )
    .join('; ');
  const today = context.registry.list()[0]?.today ?? '';

  return [
    `You are the appointment scheduling assistant for ${context.clinicName}. Today's date is ${today}.`,
    `Offices: ${offices}.`,
    'Always use the tools for availability and bookings; never invent open slots.',
    'Confirm the patient name, date and time before booking, and repeat the booking id once confirmed.',
    'Keep a courteous, professional tone and keep answers short. Do not give medical advice.',
  ].join(' ');
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  const content = message.content ?? '';
  switch (message.role) {
    case 'tool':
      return { role: 'tool', tool_call_id: message.tool_call_id ?? '', content };
    case 'assistant':
      return { role: 'assistant', content, name: message.name };
    case 'system':
      return { role: 'system', content, name: message.name };
    case 'user':
      return { role: 'user', content, name: message.name };
  }
}

function toAssistantMessageParam(message: ChatCompletionMessage): ChatCompletionAssistantMessageParam {
  return {
    role: 'assistant',
    content: message.content ?? '',
    tool_calls: message.tool_calls,
  };
}

interface ToolOutcome {
  ok: boolean;
  data?: unknown;
  error?: string;
}

function runTool(name: string, rawArguments: string, context: ChatContext): ToolOutcome {
  const executor = toolExecutors[name];
  if (!executor) {
    return { ok: false, error: `Unknown tool: ${name}` };
  }

  let parsedArgs: unknown;
  try {
    parsedArgs = rawArguments ? JSON.parse(rawArguments) : {};
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : 'Unable to parse tool arguments as JSON' };
  }

  try {
    return { ok: true, data: executor(parsedArgs, context) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : 'Tool execution failed' };
  }
}

export async function handleChatRequest(request: ChatRequest, context: ChatContext): Promise<ChatResponse> {
  const openai = getOpenAIClient();
  const conversation: ChatCompletionMessageParam[] = [
    { role: 'system', content: buildSystemPrompt(context) },
    ...request.messages.map(toOpenAIMessage),
  ];
  const toolsUsed = new Set<string>();
  const toolResults: Record<string, unknown[]> = {};

  for (let step = 0; step < MAX_TOOL_EXECUTIONS; step += 1) {
    const completion = await executeWithRetry(
      () =>
        openai.chat.completions.create({
          model: env.OPENAI_MODEL,
          messages: conversation,
          tool_choice: 'auto',
          tools: toolDefinitions,
        }),
      {
        shouldRetry: isTransientCompletionError,
        onRetry: (attempt, error, nextDelayMs) => {
          console.warn(`Chat completion failed on attempt ${attempt}. Retrying in ${nextDelayMs}ms:`, error);
        },
      },
    );

    const choice = completion.choices[0];
    if (!choice?.message) {
      throw new Error('OpenAI response did not include a message');
    }

    const assistantMessage = toAssistantMessageParam(choice.message);
    conversation.push(assistantMessage);

    if (!assistantMessage.tool_calls?.length) {
      return {
        message: { role: 'assistant', content: choice.message.content ?? '' },
        toolsUsed: [...toolsUsed],
        toolResults,
      };
    }

    // Tools run once each; a failed booking is reported back to the model, never retried.
    for (const toolCall of assistantMessage.tool_calls) {
      const name = toolCall.function.name;
      const outcome = runTool(name, toolCall.function.arguments, context);
      if (outcome.ok) {
        toolsUsed.add(name);
        if (!toolResults[name]) {
          toolResults[name] = [];
        }
        toolResults[name].push(outcome.data);
      }
      conversation.push({
        role: 'tool',
        tool_call_id: toolCall.id,
        content: JSON.stringify(outcome),
      });
    }
  }

  return {
    message: {
      role: 'assistant',
      content:
        "I'm having trouble completing that request right now. Please try again, or call the front desk to schedule.",
    },
    toolsUsed: [...toolsUsed],
    toolResults,
  };
}
