import { z } from 'zod';

const ACTION_LINE_RE = /^\s*ACTION\s+([A-Za-z_]+)\s+(\{.*\})\s*$/;

const ScheduleAppointmentSchema = z.object({
  customer_name: z.string().trim().min(1),
  customer_phone: z.string().trim().min(1),
  customer_address: z.string().trim().min(1).optional(),
  issue_type: z.string().trim().min(1),
  scheduled_time: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
});

export type ScheduleAppointmentParams = z.infer<typeof ScheduleAppointmentSchema>;

export type ActionIntent = { intent: 'schedule_appointment'; params: ScheduleAppointmentParams };

export type IntentName = ActionIntent['intent'];

export interface ParsedCompletion {
  text: string;
  intents: ActionIntent[];
}

const INTENT_PARSERS: Record<IntentName, (body: unknown) => ActionIntent | null> = {
  schedule_appointment: (body) => {
    const result = ScheduleAppointmentSchema.safeParse(body);
    return result.success ? { intent: 'schedule_appointment', params: result.data } : null;
  },
};

/** Intents a completion may request; any other ACTION line is spoken as-is. */
export const INTENT_VOCABULARY = Object.keys(INTENT_PARSERS);

function isIntentName(name: string): name is IntentName {
  return INTENT_VOCABULARY.includes(name);
}

function parseIntentLine(name: string, json: string): ActionIntent | null {
  if (!isIntentName(name)) {
    return null;
  }

  let body: unknown;
  try {
    body = JSON.parse(json);
  } catch {
    return null;
  }
  return INTENT_PARSERS[name](body);
}

/**
 * Splits a completion into spoken text and recognised action intents. Lines naming
 * an intent outside the vocabulary, or carrying invalid parameters, stay in the
 * spoken text as ordinary conversation.
 */
export function parseCompletion(completion: string): ParsedCompletion {
  const kept: string[] = [];
  const intents: ActionIntent[] = [];

  for (const line of completion.split(/\r?\n/)) {
    const match = ACTION_LINE_RE.exec(line);
    const intent = match ? parseIntentLine(match[1], match[2]) : null;
    if (intent) {
      intents.push(intent);
    } else {
      kept.push(line);
    }
  }

  return {
    text: kept.join('\n').replace(/\n{3,}/g, '\n\n').trim(),
    intents,
  };
}
