import { createHash } from 'crypto';
import { z } from 'zod';
import { ProtocolError } from '../errors';
import type { CallDirection, CallId, Namespace, Speaker, TerminalCallStatus } from '../calls/types';

// Largest epoch millisecond a Date can hold.
const MAX_DATE_MS = 8.64e15;

const TimestampSchema = z
  .union([
    z.number().finite().nonnegative().max(MAX_DATE_MS),
    z.string().datetime({ offset: true }),
  ])
  .transform((value) => new Date(value));

const CallStartedPayloadSchema = z
  .object({
    direction: z.enum(['inbound', 'outbound']).optional(),
    phone_number: z.string().min(1).optional(),
    timestamp: TimestampSchema.optional(),
  })
  .passthrough();

const StatusUpdatePayloadSchema = z
  .object({
    status: z.string().min(1),
    message: z.string().optional(),
    timestamp: TimestampSchema.optional(),
  })
  .passthrough();

const TurnCompletedPayloadSchema = z
  .object({
    sequence: z.number().int().nonnegative().optional(),
    speaker: z.enum(['user', 'agent', 'system']).default('user'),
    text: z.string(),
    timestamp: TimestampSchema.optional(),
    sentiment_score: z.number().finite().optional(),
    respond: z.boolean().optional(),
  })
  .passthrough();

const EndOfCallPayloadSchema = z
  .object({
    timestamp: TimestampSchema.optional(),
    started_at: TimestampSchema.optional(),
    outcome: z.enum(['completed', 'failed', 'missed']).optional(),
    ended_reason: z.string().min(1).optional(),
    recording_url: z.string().min(1).optional(),
  })
  .passthrough();

const envelope = {
  call_id: z.string().min(1),
  namespace: z.string().min(1),
  event_id: z.string().min(1).optional(),
};

const RawEventSchema = z.discriminatedUnion('event_type', [
  z.object({ event_type: z.literal('call-started'), ...envelope, payload: CallStartedPayloadSchema.default({}) }),
  z.object({ event_type: z.literal('status-update'), ...envelope, payload: StatusUpdatePayloadSchema }),
  z.object({ event_type: z.literal('turn-completed'), ...envelope, payload: TurnCompletedPayloadSchema }),
  z.object({
    event_type: z.literal('end-of-call-report'),
    ...envelope,
    payload: EndOfCallPayloadSchema.default({}),
  }),
]);

export type VoiceEventType = z.infer<typeof RawEventSchema>['event_type'];

interface EventEnvelope {
  eventId: string;
  callId: CallId;
  namespace: Namespace;
  receivedAt: Date;
}

export interface CallStartedEvent extends EventEnvelope {
  type: 'call-started';
  direction?: CallDirection;
  phoneNumber?: string;
  timestamp?: Date;
}

export interface StatusUpdateEvent extends EventEnvelope {
  type: 'status-update';
  status: string;
  message?: string;
  timestamp?: Date;
}

export interface TurnCompletedEvent extends EventEnvelope {
  type: 'turn-completed';
  sequence?: number;
  speaker: Speaker;
  text: string;
  timestamp?: Date;
  sentimentScore?: number;
  /** A user turn asks the orchestrator for a reply unless the sender opts out. */
  respond: boolean;
}

export interface EndOfCallEvent extends EventEnvelope {
  type: 'end-of-call-report';
  timestamp?: Date;
  startedAt?: Date;
  outcome?: TerminalCallStatus;
  endedReason?: string;
  recordingUrl?: string;
}

export type VoiceEvent = CallStartedEvent | StatusUpdateEvent | TurnCompletedEvent | EndOfCallEvent;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Identity of an event delivery: the sender's event_id when present, otherwise a
 * digest of the event body so redelivery of an identical body maps to the same id.
 */
export function deriveEventId(raw: Record<string, unknown>): string {
  const explicit = raw.event_id;
  if (typeof explicit === 'string' && explicit.trim() !== '') {
    return explicit;
  }
  const { event_id: _ignored, ...rest } = raw;
  return createHash('sha256').update(stableStringify(rest)).digest('hex').slice(0, 32);
}

export function parseVoiceEvent(input: unknown, receivedAt: Date = new Date()): VoiceEvent {
  const result = RawEventSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new ProtocolError(`malformed event: ${issues}`);
  }

  const raw = result.data;
  const base: EventEnvelope = {
    eventId: deriveEventId(isRecord(input) ? input : {}),
    callId: raw.call_id,
    namespace: raw.namespace,
    receivedAt,
  };

  switch (raw.event_type) {
    case 'call-started':
      return {
        ...base,
        type: 'call-started',
        direction: raw.payload.direction,
        phoneNumber: raw.payload.phone_number,
        timestamp: raw.payload.timestamp,
      };
    case 'status-update':
      return {
        ...base,
        type: 'status-update',
        status: raw.payload.status,
        message: raw.payload.message,
        timestamp: raw.payload.timestamp,
      };
    case 'turn-completed':
      return {
        ...base,
        type: 'turn-completed',
        sequence: raw.payload.sequence,
        speaker: raw.payload.speaker,
        text: raw.payload.text,
        timestamp: raw.payload.timestamp,
        sentimentScore: raw.payload.sentiment_score,
        respond: raw.payload.speaker === 'user' && raw.payload.respond !== false,
      };
    case 'end-of-call-report':
      return {
        ...base,
        type: 'end-of-call-report',
        timestamp: raw.payload.timestamp,
        startedAt: raw.payload.started_at,
        outcome: raw.payload.outcome,
        endedReason: raw.payload.ended_reason,
        recordingUrl: raw.payload.recording_url,
      };
  }
}
