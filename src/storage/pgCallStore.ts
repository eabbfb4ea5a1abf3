import { Pool } from 'pg';
import { log } from '../log';
import type { CallRecord, ScheduledAction, TranscriptEntry } from '../calls/types';
import type { CallLogStore } from './types';

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

// A call that already reached Ended is never moved back by a stale write, nor
// replaced by an Ended write that knows of fewer user turns.
const SQL_UPSERT_CALL =
  'INSERT INTO calls (call_id, namespace, phone_number, direction, start_time, end_time, duration, ' +
  'status, phase, ended_reason, recording_url, turns, updated_at) ' +
  'VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, NOW()) ' +
  'ON CONFLICT (call_id) DO UPDATE SET ' +
  'phone_number = COALESCE(EXCLUDED.phone_number, calls.phone_number), ' +
  'direction = COALESCE(EXCLUDED.direction, calls.direction), ' +
  'start_time = EXCLUDED.start_time, end_time = EXCLUDED.end_time, duration = EXCLUDED.duration, ' +
  'status = EXCLUDED.status, phase = EXCLUDED.phase, ' +
  'ended_reason = COALESCE(EXCLUDED.ended_reason, calls.ended_reason), ' +
  'recording_url = COALESCE(EXCLUDED.recording_url, calls.recording_url), ' +
  'turns = EXCLUDED.turns, updated_at = NOW() ' +
  "WHERE calls.phase <> 'Ended' OR (EXCLUDED.phase = 'Ended' AND EXCLUDED.turns >= calls.turns)";

const SQL_UPSERT_TRANSCRIPT =
  'INSERT INTO transcripts (call_id, sequence, speaker, content, timestamp, sentiment_score) ' +
  'VALUES ($1, $2, $3, $4, $5, $6) ' +
  'ON CONFLICT (call_id, sequence, speaker) DO UPDATE SET ' +
  'content = EXCLUDED.content, timestamp = EXCLUDED.timestamp, sentiment_score = EXCLUDED.sentiment_score';

const SQL_UPSERT_APPOINTMENT =
  'INSERT INTO appointments (call_id, action_id, namespace, customer_name, customer_phone, customer_address, ' +
  'issue_type, scheduled_time, calendar_event_id, crm_contact_id) ' +
  'VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10) ' +
  'ON CONFLICT (call_id, action_id) DO UPDATE SET ' +
  'calendar_event_id = COALESCE(EXCLUDED.calendar_event_id, appointments.calendar_event_id), ' +
  'crm_contact_id = COALESCE(EXCLUDED.crm_contact_id, appointments.crm_contact_id)';

export function createPool(connectionString: string, max: number): Pool {
  const pool = new Pool({ connectionString, max });
  pool.on('error', (error) => {
    log.error({ err: error, event: 'pg_pool_error' }, 'idle postgres client error');
  });
  return pool;
}

/**
 * PostgreSQL call log. Every write is a single pooled statement, so writes for
 * unrelated calls run on separate connections.
 */
export class PgCallStore implements CallLogStore {
  constructor(private readonly db: Queryable & { end?: () => Promise<void> }) {}

  public async upsertCall(call: CallRecord): Promise<void> {
    await this.db.query(SQL_UPSERT_CALL, [
      call.callId,
      call.namespace,
      call.phoneNumber ?? null,
      call.direction ?? null,
      call.startedAt ?? null,
      call.endedAt ?? null,
      call.durationSeconds ?? null,
      call.status,
      call.phase,
      call.endedReason ?? null,
      call.recordingUrl ?? null,
      call.turns,
    ]);
  }

  public async upsertTranscriptEntry(entry: TranscriptEntry): Promise<void> {
    await this.db.query(SQL_UPSERT_TRANSCRIPT, [
      entry.callId,
      entry.sequence,
      entry.speaker,
      entry.content,
      entry.timestamp,
      entry.sentimentScore ?? null,
    ]);
  }

  public async upsertScheduledAction(action: ScheduledAction): Promise<void> {
    await this.db.query(SQL_UPSERT_APPOINTMENT, [
      action.callId,
      action.actionId,
      action.namespace,
      action.customerName,
      action.customerPhone,
      action.customerAddress ?? null,
      action.issueType,
      action.scheduledTime,
      action.calendarEventId ?? null,
      action.crmContactId ?? null,
    ]);
  }

  public async close(): Promise<void> {
    if (this.db.end) {
      await this.db.end();
    }
  }
}
