import type { CallRecord, PersistableEntity, ScheduledAction, TranscriptEntry } from '../calls/types';

/**
 * Upsert-only persistence. Keys: call id for calls; (call id, sequence, speaker)
 * for transcript entries; (call id, action id) for scheduled actions.
 */
export interface CallLogStore {
  upsertCall(call: CallRecord): Promise<void>;
  upsertTranscriptEntry(entry: TranscriptEntry): Promise<void>;
  upsertScheduledAction(action: ScheduledAction): Promise<void>;
  close?(): Promise<void>;
}

export interface PersistFailure {
  entity: PersistableEntity;
  key: string;
  attempts: number;
  error: unknown;
  transient: boolean;
}

export function entityKey(entity: PersistableEntity): string {
  switch (entity.kind) {
    case 'call':
      return `call:${entity.call.callId}`;
    case 'transcript':
      return `transcript:${entity.entry.callId}:${entity.entry.sequence}:${entity.entry.speaker}`;
    case 'action':
      return `action:${entity.action.callId}:${entity.action.actionId}`;
  }
}

export function entityCallId(entity: PersistableEntity): string {
  switch (entity.kind) {
    case 'call':
      return entity.call.callId;
    case 'transcript':
      return entity.entry.callId;
    case 'action':
      return entity.action.callId;
  }
}
