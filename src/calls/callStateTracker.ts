import { log } from '../log';
import type { EndOfCallEvent, TurnCompletedEvent, VoiceEvent } from '../events/types';
import { appendsTranscript, isTerminal, nextPhase } from './callStateMachine';
import { turnCountPolicy, type TerminalStatusPolicy } from './statusPolicy';
import type {
  CallId,
  CallRecord,
  ExternalReferences,
  PersistableEntity,
  ScheduledAction,
  Speaker,
  TerminalCallStatus,
  TranscriptEntry,
  TurnResponse,
} from './types';

export type UnknownCallPolicy = 'create' | 'reject';

export type TrackerOutcome = 'applied' | 'duplicate' | 'rejected';

export interface TrackerResult {
  outcome: TrackerOutcome;
  call?: CallRecord;
  entry?: TranscriptEntry;
  /** True only for the event that moved the call into `Ended`. */
  ended: boolean;
  writes: PersistableEntity[];
}

type StartSource = 'call-started' | 'report' | 'inferred';

interface TrackedCall {
  record: CallRecord;
  seenEvents: Set<string>;
  transcript: TranscriptEntry[];
  explicitOutcome?: TerminalCallStatus;
  startSource?: StartSource;
  nextArrivalSequence: number;
  replies: Map<string, TurnResponse>;
  actions: Map<string, ScheduledAction>;
  endedObservedAt?: number;
  lastEventAt: number;
}

/** What is kept of an ended call after its state leaves memory. */
interface ReleasedCall {
  namespace: string;
  seenEvents: Set<string>;
  releasedAt: number;
}

const DEFAULT_RELEASED_RETENTION_MS = 24 * 60 * 60_000;

export const IDLE_TIMEOUT_REASON = 'idle_timeout';

const SPEAKER_RANK: Record<Speaker, number> = { user: 0, agent: 1, system: 2 };

function compareEntries(a: TranscriptEntry, b: TranscriptEntry): number {
  if (a.sequence !== b.sequence) return a.sequence - b.sequence;
  return SPEAKER_RANK[a.speaker] - SPEAKER_RANK[b.speaker];
}

function snapshot(record: CallRecord): CallRecord {
  return { ...record };
}

function describeStatusUpdate(status: string, message?: string): string {
  return message ? `status: ${status} - ${message}` : `status: ${status}`;
}

export interface CallStateTrackerOptions {
  statusPolicy?: TerminalStatusPolicy;
  unknownCallPolicy?: UnknownCallPolicy;
  /** How long event ids of released calls are still recognised as redeliveries. */
  releasedRetentionMs?: number;
}

/**
 * Reconciles lifecycle and turn events, in whatever order they arrive, into one
 * record per call. Redelivered events (same call id and event id) are no-ops.
 */
export class CallStateTracker {
  private readonly calls = new Map<CallId, TrackedCall>();
  private readonly statusPolicy: TerminalStatusPolicy;
  private readonly unknownCallPolicy: UnknownCallPolicy;
  private readonly released = new Map<CallId, ReleasedCall>();
  private readonly releasedRetentionMs: number;

  constructor(options: CallStateTrackerOptions = {}) {
    this.statusPolicy = options.statusPolicy ?? turnCountPolicy;
    this.unknownCallPolicy = options.unknownCallPolicy ?? 'create';
    this.releasedRetentionMs = options.releasedRetentionMs ?? DEFAULT_RELEASED_RETENTION_MS;
  }

  public ingest(event: VoiceEvent): TrackerResult {
    let tracked = this.calls.get(event.callId);

    if (!tracked) {
      const released = this.released.get(event.callId);
      if (released) {
        return this.ingestReleased(event, released);
      }

      if (this.unknownCallPolicy === 'reject' && event.type !== 'call-started') {
        log.warn(
          {
            event: 'call_event_unknown_call',
            event_type: event.type,
            event_id: event.eventId,
            call_id: event.callId,
            namespace: event.namespace,
          },
          'event references unknown call - dropped',
        );
        return { outcome: 'rejected', ended: false, writes: [] };
      }
      tracked = this.createCall(event);
    } else if (tracked.record.namespace !== event.namespace) {
      log.warn(
        {
          event: 'call_event_namespace_mismatch',
          event_type: event.type,
          event_id: event.eventId,
          call_id: event.callId,
          namespace: event.namespace,
          call_namespace: tracked.record.namespace,
        },
        'event namespace does not match call - dropped',
      );
      return { outcome: 'rejected', call: snapshot(tracked.record), ended: false, writes: [] };
    }

    if (tracked.seenEvents.has(event.eventId)) {
      return { outcome: 'duplicate', call: snapshot(tracked.record), ended: false, writes: [] };
    }
    tracked.seenEvents.add(event.eventId);
    tracked.lastEventAt = Date.now();

    const wasTerminal = isTerminal(tracked.record.phase);
    tracked.record.phase = nextPhase(tracked.record.phase, event.type);

    this.applyMetadata(tracked, event);

    let entry: TranscriptEntry | undefined;
    if (appendsTranscript(event.type)) {
      entry = this.appendTranscript(tracked, event);
    }

    this.reconcile(tracked);

    const ended = !wasTerminal && isTerminal(tracked.record.phase);
    if (ended) {
      tracked.endedObservedAt = Date.now();
    }

    const writes: PersistableEntity[] = [{ kind: 'call', call: snapshot(tracked.record) }];
    if (entry) {
      writes.push({ kind: 'transcript', entry: { ...entry } });
    }

    return { outcome: 'applied', call: snapshot(tracked.record), entry, ended, writes };
  }

  public getCall(callId: CallId): CallRecord | undefined {
    const tracked = this.calls.get(callId);
    return tracked ? snapshot(tracked.record) : undefined;
  }

  /** Transcript in conversational order. */
  public getTranscript(callId: CallId): TranscriptEntry[] {
    const tracked = this.calls.get(callId);
    return tracked ? tracked.transcript.map((entry) => ({ ...entry })) : [];
  }

  public getActions(callId: CallId): ScheduledAction[] {
    const tracked = this.calls.get(callId);
    return tracked ? Array.from(tracked.actions.values(), (action) => ({ ...action })) : [];
  }

  public getReply(callId: CallId, eventId: string): TurnResponse | undefined {
    return this.calls.get(callId)?.replies.get(eventId);
  }

  public recordReply(callId: CallId, eventId: string, response: TurnResponse): void {
    this.calls.get(callId)?.replies.set(eventId, response);
  }

  /** Actions are immutable once recorded; re-recording the same action id is a no-op. */
  public recordActions(callId: CallId, actions: ScheduledAction[]): PersistableEntity[] {
    const tracked = this.calls.get(callId);
    if (!tracked) {
      return [];
    }

    const writes: PersistableEntity[] = [];
    for (const action of actions) {
      if (tracked.actions.has(action.actionId)) {
        continue;
      }
      tracked.actions.set(action.actionId, { ...action });
      writes.push({ kind: 'action', action: { ...action } });
    }
    return writes;
  }

  public attachExternalReferences(
    callId: CallId,
    actionId: string,
    refs: ExternalReferences,
  ): PersistableEntity[] {
    const action = this.calls.get(callId)?.actions.get(actionId);
    if (!action) {
      return [];
    }

    const calendarEventId = refs.calendarEventId ?? action.calendarEventId;
    const crmContactId = refs.crmContactId ?? action.crmContactId;
    if (calendarEventId === action.calendarEventId && crmContactId === action.crmContactId) {
      return [];
    }

    action.calendarEventId = calendarEventId;
    action.crmContactId = crmContactId;
    return [{ kind: 'action', action: { ...action } }];
  }

  /** The agent's side of a user turn shares the user's sequence and sorts after it. */
  public buildAgentTurn(userTurn: TurnCompletedEvent, entry: TranscriptEntry, text: string): TurnCompletedEvent {
    return {
      type: 'turn-completed',
      eventId: `${userTurn.eventId}:reply`,
      callId: userTurn.callId,
      namespace: userTurn.namespace,
      receivedAt: new Date(),
      sequence: entry.sequence,
      speaker: 'agent',
      text,
      timestamp: new Date(),
      respond: false,
    };
  }

  /**
   * Releases calls that ended more than `retentionMs` ago. Only their event ids
   * are kept, so a redelivery still reads as a duplicate instead of a new call.
   */
  public sweep(nowMs: number, retentionMs: number): number {
    let removed = 0;
    for (const [callId, tracked] of this.calls.entries()) {
      if (tracked.endedObservedAt !== undefined && nowMs - tracked.endedObservedAt > retentionMs) {
        this.calls.delete(callId);
        this.released.set(callId, {
          namespace: tracked.record.namespace,
          seenEvents: tracked.seenEvents,
          releasedAt: nowMs,
        });
        removed += 1;
      }
    }

    for (const [callId, released] of this.released.entries()) {
      if (nowMs - released.releasedAt > this.releasedRetentionMs) {
        this.released.delete(callId);
      }
    }
    return removed;
  }

  /**
   * End-of-call reports for calls that have not ended and have seen no event for
   * longer than `idleTimeoutMs`. The report ends the call at its last activity.
   */
  public idleCalls(nowMs: number, idleTimeoutMs: number): EndOfCallEvent[] {
    const reports: EndOfCallEvent[] = [];
    for (const tracked of this.calls.values()) {
      if (isTerminal(tracked.record.phase) || nowMs - tracked.lastEventAt <= idleTimeoutMs) {
        continue;
      }
      reports.push({
        type: 'end-of-call-report',
        eventId: `${tracked.record.callId}:idle-timeout`,
        callId: tracked.record.callId,
        namespace: tracked.record.namespace,
        receivedAt: new Date(nowMs),
        timestamp: new Date(tracked.lastEventAt),
        endedReason: IDLE_TIMEOUT_REASON,
      });
    }
    return reports;
  }

  public size(): number {
    return this.calls.size;
  }

  private createCall(event: VoiceEvent): TrackedCall {
    const tracked: TrackedCall = {
      record: {
        callId: event.callId,
        namespace: event.namespace,
        phase: 'Created',
        status: 'in-progress',
        turns: 0,
      },
      seenEvents: new Set(),
      transcript: [],
      nextArrivalSequence: 0,
      replies: new Map(),
      actions: new Map(),
      lastEventAt: Date.now(),
    };
    this.calls.set(event.callId, tracked);

    log.info(
      {
        event: 'call_created',
        first_event_type: event.type,
        call_id: event.callId,
        namespace: event.namespace,
      },
      'call created',
    );

    return tracked;
  }

  private ingestReleased(event: VoiceEvent, released: ReleasedCall): TrackerResult {
    if (released.seenEvents.has(event.eventId)) {
      return { outcome: 'duplicate', ended: false, writes: [] };
    }

    log.warn(
      {
        event: 'call_event_after_release',
        event_type: event.type,
        event_id: event.eventId,
        call_id: event.callId,
        namespace: event.namespace,
        call_namespace: released.namespace,
      },
      'event for a released call - dropped',
    );
    return { outcome: 'rejected', ended: false, writes: [] };
  }

  private applyMetadata(tracked: TrackedCall, event: VoiceEvent): void {
    const record = tracked.record;
    const at = event.timestamp ?? event.receivedAt;

    switch (event.type) {
      case 'call-started':
        record.startedAt = at;
        tracked.startSource = 'call-started';
        record.direction = event.direction ?? record.direction;
        record.phoneNumber = event.phoneNumber ?? record.phoneNumber;
        return;
      case 'end-of-call-report':
        if (!record.endedAt) {
          record.endedAt = at;
        }
        if (event.startedAt && tracked.startSource !== 'call-started') {
          record.startedAt = event.startedAt;
          tracked.startSource = 'report';
        }
        tracked.explicitOutcome = tracked.explicitOutcome ?? event.outcome;
        record.endedReason = record.endedReason ?? event.endedReason;
        record.recordingUrl = record.recordingUrl ?? event.recordingUrl;
        return;
      case 'status-update':
      case 'turn-completed':
        if (!tracked.startSource || tracked.startSource === 'inferred') {
          if (!record.startedAt || at.getTime() < record.startedAt.getTime()) {
            record.startedAt = at;
          }
          tracked.startSource = 'inferred';
        }
        return;
    }
  }

  private appendTranscript(tracked: TrackedCall, event: VoiceEvent): TranscriptEntry | undefined {
    let entry: TranscriptEntry;
    if (event.type === 'turn-completed') {
      entry = {
        callId: event.callId,
        sequence: event.sequence ?? tracked.nextArrivalSequence,
        speaker: event.speaker,
        content: event.text,
        timestamp: event.timestamp ?? null,
        sentimentScore: event.sentimentScore,
      };
    } else if (event.type === 'status-update') {
      entry = {
        callId: event.callId,
        sequence: tracked.nextArrivalSequence,
        speaker: 'system',
        content: describeStatusUpdate(event.status, event.message),
        timestamp: event.timestamp ?? null,
      };
    } else {
      return undefined;
    }

    // Same (sequence, speaker) is the same persisted row; the later delivery replaces it.
    const existing = tracked.transcript.findIndex(
      (item) => item.sequence === entry.sequence && item.speaker === entry.speaker,
    );
    if (existing >= 0) {
      tracked.transcript.splice(existing, 1);
    }

    let index = tracked.transcript.length;
    while (index > 0 && compareEntries(tracked.transcript[index - 1], entry) > 0) {
      index -= 1;
    }
    tracked.transcript.splice(index, 0, entry);

    tracked.nextArrivalSequence = Math.max(tracked.nextArrivalSequence, entry.sequence + 1);
    return entry;
  }

  private reconcile(tracked: TrackedCall): void {
    const record = tracked.record;
    record.turns = tracked.transcript.filter((entry) => entry.speaker === 'user').length;

    if (!isTerminal(record.phase)) {
      record.status = 'in-progress';
      return;
    }

    const endedAt = record.endedAt ?? new Date();
    record.endedAt = endedAt;
    if (!record.startedAt || record.startedAt.getTime() > endedAt.getTime()) {
      record.startedAt = endedAt;
      tracked.startSource = tracked.startSource ?? 'inferred';
    }
    record.durationSeconds = Math.round((endedAt.getTime() - record.startedAt.getTime()) / 1000);

    record.status =
      tracked.explicitOutcome ??
      this.statusPolicy({
        turns: record.turns,
        transcriptEntries: tracked.transcript.length,
        endedReason: record.endedReason,
      });
  }
}
