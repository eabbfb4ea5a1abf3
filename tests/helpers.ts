import type { ChannelControlMessage, MediaConnection } from '../src/audio/audioChannel';
import type { CallRecord, ScheduledAction, TranscriptEntry } from '../src/calls/types';
import type { CallLogStore } from '../src/storage/types';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export type SentFrame = { kind: 'audio'; data: Buffer } | { kind: 'control'; message: ChannelControlMessage };

export class FakeConnection implements MediaConnection {
  public readonly sent: SentFrame[] = [];
  public closedWith: { code?: number; reason?: string } | null = null;
  public failAudio = false;
  public onControl?: (message: ChannelControlMessage) => void;

  async sendAudio(chunk: Buffer): Promise<void> {
    if (this.failAudio) {
      throw new Error('socket reset');
    }
    this.sent.push({ kind: 'audio', data: chunk });
  }

  async sendControl(message: ChannelControlMessage): Promise<void> {
    this.sent.push({ kind: 'control', message });
    this.onControl?.(message);
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
  }
}

/** Upsert semantics over the same keys as the PostgreSQL store. */
export class InMemoryCallStore implements CallLogStore {
  public readonly calls = new Map<string, CallRecord>();
  public readonly transcripts = new Map<string, TranscriptEntry>();
  public readonly actions = new Map<string, ScheduledAction>();
  public writes = 0;

  async upsertCall(call: CallRecord): Promise<void> {
    this.writes += 1;
    const existing = this.calls.get(call.callId);
    if (existing?.phase === 'Ended' && (call.phase !== 'Ended' || call.turns < existing.turns)) {
      return;
    }
    this.calls.set(call.callId, { ...call });
  }

  async upsertTranscriptEntry(entry: TranscriptEntry): Promise<void> {
    this.writes += 1;
    this.transcripts.set(`${entry.callId}:${entry.sequence}:${entry.speaker}`, { ...entry });
  }

  async upsertScheduledAction(action: ScheduledAction): Promise<void> {
    this.writes += 1;
    this.actions.set(`${action.callId}:${action.actionId}`, { ...action });
  }

  transcriptFor(callId: string): TranscriptEntry[] {
    const rank = { user: 0, agent: 1, system: 2 };
    return Array.from(this.transcripts.values())
      .filter((entry) => entry.callId === callId)
      .sort((a, b) => a.sequence - b.sequence || rank[a.speaker] - rank[b.speaker]);
  }
}
