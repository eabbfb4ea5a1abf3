import { AbortedError } from '../errors';
import { log } from '../log';
import type { AudioChannel } from '../audio/audioChannel';
import type { CallId } from './types';

const DEFAULT_IDLE_TTL_MINUTES = 10;
const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

interface WorkItem {
  name: string;
  run: (signal: AbortSignal) => Promise<void> | void;
  cancel?: (error: AbortedError) => void;
}

interface QueueState {
  items: WorkItem[];
  running: boolean;
}

interface CallSession {
  controller: AbortController;
  lastActivityAt: number;
  channel?: AudioChannel;
  createdAt: number;
  tasks: number;
}

export interface SessionManagerOptions {
  idleTtlMinutes?: number;
  sweepIntervalMs?: number;
  /** Runs after every idle sweep; used to expire finished call state elsewhere. */
  onSweep?: (nowMs: number) => void;
}

/**
 * Per-call scheduling. Work for one call runs strictly in enqueue order; work
 * for different calls runs concurrently. Each call has an AbortController whose
 * signal is handed to its work and aborted on teardown.
 */
export class SessionManager {
  private readonly sessions = new Map<CallId, CallSession>();
  private readonly queues = new Map<CallId, QueueState>();
  private readonly idleTtlMs: number;
  private readonly sweepTimer: NodeJS.Timeout;
  private readonly onSweep?: (nowMs: number) => void;

  constructor(options: SessionManagerOptions = {}) {
    const idleMinutes = options.idleTtlMinutes ?? DEFAULT_IDLE_TTL_MINUTES;
    this.idleTtlMs = Math.max(idleMinutes, 1) * 60_000;
    this.onSweep = options.onSweep;

    const sweepInterval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.sweepTimer = setInterval(() => this.sweepIdleSessions(), sweepInterval);
    this.sweepTimer.unref?.();
  }

  public enqueue(callId: CallId, task: WorkItem): void {
    this.touch(callId);

    const queue = this.queues.get(callId) ?? { items: [], running: false };
    queue.items.push(task);
    this.queues.set(callId, queue);

    if (!queue.running) {
      queue.running = true;
      setImmediate(() => {
        void this.runQueue(callId, queue);
      });
    }
  }

  /** Enqueues `work` for the call and settles with its result. */
  public run<T>(callId: CallId, name: string, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.enqueue(callId, {
        name,
        run: async (signal) => {
          try {
            resolve(await work(signal));
          } catch (error) {
            reject(error);
          }
        },
        cancel: reject,
      });
    });
  }

  public touch(callId: CallId): void {
    this.ensureSession(callId).lastActivityAt = Date.now();
  }

  public isActive(callId: CallId): boolean {
    return this.sessions.has(callId);
  }

  public activeCalls(): number {
    return this.sessions.size;
  }

  public getChannel(callId: CallId): AudioChannel | undefined {
    return this.sessions.get(callId)?.channel;
  }

  public registerChannel(callId: CallId, channel: AudioChannel): void {
    const session = this.ensureSession(callId);
    const previous = session.channel;
    session.channel = channel;
    session.lastActivityAt = Date.now();

    if (previous && previous !== channel) {
      previous.close('replaced');
    }
  }

  public teardown(callId: CallId, reason = 'teardown'): void {
    const session = this.sessions.get(callId);
    this.clearQueue(callId, reason);
    if (!session) {
      return;
    }

    this.sessions.delete(callId);
    session.controller.abort(new AbortedError(reason));
    const channel = session.channel;
    session.channel = undefined;
    channel?.close(reason);

    log.info(
      {
        event: 'call_session_teardown',
        call_id: callId,
        reason,
        tasks: session.tasks,
        session_duration_ms: Date.now() - session.createdAt,
      },
      'call session teardown',
    );
  }

  public sweepIdleSessions(nowMs: number = Date.now()): void {
    for (const [callId, session] of this.sessions.entries()) {
      const idleMs = nowMs - session.lastActivityAt;
      if (idleMs <= this.idleTtlMs || this.queues.has(callId)) {
        continue;
      }

      this.teardown(callId, 'idle_timeout');
    }

    this.onSweep?.(nowMs);
  }

  public close(): void {
    clearInterval(this.sweepTimer);
    for (const callId of Array.from(this.sessions.keys())) {
      this.teardown(callId, 'shutdown');
    }
  }

  private ensureSession(callId: CallId): CallSession {
    const existing = this.sessions.get(callId);
    if (existing) {
      return existing;
    }

    const now = Date.now();
    const session: CallSession = {
      controller: new AbortController(),
      lastActivityAt: now,
      createdAt: now,
      tasks: 0,
    };
    this.sessions.set(callId, session);
    return session;
  }

  private async runQueue(callId: CallId, queue: QueueState): Promise<void> {
    while (queue.items.length > 0) {
      const task = queue.items.shift();
      if (!task) {
        continue;
      }

      const session = this.ensureSession(callId);
      session.tasks += 1;

      try {
        await task.run(session.controller.signal);
      } catch (error) {
        log.error({ err: error, call_id: callId, task: task.name, event: 'call_session_task_failed' }, 'session task failed');
      } finally {
        if (this.sessions.get(callId) === session) {
          session.lastActivityAt = Date.now();
        }
      }
    }

    queue.running = false;
    if (queue.items.length === 0 && this.queues.get(callId) === queue) {
      this.queues.delete(callId);
    }
  }

  private clearQueue(callId: CallId, reason: string): void {
    const queue = this.queues.get(callId);
    if (!queue) {
      return;
    }

    const dropped = queue.items.splice(0, queue.items.length);
    for (const task of dropped) {
      task.cancel?.(new AbortedError(reason));
    }
    if (!queue.running) {
      this.queues.delete(callId);
    }
  }
}
