import { sleep as defaultSleep } from '../async';
import { describeError, isConnectionError, isTransientStorageError } from '../errors';
import { log } from '../log';
import {
  incOperatorAlert,
  incPersistFailure,
  setStorageHealthy,
  startStageTimer,
} from '../metrics';
import type { PersistableEntity } from '../calls/types';
import { entityCallId, entityKey, type CallLogStore, type PersistFailure } from './types';

export interface DurableLoggerOptions {
  store: CallLogStore;
  maxAttempts: number;
  retryBaseMs: number;
  /** Consecutive connection-level failures after which storage is reported unreachable. */
  unreachableThreshold: number;
  onFailure?: (failure: PersistFailure) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Asynchronous, idempotent call log. `persist` only enqueues: it never throws
 * and never makes the conversational path wait. Writes for one call are applied
 * in the order they were enqueued; different calls write concurrently.
 */
export class DurableLogger {
  private readonly store: CallLogStore;
  private readonly maxAttempts: number;
  private readonly retryBaseMs: number;
  private readonly unreachableThreshold: number;
  private readonly onFailure?: (failure: PersistFailure) => void;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly chains = new Map<string, Promise<void>>();
  private pending = 0;
  private consecutiveConnectionFailures = 0;
  private storageHealthy = true;

  constructor(options: DurableLoggerOptions) {
    this.store = options.store;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.retryBaseMs = Math.max(0, options.retryBaseMs);
    this.unreachableThreshold = Math.max(1, options.unreachableThreshold);
    this.onFailure = options.onFailure;
    this.sleep = options.sleep ?? defaultSleep;
  }

  public persist(entity: PersistableEntity): void {
    const callId = entityCallId(entity);
    const previous = this.chains.get(callId) ?? Promise.resolve();
    this.pending += 1;

    const next = previous.then(() => this.write(entity));
    this.chains.set(callId, next);
    void next.finally(() => {
      this.pending -= 1;
      if (this.chains.get(callId) === next) {
        this.chains.delete(callId);
      }
    });
  }

  public persistAll(entities: readonly PersistableEntity[]): void {
    for (const entity of entities) {
      this.persist(entity);
    }
  }

  /** Resolves once every write enqueued so far has succeeded or been reported. */
  public async flush(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all(Array.from(this.chains.values()));
    }
  }

  public pendingWrites(): number {
    return this.pending;
  }

  public isStorageHealthy(): boolean {
    return this.storageHealthy;
  }

  private async write(entity: PersistableEntity): Promise<void> {
    const key = entityKey(entity);
    const callId = entityCallId(entity);

    for (let attempt = 1; ; attempt += 1) {
      const endTimer = startStageTimer('persist', undefined);
      try {
        await this.apply(entity);
        this.markHealthy();
        return;
      } catch (error) {
        const transient = isTransientStorageError(error);
        if (isConnectionError(error)) {
          this.noteConnectionFailure(error);
        }

        if (transient && attempt < this.maxAttempts) {
          const delayMs = this.retryBaseMs * 2 ** (attempt - 1);
          log.warn(
            {
              event: 'persist_retry',
              key,
              call_id: callId,
              attempt,
              delay_ms: delayMs,
              error: describeError(error),
            },
            'durable log write failed - retrying',
          );
          await this.sleep(delayMs);
          continue;
        }

        this.report({ entity, key, attempts: attempt, error, transient });
        return;
      } finally {
        endTimer();
      }
    }
  }

  private async apply(entity: PersistableEntity): Promise<void> {
    switch (entity.kind) {
      case 'call':
        await this.store.upsertCall(entity.call);
        return;
      case 'transcript':
        await this.store.upsertTranscriptEntry(entity.entry);
        return;
      case 'action':
        await this.store.upsertScheduledAction(entity.action);
        return;
    }
  }

  private report(failure: PersistFailure): void {
    incPersistFailure(failure.entity.kind);
    log.error(
      {
        err: failure.error,
        event: 'persist_failed',
        key: failure.key,
        call_id: entityCallId(failure.entity),
        kind: failure.entity.kind,
        attempts: failure.attempts,
        transient: failure.transient,
      },
      'durable log write failed',
    );

    if (!this.onFailure) {
      return;
    }
    try {
      this.onFailure(failure);
    } catch (error) {
      log.error({ err: error, event: 'persist_failure_handler_failed' }, 'persist failure handler threw');
    }
  }

  private noteConnectionFailure(error: unknown): void {
    this.consecutiveConnectionFailures += 1;
    if (!this.storageHealthy || this.consecutiveConnectionFailures < this.unreachableThreshold) {
      return;
    }

    this.storageHealthy = false;
    setStorageHealthy(false);
    incOperatorAlert('storage_unreachable');
    log.fatal(
      {
        err: error,
        event: 'storage_unreachable',
        alert: true,
        consecutive_failures: this.consecutiveConnectionFailures,
      },
      'call log storage unreachable',
    );
  }

  private markHealthy(): void {
    this.consecutiveConnectionFailures = 0;
    if (this.storageHealthy) {
      return;
    }
    this.storageHealthy = true;
    setStorageHealthy(true);
    log.info({ event: 'storage_recovered' }, 'call log storage recovered');
  }
}
