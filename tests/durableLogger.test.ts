import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import { deferred, InMemoryCallStore } from './helpers';
import type { CallRecord, PersistableEntity, TranscriptEntry } from '../src/calls/types';
import type { PersistFailure } from '../src/storage/types';

setTestEnv();

function codedError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function callWrite(callId: string, turns: number): PersistableEntity {
  const call: CallRecord = { callId, namespace: 'acme', phase: 'InProgress', status: 'in-progress', turns };
  return { kind: 'call', call };
}

function transcriptWrite(callId: string, sequence: number, content: string): PersistableEntity {
  const entry: TranscriptEntry = { callId, sequence, speaker: 'user', content, timestamp: null };
  return { kind: 'transcript', entry };
}

/** Fails the next queued writes with the given errors, then behaves like the in-memory store. */
class FlakyStore extends InMemoryCallStore {
  public readonly failures: Error[] = [];
  public readonly order: string[] = [];

  override async upsertCall(call: CallRecord): Promise<void> {
    this.order.push(`call:${call.callId}:${call.turns}`);
    this.failNext();
    await super.upsertCall(call);
  }

  override async upsertTranscriptEntry(entry: TranscriptEntry): Promise<void> {
    this.order.push(`transcript:${entry.callId}:${entry.sequence}`);
    this.failNext();
    await super.upsertTranscriptEntry(entry);
  }

  private failNext(): void {
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
  }
}

test('writes for one call are applied in enqueue order', async () => {
  const { DurableLogger } = await import('../src/storage/durableLogger');
  const store = new FlakyStore();
  const logger = new DurableLogger({ store, maxAttempts: 3, retryBaseMs: 0, unreachableThreshold: 3 });

  logger.persistAll([callWrite('c1', 0), transcriptWrite('c1', 1, 'hi'), callWrite('c1', 1)]);
  assert.equal(logger.pendingWrites(), 3);
  await logger.flush();

  assert.deepEqual(store.order, ['call:c1:0', 'transcript:c1:1', 'call:c1:1']);
  assert.equal(store.calls.get('c1')?.turns, 1);
  assert.equal(logger.pendingWrites(), 0);
});

test('transient failures are retried with exponential backoff', async () => {
  const { DurableLogger } = await import('../src/storage/durableLogger');
  const store = new FlakyStore();
  store.failures.push(codedError('too many clients', '53300'), codedError('serialization', '40001'));
  const delays: number[] = [];
  const logger = new DurableLogger({
    store,
    maxAttempts: 3,
    retryBaseMs: 10,
    unreachableThreshold: 3,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });

  logger.persist(callWrite('c1', 2));
  await logger.flush();

  assert.deepEqual(delays, [10, 20]);
  assert.equal(store.order.length, 3);
  assert.equal(store.calls.get('c1')?.turns, 2);
});

test('exhausted retries are reported and the next write still runs', async () => {
  const { DurableLogger } = await import('../src/storage/durableLogger');
  const store = new FlakyStore();
  store.failures.push(codedError('a', '53300'), codedError('b', '53300'));
  const failures: PersistFailure[] = [];
  const logger = new DurableLogger({
    store,
    maxAttempts: 2,
    retryBaseMs: 0,
    unreachableThreshold: 5,
    onFailure: (failure) => failures.push(failure),
    sleep: async () => undefined,
  });

  logger.persistAll([callWrite('c1', 0), transcriptWrite('c1', 1, 'hello')]);
  await logger.flush();

  assert.equal(failures.length, 1);
  assert.equal(failures[0].key, 'call:c1');
  assert.equal(failures[0].attempts, 2);
  assert.equal(failures[0].transient, true);
  assert.equal(store.calls.has('c1'), false);
  assert.equal(store.transcripts.get('c1:1:user')?.content, 'hello');
});

test('non-transient failures are not retried', async () => {
  const { DurableLogger } = await import('../src/storage/durableLogger');
  const store = new FlakyStore();
  store.failures.push(codedError('duplicate key value', '23505'));
  const failures: PersistFailure[] = [];
  const logger = new DurableLogger({
    store,
    maxAttempts: 5,
    retryBaseMs: 0,
    unreachableThreshold: 3,
    onFailure: (failure) => failures.push(failure),
  });

  logger.persist(transcriptWrite('c1', 4, 'ok'));
  await logger.flush();

  assert.equal(store.order.length, 1);
  assert.equal(failures.length, 1);
  assert.equal(failures[0].key, 'transcript:c1:4:user');
  assert.equal(failures[0].attempts, 1);
  assert.equal(failures[0].transient, false);
});

test('repeated connection failures mark storage unreachable until a write succeeds', async () => {
  const { DurableLogger } = await import('../src/storage/durableLogger');
  const store = new FlakyStore();
  store.failures.push(
    codedError('connect ECONNREFUSED', 'ECONNREFUSED'),
    codedError('connect ECONNREFUSED', 'ECONNREFUSED'),
  );
  const logger = new DurableLogger({ store, maxAttempts: 1, retryBaseMs: 0, unreachableThreshold: 2 });

  logger.persistAll([callWrite('c1', 0), callWrite('c2', 0)]);
  await logger.flush();
  assert.equal(logger.isStorageHealthy(), false);

  logger.persist(callWrite('c3', 0));
  await logger.flush();
  assert.equal(logger.isStorageHealthy(), true);
});

test('a stalled call does not hold up writes for other calls', async () => {
  const { DurableLogger } = await import('../src/storage/durableLogger');
  const gate = deferred();
  const applied: string[] = [];
  const logger = new DurableLogger({
    store: {
      upsertCall: async (call) => {
        if (call.callId === 'slow') {
          await gate.promise;
        }
        applied.push(call.callId);
      },
      upsertTranscriptEntry: async () => undefined,
      upsertScheduledAction: async () => undefined,
    },
    maxAttempts: 1,
    retryBaseMs: 0,
    unreachableThreshold: 3,
  });

  logger.persist(callWrite('slow', 0));
  logger.persist(callWrite('fast', 0));
  await new Promise((resolve) => setImmediate(resolve));

  assert.deepEqual(applied, ['fast']);
  assert.equal(logger.pendingWrites(), 1);

  gate.resolve();
  await logger.flush();
  assert.deepEqual(applied, ['fast', 'slow']);
});
