import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import { deferred, FakeConnection, tick } from './helpers';

setTestEnv();

test('sessionManager runs one call strictly in order', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const manager = new SessionManager();
  const gate = deferred();
  const order: string[] = [];

  const first = manager.run('call-1', 'first', async () => {
    order.push('first:start');
    await gate.promise;
    order.push('first:end');
    return 1;
  });
  const second = manager.run('call-1', 'second', async () => {
    order.push('second');
    return 2;
  });

  await tick();
  assert.deepEqual(order, ['first:start']);

  gate.resolve();
  assert.deepEqual(await Promise.all([first, second]), [1, 2]);
  assert.deepEqual(order, ['first:start', 'first:end', 'second']);
  manager.close();
});

test('sessionManager runs different calls concurrently', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const manager = new SessionManager();
  const gate = deferred();
  const order: string[] = [];

  const slow = manager.run('call-1', 'slow', async () => {
    await gate.promise;
    order.push('call-1');
  });
  const fast = manager.run('call-2', 'fast', async () => {
    order.push('call-2');
  });

  await fast;
  assert.deepEqual(order, ['call-2']);
  assert.equal(manager.activeCalls(), 2);

  gate.resolve();
  await slow;
  assert.deepEqual(order, ['call-2', 'call-1']);
  manager.close();
});

test('sessionManager propagates task errors without stopping the queue', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const manager = new SessionManager();

  const failing = manager.run('call-1', 'failing', async () => {
    throw new Error('boom');
  });
  const next = manager.run('call-1', 'next', async () => 'ok');

  await assert.rejects(failing, { message: 'boom' });
  assert.equal(await next, 'ok');
  manager.close();
});

test('teardown aborts running work and rejects queued work', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const { AbortedError } = await import('../src/errors');
  const manager = new SessionManager();
  const started = deferred();
  let seenSignal: AbortSignal | undefined;
  let queuedRan = false;

  const running = manager.run('call-1', 'running', (signal) => {
    seenSignal = signal;
    started.resolve();
    return new Promise<void>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
  });
  const queued = manager.run('call-1', 'queued', async () => {
    queuedRan = true;
  });

  await started.promise;
  manager.teardown('call-1', 'hangup');

  await assert.rejects(running, AbortedError);
  await assert.rejects(queued, { name: 'AbortedError', message: 'hangup' });
  assert.equal(seenSignal?.aborted, true);
  assert.equal(queuedRan, false);
  assert.equal(manager.isActive('call-1'), false);
  manager.close();
});

test('idle sweep tears down quiet calls and reports the sweep', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const sweeps: number[] = [];
  const manager = new SessionManager({ idleTtlMinutes: 1, onSweep: (nowMs) => sweeps.push(nowMs) });

  manager.touch('call-1');
  const now = Date.now();
  manager.sweepIdleSessions(now + 30_000);
  assert.equal(manager.isActive('call-1'), true);

  manager.sweepIdleSessions(now + 61_000 + 1_000);
  assert.equal(manager.isActive('call-1'), false);
  assert.deepEqual(sweeps, [now + 30_000, now + 62_000]);
  manager.close();
});

test('registering a new channel closes the one it replaces', async () => {
  const { SessionManager } = await import('../src/calls/sessionManager');
  const { AudioChannel } = await import('../src/audio/audioChannel');
  const manager = new SessionManager();
  const oldConnection = new FakeConnection();
  const options = { callId: 'call-1', namespace: 'acme', onUtterance: async () => undefined };
  const previous = new AudioChannel({ ...options, connection: oldConnection });
  const current = new AudioChannel({ ...options, connection: new FakeConnection() });

  manager.registerChannel('call-1', previous);
  manager.registerChannel('call-1', current);

  assert.equal(previous.closed, true);
  assert.deepEqual(oldConnection.closedWith, { code: 1000, reason: 'replaced' });
  assert.equal(manager.getChannel('call-1'), current);

  manager.close();
  assert.equal(current.closed, true);
  assert.equal(manager.activeCalls(), 0);
});
