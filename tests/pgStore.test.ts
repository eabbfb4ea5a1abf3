import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

class RecordingDb {
  public readonly queries: Array<{ text: string; values: unknown[] }> = [];
  public ended = false;

  async query(text: string, values: unknown[] = []): Promise<unknown> {
    this.queries.push({ text, values });
    return { rowCount: 1 };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

test('call upsert binds every column and never moves an ended call back or loses turns', async () => {
  const { PgCallStore } = await import('../src/storage/pgCallStore');
  const db = new RecordingDb();
  const store = new PgCallStore(db);
  const startedAt = new Date('2024-05-01T10:00:00Z');

  await store.upsertCall({
    callId: 'c1',
    namespace: 'acme',
    direction: 'inbound',
    phase: 'InProgress',
    status: 'in-progress',
    startedAt,
    turns: 2,
  });

  assert.equal(db.queries.length, 1);
  const [query] = db.queries;
  assert.ok(query.text.startsWith('INSERT INTO calls'));
  assert.ok(
    query.text.endsWith("WHERE calls.phase <> 'Ended' OR (EXCLUDED.phase = 'Ended' AND EXCLUDED.turns >= calls.turns)"),
  );
  assert.deepEqual(query.values, [
    'c1',
    'acme',
    null,
    'inbound',
    startedAt,
    null,
    null,
    'in-progress',
    'InProgress',
    null,
    null,
    2,
  ]);
});

test('transcript upsert is keyed on call, sequence and speaker', async () => {
  const { PgCallStore } = await import('../src/storage/pgCallStore');
  const db = new RecordingDb();
  const store = new PgCallStore(db);

  await store.upsertTranscriptEntry({ callId: 'c1', sequence: 3, speaker: 'agent', content: 'Sure.', timestamp: null });

  const [query] = db.queries;
  assert.ok(query.text.includes('ON CONFLICT (call_id, sequence, speaker)'));
  assert.deepEqual(query.values, ['c1', 3, 'agent', 'Sure.', null, null]);
});

test('appointment upsert keeps an existing calendar reference', async () => {
  const { PgCallStore } = await import('../src/storage/pgCallStore');
  const db = new RecordingDb();
  const store = new PgCallStore(db);
  const scheduledTime = new Date('2024-05-02T15:00:00Z');

  await store.upsertScheduledAction({
    callId: 'c1',
    actionId: 'evt-7:0',
    namespace: 'acme',
    kind: 'appointment',
    customerName: 'Ana',
    customerPhone: '555-0100',
    issueType: 'leak',
    scheduledTime,
    calendarEventId: 'cal-9',
  });

  const [query] = db.queries;
  assert.ok(query.text.includes('COALESCE(EXCLUDED.calendar_event_id, appointments.calendar_event_id)'));
  assert.deepEqual(query.values, ['c1', 'evt-7:0', 'acme', 'Ana', '555-0100', null, 'leak', scheduledTime, 'cal-9', null]);
});

test('close ends the pool', async () => {
  const { PgCallStore } = await import('../src/storage/pgCallStore');
  const db = new RecordingDb();
  await new PgCallStore(db).close();
  assert.equal(db.ended, true);
});
