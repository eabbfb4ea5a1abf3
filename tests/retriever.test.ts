import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import type { Retriever, ScoredSnippet } from '../src/retrieval/types';

setTestEnv();

test('tokenize lower-cases word and number runs', async () => {
  const { tokenize } = await import('../src/retrieval/lexicalIndex');

  assert.deepEqual(tokenize('Hello, WORLD! 42 café'), ['hello', 'world', '42', 'café']);
});

test('search orders by relevance and drops unrelated snippets', async () => {
  const { LexicalIndex } = await import('../src/retrieval/lexicalIndex');
  const index = new LexicalIndex([
    'The plumber fixes leaks',
    'Leaks leaks leaks',
    'Opening hours are nine to five',
  ]);

  const results = index.search('leaks', 5);

  assert.deepEqual(
    results.map((result) => result.text),
    ['Leaks leaks leaks', 'The plumber fixes leaks'],
  );
  assert.ok(Math.abs(results[0].score - 1) < 1e-9);
  assert.ok(results[1].score < results[0].score);
  assert.equal(index.search('leaks', 1).length, 1);
  assert.deepEqual(index.search('leaks', 0), []);
  assert.deepEqual(index.search('invoice', 5), []);
  assert.equal(index.size, 3);
});

test('equal scores keep insertion order on every call', async () => {
  const { LexicalIndex } = await import('../src/retrieval/lexicalIndex');
  const index = new LexicalIndex(['apple pie', 'cherry tart', 'pie apple']);

  const first = index.search('apple', 5);
  const second = index.search('apple', 5);

  assert.deepEqual(
    first.map((result) => result.text),
    ['apple pie', 'pie apple'],
  );
  assert.equal(first[0].score, first[1].score);
  assert.deepEqual(second, first);
});

test('the retriever only reads the requested namespace', async () => {
  const { LexicalIndex } = await import('../src/retrieval/lexicalIndex');
  const { NamespaceRegistry } = await import('../src/retrieval/namespaceRegistry');
  const { IndexRetriever } = await import('../src/retrieval/retriever');
  const { NamespaceNotFoundError } = await import('../src/errors');

  const registry = new NamespaceRegistry<InstanceType<typeof LexicalIndex>>();
  registry.register('acme', new LexicalIndex(['Acme repairs boilers']));
  registry.register('globex', new LexicalIndex(['Globex repairs boilers too']));
  const retriever = new IndexRetriever(registry);

  const results = await retriever.retrieve('acme', 'boilers', 5);
  assert.deepEqual(
    results.map((result) => result.text),
    ['Acme repairs boilers'],
  );
  await assert.rejects(retriever.retrieve('initech', 'boilers', 5), NamespaceNotFoundError);

  assert.deepEqual(registry.namespaces(), ['acme', 'globex']);
  assert.equal(registry.unregister('globex'), true);
  assert.equal(registry.has('globex'), false);
  assert.equal(registry.get('globex'), undefined);
});

test('retrieveWithDeadline degrades to an empty context', async () => {
  const { retrieveWithDeadline } = await import('../src/retrieval/retriever');
  const { NamespaceNotFoundError } = await import('../src/errors');

  const slow: Retriever = { retrieve: () => new Promise<ScoredSnippet[]>(() => undefined) };
  const missing: Retriever = {
    retrieve: async (namespace) => {
      throw new NamespaceNotFoundError(namespace);
    },
  };
  const broken: Retriever = {
    retrieve: async () => {
      throw new Error('index handle closed');
    },
  };

  const base = { namespace: 'acme', query: 'hours', k: 3, timeoutMs: 20 };

  const timedOut = await retrieveWithDeadline({ ...base, retriever: slow });
  assert.equal(timedOut.degraded, 'timeout');
  assert.deepEqual(timedOut.context, { namespace: 'acme', query: 'hours', snippets: [] });

  assert.equal((await retrieveWithDeadline({ ...base, retriever: missing })).degraded, 'namespace_not_found');
  assert.equal((await retrieveWithDeadline({ ...base, retriever: broken })).degraded, 'error');
});

test('retrieveWithDeadline passes results through and propagates cancellation', async () => {
  const { retrieveWithDeadline } = await import('../src/retrieval/retriever');
  const { AbortedError } = await import('../src/errors');

  const fixed: Retriever = { retrieve: async () => [{ text: 'Open 8 to 6', score: 0.5 }] };
  const ok = await retrieveWithDeadline({ retriever: fixed, namespace: 'acme', query: 'hours', k: 3, timeoutMs: 50 });
  assert.equal(ok.degraded, undefined);
  assert.deepEqual(ok.context.snippets, [{ text: 'Open 8 to 6', score: 0.5 }]);

  const controller = new AbortController();
  controller.abort();
  await assert.rejects(
    retrieveWithDeadline({
      retriever: fixed,
      namespace: 'acme',
      query: 'hours',
      k: 3,
      timeoutMs: 50,
      signal: controller.signal,
    }),
    AbortedError,
  );
});

test('knowledge files load per namespace and bad files are skipped', async () => {
  const { loadKnowledgeDirectory, parseSnippetFile } = await import('../src/retrieval/knowledgeLoader');

  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'knowledge-'));
  try {
    await fs.writeFile(path.join(dir, 'acme.json'), JSON.stringify(['Open 8 to 6', { text: 'We fix leaks' }]));
    await fs.writeFile(path.join(dir, 'broken.json'), '{not json');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored');

    const registry = await loadKnowledgeDirectory(dir);

    assert.deepEqual(registry.namespaces(), ['acme']);
    assert.deepEqual(
      registry.resolve('acme').search('leaks', 5).map((result) => result.text),
      ['We fix leaks'],
    );
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }

  const missing = await loadKnowledgeDirectory(path.join(os.tmpdir(), 'no-such-knowledge-dir-for-tests'));
  assert.deepEqual(missing.namespaces(), []);
  assert.deepEqual(parseSnippetFile(['a', { text: 'b', source: 'faq' }]), ['a', 'b']);
  assert.throws(() => parseSnippetFile({ snippets: [] }));
});
