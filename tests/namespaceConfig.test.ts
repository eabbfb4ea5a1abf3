import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

class MockRedis {
  public readonly keys: string[] = [];

  constructor(private readonly values: Record<string, string>) {}

  async get(key: string): Promise<string | null> {
    this.keys.push(key);
    return this.values[key] ?? null;
  }
}

const acmeConfig = {
  contractVersion: 'v1',
  namespace: 'acme',
  retrieval: { topK: 5 },
  calendar: { url: 'http://calendar.test', credentialRef: 'test-secret' },
  fallbackText: 'Please hold.',
};

test('config is read from the prefixed key and validated', async () => {
  const { loadNamespaceConfig } = await import('../src/namespaces/namespaceConfig');
  const redis = new MockRedis({ 'nscfg:acme': JSON.stringify(acmeConfig) });

  const config = await loadNamespaceConfig('acme', redis);

  assert.deepEqual(redis.keys, ['nscfg:acme']);
  assert.equal(config?.retrieval?.topK, 5);
  assert.equal(config?.calendar?.credentialRef, 'test-secret');
  assert.equal(config?.fallbackText, 'Please hold.');
});

test('missing, malformed, invalid and foreign configs load as null', async () => {
  const { loadNamespaceConfig } = await import('../src/namespaces/namespaceConfig');
  const redis = new MockRedis({
    'nscfg:broken': '{not json',
    'nscfg:invalid': JSON.stringify({ ...acmeConfig, namespace: 'invalid', contractVersion: 'v2' }),
    'nscfg:other': JSON.stringify(acmeConfig),
  });

  assert.equal(await loadNamespaceConfig('missing', redis), null);
  assert.equal(await loadNamespaceConfig('broken', redis), null);
  assert.equal(await loadNamespaceConfig('invalid', redis), null);
  assert.equal(await loadNamespaceConfig('other', redis), null);
});

test('a redis failure loads as null', async () => {
  const { loadNamespaceConfig } = await import('../src/namespaces/namespaceConfig');
  const redis = {
    get: async (): Promise<string | null> => {
      throw new Error('connection refused');
    },
  };

  assert.equal(await loadNamespaceConfig('acme', redis), null);
});

test('the cache serves repeat lookups until invalidated', async () => {
  const { NamespaceConfigCache } = await import('../src/namespaces/namespaceConfig');
  const loaded: string[] = [];
  const cache = new NamespaceConfigCache(async (namespace) => {
    loaded.push(namespace);
    return null;
  });

  await cache.get('acme');
  await cache.get('acme');
  await cache.get('beta');
  cache.invalidate('acme');
  await cache.get('acme');

  assert.deepEqual(loaded, ['acme', 'beta', 'acme']);
});
