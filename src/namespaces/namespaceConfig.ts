import { z } from 'zod';
import { env } from '../env';
import { log } from '../log';
import { getRedisClient, type RedisClient } from '../redis/client';
import type { Namespace } from '../calls/types';

const NamespaceConfigSchema = z
  .object({
    contractVersion: z.literal('v1'),
    namespace: z.string().min(1),
    retrieval: z
      .object({
        topK: z.number().int().positive().max(50).optional(),
      })
      .optional(),
    calendar: z
      .object({
        url: z.string().url().optional(),
        credentialRef: z.string().min(1),
        timeZone: z.string().min(1).optional(),
      })
      .optional(),
    fallbackText: z.string().min(1).optional(),
  })
  .passthrough();

export type NamespaceConfig = z.infer<typeof NamespaceConfigSchema>;

type RedisGetter = Pick<RedisClient, 'get'>;

export function buildNamespaceConfigKey(namespace: Namespace, prefix: string = env.NAMESPACECFG_PREFIX): string {
  return `${prefix}:${namespace}`;
}

export async function loadNamespaceConfig(
  namespace: Namespace,
  redis: RedisGetter = getRedisClient(),
): Promise<NamespaceConfig | null> {
  const key = buildNamespaceConfigKey(namespace);
  let raw: string | null;

  try {
    raw = await redis.get(key);
  } catch (error) {
    log.error({ err: error, namespace, key }, 'namespace config fetch failed');
    return null;
  }

  if (!raw) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    log.error({ err: error, namespace, key }, 'namespace config json parse failed');
    return null;
  }

  const result = NamespaceConfigSchema.safeParse(parsed);
  if (!result.success) {
    log.error({ namespace, key, issues: result.error.issues }, 'namespace config invalid');
    return null;
  }

  if (result.data.namespace !== namespace) {
    log.error(
      { namespace, key, config_namespace: result.data.namespace },
      'namespace config belongs to another namespace',
    );
    return null;
  }

  return result.data;
}

/** Short-lived per-namespace cache in front of loadNamespaceConfig. */
export class NamespaceConfigCache {
  private readonly entries = new Map<Namespace, { value: NamespaceConfig | null; expiresAt: number }>();

  constructor(
    private readonly loader: (namespace: Namespace) => Promise<NamespaceConfig | null> = (namespace) =>
      loadNamespaceConfig(namespace),
    private readonly ttlMs = 30_000,
  ) {}

  public async get(namespace: Namespace): Promise<NamespaceConfig | null> {
    const now = Date.now();
    const cached = this.entries.get(namespace);
    if (cached && cached.expiresAt > now) {
      return cached.value;
    }

    const value = await this.loader(namespace);
    this.entries.set(namespace, { value, expiresAt: now + this.ttlMs });
    return value;
  }

  public invalidate(namespace: Namespace): void {
    this.entries.delete(namespace);
  }
}
