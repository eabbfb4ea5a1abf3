import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10)),
  REDIS_URL: z.string().min(1),
  NAMESPACECFG_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('nscfg')),
  MEDIA_STREAM_TOKEN: z.string().min(1),
  KNOWLEDGE_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('knowledge')),
  RETRIEVAL_TOP_K: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(5)),
  RETRIEVAL_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(750),
  ),
  COMPLETION_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  COMPLETION_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(8000),
  ),
  STT_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  STT_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10000)),
  TTS_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  TTS_VOICE_ID: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  CALENDAR_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  PERSIST_MAX_ATTEMPTS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(4),
  ),
  PERSIST_RETRY_BASE_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().nonnegative().default(100),
  ),
  STORAGE_UNREACHABLE_THRESHOLD: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(3),
  ),
  CALL_STATUS_POLICY: z.preprocess(
    emptyToUndefined,
    z.enum(['turn_count', 'always_completed']).default('turn_count'),
  ),
  UNKNOWN_CALL_POLICY: z.preprocess(emptyToUndefined, z.enum(['create', 'reject']).default('create')),
  SESSION_IDLE_TTL_MINUTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(10),
  ),
  CALL_IDLE_TIMEOUT_MINUTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(60),
  ),
  RELEASED_CALL_RETENTION_MINUTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(1440),
  ),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;

export type Env = typeof env;
