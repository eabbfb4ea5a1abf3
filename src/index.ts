import path from 'path';
import { HttpCompletionClient, UnconfiguredCompletionService } from './ai/completionClient';
import { HttpCalendarBooker } from './calendar/calendarClient';
import { CallStateTracker } from './calls/callStateTracker';
import { SessionManager } from './calls/sessionManager';
import { resolveStatusPolicy } from './calls/statusPolicy';
import { env } from './env';
import { EventDispatcher } from './events/eventDispatcher';
import { log } from './log';
import { NamespaceConfigCache } from './namespaces/namespaceConfig';
import { closeRedisClient } from './redis/client';
import { loadKnowledgeDirectory } from './retrieval/knowledgeLoader';
import { IndexRetriever } from './retrieval/retriever';
import { buildServer } from './server';
import { DurableLogger } from './storage/durableLogger';
import { createPool, PgCallStore } from './storage/pgCallStore';
import { createTranscriber } from './stt/registry';
import { HttpSpeechSynthesizer, SilentSpeechSynthesizer } from './tts/httpSpeechSynthesizer';
import { TurnOrchestrator } from './turns/turnOrchestrator';

async function main(): Promise<void> {
  const indexes = await loadKnowledgeDirectory(path.resolve(env.KNOWLEDGE_DIR));
  const namespaceConfigs = new NamespaceConfigCache();

  const store = new PgCallStore(createPool(env.DATABASE_URL, env.DATABASE_POOL_MAX));
  const durableLogger = new DurableLogger({
    store,
    maxAttempts: env.PERSIST_MAX_ATTEMPTS,
    retryBaseMs: env.PERSIST_RETRY_BASE_MS,
    unreachableThreshold: env.STORAGE_UNREACHABLE_THRESHOLD,
  });

  if (!env.COMPLETION_URL) {
    log.warn({ event: 'completion_unconfigured' }, 'COMPLETION_URL not set - every turn uses the fallback reply');
  }

  const orchestrator = new TurnOrchestrator({
    retriever: new IndexRetriever(indexes),
    completion: env.COMPLETION_URL
      ? new HttpCompletionClient({ url: env.COMPLETION_URL, timeoutMs: env.COMPLETION_TIMEOUT_MS })
      : new UnconfiguredCompletionService(),
    topK: env.RETRIEVAL_TOP_K,
    retrievalTimeoutMs: env.RETRIEVAL_TIMEOUT_MS,
    completionTimeoutMs: env.COMPLETION_TIMEOUT_MS,
    namespaceSettings: async (namespace) => {
      const config = await namespaceConfigs.get(namespace);
      return config ? { topK: config.retrieval?.topK, fallbackText: config.fallbackText } : null;
    },
  });

  const tracker = new CallStateTracker({
    statusPolicy: resolveStatusPolicy(env.CALL_STATUS_POLICY),
    unknownCallPolicy: env.UNKNOWN_CALL_POLICY,
    releasedRetentionMs: env.RELEASED_CALL_RETENTION_MINUTES * 60_000,
  });

  const retentionMs = env.SESSION_IDLE_TTL_MINUTES * 60_000;
  const callIdleTimeoutMs = env.CALL_IDLE_TIMEOUT_MINUTES * 60_000;
  const sessionManager = new SessionManager({
    idleTtlMinutes: env.SESSION_IDLE_TTL_MINUTES,
    onSweep: (nowMs) => {
      const removed = tracker.sweep(nowMs, retentionMs);
      if (removed > 0) {
        log.info({ event: 'call_state_swept', removed }, 'ended calls released from memory');
      }
      dispatcher.expireIdleCalls(nowMs, callIdleTimeoutMs).catch((error: unknown) => {
        log.error({ err: error, event: 'call_idle_expiry_failed' }, 'idle call expiry failed');
      });
    },
  });

  const dispatcher = new EventDispatcher({
    tracker,
    orchestrator,
    logger: durableLogger,
    sessions: sessionManager,
    calendar: new HttpCalendarBooker({
      resolveConfig: (namespace) => namespaceConfigs.get(namespace),
      defaultUrl: env.CALENDAR_URL,
    }),
    transcriber: createTranscriber({ url: env.STT_URL, timeoutMs: env.STT_TIMEOUT_MS }),
    synthesizer: env.TTS_URL ? new HttpSpeechSynthesizer(env.TTS_URL, env.TTS_VOICE_ID) : new SilentSpeechSynthesizer(),
  });

  const { server } = buildServer({
    dispatcher,
    sessionManager,
    mediaStreamToken: env.MEDIA_STREAM_TOKEN,
    health: {
      storageHealthy: () => durableLogger.isStorageHealthy(),
      activeCalls: () => sessionManager.activeCalls(),
      namespaces: () => indexes.namespaces(),
    },
  });

  server.listen(env.PORT, () => {
    log.info({ port: env.PORT, namespaces: indexes.namespaces() }, 'server listening');
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ event: 'shutdown_started', signal }, 'shutting down');

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    sessionManager.close();
    await dispatcher.settle();
    await store.close();
    await closeRedisClient();
    log.info({ event: 'shutdown_complete' }, 'shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error({ err: error, event: 'shutdown_failed' }, 'shutdown failed');
          process.exit(1);
        });
    });
  }
}

main().catch((error: unknown) => {
  log.fatal({ err: error, event: 'startup_failed' }, 'startup failed');
  process.exit(1);
});
