import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures seconds; the stage helpers below
 * record milliseconds to match the *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_orchestrator_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

// retrieval / completion / stt / calendar / persist
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Stage duration in milliseconds (retrieval/completion/stt/calendar/persist)',
  labelNames: ['stage', 'namespace'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by stage',
  labelNames: ['stage', 'namespace'] as const,
  registers: [register],
});

const inboundAudioChunksTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_chunks_total`,
  help: 'Inbound audio chunks received on media channels',
  registers: [register],
});

const inboundAudioChunksDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_chunks_dropped_total`,
  help: 'Inbound audio chunks dropped before reaching a call channel',
  labelNames: ['reason'] as const,
  registers: [register],
});

const persistFailuresTotal = new client.Counter({
  name: `${METRICS_PREFIX}persist_failures_total`,
  help: 'Durable log writes that failed after exhausting retries',
  labelNames: ['kind'] as const,
  registers: [register],
});

const operatorAlertsTotal = new client.Counter({
  name: `${METRICS_PREFIX}operator_alerts_total`,
  help: 'Conditions surfaced to operators (configuration or storage problems)',
  labelNames: ['kind'] as const,
  registers: [register],
});

const storageHealthy = new client.Gauge({
  name: `${METRICS_PREFIX}storage_healthy`,
  help: '1 when the durable log store accepts writes, 0 when it is unreachable',
  registers: [register],
});
storageHealthy.set(1);

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls that reached the ended state',
  labelNames: ['namespace', 'status'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  labelNames: ['namespace'] as const,
  buckets: [5, 10, 30, 60, 120, 300, 900],
  registers: [register],
});

const callTurns = new client.Histogram({
  name: `${METRICS_PREFIX}call_turns`,
  help: 'Number of turns per call',
  labelNames: ['namespace'] as const,
  buckets: [0, 1, 2, 3, 5, 10, 20],
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;
  }

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

function namespaceLabel(namespace: string | undefined): string {
  return namespace ?? 'unknown';
}

// ---------- exports used by server ----------

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

// ---------- stage timing API ----------

/**
 * Starts a stage timer and returns an end() function.
 */
export function startStageTimer(stage: string, namespace: string | undefined): () => void {
  const start = nowNs();
  const label = namespaceLabel(namespace);

  return () => {
    stageDurationMs.observe({ stage, namespace: label }, nsToMs(nowNs() - start));
  };
}

export function incStageError(stage: string, namespace: string | undefined): void {
  stageErrorsTotal.inc({ stage, namespace: namespaceLabel(namespace) });
}

export function incInboundAudioChunks(count = 1): void {
  inboundAudioChunksTotal.inc(count);
}

export function incInboundAudioChunksDropped(reason: string, count = 1): void {
  const label = reason.trim() !== '' ? reason : 'unknown';
  inboundAudioChunksDroppedTotal.inc({ reason: label }, count);
}

export function incPersistFailure(kind: string): void {
  persistFailuresTotal.inc({ kind });
}

export function incOperatorAlert(kind: string): void {
  operatorAlertsTotal.inc({ kind });
}

export function setStorageHealthy(healthy: boolean): void {
  storageHealthy.set(healthy ? 1 : 0);
}

export function recordCallMetrics(opts: {
  namespace?: string;
  status: string;
  durationMs?: number;
  turns: number;
}): void {
  const namespace = namespaceLabel(opts.namespace);
  callCompletionsTotal.inc({ namespace, status: opts.status });
  if (opts.durationMs !== undefined) {
    callDurationSeconds.observe({ namespace }, opts.durationMs / 1000);
  }
  callTurns.observe({ namespace }, opts.turns);
}
