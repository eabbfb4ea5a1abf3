import { Router } from 'express';

export interface HealthProbe {
  storageHealthy(): boolean;
  activeCalls(): number;
  namespaces(): string[];
}

export function createHealthRouter(probe: HealthProbe): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const storageHealthy = probe.storageHealthy();
    res.status(storageHealthy ? 200 : 503).json({
      status: storageHealthy ? 'ok' : 'degraded',
      storage: storageHealthy ? 'ok' : 'unreachable',
      active_calls: probe.activeCalls(),
      namespaces: probe.namespaces(),
    });
  });

  return router;
}
