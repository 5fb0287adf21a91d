import { Router } from 'express';
import { buildStatusSummary } from '../metrics/health.js';
import type { ServerContext } from './types.js';

export function makeStatusRoute(ctx: ServerContext): Router {
  const router = Router();
  router.get('/status', (_req, res) => {
    res.json(buildStatusSummary(ctx.registry.snapshot(), ctx.getMetrics(), ctx.counters));
  });
  router.get('/healthz', (_req, res) => {
    res.json({ ok: true, port: ctx.port });
  });
  return router;
}
