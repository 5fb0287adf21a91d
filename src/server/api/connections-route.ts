import { Router } from 'express';
import type { ServerContext } from './types.js';

export function makeConnectionsRoute(ctx: ServerContext): Router {
  const router = Router();
  router.get('/connections', (_req, res) => {
    res.json({ connections: ctx.registry.snapshot().connections });
  });
  router.get('/connections/:id', (req, res) => {
    const conn = ctx.registry.get(req.params.id);
    if (!conn) {
      return res.status(404).json({ ok: false, error: { code: 'connection_not_found', message: `connection not found: ${req.params.id}` } });
    }
    return res.json({ connection: conn });
  });
  return router;
}
