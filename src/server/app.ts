import express, { type Express } from 'express';
import { allowAnyOrigin } from './api/cors.js';
import { makeConnectionsRoute } from './api/connections-route.js';
import { makeStatusRoute } from './api/status-route.js';
import type { ServerContext } from './api/types.js';

export function createApp(ctx: ServerContext): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(allowAnyOrigin(ctx.enableCors));
  app.use(makeStatusRoute(ctx));
  app.use(makeConnectionsRoute(ctx));
  app.use('/api', makeStatusRoute(ctx));
  app.use('/api', makeConnectionsRoute(ctx));
  return app;
}
