import http from 'node:http';
import type { WebSocketServer } from 'ws';
import type { ServerContext } from './api/types.js';
import { createApp } from './app.js';
import type { ServerConfig } from './config.js';
import { errorText } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { Counters } from './metrics/counters.js';
import { ConnectionRegistry } from './relay/connection-registry.js';
import { mountWsServer } from './transport/ws-server.js';
import type { RegistrySnapshot } from './types.js';

const log = createLogger('server');

export interface RunningServer {
  ctx: ServerContext;
  server: http.Server;
  wss: WebSocketServer;
  port: number;
  stop(): Promise<RegistrySnapshot>;
}

export async function startServer(cfg: ServerConfig): Promise<RunningServer> {
  const registry = new ConnectionRegistry();
  const counters = new Counters();
  const ctx: ServerContext = {
    port: cfg.port,
    enableCors: cfg.enableCors,
    registry,
    counters,
    getMetrics: () => ({
      wsConnections: registry.size(),
      messagesReceived: counters.messagesReceivedTotal,
      messagesSent: counters.messagesSentTotal
    })
  };

  const server = http.createServer(createApp(ctx));
  const wss = mountWsServer(server, ctx, { path: cfg.ws.path, maxPayloadBytes: cfg.ws.maxPayloadBytes });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(cfg.port, cfg.host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : cfg.port;
  ctx.port = port;
  log.info(`listening on ${cfg.host}:${port}, websocket at ${cfg.ws.path}`);

  const stop = async (): Promise<RegistrySnapshot> => {
    const final = registry.snapshot();
    registry.closeAll(1001, 'Server shutting down');
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    const closed = new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    server.closeIdleConnections();
    await closed;
    return final;
  };

  return { ctx, server, wss, port, stop };
}

export async function launch(cfg: ServerConfig, logger: Logger = log): Promise<RunningServer | undefined> {
  try {
    return await startServer(cfg);
  } catch (error) {
    logger.error(`server startup failed: ${errorText(error)}`);
    process.exitCode = 1;
    return undefined;
  }
}
