import { WebSocketServer } from 'ws';
import type { Server } from 'node:http';
import type { ServerContext } from '../api/types.js';
import { errorText } from '../errors.js';
import { createLogger } from '../logger.js';
import { runConnection } from '../relay/connection-handler.js';
import { WsTransport } from './ws-transport.js';

const log = createLogger('ws');

export interface WsMountOptions {
  path: string;
  maxPayloadBytes: number;
}

export function matchesWsPath(url: string | undefined, path: string): boolean {
  const pathname = (url ?? '').split('?')[0];
  return pathname === path;
}

export function mountWsServer(server: Server, ctx: ServerContext, options: WsMountOptions): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true, maxPayload: options.maxPayloadBytes });

  wss.on('connection', (ws) => {
    const transport = new WsTransport(ws);
    runConnection(transport, { registry: ctx.registry, counters: ctx.counters, log }).catch((error: unknown) => {
      log.error(`connection handler crashed: ${errorText(error)}`);
    });
  });

  server.on('upgrade', (req, socket, head) => {
    if (!matchesWsPath(req.url, options.path)) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req);
    });
  });

  return wss;
}
