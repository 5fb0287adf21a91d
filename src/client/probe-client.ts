import WebSocket from 'ws';
import { z } from 'zod';
import { errorText } from '../server/errors.js';
import { rawDataToString } from '../server/transport/ws-transport.js';

const replySchema = z.object({ type: z.string() }).passthrough();

export type ServerReply = z.infer<typeof replySchema>;

export interface ProbeClient {
  send(message: unknown): void;
  sendRaw(text: string): void;
  next(): Promise<ServerReply>;
  close(): Promise<void>;
}

type Delivery = { ok: true; reply: ServerReply } | { ok: false; error: Error };

export function parseReply(text: string): Delivery {
  try {
    return { ok: true, reply: replySchema.parse(JSON.parse(text)) };
  } catch (error) {
    return { ok: false, error: new Error(`unreadable reply: ${errorText(error)}`) };
  }
}

export function connectProbe(url: string): Promise<ProbeClient> {
  const ws = new WebSocket(url);
  const inbox: Delivery[] = [];
  const waiters: Array<(delivery: Delivery) => void> = [];
  let closedWith: Error | undefined;

  const settle = (delivery: Delivery): Promise<ServerReply> => (delivery.ok ? Promise.resolve(delivery.reply) : Promise.reject(delivery.error));

  ws.on('message', (raw) => {
    const delivery = parseReply(rawDataToString(raw));
    const waiter = waiters.shift();
    if (waiter) waiter(delivery);
    else inbox.push(delivery);
  });
  ws.on('close', (code) => {
    const error = new Error(`connection closed (${code})`);
    closedWith = error;
    for (const waiter of waiters.splice(0)) waiter({ ok: false, error });
  });

  const client: ProbeClient = {
    send: (message) => ws.send(JSON.stringify(message)),
    sendRaw: (text) => ws.send(text),
    next: () => {
      const queued = inbox.shift();
      if (queued) return settle(queued);
      if (closedWith) return Promise.reject(closedWith);
      return new Promise<Delivery>((resolve) => waiters.push(resolve)).then(settle);
    },
    close: () => new Promise<void>((resolve) => {
      if (ws.readyState === WebSocket.CLOSED) return resolve();
      ws.once('close', () => resolve());
      ws.close(1000, 'probe done');
    })
  };

  return new Promise((resolve, reject) => {
    ws.once('error', reject);
    ws.once('open', () => {
      ws.off('error', reject);
      resolve(client);
    });
  });
}

export function buildProbeScript(now: number): Array<Record<string, unknown>> {
  return [
    { type: 'ping', timestamp: now },
    { type: 'test', data: 'hello from probe' },
    { type: 'heartbeat' },
    { type: 'audio_stream', data: 'AAAAAAAA' },
    { type: 'probe_custom', note: 'echo me' }
  ];
}
