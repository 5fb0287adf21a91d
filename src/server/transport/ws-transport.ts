import { WebSocket, type RawData } from 'ws';
import type { MessageTransport } from '../types.js';

interface Waiter {
  resolve: (value: string | null) => void;
  reject: (reason: Error) => void;
}

export function rawDataToString(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8');
  return raw.toString('utf8');
}

// Adapts ws's push-style events into a pull-style receive(): frames queue until the loop asks for them.
export class WsTransport implements MessageTransport {
  private readonly inbox: string[] = [];
  private readonly waiters: Waiter[] = [];
  private ended = false;
  private failure?: Error;

  constructor(private readonly ws: WebSocket) {
    ws.on('message', (raw) => this.push(rawDataToString(raw)));
    ws.on('error', (error) => this.end(error));
    ws.on('close', (code, reason) => {
      // 1006: the peer went away without a close frame.
      if (code === 1006) this.end(new Error(`connection reset (code ${code}${reason.length ? `: ${reason.toString()}` : ''})`));
      else this.end();
    });
  }

  get isOpen(): boolean { return this.ws.readyState === WebSocket.OPEN; }

  receive(): Promise<string | null> {
    const next = this.inbox.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.ws.send(data, (error) => (error ? reject(error) : resolve()));
    });
  }

  close(code = 1000, reason = ''): void {
    if (this.ws.readyState === WebSocket.CLOSING || this.ws.readyState === WebSocket.CLOSED) return;
    this.ws.close(code, reason);
  }

  private push(frame: string): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(frame);
    else this.inbox.push(frame);
  }

  private end(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      if (error) waiter.reject(error);
      else waiter.resolve(null);
    }
  }
}
