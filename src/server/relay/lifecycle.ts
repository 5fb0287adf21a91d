import { errorText } from '../errors.js';
import type { Logger } from '../logger.js';
import { Counters } from '../metrics/counters.js';
import type { CloseKind, ConnectionRecord } from '../types.js';
import { ConnectionRegistry } from './connection-registry.js';

const expectedClosure = ['closed', 'broken', 'reset', 'aborted'];

export function isExpectedClosure(error: unknown): boolean {
  const text = errorText(error).toLowerCase();
  return expectedClosure.some((term) => text.includes(term));
}

export function logReceiveFailure(log: Logger, connectionId: string, error: unknown): void {
  if (isExpectedClosure(error)) log.info(`connection ${connectionId} closed unexpectedly: ${errorText(error)}`);
  else log.error(`receive error for ${connectionId}: ${errorText(error)}`);
}

export function handleConnectionClosed(registry: ConnectionRegistry, counters: Counters, log: Logger, connectionId: string, kind: CloseKind, now: number): ConnectionRecord | undefined {
  counters.markClose(kind);
  const record = registry.remove(connectionId);
  if (!record) return undefined;
  if (record.transport.isOpen) record.transport.close(closeCodeFor(kind), kind);
  log.info(`connection ${connectionId} removed (${kind}, lived ${((now - record.connectedAt) / 1000).toFixed(1)}s, ${record.messageCount} messages). total: ${registry.size()}`);
  return record;
}

export function closeCodeFor(kind: CloseKind): number {
  return kind === 'internal' ? 1011 : 1000;
}
