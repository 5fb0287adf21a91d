import type { RegistrySnapshot, ServerMetrics } from '../types.js';
import { toEpochSeconds } from '../relay/outbound.js';
import { Counters } from './counters.js';

export interface ConnectionStatusRow {
  connected_at: number;
  last_activity: number;
  duration: number;
  message_count: number;
}

export function buildStatusSummary(snapshot: RegistrySnapshot, metrics: ServerMetrics, counters: Counters) {
  const connections: Record<string, ConnectionStatusRow> = {};
  for (const c of snapshot.connections) {
    connections[c.id] = {
      connected_at: toEpochSeconds(c.connectedAt),
      last_activity: toEpochSeconds(c.lastActivity),
      duration: c.duration,
      message_count: c.messageCount
    };
  }
  return {
    status: 'healthy' as const,
    server_time: toEpochSeconds(snapshot.takenAt),
    total_connections: snapshot.totalConnections,
    connections,
    metrics,
    closeByKind: counters.closeTotal,
    decodeErrorTotal: counters.decodeErrorTotal,
    processingErrorTotal: counters.processingErrorTotal,
    sendFailureTotal: counters.sendFailureTotal
  };
}
