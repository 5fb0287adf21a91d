import type { InboundMessage } from '../transport/ws-protocol.js';
import { elapsedSeconds, toEpochSeconds, type DispatchResponse } from './outbound.js';

export interface DispatchStats {
  id: string;
  connectedAt: number;
  messageCount: number;
  now: number;
}

export function dispatch(message: InboundMessage, stats: DispatchStats): DispatchResponse {
  const { now } = stats;
  const uptime = elapsedSeconds(stats.connectedAt, now);
  switch (message.type) {
    case 'ping':
      return { type: 'pong', timestamp: toEpochSeconds(now), original_timestamp: message.timestamp ?? null, server_connection_time: uptime };
    case 'test':
      return {
        type: 'test_response',
        message: 'Test successful!',
        echo_data: 'data' in message.raw ? message.data : '',
        server_time: toEpochSeconds(now),
        connection_stats: { id: stats.id, messages_received: stats.messageCount, uptime }
      };
    case 'heartbeat':
      return { type: 'heartbeat_ack', timestamp: toEpochSeconds(now), connection_uptime: uptime };
    case 'audio_stream': {
      const size = payloadLength(message.data);
      return { type: 'audio_received', message: `Audio chunk received (${size} bytes)`, size, timestamp: toEpochSeconds(now) };
    }
    case 'other':
      return {
        type: 'echo',
        original_type: message.originalType,
        message: `Echo: ${String(message.originalType)}`,
        original_message: message.raw,
        timestamp: toEpochSeconds(now)
      };
  }
}

// Strings and arrays report their element count, objects their key count; scalars have no size.
export function payloadLength(data: unknown): number {
  if (typeof data === 'string' || Array.isArray(data)) return data.length;
  if (typeof data === 'object' && data !== null) return Object.keys(data).length;
  return 0;
}
