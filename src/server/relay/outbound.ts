export interface SystemReadyMessage { type: 'system_ready'; message: string; connection_id: string; server_time: number; }
export interface PongMessage { type: 'pong'; timestamp: number; original_timestamp: unknown; server_connection_time: number; }
export interface TestResponseMessage {
  type: 'test_response';
  message: string;
  echo_data: unknown;
  server_time: number;
  connection_stats: { id: string; messages_received: number; uptime: number };
}
export interface HeartbeatAckMessage { type: 'heartbeat_ack'; timestamp: number; connection_uptime: number; }
export interface AudioReceivedMessage { type: 'audio_received'; message: string; size: number; timestamp: number; }
export interface EchoMessage { type: 'echo'; original_type: unknown; message: string; original_message: Record<string, unknown>; timestamp: number; }
export interface ErrorMessage { type: 'error'; message: string; error?: string; timestamp: number; }

export type DispatchResponse = PongMessage | TestResponseMessage | HeartbeatAckMessage | AudioReceivedMessage | EchoMessage;
export type OutboundMessage = SystemReadyMessage | DispatchResponse | ErrorMessage;

export const toEpochSeconds = (ms: number): number => Math.floor(ms / 1000);
export const elapsedSeconds = (from: number, to: number): number => (to - from) / 1000;

export function systemReady(connectionId: string, now: number): SystemReadyMessage {
  return { type: 'system_ready', message: 'Test connection successful!', connection_id: connectionId, server_time: toEpochSeconds(now) };
}

export function invalidJson(detail: string, now: number): ErrorMessage {
  return { type: 'error', message: 'Invalid JSON format', error: detail, timestamp: toEpochSeconds(now) };
}

export function processingError(now: number): ErrorMessage {
  return { type: 'error', message: 'Server processing error', timestamp: toEpochSeconds(now) };
}
