export interface MessageTransport {
  /** Resolves with the next inbound text frame, or null once the peer has closed cleanly. */
  receive(): Promise<string | null>;
  send(data: string): Promise<void>;
  close(code?: number, reason?: string): void;
  readonly isOpen: boolean;
}

export interface ConnectionRecord {
  id: string;
  transport: MessageTransport;
  readonly connectedAt: number;
  lastActivity: number;
  messageCount: number;
}

export interface ConnectionStats {
  id: string;
  connectedAt: number;
  lastActivity: number;
  messageCount: number;
}

export interface ConnectionSummary extends ConnectionStats {
  duration: number;
}

export interface RegistrySnapshot {
  takenAt: number;
  totalConnections: number;
  connections: ConnectionSummary[];
}

export type CloseKind = 'clean' | 'abrupt' | 'send_failed' | 'welcome_failed' | 'internal';

export interface ConnectionOutcome {
  id: string;
  kind: CloseKind;
  messageCount: number;
}

export interface ServerMetrics {
  wsConnections: number;
  messagesReceived: number;
  messagesSent: number;
}
