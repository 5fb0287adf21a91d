import { DuplicateConnectionIdError } from '../errors.js';
import type { ConnectionRecord, ConnectionStats, RegistrySnapshot } from '../types.js';

// Every method runs to completion on the event loop, so no caller can observe a half-applied change.
export class ConnectionRegistry {
  private readonly connections = new Map<string, ConnectionRecord>();

  add(id: string, record: ConnectionRecord): void {
    if (this.connections.has(id)) throw new DuplicateConnectionIdError(id);
    this.connections.set(id, record);
  }

  remove(id: string): ConnectionRecord | undefined {
    const record = this.connections.get(id);
    this.connections.delete(id);
    return record;
  }

  touch(id: string, now: number = Date.now()): ConnectionStats | undefined {
    const record = this.connections.get(id);
    if (!record) return undefined;
    record.messageCount += 1;
    record.lastActivity = now;
    return toStats(record);
  }

  get(id: string): ConnectionStats | undefined {
    const record = this.connections.get(id);
    return record ? toStats(record) : undefined;
  }

  has(id: string): boolean { return this.connections.has(id); }
  size(): number { return this.connections.size; }

  snapshot(now: number = Date.now()): RegistrySnapshot {
    const connections = [...this.connections.values()].map((r) => ({ ...toStats(r), duration: (now - r.connectedAt) / 1000 }));
    return { takenAt: now, totalConnections: connections.length, connections };
  }

  closeAll(code: number, reason: string): number {
    let closed = 0;
    for (const record of this.connections.values()) {
      if (!record.transport.isOpen) continue;
      record.transport.close(code, reason);
      closed += 1;
    }
    return closed;
  }
}

function toStats(record: ConnectionRecord): ConnectionStats {
  return { id: record.id, connectedAt: record.connectedAt, lastActivity: record.lastActivity, messageCount: record.messageCount };
}
