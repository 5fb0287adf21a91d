import type { CloseKind } from '../types.js';

type KindCounter = Partial<Record<CloseKind, number>>;

export class Counters {
  closeTotal: KindCounter = {};
  connectionsTotal = 0;
  messagesReceivedTotal = 0;
  messagesSentTotal = 0;
  decodeErrorTotal = 0;
  processingErrorTotal = 0;
  sendFailureTotal = 0;

  markClose(kind: CloseKind): void {
    this.closeTotal[kind] = (this.closeTotal[kind] ?? 0) + 1;
  }

  markSend(ok: boolean): void {
    if (ok) this.messagesSentTotal += 1;
    else this.sendFailureTotal += 1;
  }
}
