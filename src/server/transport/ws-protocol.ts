import { z } from 'zod';
import { DecodeError, EnvelopeError, errorText } from '../errors.js';

const envelopeSchema = z.record(z.unknown());

export type Envelope = z.infer<typeof envelopeSchema>;

export interface PingMessage { type: 'ping'; timestamp: unknown; raw: Envelope; }
export interface TestMessage { type: 'test'; data: unknown; raw: Envelope; }
export interface HeartbeatMessage { type: 'heartbeat'; raw: Envelope; }
export interface AudioStreamMessage { type: 'audio_stream'; data: unknown; raw: Envelope; }
export interface OtherMessage { type: 'other'; originalType: unknown; raw: Envelope; }

export type InboundMessage = PingMessage | TestMessage | HeartbeatMessage | AudioStreamMessage | OtherMessage;

export function parseInboundMessage(raw: string): InboundMessage {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new DecodeError(errorText(error), error);
  }
  const parsed = envelopeSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new EnvelopeError(parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; '));
  }
  return classify(parsed.data);
}

export function classify(envelope: Envelope): InboundMessage {
  const type = 'type' in envelope ? envelope.type : 'unknown';
  if (typeof type !== 'string') return { type: 'other', originalType: type, raw: envelope };
  switch (type) {
    case 'ping': return { type: 'ping', timestamp: envelope.timestamp, raw: envelope };
    case 'test': return { type: 'test', data: envelope.data, raw: envelope };
    case 'heartbeat': return { type: 'heartbeat', raw: envelope };
    case 'audio_stream': return { type: 'audio_stream', data: envelope.data, raw: envelope };
    default: return { type: 'other', originalType: type, raw: envelope };
  }
}

export function messageTypeOf(message: InboundMessage): string {
  return message.type === 'other' ? String(message.originalType) : message.type;
}
