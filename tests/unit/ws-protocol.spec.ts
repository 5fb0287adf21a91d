import { describe, expect, it } from 'vitest';
import { DecodeError, EnvelopeError } from '../../src/server/errors.js';
import { messageTypeOf, parseInboundMessage } from '../../src/server/transport/ws-protocol.js';

describe('ws-protocol', () => {
  it('classifies known types', () => {
    expect(parseInboundMessage('{"type":"ping","timestamp":7}')).toEqual({ type: 'ping', timestamp: 7, raw: { type: 'ping', timestamp: 7 } });
    expect(parseInboundMessage('{"type":"heartbeat"}').type).toBe('heartbeat');
  });

  it('falls back to the other variant for unknown tags', () => {
    const msg = parseInboundMessage('{"type":"custom","x":1}');
    expect(msg).toEqual({ type: 'other', originalType: 'custom', raw: { type: 'custom', x: 1 } });
    expect(messageTypeOf(msg)).toBe('custom');
  });

  it('treats a missing type as unknown', () => {
    expect(messageTypeOf(parseInboundMessage('{}'))).toBe('unknown');
  });

  it('throws DecodeError on malformed JSON', () => {
    expect(() => parseInboundMessage('not-json')).toThrow(DecodeError);
  });

  it('throws EnvelopeError for JSON that is not a message object', () => {
    expect(() => parseInboundMessage('42')).toThrow(EnvelopeError);
    expect(() => parseInboundMessage('null')).toThrow(EnvelopeError);
    expect(() => parseInboundMessage('[1]')).toThrow(EnvelopeError);
  });

  it('keeps a non-string type in the other variant', () => {
    expect(parseInboundMessage('{"type":5}')).toEqual({ type: 'other', originalType: 5, raw: { type: 5 } });
    const nullType = parseInboundMessage('{"type":null}');
    expect(nullType).toEqual({ type: 'other', originalType: null, raw: { type: null } });
    expect(messageTypeOf(nullType)).toBe('null');
  });
});
