import { describe, expect, it } from 'vitest';
import { createConnectionId } from '../../src/server/relay/connection-id.js';

describe('connection-id', () => {
  it('stays unique for connections opened in the same millisecond', () => {
    const ids = new Set(Array.from({ length: 50 }, () => createConnectionId(1_700_000_000_000)));
    expect(ids.size).toBe(50);
  });

  it('carries the accept time', () => {
    expect(createConnectionId(1234)).toMatch(/^conn_1234_\d+$/);
  });
});
