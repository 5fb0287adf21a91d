import { describe, expect, it } from 'vitest';
import { Counters } from '../../src/server/metrics/counters.js';
import { runConnection, type ConnectionHandlerDeps } from '../../src/server/relay/connection-handler.js';
import { ConnectionRegistry } from '../../src/server/relay/connection-registry.js';
import { FakeTransport, fakeLogger } from '../helpers/fake-transport.js';

function setup(overrides: Partial<ConnectionHandlerDeps> = {}) {
  let seq = 0;
  const registry = new ConnectionRegistry();
  const counters = new Counters();
  const log = fakeLogger();
  const deps: ConnectionHandlerDeps = {
    registry,
    counters,
    log,
    now: () => 1_000_000,
    createId: () => `conn_test_${++seq}`,
    ...overrides
  };
  return { registry, counters, log, deps };
}

describe('connection handler', () => {
  it('welcomes, answers a test message and removes the record on clean close', async () => {
    const { registry, counters, deps } = setup();
    const t = new FakeTransport().pushJson({ type: 'test', data: 'abc' }).end();

    const outcome = await runConnection(t, deps);

    const [welcome, reply] = t.messages();
    expect(welcome).toEqual({ type: 'system_ready', message: 'Test connection successful!', connection_id: 'conn_test_1', server_time: 1000 });
    expect(reply).toMatchObject({ type: 'test_response', echo_data: 'abc', connection_stats: { id: 'conn_test_1', messages_received: 1, uptime: 0 } });
    expect(outcome).toEqual({ id: 'conn_test_1', kind: 'clean', messageCount: 1 });
    expect(registry.snapshot().connections).toEqual([]);
    expect(counters.closeTotal).toEqual({ clean: 1 });
    expect(counters.messagesSentTotal).toBe(2);
  });

  it('keeps the connection open after invalid JSON', async () => {
    const { counters, deps } = setup();
    const t = new FakeTransport().push('not-json').pushJson({ type: 'heartbeat' }).end();

    const outcome = await runConnection(t, deps);

    const [, invalid, ack] = t.messages();
    expect(invalid).toMatchObject({ type: 'error', message: 'Invalid JSON format', timestamp: 1000 });
    expect(typeof invalid.error).toBe('string');
    expect(ack).toEqual({ type: 'heartbeat_ack', timestamp: 1000, connection_uptime: 0 });
    expect(outcome.messageCount).toBe(2);
    expect(counters.decodeErrorTotal).toBe(1);
  });

  it('counts malformed messages toward message_count', async () => {
    const { registry, deps } = setup();
    const t = new FakeTransport();
    const running = runConnection(t, deps);

    t.push('{').push('also bad').pushJson({ type: 'test' });
    const messages = await t.waitForSent(4);
    expect(messages[3]).toMatchObject({ type: 'test_response', connection_stats: { messages_received: 3 } });
    expect(registry.get('conn_test_1')?.messageCount).toBe(3);

    t.end();
    await running;
    expect(registry.has('conn_test_1')).toBe(false);
  });

  it('echoes ping timestamps and unrecognized types', async () => {
    const { deps } = setup();
    const t = new FakeTransport()
      .pushJson({ type: 'ping', timestamp: 1234567 })
      .pushJson({ type: 'unrecognized_xyz', n: 1 })
      .pushJson({ type: 'unrecognized_xyz', n: 2 })
      .end();

    await runConnection(t, deps);

    const [, pong, echo1, echo2] = t.messages();
    expect(pong).toMatchObject({ type: 'pong', original_timestamp: 1234567 });
    expect(echo1).toMatchObject({ type: 'echo', original_type: 'unrecognized_xyz', original_message: { type: 'unrecognized_xyz', n: 1 } });
    expect(echo2).toMatchObject({ type: 'echo', original_type: 'unrecognized_xyz', original_message: { type: 'unrecognized_xyz', n: 2 } });
  });

  it('echoes objects whose type is not a string', async () => {
    const { counters, deps } = setup();
    const t = new FakeTransport().push('{"type":5}').push('{"type":null}').end();

    const outcome = await runConnection(t, deps);

    const [, numeric, nullish] = t.messages();
    expect(numeric).toEqual({ type: 'echo', original_type: 5, message: 'Echo: 5', original_message: { type: 5 }, timestamp: 1000 });
    expect(nullish).toEqual({ type: 'echo', original_type: null, message: 'Echo: null', original_message: { type: null }, timestamp: 1000 });
    expect(outcome.kind).toBe('clean');
    expect(counters.processingErrorTotal).toBe(0);
  });

  it('sizes audio payloads', async () => {
    const { deps } = setup();
    const t = new FakeTransport().pushJson({ type: 'audio_stream', data: 'xxxxx' }).end();
    await runConnection(t, deps);
    expect(t.messages()[1]).toMatchObject({ type: 'audio_received', size: 5 });
  });

  it('answers a dispatch failure generically and carries on', async () => {
    let calls = 0;
    const { counters, log, deps } = setup({
      dispatch: () => {
        calls += 1;
        if (calls === 1) throw new Error('secret internals');
        return { type: 'heartbeat_ack', timestamp: 1, connection_uptime: 0 };
      }
    });
    const t = new FakeTransport().pushJson({ type: 'test' }).pushJson({ type: 'heartbeat' }).end();

    const outcome = await runConnection(t, deps);

    const [, failure, ack] = t.messages();
    expect(failure).toEqual({ type: 'error', message: 'Server processing error', timestamp: 1000 });
    expect(ack.type).toBe('heartbeat_ack');
    expect(outcome.kind).toBe('clean');
    expect(counters.processingErrorTotal).toBe(1);
    expect(log.error).toHaveBeenCalledWith('message processing error for conn_test_1: failed to handle test: secret internals');
  });

  it('answers non-object JSON generically', async () => {
    const { deps } = setup();
    const t = new FakeTransport().push('[1,2]').end();
    await runConnection(t, deps);
    expect(t.messages()[1]).toEqual({ type: 'error', message: 'Server processing error', timestamp: 1000 });
  });

  it('closes without processing when the welcome cannot be sent', async () => {
    const { registry, counters, deps } = setup();
    const t = new FakeTransport().pushJson({ type: 'ping' });
    t.failSend = () => new Error('broken pipe');

    const outcome = await runConnection(t, deps);

    expect(outcome).toEqual({ id: 'conn_test_1', kind: 'welcome_failed', messageCount: 0 });
    expect(registry.size()).toBe(0);
    expect(counters.closeTotal).toEqual({ welcome_failed: 1 });
    expect(t.closed).toEqual({ code: 1000, reason: 'welcome_failed' });
  });

  it('closes when a response cannot be sent', async () => {
    const { registry, deps } = setup();
    const t = new FakeTransport().pushJson({ type: 'ping' }).pushJson({ type: 'ping' });
    t.failSend = (_data, index) => (index === 1 ? new Error('closed') : undefined);

    const outcome = await runConnection(t, deps);

    expect(outcome.kind).toBe('send_failed');
    expect(outcome.messageCount).toBe(1);
    expect(registry.size()).toBe(0);
  });

  it('closes when the error reply itself cannot be sent', async () => {
    const { deps } = setup();
    const t = new FakeTransport().push('not-json').pushJson({ type: 'heartbeat' });
    t.failSend = (data) => (data.includes('"error"') ? new Error('reset') : undefined);

    const outcome = await runConnection(t, deps);
    expect(outcome).toEqual({ id: 'conn_test_1', kind: 'send_failed', messageCount: 1 });
  });

  it('treats receive failures as abrupt closes with severity by signature', async () => {
    const first = setup();
    const reset = await runConnection(new FakeTransport().fail(new Error('Connection reset by peer')), first.deps);
    expect(reset.kind).toBe('abrupt');
    expect(first.log.info).toHaveBeenCalledWith('connection conn_test_1 closed unexpectedly: Connection reset by peer');
    expect(first.registry.size()).toBe(0);

    const second = setup();
    await runConnection(new FakeTransport().fail(new Error('invalid frame header')), second.deps);
    expect(second.log.error).toHaveBeenCalledWith('receive error for conn_test_1: invalid frame header');
    expect(second.counters.closeTotal).toEqual({ abrupt: 1 });
  });

  it('leaves an existing record alone when its id is minted twice', async () => {
    const { registry, counters, deps } = setup({ createId: () => 'conn_dup' });
    const owner = new FakeTransport();
    const running = runConnection(owner, deps);
    await owner.waitForSent(1);

    const intruder = new FakeTransport();
    const outcome = await runConnection(intruder, deps);

    expect(outcome.kind).toBe('internal');
    expect(intruder.closed?.code).toBe(1011);
    expect(intruder.sent).toEqual([]);
    expect(registry.has('conn_dup')).toBe(true);
    expect(counters.closeTotal).toEqual({ internal: 1 });

    owner.end();
    await running;
    expect(registry.has('conn_dup')).toBe(false);
  });

  it('keeps counts of concurrent connections apart', async () => {
    const { registry, deps } = setup();
    const a = new FakeTransport();
    const b = new FakeTransport();
    const runA = runConnection(a, deps);
    const runB = runConnection(b, deps);
    await Promise.all([a.waitForSent(1), b.waitForSent(1)]);

    a.pushJson({ type: 'heartbeat' });
    b.pushJson({ type: 'heartbeat' }).pushJson({ type: 'heartbeat' });
    a.pushJson({ type: 'test' });
    b.pushJson({ type: 'test' });
    const [msgsA, msgsB] = await Promise.all([a.waitForSent(3), b.waitForSent(4)]);

    expect(msgsA[2]).toMatchObject({ type: 'test_response', connection_stats: { id: 'conn_test_1', messages_received: 2 } });
    expect(msgsB[3]).toMatchObject({ type: 'test_response', connection_stats: { id: 'conn_test_2', messages_received: 3 } });
    expect(registry.get('conn_test_1')?.messageCount).toBe(2);
    expect(registry.get('conn_test_2')?.messageCount).toBe(3);

    a.end();
    expect(await runA).toMatchObject({ kind: 'clean' });
    expect(registry.snapshot().connections.map((c) => c.id)).toEqual(['conn_test_2']);
    b.fail(new Error('aborted'));
    expect(await runB).toMatchObject({ kind: 'abrupt' });
    expect(registry.size()).toBe(0);
  });

  it('replies strictly in request order', async () => {
    const { deps } = setup();
    const t = new FakeTransport()
      .pushJson({ type: 'ping', timestamp: 1 })
      .pushJson({ type: 'heartbeat' })
      .pushJson({ type: 'ping', timestamp: 2 })
      .push('oops')
      .pushJson({ type: 'audio_stream', data: 'ab' })
      .end();
    await runConnection(t, deps);
    expect(t.messages().map((m) => m.type)).toEqual(['system_ready', 'pong', 'heartbeat_ack', 'pong', 'error', 'audio_received']);
  });
});
