import { DecodeError, DispatchError, errorText } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { Counters } from '../metrics/counters.js';
import { sendJson } from '../transport/safe-send.js';
import { messageTypeOf, parseInboundMessage, type InboundMessage } from '../transport/ws-protocol.js';
import type { CloseKind, ConnectionOutcome, MessageTransport } from '../types.js';
import { createConnectionId } from './connection-id.js';
import { ConnectionRegistry } from './connection-registry.js';
import { dispatch as defaultDispatch } from './dispatcher.js';
import { handleConnectionClosed, logReceiveFailure } from './lifecycle.js';
import { invalidJson, processingError, systemReady, type OutboundMessage } from './outbound.js';

export interface ConnectionHandlerDeps {
  registry: ConnectionRegistry;
  counters: Counters;
  log?: Logger;
  now?: () => number;
  createId?: (now: number) => string;
  dispatch?: typeof defaultDispatch;
}

interface Session {
  id: string;
  connectedAt: number;
  received: number;
  transport: MessageTransport;
  registry: ConnectionRegistry;
  counters: Counters;
  log: Logger;
  now: () => number;
  dispatch: typeof defaultDispatch;
}

const defaultLog = createLogger('ws');

/**
 * Drives one connection from accept to cleanup. Resolves once the connection is gone;
 * never rejects, and always removes the connection's record on the way out.
 */
export async function runConnection(transport: MessageTransport, deps: ConnectionHandlerDeps): Promise<ConnectionOutcome> {
  const now = deps.now ?? Date.now;
  const connectedAt = now();
  const session: Session = {
    id: (deps.createId ?? createConnectionId)(connectedAt),
    connectedAt,
    received: 0,
    transport,
    registry: deps.registry,
    counters: deps.counters,
    log: deps.log ?? defaultLog,
    now,
    dispatch: deps.dispatch ?? defaultDispatch
  };
  const { id, registry, counters, log } = session;
  log.info(`new connection: ${id}`);

  let kind: CloseKind = 'internal';
  let registered = false;
  try {
    registry.add(id, { id, transport, connectedAt, lastActivity: connectedAt, messageCount: 0 });
    registered = true;
    counters.connectionsTotal += 1;
    log.info(`connection ${id} added. total: ${registry.size()}`);
    kind = await serve(session);
  } catch (error) {
    kind = 'internal';
    log.error(`handler error for ${id}: ${errorText(error)}`);
  } finally {
    if (registered) {
      handleConnectionClosed(registry, counters, log, id, kind, now());
    } else {
      // Never registered: the id may belong to someone else, so leave the registry alone.
      counters.markClose(kind);
      transport.close(1011, kind);
    }
    log.info(`cleanup completed for ${id}`);
  }
  return { id, kind, messageCount: session.received };
}

async function serve(session: Session): Promise<CloseKind> {
  const { id, transport, log } = session;
  if (!(await reply(session, systemReady(id, session.now())))) {
    log.error(`failed to send welcome message to ${id}`);
    return 'welcome_failed';
  }
  log.info(`welcome sent to ${id}`);

  for (;;) {
    let raw: string | null;
    try {
      raw = await transport.receive();
    } catch (error) {
      logReceiveFailure(log, id, error);
      return 'abrupt';
    }
    if (raw === null) {
      log.info(`connection ${id} closed by client (clean)`);
      return 'clean';
    }

    session.received += 1;
    session.counters.messagesReceivedTotal += 1;
    const response = respond(session, raw);
    if (!(await reply(session, response))) {
      log.error(`failed to send response to ${id}`);
      return 'send_failed';
    }
    logSent(session, response);
  }
}

function respond(session: Session, raw: string): OutboundMessage {
  const { id, counters, log } = session;
  const now = session.now();
  const stats = session.registry.touch(id, now);

  let message: InboundMessage;
  try {
    message = parseInboundMessage(raw);
  } catch (error) {
    if (error instanceof DecodeError) {
      counters.decodeErrorTotal += 1;
      log.warn(`invalid JSON from ${id}: ${error.message}`);
      return invalidJson(error.message, now);
    }
    counters.processingErrorTotal += 1;
    log.error(`message processing error for ${id}: ${errorText(error)}`);
    return processingError(now);
  }

  const type = messageTypeOf(message);
  if (type === 'heartbeat') log.debug(`heartbeat from ${id}`);
  else log.info(`${id}: ${type}`);

  try {
    return session.dispatch(message, {
      id,
      connectedAt: session.connectedAt,
      messageCount: stats?.messageCount ?? session.received,
      now
    });
  } catch (error) {
    const failure = new DispatchError(type, error);
    counters.processingErrorTotal += 1;
    log.error(`message processing error for ${id}: ${failure.message}`);
    return processingError(now);
  }
}

async function reply(session: Session, message: OutboundMessage): Promise<boolean> {
  const ok = await sendJson(session.transport, message, session.id, session.log);
  session.counters.markSend(ok);
  return ok;
}

function logSent(session: Session, message: OutboundMessage): void {
  if (message.type === 'heartbeat_ack') return;
  if (message.type === 'pong') session.log.debug(`pong sent to ${session.id}`);
  else session.log.info(`response sent to ${session.id}: ${message.type}`);
}
