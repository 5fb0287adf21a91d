import { errorText } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { MessageTransport } from '../types.js';

const defaultLog = createLogger('ws');

export async function sendJson(transport: MessageTransport, payload: unknown, connectionId: string, log: Logger = defaultLog): Promise<boolean> {
  if (!transport.isOpen) {
    log.error(`send to ${connectionId} skipped: transport closed`);
    return false;
  }
  let data: string;
  try {
    data = JSON.stringify(payload);
  } catch (error) {
    log.error(`failed to serialize message for ${connectionId}: ${errorText(error)}`);
    return false;
  }
  try {
    await transport.send(data);
    return true;
  } catch (error) {
    log.error(`failed to send message to ${connectionId}: ${errorText(error)}`);
    return false;
  }
}
