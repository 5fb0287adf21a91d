export type ServerErrorCode = 'decode_error' | 'invalid_envelope' | 'dispatch_error' | 'duplicate_connection_id';

export class ServerError extends Error {
  readonly code: ServerErrorCode;

  constructor(code: ServerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ServerError';
    this.code = code;
  }
}

/** Inbound text was not valid JSON. Carries the parser's own message. */
export class DecodeError extends ServerError {
  constructor(message: string, cause?: unknown) {
    super('decode_error', message, { cause });
    this.name = 'DecodeError';
  }
}

/** Valid JSON, but not a message object. */
export class EnvelopeError extends ServerError {
  constructor(message: string) {
    super('invalid_envelope', message);
    this.name = 'EnvelopeError';
  }
}

export class DispatchError extends ServerError {
  constructor(messageType: string, cause: unknown) {
    super('dispatch_error', `failed to handle ${messageType}: ${errorText(cause)}`, { cause });
    this.name = 'DispatchError';
  }
}

export class DuplicateConnectionIdError extends ServerError {
  constructor(readonly connectionId: string) {
    super('duplicate_connection_id', `connection id already registered: ${connectionId}`);
    this.name = 'DuplicateConnectionIdError';
  }
}

export function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
