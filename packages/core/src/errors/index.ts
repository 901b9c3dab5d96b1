/**
 * Structured error types for codedrop.
 *
 * Every error a peer can trigger carries a stable `code` so the HTTP and
 * WebSocket layers can map it to a status or control message without
 * string matching.
 */

export class CodeDropError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CodeDropError';
  }
}

export class RoomNotFoundError extends CodeDropError {
  constructor(public readonly roomCode: string, context?: Record<string, unknown>) {
    super(`No room found for code ${roomCode}.`, 'NOT_FOUND', { ...context, roomCode });
    this.name = 'RoomNotFoundError';
  }
}

export class PayloadNotFoundError extends CodeDropError {
  constructor(public readonly roomCode: string) {
    super(`No file has been uploaded for code ${roomCode}.`, 'NOT_FOUND', { roomCode });
    this.name = 'PayloadNotFoundError';
  }
}

export class ReceiverAlreadyBoundError extends CodeDropError {
  constructor(public readonly roomCode: string) {
    super(`Room ${roomCode} already has a receiver.`, 'ALREADY_BOUND', { roomCode });
    this.name = 'ReceiverAlreadyBoundError';
  }
}

export class NoReceiverError extends CodeDropError {
  constructor(public readonly roomCode: string) {
    super(`Receiver not connected to room ${roomCode}.`, 'NO_RECEIVER', { roomCode });
    this.name = 'NoReceiverError';
  }
}

export class EmptyPayloadError extends CodeDropError {
  constructor(context?: Record<string, unknown>) {
    super('No file selected.', 'EMPTY_PAYLOAD', context);
    this.name = 'EmptyPayloadError';
  }
}

export class PayloadTooLargeError extends CodeDropError {
  constructor(public readonly limitBytes: number, context?: Record<string, unknown>) {
    super(`File exceeds the ${limitBytes} byte upload limit.`, 'PAYLOAD_TOO_LARGE', { ...context, limitBytes });
    this.name = 'PayloadTooLargeError';
  }
}

export class InvalidRequestError extends CodeDropError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', context);
    this.name = 'InvalidRequestError';
  }
}

/** A notification target could not be reached. Never fatal to the caller. */
export class ChannelClosedError extends CodeDropError {
  constructor(public readonly channelId: string, context?: Record<string, unknown>) {
    super(`Channel ${channelId} is not open.`, 'CHANNEL_CLOSED', { ...context, channelId });
    this.name = 'ChannelClosedError';
  }
}

export class CodeSpaceExhaustedError extends CodeDropError {
  constructor(public readonly attempts: number) {
    super(`Could not allocate a unique room code after ${attempts} attempts.`, 'CODE_SPACE_EXHAUSTED', { attempts });
    this.name = 'CodeSpaceExhaustedError';
  }
}

export class ConfigError extends CodeDropError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}
