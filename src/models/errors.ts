/**
 * Application Error Models
 *
 * Error types shared by the transport, the command dispatcher and the
 * server probe. Transport failures are returned as typed results to command
 * callers and drive reconnection in the receive loop; validation and state
 * errors are thrown to the immediate caller before anything is sent.
 */

/**
 * Transport failure codes
 */
export enum TransportErrorCode {
  NOT_CONNECTED = 'NOT_CONNECTED',
  TIMEOUT = 'TIMEOUT',
  CONNECTION_LOST = 'CONNECTION_LOST',
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
}

/**
 * Network-level failure (no delivery confirmation possible)
 */
export class TransportError extends Error {
  constructor(
    public readonly code: TransportErrorCode,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Bad command parameter, surfaced before anything is sent
 */
export class ValidationError extends Error {
  constructor(message: string, public readonly details?: Record<string, string>) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Command understood by the server but refused (e.g. unknown event id)
 */
export class ServerRejection extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
    this.name = 'ServerRejection';
  }
}

/**
 * Operation incompatible with the current snapshot
 */
export class StateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateError';
  }
}

/**
 * No known endpoint of the server answered the probe
 */
export class CannotConnectError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CannotConnectError';
  }
}
