/**
 * Connection Models
 *
 * Lifecycle of the single logical connection to the timer server.
 */

import { TransportError } from './errors';
import { RawMessage } from './raw-message';

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'backoff';

/**
 * Current connection state; the last failure is attached while backing off
 */
export type ConnectionState =
  | { status: Exclude<ConnectionStatus, 'backoff'> }
  | { status: 'backoff'; error: TransportError; attempt: number; delay_ms: number };

/**
 * Item produced by the transport's receive loop.
 *
 * `session` increases every time the transport enters `connected`; messages
 * from a new session follow a gap and must not be trusted as deltas.
 */
export type TransportEvent =
  | { type: 'message'; session: number; message: RawMessage }
  | { type: 'state'; state: ConnectionState };

export type HttpMethod = 'GET' | 'POST';

/**
 * Outbound request; `path` is relative to the API prefix, `method`
 * defaults to GET
 */
export interface TransportRequest {
  path: string;
  method?: HttpMethod;
  request_id?: string;
}

/**
 * Delivery confirmation: the server answered, whatever it answered
 */
export interface Ack {
  status: number;
  payload: unknown;
}

export type SendResult =
  | { ok: true; ack: Ack }
  | { ok: false; error: TransportError };
