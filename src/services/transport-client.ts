/**
 * Transport Client
 *
 * Owns the single logical connection to the timer server. The server is
 * polled over HTTP; each poll response is a full state message. The client
 * reconnects with exponential backoff, hands inbound messages out in
 * arrival order through `receive()`, and sends commands one at a time.
 */

import axios, { AxiosInstance } from 'axios';
import {
  Ack,
  ConnectionState,
  HttpMethod,
  SendResult,
  TransportEvent,
  TransportRequest,
} from '../models/connection';
import { TransportError, TransportErrorCode } from '../models/errors';
import { decodeFrame } from '../utils/message-decoder';
import { ExponentialBackoff, Sleep, sleep as defaultSleep } from '../utils/backoff';
import { logConnectionState, logProtocolError } from '../utils/logger';

/**
 * Status codes the server uses for a successful answer
 */
export const ACCEPTED_STATUSES = [200, 202];

/**
 * The part of axios the transport needs
 */
export type HttpClient = Pick<AxiosInstance, 'get' | 'post'>;

export interface TransportOptions {
  apiPrefix: string;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  backoffInitialMs: number;
  backoffMaxMs: number;
  stabilityThresholdMs: number;
  protocolErrorThreshold: number;
  /**
   * Consecutive failed attempts allowed before receive() gives up; any
   * successful poll starts the count again. 0 = retry forever.
   */
  maxReconnectAttempts: number;
  http?: HttpClient;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Transport contract consumed by the sync service and the dispatcher
 */
export interface TransportClient {
  readonly state: ConnectionState;
  connect(host: string, port: number): Promise<ConnectionState>;
  receive(): AsyncGenerator<TransportEvent, void, undefined>;
  send(request: TransportRequest): Promise<SendResult>;
  close(): void;
}

/**
 * Classify a raw HTTP client failure
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  if (axios.isCancel(error)) {
    return new TransportError(TransportErrorCode.CONNECTION_LOST, 'Request cancelled', error);
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TransportError(TransportErrorCode.TIMEOUT, error.message, error);
    }
    return new TransportError(
      TransportErrorCode.CONNECTION_LOST,
      error.code ? `${error.code}: ${error.message}` : error.message,
      error
    );
  }

  return new TransportError(
    TransportErrorCode.CONNECTION_LOST,
    error instanceof Error ? error.message : 'Unknown error',
    error
  );
}

/**
 * HTTP polling transport
 */
export class HttpTransportClient implements TransportClient {
  private readonly http: HttpClient;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly backoff: ExponentialBackoff;
  private readonly abortController = new AbortController();

  private baseUrl: string | null = null;
  private currentState: ConnectionState = { status: 'disconnected' };
  private pending: TransportEvent[] = [];
  private session = 0;
  private connectedSince: number | null = null;
  private protocolErrors = 0;
  private failedAttempts = 0;
  private receiving = false;
  private closed = false;
  private terminalError: TransportError | null = null;
  private sendChain: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: TransportOptions) {
    this.http = options.http ?? axios.create({ timeout: options.requestTimeoutMs });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.backoff = new ExponentialBackoff({
      initialMs: options.backoffInitialMs,
      maxMs: options.backoffMaxMs,
    });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /**
   * Base URL of the server's API, once connect() has been called
   */
  get target(): string | null {
    return this.baseUrl;
  }

  /**
   * Set the target and make the first attempt.
   *
   * On success the first poll response becomes the first message of
   * `receive()`; on failure the client is left backing off and `receive()`
   * keeps retrying.
   */
  async connect(host: string, port: number): Promise<ConnectionState> {
    if (this.baseUrl !== null) {
      throw new Error('Transport already connected; create a new client for another target');
    }
    this.baseUrl = `http://${host}:${port}${this.options.apiPrefix}`;
    this.setState({ status: 'connecting' });
    await this.pollOnce();
    return this.currentState;
  }

  /**
   * Inbound messages and state changes, in arrival order.
   *
   * Infinite while the transport is open; returns after close(); throws
   * TransportError(CONNECTION_LOST) once maxReconnectAttempts is exhausted.
   * Can only be iterated once. Abandoning the iteration closes the client.
   */
  async *receive(): AsyncGenerator<TransportEvent, void, undefined> {
    if (this.receiving) {
      throw new Error('receive() can only be called once per transport');
    }
    if (this.baseUrl === null) {
      throw new Error('connect() must be called before receive()');
    }
    this.receiving = true;

    try {
      while (true) {
        let event = this.pending.shift();
        while (event !== undefined) {
          yield event;
          event = this.pending.shift();
        }

        if (this.terminalError) {
          throw this.terminalError;
        }
        if (this.closed) {
          return;
        }

        await this.step();
      }
    } finally {
      this.close();
    }
  }

  /**
   * Send one request. Fails fast unless connected; requests are delivered
   * one at a time in call order.
   */
  send(request: TransportRequest): Promise<SendResult> {
    if (this.currentState.status !== 'connected') {
      return Promise.resolve(this.notConnected());
    }

    const result = this.sendChain.then(() => this.deliver(request));
    this.sendChain = result;
    return result;
  }

  /**
   * Stop polling and interrupt any backoff wait or in-flight request
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.abortController.abort();
    this.connectedSince = null;
    this.setState({ status: 'disconnected' });
  }

  private notConnected(): SendResult {
    return {
      ok: false,
      error: new TransportError(
        TransportErrorCode.NOT_CONNECTED,
        `Not connected (state: ${this.currentState.status})`
      ),
    };
  }

  private async deliver(request: TransportRequest): Promise<SendResult> {
    if (this.currentState.status !== 'connected') {
      return this.notConnected();
    }
    try {
      const ack = await this.request(request.path, request.method);
      return { ok: true, ack };
    } catch (error) {
      return { ok: false, error: toTransportError(error) };
    }
  }

  private async request(path: string, method: HttpMethod = 'GET'): Promise<Ack> {
    const url = `${this.baseUrl}${path}`;
    const config = {
      timeout: this.options.requestTimeoutMs,
      validateStatus: () => true,
      signal: this.abortController.signal,
    };
    const response = method === 'POST'
      ? await this.http.post<unknown>(url, undefined, config)
      : await this.http.get<unknown>(url, config);
    return { status: response.status, payload: response.data };
  }

  private async step(): Promise<void> {
    const state = this.currentState;
    const signal = this.abortController.signal;

    if (state.status === 'backoff') {
      await this.sleep(state.delay_ms, signal);
      if (this.closed) {
        return;
      }
      this.setState({ status: 'connecting' });
    } else if (state.status === 'connected') {
      await this.sleep(this.options.pollIntervalMs, signal);
      if (this.closed) {
        return;
      }
    }

    await this.pollOnce();
  }

  private async pollOnce(): Promise<void> {
    let ack: Ack;
    try {
      ack = await this.request('/poll');
    } catch (error) {
      this.handleFailure(toTransportError(error));
      return;
    }

    if (this.closed) {
      return;
    }

    if (this.currentState.status !== 'connected') {
      this.session++;
      this.connectedSince = this.now();
      this.setState({ status: 'connected' });
    }

    if (!ACCEPTED_STATUSES.includes(ack.status)) {
      this.handleProtocolError(
        new TransportError(TransportErrorCode.PROTOCOL_ERROR, `Unexpected poll status ${ack.status}`),
        ack.payload
      );
      return;
    }

    try {
      const message = decodeFrame(ack.payload, new Date(this.now()).toISOString());
      this.protocolErrors = 0;
      this.failedAttempts = 0;
      this.pending.push({ type: 'message', session: this.session, message });
    } catch (error) {
      this.handleProtocolError(toTransportError(error), ack.payload);
    }
  }

  private handleProtocolError(error: TransportError, frame: unknown): void {
    this.protocolErrors++;
    logProtocolError({
      errorMessage: error.message,
      frame,
      consecutiveErrors: this.protocolErrors,
    });

    if (this.protocolErrors >= this.options.protocolErrorThreshold) {
      const count = this.protocolErrors;
      this.protocolErrors = 0;
      this.handleFailure(
        new TransportError(
          TransportErrorCode.CONNECTION_LOST,
          `${count} consecutive protocol errors`,
          error
        )
      );
    }
  }

  private handleFailure(error: TransportError): void {
    if (this.closed) {
      return;
    }

    const now = this.now();
    if (this.connectedSince !== null && now - this.connectedSince >= this.options.stabilityThresholdMs) {
      this.backoff.reset();
    }
    this.connectedSince = null;

    const delay = this.backoff.next();
    this.failedAttempts++;
    const maxAttempts = this.options.maxReconnectAttempts;
    if (maxAttempts > 0 && this.failedAttempts > maxAttempts) {
      this.terminalError = new TransportError(
        TransportErrorCode.CONNECTION_LOST,
        `Gave up after ${maxAttempts} reconnect attempts: ${error.message}`,
        error
      );
      this.closed = true;
      this.abortController.abort();
      this.setState({ status: 'disconnected' });
      return;
    }

    this.setState({
      status: 'backoff',
      error,
      attempt: this.backoff.attempt,
      delay_ms: delay,
    });
  }

  private setState(state: ConnectionState): void {
    this.currentState = state;
    logConnectionState({ state, target: this.baseUrl ?? undefined });
    this.pending.push({ type: 'state', state });
  }
}
