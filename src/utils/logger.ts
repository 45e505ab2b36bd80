/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the bridge. Every entry carries a timestamp and level; context keys are
 * written as given (snake_case by convention).
 */

import { ConnectionState, ConnectionStatus, HttpMethod } from '../models/connection';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  request_id?: string;
}

/**
 * Connection state change log entry
 */
interface ConnectionLogEntry extends BaseLogEntry {
  log_type: 'CONNECTION_STATE';
  status: ConnectionStatus;
  target?: string;
  attempt?: number;
  delay_ms?: number;
  error_code?: string;
  error_message?: string;
}

/**
 * Command dispatch log entry
 */
interface CommandLogEntry extends BaseLogEntry {
  log_type: 'COMMAND';
  command: string;
  method?: HttpMethod;
  path: string;
  outcome: 'accepted' | 'rejected' | 'failed';
  status_code?: number;
  reason?: string;
  latency_ms: number;
}

/**
 * Protocol error log entry
 */
interface ProtocolLogEntry extends BaseLogEntry {
  log_type: 'PROTOCOL_ERROR';
  error_message: string;
  frame_preview: string;
  consecutive_errors: number;
}

const PREVIEW_LENGTH = 200;

let minimumLevel: LogLevel = LogLevel.INFO;

/**
 * Set the minimum level written; accepts LogLevel values or their
 * lowercase names ("debug", "info", ...). Unknown names are ignored.
 */
export function setLogLevel(level: LogLevel | string): void {
  const normalized = level.toUpperCase();
  const match = Object.values(LogLevel).find((value) => value === normalized);
  if (match) {
    minimumLevel = match;
  }
}

/**
 * Current minimum level
 */
export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Write log entry to console as a single JSON line
 */
function writeLog<T extends BaseLogEntry>(entry: T): void {
  if (!isEnabled(entry.level)) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Truncate an arbitrary value to a printable preview
 */
export function preview(value: unknown): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
  }
  return text.length > PREVIEW_LENGTH ? text.substring(0, PREVIEW_LENGTH) + '...' : text;
}

/**
 * Log a connection state change
 *
 * Backoff entries are written at WARN with the failure that caused them.
 *
 * @example
 * ```typescript
 * logConnectionState({
 *   state: { status: 'connected' },
 *   target: 'http://192.168.1.20:4001/api',
 * });
 * ```
 */
export function logConnectionState(params: {
  state: ConnectionState;
  target?: string;
}): void {
  const { state } = params;
  const entry: ConnectionLogEntry = {
    timestamp: new Date().toISOString(),
    level: state.status === 'backoff' ? LogLevel.WARN : LogLevel.INFO,
    log_type: 'CONNECTION_STATE',
    status: state.status,
    target: params.target,
  };

  if (state.status === 'backoff') {
    entry.attempt = state.attempt;
    entry.delay_ms = state.delay_ms;
    entry.error_code = state.error.code;
    entry.error_message = state.error.message;
  }

  writeLog(entry);
}

/**
 * Log the outcome of a dispatched command
 *
 * @example
 * ```typescript
 * logCommand({
 *   requestId: 'c0a8-...',
 *   command: 'start',
 *   path: '/start',
 *   outcome: 'accepted',
 *   statusCode: 200,
 *   latencyMs: 12,
 * });
 * ```
 */
export function logCommand(params: {
  requestId: string;
  command: string;
  method?: HttpMethod;
  path: string;
  outcome: 'accepted' | 'rejected' | 'failed';
  statusCode?: number;
  reason?: string;
  latencyMs: number;
}): void {
  const entry: CommandLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.outcome === 'accepted' ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'COMMAND',
    request_id: params.requestId,
    command: params.command,
    method: params.method,
    path: params.path,
    outcome: params.outcome,
    status_code: params.statusCode,
    reason: params.reason,
    latency_ms: params.latencyMs,
  };

  writeLog(entry);
}

/**
 * Log a frame that could not be decoded
 */
export function logProtocolError(params: {
  errorMessage: string;
  frame: unknown;
  consecutiveErrors: number;
}): void {
  const entry: ProtocolLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.WARN,
    log_type: 'PROTOCOL_ERROR',
    error_message: params.errorMessage,
    frame_preview: preview(params.frame),
    consecutive_errors: params.consecutiveErrors,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'Bridge started', {
 *   target: 'http://localhost:4001/api',
 *   poll_interval_ms: 1000,
 * });
 * ```
 */
export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  writeLog({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  });
}
