/**
 * Message Decoder Module
 *
 * Turns raw server frames into tagged RawMessage values. The envelope is
 * checked with ajv; everything inside it is read field by field so that a
 * malformed or unknown field only drops that field, never the message.
 *
 * Two envelopes are understood:
 * - poll responses: `{ payload: { timer, eventNow, ... } }`
 * - push frames:    `{ type: 'ontime' | 'ontime-timer' | ..., payload }`
 */

import Ajv, { JSONSchemaType, Schema } from 'ajv';
import { TransportError, TransportErrorCode } from '../models/errors';
import { EventRef, PlaybackState } from '../models/snapshot';
import { RawMessage, TimerFields } from '../models/raw-message';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
});

/**
 * Outer frame: an object with an object payload, optionally tagged
 */
interface FrameEnvelope {
  type?: string;
  payload: Record<string, unknown>;
}

const envelopeSchema: Schema = {
  type: 'object',
  properties: {
    type: { type: 'string' },
    payload: { type: 'object' },
  },
  required: ['payload'],
  additionalProperties: true,
};

/**
 * Minimal identity every event object must carry
 */
interface EventIdentity {
  id: string;
}

const eventIdentitySchema: JSONSchemaType<EventIdentity> = {
  type: 'object',
  properties: {
    id: { type: 'string', minLength: 1 },
  },
  required: ['id'],
  additionalProperties: true,
};

const isEnvelope = ajv.compile<FrameEnvelope>(envelopeSchema);
const hasEventIdentity = ajv.compile(eventIdentitySchema);

const PUSH_TYPES: Record<string, RawMessage['type']> = {
  ontime: 'runtime',
  'ontime-timer': 'timer',
  'ontime-eventNow': 'event-now',
  'ontime-eventNext': 'event-next',
  'ontime-playback': 'playback',
};

const PLAYBACK_VALUES: Record<string, PlaybackState> = {
  stop: PlaybackState.STOPPED,
  armed: PlaybackState.STOPPED,
  play: PlaybackState.PLAYING,
  pause: PlaybackState.PAUSED,
  roll: PlaybackState.ROLLING,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasField(source: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(source, key);
}

/**
 * Read a nullable integer field: number → rounded value, null → null,
 * absent or anything else → undefined
 */
function readNullableNumber(source: Record<string, unknown>, key: string): number | null | undefined {
  if (!hasField(source, key)) {
    return undefined;
  }
  const value = source[key];
  if (value === null) {
    return null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.round(value);
  }
  return undefined;
}

/**
 * Read an epoch-millisecond timestamp; values outside the Date range are
 * treated as malformed
 */
function readNullableTimestamp(source: Record<string, unknown>, key: string): number | null | undefined {
  const value = readNullableNumber(source, key);
  if (typeof value === 'number' && Number.isNaN(new Date(value).getTime())) {
    return undefined;
  }
  return value;
}

function readNullableString(source: Record<string, unknown>, key: string): string | null | undefined {
  if (!hasField(source, key)) {
    return undefined;
  }
  const value = source[key];
  if (value === null) {
    return null;
  }
  return typeof value === 'string' ? value : undefined;
}

/**
 * Map a server playback string to PlaybackState; unknown values → undefined
 */
export function decodePlayback(value: unknown): PlaybackState | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  return PLAYBACK_VALUES[value.toLowerCase()];
}

/**
 * Decode an event object.
 *
 * Returns null for an explicit null, undefined when the value carries no
 * usable identity. Optional fields fall back to empty/neutral values.
 */
export function decodeEvent(value: unknown, index?: number | null): EventRef | null | undefined {
  if (value === null) {
    return null;
  }
  if (!isRecord(value) || !hasEventIdentity(value)) {
    return undefined;
  }

  const duration = readNullableNumber(value, 'duration');
  const ownIndex = readNullableNumber(value, 'index');

  return {
    event_id: value.id,
    cue: typeof value.cue === 'string' ? value.cue : '',
    index: index ?? ownIndex ?? null,
    title: typeof value.title === 'string' ? value.title : '',
    duration_ms: duration ?? null,
  };
}

/**
 * Decode the timer object; fields are read independently
 */
export function decodeTimer(value: unknown): TimerFields | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  const fields: TimerFields = {
    current_ms: readNullableNumber(value, 'current'),
    elapsed_ms: readNullableNumber(value, 'elapsed'),
    duration_ms: readNullableNumber(value, 'duration'),
    expected_finish: readNullableTimestamp(value, 'expectedFinish'),
    phase: readNullableString(value, 'phase'),
    playback: decodePlayback(value.playback),
  };

  if (fields.elapsed_ms !== undefined && fields.elapsed_ms !== null && fields.elapsed_ms < 0) {
    fields.elapsed_ms = undefined;
  }

  return fields;
}

function firstPresent(source: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (hasField(source, key)) {
      return source[key];
    }
  }
  return undefined;
}

function decodeSelectedIndex(payload: Record<string, unknown>): number | null | undefined {
  const runtime = payload.runtime;
  if (!isRecord(runtime)) {
    return undefined;
  }
  const index = readNullableNumber(runtime, 'selectedEventIndex');
  return index !== undefined && index !== null && index < 0 ? null : index;
}

function decodeRuntime(payload: Record<string, unknown>, receivedAt: string): RawMessage {
  const timer = decodeTimer(payload.timer);
  const index = decodeSelectedIndex(payload);

  const eventNowKeys = ['eventNow', 'currentEvent'];
  const eventNextKeys = ['eventNext', 'nextEvent', 'publicEventNext'];
  const hasEventNow = eventNowKeys.some((key) => hasField(payload, key));
  const hasEventNext = eventNextKeys.some((key) => hasField(payload, key));

  return {
    type: 'runtime',
    received_at: receivedAt,
    timer,
    playback: decodePlayback(payload.playback) ?? timer?.playback,
    event_now: hasEventNow ? decodeEvent(firstPresent(payload, eventNowKeys), index) : undefined,
    event_next: hasEventNext ? decodeEvent(firstPresent(payload, eventNextKeys)) : undefined,
  };
}

function protocolError(message: string): TransportError {
  return new TransportError(TransportErrorCode.PROTOCOL_ERROR, message);
}

/**
 * Decode one inbound frame
 *
 * @param frame - Parsed JSON body or push frame
 * @param receivedAt - ISO-8601 arrival timestamp
 * @throws TransportError(PROTOCOL_ERROR) when the envelope is unusable
 */
export function decodeFrame(frame: unknown, receivedAt: string = new Date().toISOString()): RawMessage {
  let parsed: unknown = frame;
  if (typeof frame === 'string') {
    try {
      parsed = JSON.parse(frame);
    } catch {
      throw protocolError('Frame is not valid JSON');
    }
  }

  if (!isEnvelope(parsed)) {
    throw protocolError('Frame has no payload object');
  }

  const payload = parsed.payload;
  const kind = parsed.type === undefined ? 'runtime' : PUSH_TYPES[parsed.type];

  switch (kind) {
    case 'runtime':
      return decodeRuntime(payload, receivedAt);

    case 'timer': {
      const timer = decodeTimer(payload);
      if (!timer) {
        throw protocolError('Timer frame has no timer object');
      }
      return { type: 'timer', received_at: receivedAt, timer };
    }

    case 'event-now':
      return { type: 'event-now', received_at: receivedAt, event: decodeEvent(payload) };

    case 'event-next':
      return { type: 'event-next', received_at: receivedAt, event: decodeEvent(payload) };

    case 'playback':
      return { type: 'playback', received_at: receivedAt, playback: decodePlayback(payload.playback) };

    default:
      throw protocolError(`Unknown frame type: ${parsed.type}`);
  }
}
