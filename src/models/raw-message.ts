/**
 * Raw Message Models
 *
 * Decoded inbound frames. Field values follow one convention throughout:
 * `undefined` means the field was absent or malformed and must be left as
 * it was, `null` means the server explicitly cleared it.
 */

import { EventRef, PlaybackState } from './snapshot';

/**
 * Timer fields carried by full and timer-only messages
 */
export interface TimerFields {
  current_ms?: number | null;
  elapsed_ms?: number | null;
  duration_ms?: number | null;
  expected_finish?: number | null;
  phase?: string | null;
  playback?: PlaybackState;
}

/**
 * Complete runtime state (poll response or full push message)
 */
export interface RuntimeMessage {
  type: 'runtime';
  received_at: string;
  timer?: TimerFields;
  playback?: PlaybackState;
  event_now?: EventRef | null;
  event_next?: EventRef | null;
}

export interface TimerMessage {
  type: 'timer';
  received_at: string;
  timer: TimerFields;
}

export interface EventNowMessage {
  type: 'event-now';
  received_at: string;
  event?: EventRef | null;
}

export interface EventNextMessage {
  type: 'event-next';
  received_at: string;
  event?: EventRef | null;
}

export interface PlaybackMessage {
  type: 'playback';
  received_at: string;
  playback?: PlaybackState;
}

export type RawMessage =
  | RuntimeMessage
  | TimerMessage
  | EventNowMessage
  | EventNextMessage
  | PlaybackMessage;

/**
 * Messages that only update part of the snapshot
 */
export type DeltaMessage = Exclude<RawMessage, RuntimeMessage>;
