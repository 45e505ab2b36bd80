/**
 * Shared test fixtures
 *
 * Builders for decoded messages and snapshots. Snapshots are always built
 * through the reducer, never by hand.
 */

import { applyMessages, initialSnapshot } from '../src/utils/apply-message';
import {
  EventNowMessage,
  PlaybackMessage,
  RawMessage,
  RuntimeMessage,
  TimerMessage,
} from '../src/models/raw-message';
import { EventRef, PlaybackState, Snapshot } from '../src/models/snapshot';

export const RECEIVED_AT = '2026-03-14T18:00:00.000Z';

export function event(eventId: string, overrides: Partial<EventRef> = {}): EventRef {
  return {
    event_id: eventId,
    cue: eventId.toUpperCase(),
    index: 0,
    title: `Event ${eventId}`,
    duration_ms: 600000,
    ...overrides,
  };
}

export function runtime(
  timerMs: number | null,
  overrides: Partial<Omit<RuntimeMessage, 'type'>> = {}
): RuntimeMessage {
  return {
    type: 'runtime',
    received_at: RECEIVED_AT,
    timer: {
      current_ms: timerMs,
      elapsed_ms: 0,
      duration_ms: 600000,
      expected_finish: null,
      phase: 'default',
    },
    playback: PlaybackState.PLAYING,
    event_now: event('ev-1', { title: 'Keynote' }),
    event_next: null,
    ...overrides,
  };
}

export function timer(timerMs: number | null, receivedAt: string = RECEIVED_AT): TimerMessage {
  return { type: 'timer', received_at: receivedAt, timer: { current_ms: timerMs } };
}

export function eventNow(value: EventRef | null): EventNowMessage {
  return { type: 'event-now', received_at: RECEIVED_AT, event: value };
}

export function playback(value: PlaybackState): PlaybackMessage {
  return { type: 'playback', received_at: RECEIVED_AT, playback: value };
}

/**
 * Fold messages onto the initial snapshot
 */
export function snapshotOf(...messages: RawMessage[]): Snapshot {
  return applyMessages(initialSnapshot(), messages);
}

/**
 * Raw poll response body as the server sends it
 */
export function pollBody(current: number | null, playbackValue = 'play'): { payload: Record<string, unknown> } {
  return {
    payload: {
      timer: {
        current,
        elapsed: 1000,
        duration: 600000,
        expectedFinish: null,
        phase: 'default',
        playback: playbackValue,
      },
      eventNow: { id: 'ev-1', cue: '1', title: 'Keynote', duration: 600000 },
      eventNext: { id: 'ev-2', cue: '2', title: 'Panel', duration: 1800000 },
      playback: playbackValue,
      runtime: { selectedEventIndex: 0 },
    },
  };
}

/**
 * Let pending promise callbacks run
 */
export function flushPromises(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(() => resolve()));
}
