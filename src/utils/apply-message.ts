/**
 * Apply Message Module
 *
 * The state reducer: folds decoded server messages into snapshots.
 * Every function here is pure and returns a new frozen snapshot; this is
 * the only module that constructs Snapshot values.
 */

import { EventRef, PlaybackState, Snapshot } from '../models/snapshot';
import { DeltaMessage, RawMessage, TimerFields } from '../models/raw-message';

const EPOCH = new Date(0).toISOString();

function freezeSnapshot(snapshot: Snapshot): Snapshot {
  if (snapshot.current_event) {
    Object.freeze(snapshot.current_event);
  }
  if (snapshot.next_event) {
    Object.freeze(snapshot.next_event);
  }
  return Object.freeze(snapshot);
}

/**
 * Pick the incoming value unless it is undefined (absent or malformed)
 */
function pick<T>(incoming: T | undefined, previous: T): T {
  return incoming === undefined ? previous : incoming;
}

function copyEvent(event: EventRef | null): EventRef | null {
  return event ? { ...event } : null;
}

/**
 * True for messages that only update part of the snapshot
 */
export function isDeltaMessage(message: RawMessage): message is DeltaMessage {
  return message.type !== 'runtime';
}

/**
 * Snapshot used before anything has been received
 */
export function initialSnapshot(): Snapshot {
  return freezeSnapshot({
    timer_ms: null,
    playback_state: PlaybackState.STOPPED,
    current_event: null,
    next_event: null,
    elapsed_ms: null,
    expected_end: null,
    duration_ms: null,
    phase: null,
    origin: 'unknown',
    updated_at: EPOCH,
  });
}

/**
 * Stand-in for the last snapshot after a reconnect.
 *
 * Keeps the last known values for readers but marks the origin unknown, so
 * the next comparison is skipped and deltas are ignored until a full message
 * rebuilds the snapshot.
 */
export function markResync(snapshot: Snapshot): Snapshot {
  if (snapshot.origin === 'unknown') {
    return snapshot;
  }
  return freezeSnapshot({
    ...snapshot,
    current_event: copyEvent(snapshot.current_event),
    next_event: copyEvent(snapshot.next_event),
    origin: 'unknown',
  });
}

function applyTimer(
  current: Snapshot,
  timer: TimerFields,
  playback: PlaybackState | undefined
): Pick<Snapshot, 'timer_ms' | 'elapsed_ms' | 'duration_ms' | 'expected_end' | 'phase' | 'playback_state'> {
  return {
    timer_ms: pick(timer.current_ms, current.timer_ms),
    elapsed_ms: pick(timer.elapsed_ms, current.elapsed_ms),
    duration_ms: pick(timer.duration_ms, current.duration_ms),
    expected_end: pick(timer.expected_finish, current.expected_end),
    phase: pick(timer.phase, current.phase),
    playback_state: pick(playback ?? timer.playback, current.playback_state),
  };
}

/**
 * Apply one message to the current snapshot
 *
 * Handles the different message types:
 * - runtime: full state; present fields replace, explicit nulls clear
 * - timer / playback / event-now / event-next: deltas touching only their fields
 *
 * Deltas arriving while the current snapshot's origin is unknown are
 * ignored: after a gap only a full message can be trusted.
 *
 * @param current - Snapshot the message applies to
 * @param message - Decoded server message
 * @returns New snapshot (the same instance when the message was ignored)
 */
export function applyMessage(current: Snapshot, message: RawMessage): Snapshot {
  if (isDeltaMessage(message) && current.origin === 'unknown') {
    return current;
  }

  const base = {
    ...current,
    current_event: copyEvent(current.current_event),
    next_event: copyEvent(current.next_event),
    origin: 'server' as const,
    updated_at: message.received_at,
  };

  switch (message.type) {
    case 'runtime':
      return freezeSnapshot({
        ...base,
        ...(message.timer
          ? applyTimer(current, message.timer, message.playback)
          : { playback_state: pick(message.playback, current.playback_state) }),
        current_event: copyEvent(pick(message.event_now, base.current_event)),
        next_event: copyEvent(pick(message.event_next, base.next_event)),
      });

    case 'timer':
      return freezeSnapshot({
        ...base,
        ...applyTimer(current, message.timer, undefined),
      });

    case 'event-now':
      return freezeSnapshot({
        ...base,
        current_event: copyEvent(pick(message.event, base.current_event)),
      });

    case 'event-next':
      return freezeSnapshot({
        ...base,
        next_event: copyEvent(pick(message.event, base.next_event)),
      });

    case 'playback':
      return freezeSnapshot({
        ...base,
        playback_state: pick(message.playback, current.playback_state),
      });
  }
}

/**
 * Fold a sequence of messages from a starting snapshot
 */
export function applyMessages(initial: Snapshot, messages: Iterable<RawMessage>): Snapshot {
  let snapshot = initial;
  for (const message of messages) {
    snapshot = applyMessage(snapshot, message);
  }
  return snapshot;
}
