/**
 * Transition Detection Module
 *
 * Compares two consecutive snapshots and reports edge crossings. Detection
 * is edge-triggered: a condition that persists across snapshots is reported
 * once, when it starts.
 */

import { Snapshot } from '../models/snapshot';
import { TransitionKind, TransitionRecord } from '../models/transition';

function isOvertime(timerMs: number | null): boolean | null {
  return timerMs === null ? null : timerMs < 0;
}

function eventId(snapshot: Snapshot): string | null {
  return snapshot.current_event ? snapshot.current_event.event_id : null;
}

/**
 * Detect transitions between two snapshots
 *
 * Nothing is reported when `previous` has an unknown origin (initial state
 * or the stand-in kept after a reconnect): there is no trustworthy state to
 * compare against.
 *
 * Records come out in a fixed order: EVENT_CHANGED, PLAYBACK_CHANGED, then
 * the overtime edge.
 *
 * @param previous - Snapshot immediately preceding `current`
 * @param current - Newly produced snapshot
 * @param occurredAt - ISO-8601 timestamp stamped on every record
 */
export function detectTransitions(
  previous: Snapshot,
  current: Snapshot,
  occurredAt: string = current.updated_at
): TransitionRecord[] {
  if (previous.origin === 'unknown' || previous === current) {
    return [];
  }

  const records: TransitionRecord[] = [];
  const record = (kind: TransitionKind): void => {
    records.push({
      kind,
      previous_snapshot: previous,
      current_snapshot: current,
      occurred_at: occurredAt,
    });
  };

  // Identity only; a retitled event is still the same event
  if (eventId(previous) !== eventId(current)) {
    record(TransitionKind.EVENT_CHANGED);
  }

  if (previous.playback_state !== current.playback_state) {
    record(TransitionKind.PLAYBACK_CHANGED);
  }

  const wasOvertime = isOvertime(previous.timer_ms);
  const nowOvertime = isOvertime(current.timer_ms);
  if (wasOvertime === false && nowOvertime === true) {
    record(TransitionKind.OVERTIME_ENTERED);
  } else if (wasOvertime === true && nowOvertime === false) {
    record(TransitionKind.OVERTIME_CLEARED);
  }

  return records;
}
