/**
 * Read Surface
 *
 * Flat readings derived from a snapshot, in the shape home automation
 * entities consume them.
 */

import { PlaybackState, Snapshot } from '../models/snapshot';
import { OvertimeNotification, TransitionRecord } from '../models/transition';

export const NO_EVENT_TITLE = 'No Event';
export const UNKNOWN_EVENT_TITLE = 'Unknown';

export interface Readings {
  timer_ms: number | null;
  playback_state: PlaybackState;
  current_event_title: string;
  current_event_id: string | null;
  current_event_cue: string | null;
  next_event_title: string | null;
  is_overtime: boolean;
  overtime_seconds: number;
  elapsed_ms: number | null;
  expected_end: string | null;      // ISO-8601
}

/**
 * Whole seconds past zero; 0 while the timer is not in overtime
 */
export function overtimeSeconds(timerMs: number | null): number {
  if (timerMs === null || timerMs >= 0) {
    return 0;
  }
  return Math.floor(-timerMs / 1000);
}

function toIsoTimestamp(epochMs: number | null): string | null {
  if (epochMs === null) {
    return null;
  }
  const date = new Date(epochMs);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export function toReadings(snapshot: Snapshot): Readings {
  const event = snapshot.current_event;

  return {
    timer_ms: snapshot.timer_ms,
    playback_state: snapshot.playback_state,
    current_event_title: event && event.title ? event.title : NO_EVENT_TITLE,
    current_event_id: event ? event.event_id : null,
    current_event_cue: event ? event.cue : null,
    next_event_title: snapshot.next_event ? snapshot.next_event.title : null,
    is_overtime: snapshot.timer_ms !== null && snapshot.timer_ms < 0,
    overtime_seconds: overtimeSeconds(snapshot.timer_ms),
    elapsed_ms: snapshot.elapsed_ms,
    expected_end: toIsoTimestamp(snapshot.expected_end),
  };
}

/**
 * Notification payload for an overtime edge, read from the snapshot that
 * crossed it
 */
export function buildOvertimeNotification(record: TransitionRecord): OvertimeNotification {
  const snapshot = record.current_snapshot;
  const event = snapshot.current_event;

  return {
    event_id: event ? event.event_id : null,
    event_title: event && event.title ? event.title : UNKNOWN_EVENT_TITLE,
    overtime_seconds: overtimeSeconds(snapshot.timer_ms),
    occurred_at: record.occurred_at,
  };
}
