/**
 * Transition Models
 *
 * Discrete domain events derived from two consecutive snapshots.
 */

import { Snapshot } from './snapshot';

/**
 * Kinds of detected edges
 */
export enum TransitionKind {
  OVERTIME_ENTERED = 'OVERTIME_ENTERED',
  OVERTIME_CLEARED = 'OVERTIME_CLEARED',
  PLAYBACK_CHANGED = 'PLAYBACK_CHANGED',
  EVENT_CHANGED = 'EVENT_CHANGED',
}

/**
 * One edge crossing, produced once and never retroactively
 */
export interface TransitionRecord {
  kind: TransitionKind;
  previous_snapshot: Snapshot;
  current_snapshot: Snapshot;
  occurred_at: string;              // ISO-8601 timestamp
}

/**
 * Payload handed to automation triggers when a timer runs into overtime
 */
export interface OvertimeNotification {
  event_id: string | null;
  event_title: string;
  overtime_seconds: number;
  occurred_at: string;
}
