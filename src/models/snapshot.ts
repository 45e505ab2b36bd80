/**
 * Snapshot Models
 *
 * Type definitions for the live view of the remote timer server.
 * A snapshot is replaced wholesale on every inbound update and is never
 * mutated; only the state reducer builds one.
 */

/**
 * Playback mode reported by the server
 */
export enum PlaybackState {
  STOPPED = 'stop',
  PLAYING = 'play',
  PAUSED = 'pause',
  ROLLING = 'roll',
}

/**
 * Reference to an event of the server's rundown.
 *
 * The server owns the rundown and may edit it at any time, so this is only
 * what the last message said about the event, keyed by `event_id`.
 */
export interface EventRef {
  event_id: string;                 // Stable identity
  cue: string;                      // Operator label, not guaranteed unique
  index: number | null;             // Rundown position, shifts on edits
  title: string;
  duration_ms: number | null;
}

/**
 * Where a snapshot's contents came from.
 *
 * `unknown` marks the initial snapshot and the stand-in kept after a
 * reconnect; nothing is compared against it.
 */
export type SnapshotOrigin = 'unknown' | 'server';

/**
 * Complete, internally consistent picture of remote state at one instant
 */
export interface Snapshot {
  readonly timer_ms: number | null;             // Negative while in overtime
  readonly playback_state: PlaybackState;
  readonly current_event: EventRef | null;
  readonly next_event: EventRef | null;
  readonly elapsed_ms: number | null;
  readonly expected_end: number | null;         // Epoch milliseconds
  readonly duration_ms: number | null;          // Duration of the running timer
  readonly phase: string | null;                // Server timer phase (none, default, warning, danger, overtime...)
  readonly origin: SnapshotOrigin;
  readonly updated_at: string;                  // ISO-8601 timestamp of the producing message
}
