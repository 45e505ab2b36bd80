/**
 * Read Surface Tests
 */

import {
  buildOvertimeNotification,
  overtimeSeconds,
  toReadings,
} from '../../src/utils/read-surface';
import { applyMessage, initialSnapshot } from '../../src/utils/apply-message';
import { detectTransitions } from '../../src/utils/detect-transitions';
import { PlaybackState } from '../../src/models/snapshot';
import { event, runtime, snapshotOf, timer } from '../fixtures';

describe('overtimeSeconds', () => {
  it.each([
    [null, 0],
    [60000, 0],
    [0, 0],
    [-999, 0],
    [-1000, 1],
    [-61500, 61],
  ])('%p ms should be %p s over', (timerMs, seconds) => {
    expect(overtimeSeconds(timerMs)).toBe(seconds);
  });
});

describe('toReadings', () => {
  it('should flatten a running snapshot', () => {
    const snapshot = snapshotOf(
      runtime(-12345, {
        event_next: event('ev-2', { title: 'Panel' }),
        timer: { current_ms: -12345, elapsed_ms: 612345, expected_finish: Date.UTC(2026, 2, 14, 18, 30) },
      })
    );

    expect(toReadings(snapshot)).toEqual({
      timer_ms: -12345,
      playback_state: PlaybackState.PLAYING,
      current_event_title: 'Keynote',
      current_event_id: 'ev-1',
      current_event_cue: 'EV-1',
      next_event_title: 'Panel',
      is_overtime: true,
      overtime_seconds: 12,
      elapsed_ms: 612345,
      expected_end: '2026-03-14T18:30:00.000Z',
    });
  });

  it('should report no expected end when the stored value is outside the date range', () => {
    const snapshot = snapshotOf(
      runtime(1000, { timer: { current_ms: 1000, expected_finish: 1e16 } })
    );

    expect(snapshot.expected_end).toBe(1e16);
    expect(toReadings(snapshot).expected_end).toBeNull();
    expect(toReadings(snapshot).timer_ms).toBe(1000);
  });

  it('should describe an empty server', () => {
    expect(toReadings(initialSnapshot())).toEqual({
      timer_ms: null,
      playback_state: PlaybackState.STOPPED,
      current_event_title: 'No Event',
      current_event_id: null,
      current_event_cue: null,
      next_event_title: null,
      is_overtime: false,
      overtime_seconds: 0,
      elapsed_ms: null,
      expected_end: null,
    });
  });
});

describe('buildOvertimeNotification', () => {
  it('should read the event and overtime from the crossing snapshot', () => {
    const previous = snapshotOf(runtime(500));
    const current = applyMessage(previous, timer(-4200, '2026-03-14T18:45:00.000Z'));
    const [record] = detectTransitions(previous, current);

    expect(buildOvertimeNotification(record)).toEqual({
      event_id: 'ev-1',
      event_title: 'Keynote',
      overtime_seconds: 4,
      occurred_at: '2026-03-14T18:45:00.000Z',
    });
  });
});
