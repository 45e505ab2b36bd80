/**
 * Command Routes
 *
 * Maps validated control intents to the request each server API expects.
 * The surface is chosen from the API prefix, the same prefix the server
 * probe reports.
 */

import { AddTimeDirection, CommandApi, CommandRoute } from '../models/command';
import { ValidationError } from '../models/errors';

export const V1_API_PREFIX = '/api/v1';

export type CommandIntent =
  | { command: 'start' | 'pause' | 'stop' | 'reload' | 'roll' | 'next' | 'previous' }
  | { command: 'load_event' | 'start_event'; event_id: string }
  | { command: 'load_event_index'; event_index: number }
  | { command: 'load_event_cue'; event_cue: string }
  | { command: 'add_time'; time: number; direction: AddTimeDirection };

/**
 * Command surface served under an API prefix
 */
export function commandApiForPrefix(apiPrefix: string): CommandApi {
  return apiPrefix === V1_API_PREFIX ? CommandApi.PLAYBACK : CommandApi.REST;
}

/**
 * REST servers take whole seconds and only add or remove on both ends
 */
function restAddTime(time: number, direction: AddTimeDirection): CommandRoute {
  if (direction !== AddTimeDirection.BOTH) {
    throw new ValidationError('Invalid add time parameters', {
      direction: `direction '${direction}' needs the v1 API; REST servers only take 'both'`,
    });
  }

  const seconds = Math.floor(Math.abs(time) / 1000);
  if (seconds === 0) {
    throw new ValidationError('Invalid add time parameters', {
      time: `must be at least 1000 ms for REST servers, got ${time}`,
    });
  }

  return { method: 'GET', path: `/addtime/${time < 0 ? 'remove' : 'add'}/${seconds}` };
}

function restRoute(intent: CommandIntent): CommandRoute {
  switch (intent.command) {
    case 'load_event':
      return { method: 'GET', path: `/load/id/${encodeURIComponent(intent.event_id)}` };
    case 'start_event':
      return { method: 'GET', path: `/start/id/${encodeURIComponent(intent.event_id)}` };
    case 'load_event_index':
      return { method: 'GET', path: `/load/index/${intent.event_index}` };
    case 'load_event_cue':
      return { method: 'GET', path: `/load/cue/${encodeURIComponent(intent.event_cue)}` };
    case 'add_time':
      return restAddTime(intent.time, intent.direction);
    default:
      return { method: 'GET', path: `/${intent.command}` };
  }
}

function playbackRoute(intent: CommandIntent): CommandRoute {
  switch (intent.command) {
    case 'load_event':
      return { method: 'POST', path: `/playback/load/${encodeURIComponent(intent.event_id)}` };
    case 'start_event':
      return { method: 'POST', path: `/playback/start/${encodeURIComponent(intent.event_id)}` };
    case 'load_event_index':
      return { method: 'POST', path: `/playback/loadindex/${intent.event_index}` };
    case 'load_event_cue':
      return { method: 'POST', path: `/playback/loadcue/${encodeURIComponent(intent.event_cue)}` };
    case 'add_time':
      return { method: 'POST', path: `/playback/addtime/${intent.direction}/${intent.time}` };
    default:
      return { method: 'POST', path: `/playback/${intent.command}` };
  }
}

/**
 * Request for an intent on the given surface
 *
 * @throws ValidationError when the surface cannot express the intent
 */
export function buildCommandRoute(api: CommandApi, intent: CommandIntent): CommandRoute {
  return api === CommandApi.PLAYBACK ? playbackRoute(intent) : restRoute(intent);
}
