/**
 * Command Models
 *
 * Control intents accepted by the command dispatcher and their outcomes.
 */

import { HttpMethod } from './connection';
import { ServerRejection, TransportError } from './errors';

/**
 * Which side of the running event an added amount of time applies to
 */
export enum AddTimeDirection {
  BOTH = 'both',
  START = 'start',
  DURATION = 'duration',
  END = 'end',
}

/**
 * Command surface served by the timer server.
 *
 * REST servers (API prefix `/api` or none) take GET requests such as
 * `/start` or `/load/id/{id}`; v1 servers (prefix `/api/v1`) take POST
 * requests under `/playback`.
 */
export enum CommandApi {
  REST = 'rest',
  PLAYBACK = 'playback',
}

/**
 * Method and prefix-relative path of one command request
 */
export interface CommandRoute {
  method: HttpMethod;
  path: string;
}

export type CommandName =
  | 'start'
  | 'pause'
  | 'stop'
  | 'reload'
  | 'roll'
  | 'next'
  | 'previous'
  | 'load_event'
  | 'start_event'
  | 'load_event_index'
  | 'load_event_cue'
  | 'add_time';

/**
 * Outcome of a dispatched command. Validation and state errors never reach
 * this point: they are thrown before anything is sent.
 */
export type CommandResult =
  | { status: 'accepted'; command: CommandName; request_id: string; payload: unknown }
  | { status: 'rejected'; command: CommandName; request_id: string; error: ServerRejection }
  | { status: 'failed'; command: CommandName; request_id: string; error: TransportError };
