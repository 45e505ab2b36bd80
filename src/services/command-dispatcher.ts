/**
 * Command Dispatcher
 *
 * Turns control intents into requests against the timer server, using the
 * command surface of its API version. Parameters are validated
 * synchronously, so a bad call throws before anything is sent; once sent,
 * the outcome comes back as a CommandResult and the effect shows up later
 * through the subscription hub.
 */

import { v4 as uuidv4 } from 'uuid';
import { AddTimeDirection, CommandApi, CommandName, CommandResult, CommandRoute } from '../models/command';
import { Ack } from '../models/connection';
import { ServerRejection, StateError } from '../models/errors';
import { Snapshot } from '../models/snapshot';
import {
  validateAddTime,
  validateEventCue,
  validateEventId,
  validateEventIndex,
} from '../utils/command-validation';
import { buildCommandRoute, CommandIntent } from '../utils/command-routes';
import { logCommand } from '../utils/logger';
import { ACCEPTED_STATUSES, TransportClient } from './transport-client';

/**
 * Supplies the live snapshot for state checks
 */
export type SnapshotReader = () => Snapshot;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract the server's reason for refusing a command
 */
export function rejectionReason(ack: Ack): string {
  const { payload } = ack;

  if (isRecord(payload)) {
    for (const key of ['message', 'error']) {
      const value = payload[key];
      if (typeof value === 'string' && value.trim() !== '') {
        return value;
      }
    }
  } else if (typeof payload === 'string' && payload.trim() !== '') {
    return payload;
  }

  return `Server responded with status ${ack.status}`;
}

export class CommandDispatcher {
  constructor(
    private readonly transport: Pick<TransportClient, 'send'>,
    private readonly readSnapshot: SnapshotReader,
    private readonly api: CommandApi = CommandApi.REST
  ) {}

  start(): Promise<CommandResult> {
    return this.dispatch({ command: 'start' });
  }

  pause(): Promise<CommandResult> {
    return this.dispatch({ command: 'pause' });
  }

  stop(): Promise<CommandResult> {
    return this.dispatch({ command: 'stop' });
  }

  reload(): Promise<CommandResult> {
    return this.dispatch({ command: 'reload' });
  }

  roll(): Promise<CommandResult> {
    return this.dispatch({ command: 'roll' });
  }

  next(): Promise<CommandResult> {
    return this.dispatch({ command: 'next' });
  }

  previous(): Promise<CommandResult> {
    return this.dispatch({ command: 'previous' });
  }

  /**
   * Load an event by its id without starting it
   *
   * @throws ValidationError if the id is empty
   */
  loadEventById(eventId: string): Promise<CommandResult> {
    const { event_id } = validateEventId(eventId);
    return this.dispatch({ command: 'load_event', event_id });
  }

  /**
   * Load and start an event by its id
   *
   * @throws ValidationError if the id is empty
   */
  startEvent(eventId: string): Promise<CommandResult> {
    const { event_id } = validateEventId(eventId);
    return this.dispatch({ command: 'start_event', event_id });
  }

  /**
   * @throws ValidationError unless index is an integer >= 0
   */
  loadEventByIndex(index: number): Promise<CommandResult> {
    const { event_index } = validateEventIndex(index);
    return this.dispatch({ command: 'load_event_index', event_index });
  }

  loadEventByCue(cue: string): Promise<CommandResult> {
    const { event_cue } = validateEventCue(cue);
    return this.dispatch({ command: 'load_event_cue', event_cue });
  }

  /**
   * Add (or, with a negative amount, remove) time on the running event
   *
   * REST servers take whole seconds on both ends only; the v1 API takes
   * milliseconds and any direction.
   *
   * @param timeMs - Signed, non-zero milliseconds
   * @param direction - both, start, duration or end
   * @throws ValidationError on a bad amount or direction
   * @throws StateError when no event is loaded
   */
  addTime(timeMs: number, direction: string = AddTimeDirection.BOTH): Promise<CommandResult> {
    const params = validateAddTime(timeMs, direction);
    const route = buildCommandRoute(this.api, { command: 'add_time', ...params });

    if (this.readSnapshot().current_event === null) {
      throw new StateError('Cannot add time: no event is loaded');
    }

    return this.send('add_time', route);
  }

  /**
   * Build the route synchronously so a surface that cannot express the
   * intent throws before anything is sent
   */
  private dispatch(intent: CommandIntent): Promise<CommandResult> {
    return this.send(intent.command, buildCommandRoute(this.api, intent));
  }

  private async send(command: CommandName, route: CommandRoute): Promise<CommandResult> {
    const requestId = uuidv4();
    const startTime = Date.now();
    const { method, path } = route;

    const result = await this.transport.send({ path, method, request_id: requestId });
    const latencyMs = Date.now() - startTime;

    if (!result.ok) {
      logCommand({
        requestId,
        command,
        method,
        path,
        outcome: 'failed',
        reason: `${result.error.code}: ${result.error.message}`,
        latencyMs,
      });
      return { status: 'failed', command, request_id: requestId, error: result.error };
    }

    const { ack } = result;
    if (!ACCEPTED_STATUSES.includes(ack.status)) {
      const reason = rejectionReason(ack);
      logCommand({
        requestId,
        command,
        method,
        path,
        outcome: 'rejected',
        statusCode: ack.status,
        reason,
        latencyMs,
      });
      return {
        status: 'rejected',
        command,
        request_id: requestId,
        error: new ServerRejection(reason, ack.status),
      };
    }

    logCommand({ requestId, command, method, path, outcome: 'accepted', statusCode: ack.status, latencyMs });
    return { status: 'accepted', command, request_id: requestId, payload: ack.payload };
  }
}
