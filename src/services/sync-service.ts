/**
 * Sync Service
 *
 * Owns the transport's receive loop. It is the only writer of the live
 * snapshot and the only producer into the subscription hub: every inbound
 * message is folded into a new snapshot, compared against the previous one,
 * and published together with the detected transitions.
 */

import { ConnectionState, TransportEvent } from '../models/connection';
import { RawMessage } from '../models/raw-message';
import { Snapshot } from '../models/snapshot';
import { TransitionKind } from '../models/transition';
import { applyMessage, initialSnapshot, markResync } from '../utils/apply-message';
import { detectTransitions } from '../utils/detect-transitions';
import { log, LogLevel } from '../utils/logger';
import { SubscriptionHub } from './subscription-hub';
import { TransportClient } from './transport-client';

export interface SyncTarget {
  host: string;
  port: number;
}

export class SyncService {
  private current: Snapshot = initialSnapshot();
  private session: number | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly transport: TransportClient,
    private readonly hub: SubscriptionHub,
    private readonly target: SyncTarget
  ) {}

  /**
   * Live snapshot; replaced as a whole on every update
   */
  get snapshot(): Snapshot {
    return this.current;
  }

  get connectionState(): ConnectionState {
    return this.transport.state;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /**
   * Connect and start the receive loop. Resolves with the state reached by
   * the first attempt; a failed first attempt keeps retrying in the
   * background.
   */
  async start(): Promise<ConnectionState> {
    if (this.loop) {
      throw new Error('Sync service already started');
    }

    const state = await this.transport.connect(this.target.host, this.target.port);
    this.loop = this.run();

    log(LogLevel.INFO, 'Sync started', {
      host: this.target.host,
      port: this.target.port,
      status: state.status,
      operation: 'start',
    });

    return state;
  }

  /**
   * Close the transport, wait for the receive loop to drain, and end all
   * subscriptions
   */
  async stop(): Promise<void> {
    this.transport.close();
    if (this.loop) {
      await this.loop;
    }
    this.hub.close();

    log(LogLevel.INFO, 'Sync stopped', { operation: 'stop' });
  }

  /**
   * Resolves once the receive loop has ended
   */
  async done(): Promise<void> {
    if (this.loop) {
      await this.loop;
    }
  }

  private async run(): Promise<void> {
    try {
      for await (const event of this.transport.receive()) {
        this.handle(event);
      }
    } catch (error) {
      log(LogLevel.ERROR, 'Receive loop ended', {
        error: error instanceof Error ? error.message : 'Unknown error',
        operation: 'run',
      });
    }
  }

  private handle(event: TransportEvent): void {
    if (event.type === 'message') {
      this.handleMessage(event.session, event.message);
    }
  }

  private handleMessage(session: number, message: RawMessage): void {
    let previous = this.current;

    // First message of a new connection: nothing from before the gap is trusted
    if (session !== this.session) {
      previous = markResync(previous);
      this.session = session;
    }

    const next = applyMessage(previous, message);
    this.current = next;

    if (next === previous) {
      log(LogLevel.DEBUG, 'Message ignored until full resync', {
        message_type: message.type,
        operation: 'handleMessage',
      });
      return;
    }

    const transitions = detectTransitions(previous, next);
    const update = this.hub.publish(next, transitions);

    for (const transition of transitions) {
      log(
        transition.kind === TransitionKind.OVERTIME_ENTERED ? LogLevel.INFO : LogLevel.DEBUG,
        'Transition detected',
        {
          kind: transition.kind,
          event_id: next.current_event?.event_id ?? null,
          timer_ms: next.timer_ms,
          sequence: update?.sequence,
          operation: 'handleMessage',
        }
      );
    }
  }
}
