/**
 * Notification Service
 *
 * Listens on the hub and raises one overtime notification per
 * OVERTIME_ENTERED transition. Only updates published after start() are
 * seen, so restarting never replays an old notification.
 */

import { OvertimeNotification, TransitionKind } from '../models/transition';
import { buildOvertimeNotification } from '../utils/read-surface';
import { log, LogLevel } from '../utils/logger';
import { Subscription, SubscriptionHub } from './subscription-hub';

export type OvertimeHandler = (notification: OvertimeNotification) => void | Promise<void>;

export class NotificationService {
  private subscription: Subscription | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly hub: SubscriptionHub,
    private readonly handler: OvertimeHandler
  ) {}

  start(): void {
    if (this.subscription) {
      return;
    }
    const subscription = this.hub.subscribe();
    this.subscription = subscription;
    this.loop = this.run(subscription);
  }

  /**
   * Unsubscribe and wait for queued notifications to be handled
   */
  async stop(): Promise<void> {
    if (!this.subscription) {
      return;
    }
    this.hub.unsubscribe(this.subscription);
    if (this.loop) {
      await this.loop;
    }
    this.subscription = null;
    this.loop = null;
  }

  private async run(subscription: Subscription): Promise<void> {
    for await (const update of subscription) {
      for (const transition of update.transitions) {
        if (transition.kind !== TransitionKind.OVERTIME_ENTERED) {
          continue;
        }

        const notification = buildOvertimeNotification(transition);
        try {
          await this.handler(notification);
        } catch (error) {
          log(LogLevel.ERROR, 'Overtime handler failed', {
            event_id: notification.event_id,
            sequence: update.sequence,
            error: error instanceof Error ? error.message : 'Unknown error',
            operation: 'notifyOvertime',
          });
        }
      }
    }
  }
}
