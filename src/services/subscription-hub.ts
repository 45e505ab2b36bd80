/**
 * Subscription Hub
 *
 * Fans snapshot updates and their transitions out to observers. Every
 * subscriber sees the same total order; each has its own bounded queue so a
 * slow reader only falls behind itself.
 */

import { v4 as uuidv4 } from 'uuid';
import { Snapshot } from '../models/snapshot';
import { TransitionRecord } from '../models/transition';
import { log, LogLevel } from '../utils/logger';

/**
 * One published update; `sequence` is hub-wide and strictly increasing
 */
export interface SnapshotUpdate {
  sequence: number;
  snapshot: Snapshot;
  transitions: readonly TransitionRecord[];
}

/**
 * Handle returned by subscribe()
 *
 * Iterating the handle reads from its queue; iterating it again after a
 * `break` resumes from the next unread update.
 */
export class Subscription implements AsyncIterable<SnapshotUpdate> {
  readonly id = uuidv4();

  private queue: SnapshotUpdate[] = [];
  private waiters: Array<(result: IteratorResult<SnapshotUpdate, undefined>) => void> = [];
  private droppedCount = 0;
  private closed = false;

  constructor(private readonly depth: number) {}

  /**
   * Updates discarded because the queue was full
   */
  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** @internal called by the hub */
  enqueue(update: SnapshotUpdate): void {
    if (this.closed) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: update, done: false });
      return;
    }

    this.queue.push(update);
    if (this.queue.length > this.depth) {
      this.queue.shift();
      this.droppedCount++;
    }
  }

  /**
   * Next update, waiting if the queue is empty. Resolves done once closed
   * and drained.
   */
  next(): Promise<IteratorResult<SnapshotUpdate, undefined>> {
    const update = this.queue.shift();
    if (update) {
      return Promise.resolve({ value: update, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** @internal called by the hub */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<SnapshotUpdate, undefined> {
    return {
      next: () => this.next(),
    };
  }
}

export class SubscriptionHub {
  private subscriptions = new Map<string, Subscription>();
  private sequence = 0;
  private closed = false;

  constructor(private readonly queueDepth: number) {
    if (!Number.isInteger(queueDepth) || queueDepth < 1) {
      throw new Error(`Queue depth must be a positive integer, got ${queueDepth}`);
    }
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Sequence number of the last published update (0 before the first)
   */
  get lastSequence(): number {
    return this.sequence;
  }

  /**
   * Register an observer. Only updates published after this call returns
   * reach it.
   */
  subscribe(): Subscription {
    const subscription = new Subscription(this.queueDepth);
    if (this.closed) {
      subscription.close();
      return subscription;
    }
    this.subscriptions.set(subscription.id, subscription);

    log(LogLevel.DEBUG, 'Subscriber added', {
      subscription_id: subscription.id,
      subscriber_count: this.subscriptions.size,
      operation: 'subscribe',
    });

    return subscription;
  }

  /**
   * Remove an observer; its pending iteration ends after the queued updates
   */
  unsubscribe(subscription: Subscription): void {
    if (!this.subscriptions.delete(subscription.id)) {
      return;
    }
    subscription.close();

    log(LogLevel.DEBUG, 'Subscriber removed', {
      subscription_id: subscription.id,
      subscriber_count: this.subscriptions.size,
      dropped: subscription.dropped,
      operation: 'unsubscribe',
    });
  }

  /**
   * Deliver one update to every subscriber. Never waits on a reader.
   */
  publish(snapshot: Snapshot, transitions: readonly TransitionRecord[]): SnapshotUpdate | null {
    if (this.closed) {
      return null;
    }

    const update: SnapshotUpdate = {
      sequence: ++this.sequence,
      snapshot,
      transitions: Object.freeze([...transitions]),
    };

    for (const subscription of this.subscriptions.values()) {
      subscription.enqueue(update);
    }

    return update;
  }

  /**
   * End every subscription; later publishes are ignored
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const subscription of this.subscriptions.values()) {
      subscription.close();
    }
    this.subscriptions.clear();
  }
}
