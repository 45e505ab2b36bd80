/**
 * Sync Service Tests
 *
 * Receive loop against an in-memory transport: snapshot ownership,
 * published transitions and resync after a reconnect.
 */

import { SyncService } from '../../src/services/sync-service';
import { SubscriptionHub, Subscription } from '../../src/services/subscription-hub';
import { TransportClient } from '../../src/services/transport-client';
import { ConnectionState, SendResult, TransportEvent } from '../../src/models/connection';
import { RawMessage } from '../../src/models/raw-message';
import { PlaybackState } from '../../src/models/snapshot';
import { TransitionKind } from '../../src/models/transition';
import { TransportError, TransportErrorCode } from '../../src/models/errors';
import { event, runtime, timer } from '../fixtures';

/**
 * Transport stand-in fed by the test
 */
class FakeTransport implements TransportClient {
  state: ConnectionState = { status: 'disconnected' };
  connect = jest.fn(async (_host: string, _port: number): Promise<ConnectionState> => {
    this.state = { status: 'connected' };
    return this.state;
  });
  send = jest.fn(async (): Promise<SendResult> => ({ ok: true, ack: { status: 200, payload: {} } }));

  private events: TransportEvent[] = [];
  private wake: (() => void) | null = null;
  private closed = false;
  private failure: TransportError | null = null;

  message(session: number, ...messages: RawMessage[]): void {
    for (const message of messages) {
      this.events.push({ type: 'message', session, message });
    }
    this.notify();
  }

  fail(error: TransportError): void {
    this.failure = error;
    this.notify();
  }

  async *receive(): AsyncGenerator<TransportEvent, void, undefined> {
    while (true) {
      const next = this.events.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.failure) {
        throw this.failure;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  close(): void {
    this.closed = true;
    this.state = { status: 'disconnected' };
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

async function nextUpdate(subscription: Subscription) {
  const result = await subscription.next();
  if (result.done) {
    throw new Error('Subscription ended');
  }
  return result.value;
}

describe('SyncService', () => {
  let transport: FakeTransport;
  let hub: SubscriptionHub;
  let sync: SyncService;
  let updates: Subscription;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    transport = new FakeTransport();
    hub = new SubscriptionHub(32);
    sync = new SyncService(transport, hub, { host: 'ontime.local', port: 4001 });
    updates = hub.subscribe();
  });

  afterEach(async () => {
    await sync.stop();
    jest.restoreAllMocks();
  });

  it('should connect to the configured target', async () => {
    const state = await sync.start();

    expect(state).toEqual({ status: 'connected' });
    expect(transport.connect).toHaveBeenCalledWith('ontime.local', 4001);
    expect(sync.running).toBe(true);
    expect(sync.connectionState).toEqual({ status: 'connected' });
  });

  it('should refuse to start twice', async () => {
    await sync.start();
    await expect(sync.start()).rejects.toThrow('Sync service already started');
  });

  it('should publish every new snapshot and keep the latest', async () => {
    await sync.start();
    transport.message(1, runtime(60000), timer(59000));

    const first = await nextUpdate(updates);
    const second = await nextUpdate(updates);

    expect(first.sequence).toBe(1);
    expect(first.snapshot.timer_ms).toBe(60000);
    expect(first.transitions).toEqual([]);
    expect(second.sequence).toBe(2);
    expect(second.snapshot.timer_ms).toBe(59000);
    expect(sync.snapshot).toBe(second.snapshot);
  });

  it('should publish overtime edges as they happen', async () => {
    await sync.start();
    transport.message(1, runtime(5000), timer(2000), timer(-100), timer(-50), timer(3000), timer(-10));

    const kinds: TransitionKind[] = [];
    for (let i = 0; i < 6; i++) {
      const update = await nextUpdate(updates);
      kinds.push(...update.transitions.map((record) => record.kind));
    }

    expect(kinds).toEqual([
      TransitionKind.OVERTIME_ENTERED,
      TransitionKind.OVERTIME_CLEARED,
      TransitionKind.OVERTIME_ENTERED,
    ]);
  });

  it('should not fire on the first message after a reconnect', async () => {
    await sync.start();
    transport.message(1, runtime(2000));
    await nextUpdate(updates);

    transport.message(
      2,
      runtime(-500, { playback: PlaybackState.PAUSED, event_now: event('ev-7') }),
      timer(800)
    );
    const afterReconnect = await nextUpdate(updates);
    const following = await nextUpdate(updates);

    expect(afterReconnect.transitions).toEqual([]);
    expect(afterReconnect.snapshot.current_event?.event_id).toBe('ev-7');
    expect(following.transitions.map((record) => record.kind)).toEqual([TransitionKind.OVERTIME_CLEARED]);
  });

  it('should hold back deltas after a reconnect until a full message arrives', async () => {
    await sync.start();
    transport.message(1, runtime(2000));
    await nextUpdate(updates);

    transport.message(2, timer(-300), runtime(-400));
    const update = await nextUpdate(updates);

    expect(update.sequence).toBe(2);
    expect(update.snapshot.timer_ms).toBe(-400);
    expect(update.transitions).toEqual([]);
  });

  it('should end subscriptions on stop', async () => {
    await sync.start();

    await sync.stop();

    await expect(updates.next()).resolves.toEqual({ done: true, value: undefined });
    expect(transport.state).toEqual({ status: 'disconnected' });
  });

  it('should log and finish when the transport gives up', async () => {
    await sync.start();
    transport.fail(new TransportError(TransportErrorCode.CONNECTION_LOST, 'Gave up after 3 reconnect attempts'));

    await sync.done();

    expect(JSON.parse(consoleErrorSpy.mock.calls[0][0])).toMatchObject({
      level: 'ERROR',
      message: 'Receive loop ended',
      error: 'Gave up after 3 reconnect attempts',
    });
  });
});
