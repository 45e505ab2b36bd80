/**
 * Command Dispatcher Tests
 *
 * Request paths, synchronous validation, state checks and result
 * classification.
 */

import { CommandDispatcher, rejectionReason } from '../../src/services/command-dispatcher';
import { HttpTransportClient } from '../../src/services/transport-client';
import { SendResult, TransportRequest } from '../../src/models/connection';
import { CommandApi } from '../../src/models/command';
import {
  ServerRejection,
  StateError,
  TransportError,
  TransportErrorCode,
  ValidationError,
} from '../../src/models/errors';
import { initialSnapshot } from '../../src/utils/apply-message';
import { Snapshot } from '../../src/models/snapshot';
import { runtime, snapshotOf } from '../fixtures';

describe('CommandDispatcher', () => {
  let send: jest.Mock<Promise<SendResult>, [TransportRequest]>;
  let snapshot: Snapshot;
  let dispatcher: CommandDispatcher;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    send = jest.fn(async (_request: TransportRequest): Promise<SendResult> => ({
      ok: true,
      ack: { status: 200, payload: { payload: 'success' } },
    }));
    snapshot = snapshotOf(runtime(60000));
    dispatcher = new CommandDispatcher({ send }, () => snapshot);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function sentPath(): string {
    expect(send).toHaveBeenCalledTimes(1);
    return send.mock.calls[0][0].path;
  }

  describe('playback commands', () => {
    it.each([
      ['start', '/start'],
      ['pause', '/pause'],
      ['stop', '/stop'],
      ['reload', '/reload'],
      ['roll', '/roll'],
      ['next', '/next'],
      ['previous', '/previous'],
    ] as const)('%s should request %s', async (command, path) => {
      const result = await dispatcher[command]();

      expect(sentPath()).toBe(path);
      expect(send.mock.calls[0][0].method).toBe('GET');
      expect(result).toMatchObject({ status: 'accepted', command, payload: { payload: 'success' } });
    });

    it('should tag each request with a fresh request id', async () => {
      const first = await dispatcher.start();
      const second = await dispatcher.start();

      expect(first.request_id).toMatch(/^[0-9a-f-]{36}$/);
      expect(first.request_id).not.toBe(second.request_id);
      expect(send.mock.calls[0][0].request_id).toBe(first.request_id);
    });
  });

  describe('event commands', () => {
    it('should encode ids in the path', async () => {
      await dispatcher.loadEventById('ev 1/a');
      expect(sentPath()).toBe('/load/id/ev%201%2Fa');
    });

    it('should start an event by id', async () => {
      const result = await dispatcher.startEvent('ev-2');

      expect(sentPath()).toBe('/start/id/ev-2');
      expect(result.command).toBe('start_event');
    });

    it('should load by index and by cue', async () => {
      await dispatcher.loadEventByIndex(3);
      await dispatcher.loadEventByCue('A1');

      expect(send.mock.calls.map(([request]) => request.path)).toEqual(['/load/index/3', '/load/cue/A1']);
    });

    it('should throw before sending on a negative index', () => {
      expect(() => dispatcher.loadEventByIndex(-1)).toThrow(ValidationError);
      expect(send).not.toHaveBeenCalled();
    });

    it('should throw before sending on an empty id', () => {
      expect(() => dispatcher.startEvent('')).toThrow(ValidationError);
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe('addTime', () => {
    it('should remove whole seconds for a negative amount in both directions', async () => {
      const result = await dispatcher.addTime(-30000, 'both');

      expect(sentPath()).toBe('/addtime/remove/30');
      expect(result.status).toBe('accepted');
    });

    it('should default to both directions', async () => {
      await dispatcher.addTime(60000);
      expect(sentPath()).toBe('/addtime/add/60');
    });

    it('should throw for a one-sided direction on a REST server', () => {
      expect(() => dispatcher.addTime(1000, 'end')).toThrow(ValidationError);
      expect(send).not.toHaveBeenCalled();
    });

    it('should throw for less than a second on a REST server', () => {
      expect(() => dispatcher.addTime(-999)).toThrow(ValidationError);
      expect(send).not.toHaveBeenCalled();
    });

    it('should throw on an unknown direction without sending', () => {
      expect(() => dispatcher.addTime(1000, 'sideways')).toThrow(ValidationError);
      expect(send).not.toHaveBeenCalled();
    });

    it('should throw when no event is loaded', () => {
      snapshot = initialSnapshot();

      expect(() => dispatcher.addTime(1000, 'both')).toThrow(StateError);
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe('v1 playback surface', () => {
    beforeEach(() => {
      dispatcher = new CommandDispatcher({ send }, () => snapshot, CommandApi.PLAYBACK);
    });

    it.each([
      ['start', '/playback/start', () => dispatcher.start()],
      ['stop', '/playback/stop', () => dispatcher.stop()],
      ['next', '/playback/next', () => dispatcher.next()],
      ['loadEventById', '/playback/load/ev%201', () => dispatcher.loadEventById('ev 1')],
      ['startEvent', '/playback/start/ev-2', () => dispatcher.startEvent('ev-2')],
      ['loadEventByIndex', '/playback/loadindex/3', () => dispatcher.loadEventByIndex(3)],
      ['loadEventByCue', '/playback/loadcue/A1', () => dispatcher.loadEventByCue('A1')],
      ['addTime', '/playback/addtime/duration/-1500', () => dispatcher.addTime(-1500, 'duration')],
    ] as const)('%s should POST %s', async (_name, path, run) => {
      const result = await run();

      expect(send).toHaveBeenCalledWith(expect.objectContaining({ method: 'POST', path }));
      expect(result.status).toBe('accepted');
    });
  });

  describe('results', () => {
    it('should report a refusal with the server reason', async () => {
      send.mockResolvedValueOnce({ ok: true, ack: { status: 404, payload: { message: 'Event not found' } } });

      const result = await dispatcher.loadEventById('missing');

      expect(result.status).toBe('rejected');
      if (result.status === 'rejected') {
        expect(result.error).toBeInstanceOf(ServerRejection);
        expect(result.error.message).toBe('Event not found');
        expect(result.error.status).toBe(404);
      }
    });

    it('should report transport failures', async () => {
      const error = new TransportError(TransportErrorCode.TIMEOUT, 'timeout of 10000ms exceeded');
      send.mockResolvedValueOnce({ ok: false, error });

      const result = await dispatcher.pause();

      expect(result).toEqual({ status: 'failed', command: 'pause', request_id: result.request_id, error });
    });

    it('should fail immediately while the transport backs off', async () => {
      const get = jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED'));
      const transport = new HttpTransportClient({
        apiPrefix: '/api',
        pollIntervalMs: 1000,
        requestTimeoutMs: 10000,
        backoffInitialMs: 5000,
        backoffMaxMs: 30000,
        stabilityThresholdMs: 30000,
        protocolErrorThreshold: 5,
        maxReconnectAttempts: 0,
        http: { get, post: jest.fn() },
      });
      await transport.connect('ontime.local', 4001);
      const live = new CommandDispatcher(transport, () => snapshot);

      const result = await live.start();

      expect(transport.state.status).toBe('backoff');
      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.error.code).toBe(TransportErrorCode.NOT_CONNECTED);
      }
      expect(get).toHaveBeenCalledTimes(1);
      transport.close();
    });
  });

  describe('rejectionReason', () => {
    it('should fall back from message to error to the status', () => {
      expect(rejectionReason({ status: 400, payload: { error: 'Invalid cue' } })).toBe('Invalid cue');
      expect(rejectionReason({ status: 400, payload: 'Bad request body' })).toBe('Bad request body');
      expect(rejectionReason({ status: 500, payload: { message: '' } })).toBe('Server responded with status 500');
      expect(rejectionReason({ status: 503, payload: null })).toBe('Server responded with status 503');
    });
  });
});
