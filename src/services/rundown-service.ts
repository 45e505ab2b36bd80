/**
 * Rundown Service
 *
 * Reads the server's rundown on demand. Nothing is cached: the server owns
 * the rundown and may edit it at any time.
 */

import { EventRef } from '../models/snapshot';
import { decodeEvent } from '../utils/message-decoder';
import { ACCEPTED_STATUSES, TransportClient } from './transport-client';
import { ServerRejection, TransportError, TransportErrorCode } from '../models/errors';

/**
 * One rundown entry as the server sends it
 */
export interface RundownEntry {
  id: string;
  type: string;
  skip: boolean;
  event: EventRef | null;           // Decoded view; null for non-event entries
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the raw rundown list; entries without an id are left out
 */
export function parseRundown(payload: unknown): RundownEntry[] {
  if (!isRecord(payload) || !Array.isArray(payload.payload)) {
    throw new TransportError(TransportErrorCode.PROTOCOL_ERROR, 'Rundown response has no payload list');
  }

  const entries: RundownEntry[] = [];
  payload.payload.forEach((item: unknown, index: number) => {
    if (!isRecord(item) || typeof item.id !== 'string' || item.id === '') {
      return;
    }
    const type = typeof item.type === 'string' ? item.type : '';
    entries.push({
      id: item.id,
      type,
      skip: item.skip === true,
      event: type === 'event' ? decodeEvent(item, index) ?? null : null,
    });
  });
  return entries;
}

/**
 * First event after `currentId` that is not skipped. Blocks and other
 * non-event entries are passed over.
 */
export function findNextEvent(rundown: RundownEntry[], currentId: string | null): EventRef | null {
  if (currentId === null) {
    return null;
  }

  let foundCurrent = false;
  for (const entry of rundown) {
    if (entry.type !== 'event') {
      continue;
    }
    if (foundCurrent && !entry.skip) {
      return entry.event;
    }
    if (entry.id === currentId) {
      foundCurrent = true;
    }
  }
  return null;
}

export class RundownService {
  constructor(private readonly transport: Pick<TransportClient, 'send'>) {}

  /**
   * Fetch the rundown
   *
   * @throws TransportError when the request fails or the body is unusable
   * @throws ServerRejection when the server refuses the request
   */
  async getRundown(): Promise<RundownEntry[]> {
    const result = await this.transport.send({ path: '/data/rundown' });
    if (!result.ok) {
      throw result.error;
    }
    if (!ACCEPTED_STATUSES.includes(result.ack.status)) {
      throw new ServerRejection(`Rundown request failed with status ${result.ack.status}`, result.ack.status);
    }
    return parseRundown(result.ack.payload);
  }

  async getNextEvent(currentId: string | null): Promise<EventRef | null> {
    return findNextEvent(await this.getRundown(), currentId);
  }
}
