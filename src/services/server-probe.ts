/**
 * Server Probe
 *
 * Finds out whether a timer server answers at host:port and which API
 * prefix it serves, trying the paths used by current and older server
 * releases in turn.
 */

import axios, { AxiosInstance } from 'axios';
import { CommandApi } from '../models/command';
import { CannotConnectError } from '../models/errors';
import { commandApiForPrefix } from '../utils/command-routes';
import { log, LogLevel } from '../utils/logger';
import { toTransportError } from './transport-client';

export const PROBE_PATHS = [
  '/api/info',
  '/api/v1/info',
  '/info',
  '/api/runtime',
  '/api/v1/runtime',
];

const PROBE_TIMEOUT_MS = 5000;
const INFO_TIMEOUT_MS = 10000;

export interface ServerInfo {
  api_prefix: string;
  command_api: CommandApi;
  info: Record<string, unknown>;
  title: string;
}

export type ProbeHttpClient = Pick<AxiosInstance, 'get'>;

export interface ProbeOptions {
  http?: ProbeHttpClient;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * API prefix implied by the probe path that answered
 */
export function prefixForPath(path: string): string {
  if (path.includes('v1')) {
    return '/api/v1';
  }
  if (path.startsWith('/api/')) {
    return '/api';
  }
  return '';
}

/**
 * Display title for a configured server
 */
export function serverTitle(info: Record<string, unknown>): string {
  const version = info.version;
  return `Ontime ${typeof version === 'string' && version !== '' ? version : 'Server'}`;
}

async function fetchInfo(http: ProbeHttpClient, baseUrl: string, prefix: string): Promise<Record<string, unknown>> {
  try {
    const response = await http.get<unknown>(`${baseUrl}${prefix}/info`, {
      timeout: INFO_TIMEOUT_MS,
      validateStatus: () => true,
    });
    return response.status === 200 && isRecord(response.data) ? response.data : {};
  } catch (error) {
    log(LogLevel.WARN, 'Could not fetch server info', {
      error: toTransportError(error).message,
      operation: 'probeServer',
    });
    return {};
  }
}

/**
 * Probe a server
 *
 * @throws CannotConnectError when none of the probe paths answers 200
 */
export async function probeServer(host: string, port: number, options: ProbeOptions = {}): Promise<ServerInfo> {
  const http = options.http ?? axios.create();
  const baseUrl = `http://${host}:${port}`;

  for (const path of PROBE_PATHS) {
    let status: number;
    let data: unknown;
    try {
      const response = await http.get<unknown>(`${baseUrl}${path}`, {
        timeout: PROBE_TIMEOUT_MS,
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      log(LogLevel.DEBUG, 'Probe path failed', {
        path,
        error: toTransportError(error).message,
        operation: 'probeServer',
      });
      continue;
    }

    if (status !== 200) {
      log(LogLevel.DEBUG, 'Probe path answered with unexpected status', {
        path,
        status_code: status,
        operation: 'probeServer',
      });
      continue;
    }

    const apiPrefix = prefixForPath(path);
    const info = path.endsWith('/info') && isRecord(data)
      ? data
      : await fetchInfo(http, baseUrl, apiPrefix);

    log(LogLevel.INFO, 'Server found', {
      target: baseUrl,
      path,
      api_prefix: apiPrefix,
      operation: 'probeServer',
    });

    return { api_prefix: apiPrefix, command_api: commandApiForPrefix(apiPrefix), info, title: serverTitle(info) };
  }

  throw new CannotConnectError(`No timer server answered at ${baseUrl}`);
}
