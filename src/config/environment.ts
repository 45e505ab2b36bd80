/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 */

import Ajv, { JSONSchemaType } from 'ajv';
import addFormats from 'ajv-formats';

export interface EnvironmentConfig {
  // Timer server
  ontimeHost: string;
  ontimePort: number;
  apiPrefix: string;

  // Transport
  pollIntervalMs: number;
  requestTimeoutMs: number;
  backoffInitialMs: number;
  backoffMaxMs: number;
  stabilityThresholdMs: number;
  protocolErrorThreshold: number;
  maxReconnectAttempts: number;

  // Subscription hub
  queueDepth: number;

  // Application configuration
  logLevel: string;
  nodeEnv: string;
}

const ajv = new Ajv({ allErrors: true, strict: true, coerceTypes: false });
addFormats(ajv);

const configSchema: JSONSchemaType<EnvironmentConfig> = {
  type: 'object',
  properties: {
    ontimeHost: { type: 'string', minLength: 1, format: 'hostname' },
    ontimePort: { type: 'integer', minimum: 1, maximum: 65535 },
    apiPrefix: { type: 'string', pattern: '^(/[A-Za-z0-9._~-]+)*$' },
    pollIntervalMs: { type: 'integer', minimum: 1 },
    requestTimeoutMs: { type: 'integer', minimum: 1 },
    backoffInitialMs: { type: 'integer', minimum: 1 },
    backoffMaxMs: { type: 'integer', minimum: 1 },
    stabilityThresholdMs: { type: 'integer', minimum: 0 },
    protocolErrorThreshold: { type: 'integer', minimum: 1 },
    maxReconnectAttempts: { type: 'integer', minimum: 0 },
    queueDepth: { type: 'integer', minimum: 1 },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
    nodeEnv: { type: 'string' },
  },
  required: [
    'ontimeHost',
    'ontimePort',
    'apiPrefix',
    'pollIntervalMs',
    'requestTimeoutMs',
    'backoffInitialMs',
    'backoffMaxMs',
    'stabilityThresholdMs',
    'protocolErrorThreshold',
    'maxReconnectAttempts',
    'queueDepth',
    'logLevel',
    'nodeEnv',
  ],
  additionalProperties: false,
};

const validateConfigSchema = ajv.compile(configSchema);

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Load environment configuration, applying defaults
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    ontimeHost: process.env.ONTIME_HOST || '',
    ontimePort: readInt(process.env.ONTIME_PORT, 4001),
    apiPrefix: process.env.ONTIME_API_PREFIX ?? '/api',
    pollIntervalMs: readInt(process.env.ONTIME_POLL_INTERVAL_MS, 1000),
    requestTimeoutMs: readInt(process.env.ONTIME_REQUEST_TIMEOUT_MS, 10000),
    backoffInitialMs: readInt(process.env.ONTIME_BACKOFF_INITIAL_MS, 1000),
    backoffMaxMs: readInt(process.env.ONTIME_BACKOFF_MAX_MS, 30000),
    stabilityThresholdMs: readInt(process.env.ONTIME_STABILITY_THRESHOLD_MS, 30000),
    protocolErrorThreshold: readInt(process.env.ONTIME_PROTOCOL_ERROR_THRESHOLD, 5),
    maxReconnectAttempts: readInt(process.env.ONTIME_MAX_RECONNECT_ATTEMPTS, 0),
    queueDepth: readInt(process.env.ONTIME_QUEUE_DEPTH, 16),
    logLevel: (process.env.LOG_LEVEL || 'info').toLowerCase(),
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

/**
 * Validate configuration values
 *
 * @throws Error listing every invalid or missing setting
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const problems: string[] = [];
  const hostMissing = !config.ontimeHost;

  if (hostMissing) {
    problems.push('Missing required environment variable: ONTIME_HOST');
  }

  if (!validateConfigSchema(config) && validateConfigSchema.errors) {
    for (const error of validateConfigSchema.errors) {
      const field = error.instancePath ? error.instancePath.substring(1) : 'config';
      if (field === 'ontimeHost' && hostMissing) {
        continue;
      }
      problems.push(`${field} ${error.message || 'is invalid'}`);
    }
  }

  if (config.backoffMaxMs < config.backoffInitialMs) {
    problems.push('backoffMaxMs must be >= backoffInitialMs');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
}
