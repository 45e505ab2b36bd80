/**
 * Ontime Bridge
 *
 * Keeps a live snapshot of an Ontime timer server, publishes updates and
 * transitions to subscribers, and sends control commands back.
 */

import { EnvironmentConfig, validateEnvironmentConfig } from './config/environment';
import { CommandDispatcher } from './services/command-dispatcher';
import { NotificationService, OvertimeHandler } from './services/notification-service';
import { RundownService } from './services/rundown-service';
import { SubscriptionHub } from './services/subscription-hub';
import { SyncService } from './services/sync-service';
import { HttpClient, HttpTransportClient } from './services/transport-client';
import { Sleep } from './utils/backoff';
import { commandApiForPrefix } from './utils/command-routes';
import { setLogLevel } from './utils/logger';

export * from './config/environment';
export * from './models/command';
export * from './models/connection';
export * from './models/errors';
export * from './models/raw-message';
export * from './models/snapshot';
export * from './models/transition';
export * from './services/command-dispatcher';
export * from './services/notification-service';
export * from './services/rundown-service';
export * from './services/server-probe';
export * from './services/subscription-hub';
export * from './services/sync-service';
export * from './services/transport-client';
export * from './utils/apply-message';
export * from './utils/command-routes';
export * from './utils/detect-transitions';
export * from './utils/message-decoder';
export * from './utils/read-surface';

export interface Bridge {
  transport: HttpTransportClient;
  hub: SubscriptionHub;
  sync: SyncService;
  commands: CommandDispatcher;
  rundown: RundownService;
  notifications: NotificationService | null;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface BridgeOptions {
  onOvertime?: OvertimeHandler;
  http?: HttpClient;
  sleep?: Sleep;
}

/**
 * Wire the bridge for one server
 *
 * @throws Error when the configuration is invalid
 */
export function createBridge(config: EnvironmentConfig, options: BridgeOptions = {}): Bridge {
  validateEnvironmentConfig(config);
  setLogLevel(config.logLevel);

  const transport = new HttpTransportClient({
    apiPrefix: config.apiPrefix,
    pollIntervalMs: config.pollIntervalMs,
    requestTimeoutMs: config.requestTimeoutMs,
    backoffInitialMs: config.backoffInitialMs,
    backoffMaxMs: config.backoffMaxMs,
    stabilityThresholdMs: config.stabilityThresholdMs,
    protocolErrorThreshold: config.protocolErrorThreshold,
    maxReconnectAttempts: config.maxReconnectAttempts,
    http: options.http,
    sleep: options.sleep,
  });
  const hub = new SubscriptionHub(config.queueDepth);
  const sync = new SyncService(transport, hub, { host: config.ontimeHost, port: config.ontimePort });
  const commands = new CommandDispatcher(transport, () => sync.snapshot, commandApiForPrefix(config.apiPrefix));
  const rundown = new RundownService(transport);
  const notifications = options.onOvertime ? new NotificationService(hub, options.onOvertime) : null;

  return {
    transport,
    hub,
    sync,
    commands,
    rundown,
    notifications,
    async start(): Promise<void> {
      notifications?.start();
      await sync.start();
    },
    async stop(): Promise<void> {
      await sync.stop();
      await notifications?.stop();
    },
  };
}
