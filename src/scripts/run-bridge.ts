/**
 * Bridge Runner
 *
 * Starts the bridge against the server named in the environment and logs
 * readings on every update until SIGINT or SIGTERM.
 */

import { loadEnvironmentConfig } from '../config/environment';
import { createBridge } from '../index';
import { toReadings } from '../utils/read-surface';
import { log, LogLevel } from '../utils/logger';

export async function runBridge(): Promise<void> {
  const bridge = createBridge(loadEnvironmentConfig(), {
    onOvertime: (notification) => {
      log(LogLevel.WARN, 'Timer overtime', { ...notification });
    },
  });

  const updates = bridge.hub.subscribe();
  const reader = (async () => {
    for await (const update of updates) {
      try {
        log(LogLevel.DEBUG, 'Snapshot update', {
          sequence: update.sequence,
          ...toReadings(update.snapshot),
        });
      } catch (error) {
        log(LogLevel.WARN, 'Could not read snapshot update', {
          sequence: update.sequence,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    }
  })();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    log(LogLevel.INFO, 'Shutting down', { signal });
    await bridge.stop();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        log(LogLevel.ERROR, 'Shutdown failed', {
          signal,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      });
    });
  }

  await bridge.start();
  await bridge.sync.done();
  await shutdown('loop-ended');
  await reader;
}

if (require.main === module) {
  runBridge().catch((error) => {
    log(LogLevel.ERROR, 'Bridge failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    process.exit(1);
  });
}
