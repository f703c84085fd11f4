import { createLogger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

/** Longer than the slowest service stop so a clean shutdown always wins. */
const FORCE_EXIT_MS = 12000;

export function registerShutdownHandlers(
  runtime: Pick<Runtime, 'stop'>,
  log = createLogger('Server'),
): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutdown requested', { signal });

    // Watchdog so a stop that never resolves cannot hang the process.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    await runtime.stop();

    clearTimeout(forceExit);
    process.exit(0);
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}
