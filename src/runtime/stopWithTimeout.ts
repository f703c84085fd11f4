import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

type StopLog = Pick<ComponentLogger, 'info' | 'warn' | 'error'>;

/**
 * Runs one service's stop routine, giving up after `timeoutMs`. A stop that
 * fails after the timeout is still logged once it settles.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: StopLog = createLogger('Server'),
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = stopFn().then(
    (): StopResult => ({ kind: 'stopped' }),
    (error: unknown): StopResult => ({ kind: 'error', error }),
  );
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  switch (result.kind) {
    case 'stopped':
      log.info(`service ${name} stopped`);
      return result;
    case 'timeout':
      log.warn(`service ${name} stop timed out`, { timeoutMs });
      void stopPromise.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: errorMessage(late.error) });
        }
      });
      return result;
    case 'error':
      log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
      return result;
  }
}
