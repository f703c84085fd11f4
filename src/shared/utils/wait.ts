export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    if (ms <= 0) {
      resolve();
      return;
    }
    setTimeout(resolve, ms);
  });

export type RetryOptions = {
  attempts: number;
  delayMs: number;
  /** Called before sleeping between attempts. */
  onRetry?: (attempt: number, error: unknown) => void;
};

/**
 * Runs `fn` up to `attempts` times, sleeping `delayMs` between failures.
 * Rethrows the last error once the attempts are exhausted.
 */
export async function retryWithDelay<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  let lastError: unknown = new Error('retry exhausted');
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt < attempts) {
        options.onRetry?.(attempt, error);
        await delay(options.delayMs);
      }
    }
  }
  throw lastError;
}

/**
 * Resolves `true` when `promise` settles within `timeoutMs`, `false` otherwise.
 */
export async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | null = null;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  const settled = promise.then(
    () => true,
    () => true,
  );
  try {
    return await Promise.race([settled, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
