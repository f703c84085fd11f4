import { PlayerError } from '@/domain/playback/errors';

export const DEFAULT_MAX_PENDING = 4;

/**
 * FIFO executor with exactly one task in flight. At most `maxPending` tasks
 * may wait behind the running one; further submissions fail with `busy`.
 */
export class SerialCommandQueue {
  private tail: Promise<void> = Promise.resolve();
  private outstanding = 0;

  constructor(private readonly maxPending: number = DEFAULT_MAX_PENDING) {}

  /** Running plus waiting tasks. */
  public get size(): number {
    return this.outstanding;
  }

  public isIdle(): boolean {
    return this.outstanding === 0;
  }

  public enqueue<T>(label: string, task: () => Promise<T>): Promise<T> {
    if (this.outstanding > this.maxPending) {
      return Promise.reject(
        new PlayerError('busy', `too many pending commands, rejected ${label}`, {
          command: label,
          pending: this.outstanding,
        }),
      );
    }
    this.outstanding += 1;
    const run = this.tail.then(task);
    const settle = () => {
      this.outstanding -= 1;
    };
    this.tail = run.then(settle, settle);
    return run;
  }

  /** Enqueues only when nothing is running or waiting; otherwise returns null. */
  public runIfIdle<T>(label: string, task: () => Promise<T>): Promise<T> | null {
    if (!this.isIdle()) {
      return null;
    }
    return this.enqueue(label, task);
  }
}
