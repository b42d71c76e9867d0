import { DispatchError } from './errors';

interface QueuedTask {
  start: () => void;
  reject: (error: DispatchError) => void;
}

export interface WorkerPoolStats {
  active: number;
  queued: number;
  maxInFlight: number;
}

/**
 * Bounded execution pool for transport calls.
 *
 * At most `maxInFlight` tasks run at once; the rest wait in FIFO order. A slot
 * is held until the task's promise settles, so a task that can be abandoned
 * must settle its promise when it is.
 */
export class WorkerPool {
  private active = 0;
  private readonly queue: QueuedTask[] = [];

  constructor(readonly maxInFlight: number) {
    if (!Number.isInteger(maxInFlight) || maxInFlight < 1) {
      throw new DispatchError('invalid_argument', `maxInFlight must be a positive integer, got ${maxInFlight}`);
    }
  }

  get stats(): WorkerPoolStats {
    return { active: this.active, queued: this.queue.length, maxInFlight: this.maxInFlight };
  }

  /**
   * Waits for a free slot, then runs `task`. `onStart` fires when the slot is
   * acquired, which is where per-request deadlines begin.
   *
   * Aborting `signal` while the task is still queued removes it from the
   * queue and rejects with `canceled`; once started the task runs to the end.
   */
  run<T>(task: () => Promise<T>, signal?: AbortSignal, onStart?: () => void): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(canceled());
    }

    return new Promise<T>((resolve, reject) => {
      const entry: QueuedTask = {
        start: () => {
          signal?.removeEventListener('abort', onAbort);
          this.active += 1;
          onStart?.();
          let pending: Promise<T>;
          try {
            pending = task();
          } catch (error) {
            pending = Promise.reject(error);
          }
          void pending.then(resolve, reject).finally(() => this.release());
        },
        reject,
      };

      const onAbort = () => {
        const index = this.queue.indexOf(entry);
        if (index >= 0) {
          this.queue.splice(index, 1);
          entry.reject(canceled());
        }
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      if (this.active < this.maxInFlight) {
        entry.start();
      } else {
        this.queue.push(entry);
      }
    });
  }

  private release(): void {
    this.active -= 1;
    const next = this.queue.shift();
    if (next) {
      next.start();
    }
  }
}

function canceled(): DispatchError {
  return new DispatchError('canceled', 'Operation canceled before the request was sent');
}
