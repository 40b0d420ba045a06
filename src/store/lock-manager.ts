import { ConcurrencyConflictError } from "../errors";

interface Waiter {
  owner: symbol;
  resolve: () => void;
  timer: NodeJS.Timeout;
}

/**
 * Exclusive, FIFO, owner-reentrant locks keyed by row. A waiter that is not
 * granted the lock within the timeout is rejected with ConcurrencyConflictError.
 */
export class RowLockManager {
  private holders = new Map<string, symbol>();
  private queues = new Map<string, Waiter[]>();

  acquire(key: string, owner: symbol, timeoutMs: number): Promise<void> {
    const holder = this.holders.get(key);
    if (holder === undefined) {
      this.holders.set(key, owner);
      return Promise.resolve();
    }
    if (holder === owner) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const queue = this.queues.get(key) ?? [];
      const waiter: Waiter = {
        owner,
        resolve,
        timer: setTimeout(() => {
          const pending = this.queues.get(key) ?? [];
          this.queues.set(
            key,
            pending.filter((w) => w !== waiter),
          );
          reject(
            new ConcurrencyConflictError(
              `Timed out after ${timeoutMs}ms waiting for lock on ${key}`,
            ),
          );
        }, timeoutMs),
      };
      queue.push(waiter);
      this.queues.set(key, queue);
    });
  }

  release(key: string, owner: symbol): void {
    if (this.holders.get(key) !== owner) return;

    const queue = this.queues.get(key) ?? [];
    const next = queue.shift();
    if (!next) {
      this.holders.delete(key);
      this.queues.delete(key);
      return;
    }
    clearTimeout(next.timer);
    this.holders.set(key, next.owner);
    next.resolve();
  }

  isLocked(key: string): boolean {
    return this.holders.has(key);
  }
}
