import { Semaphore } from 'async-mutex';

/**
 * Read/Write Lock
 *
 * Shared/exclusive lock on top of a weighted semaphore: a reader takes one
 * permit, a writer takes all of them. Waiters are served in queue order, so a
 * queued writer holds back readers that arrive after it.
 */
const MAX_READERS = 1024;

export class ReadWriteLock {
  private semaphore = new Semaphore(MAX_READERS);

  /**
   * Runs the callback while holding the shared (read) mode
   */
  async read<T>(callback: () => T | Promise<T>): Promise<T> {
    return this.semaphore.runExclusive(callback, 1);
  }

  /**
   * Runs the callback while holding the exclusive (write) mode
   */
  async write<T>(callback: () => T | Promise<T>): Promise<T> {
    return this.semaphore.runExclusive(callback, MAX_READERS);
  }

  /**
   * True while any reader or writer holds the lock
   */
  isLocked(): boolean {
    return this.semaphore.isLocked() || this.semaphore.getValue() < MAX_READERS;
  }
}
