/**
 * RepositoryLock - Reader/writer lock for one script repository.
 *
 * Readers share the lock; a writer holds it alone. Waiters are served in
 * arrival order, so a queued writer is not starved by later readers.
 * Every wait is bounded by `timeoutMs` and may be cancelled through an
 * AbortSignal.
 *
 * With `crossProcess` enabled, writers additionally hold a proper-lockfile
 * lock on the repository root so that two processes pointed at the same
 * folder do not interleave mutations.
 */

import { join } from 'node:path';
import lockfile from 'proper-lockfile';
import { LockTimeoutError, OperationCancelledError, isErrnoException } from '../types/errors.js';

export type LockMode = 'read' | 'write';

export interface RepositoryLockOptions {
  /** Maximum wait for the lock, in milliseconds */
  timeoutMs: number;
  /** Also take a file lock on the repository root for writes */
  crossProcess: boolean;
  /** Age after which a cross-process lock is considered abandoned */
  staleMs: number;
}

export interface AcquireOptions {
  signal?: AbortSignal | undefined;
  /** Operation name used in cancellation errors */
  operation?: string;
}

export const DEFAULT_LOCK_OPTIONS: RepositoryLockOptions = {
  timeoutMs: 10_000,
  crossProcess: false,
  staleMs: 30_000,
};

/** Name of the directory proper-lockfile creates inside the root. */
export const LOCK_DIRECTORY = '.script-shelf.lock';

const FILE_LOCK_RETRY_MS = 100;

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export class RepositoryLock {
  private readonly root: string;
  private readonly options: RepositoryLockOptions;
  private activeReaders = 0;
  private writerActive = false;
  private readonly queue: Waiter[] = [];

  constructor(root: string, options: Partial<RepositoryLockOptions> = {}) {
    this.root = root;
    this.options = { ...DEFAULT_LOCK_OPTIONS, ...options };
  }

  /** Number of readers currently holding the lock. */
  get readers(): number {
    return this.activeReaders;
  }

  /** Whether a writer currently holds the lock. */
  get writing(): boolean {
    return this.writerActive;
  }

  /**
   * Run `fn` while holding the shared lock.
   */
  async withRead<T>(fn: () => Promise<T> | T, options: AcquireOptions = {}): Promise<T> {
    await this.acquire('read', options);
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  /**
   * Run `fn` while holding the exclusive lock (and the file lock when
   * cross-process locking is on).
   */
  async withWrite<T>(fn: () => Promise<T> | T, options: AcquireOptions = {}): Promise<T> {
    await this.acquire('write', options);
    try {
      if (!this.options.crossProcess) {
        return await fn();
      }
      const releaseFile = await this.acquireFileLock();
      try {
        return await fn();
      } finally {
        await releaseFile().catch((err: unknown) => {
          console.error(`[RepositoryLock] Failed to release file lock on ${this.root}:`, err);
        });
      }
    } finally {
      this.release('write');
    }
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writerActive) return false;
    return mode === 'read' || this.activeReaders === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'read') {
      this.activeReaders++;
    } else {
      this.writerActive = true;
    }
  }

  private acquire(mode: LockMode, options: AcquireOptions): Promise<void> {
    const { signal, operation = mode } = options;
    if (signal?.aborted) {
      return Promise.reject(new OperationCancelledError(operation));
    }

    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.queue.indexOf(waiter);
        if (index >= 0) this.queue.splice(index, 1);
      };

      const waiter: Waiter = {
        mode,
        grant: () => {
          cleanup();
          this.take(mode);
          resolve();
        },
      };

      const timer = setTimeout(() => {
        cleanup();
        reject(new LockTimeoutError(mode, this.options.timeoutMs));
        // A timed-out writer at the head may have been holding back readers
        this.drain();
      }, this.options.timeoutMs);

      const onAbort = (): void => {
        cleanup();
        reject(new OperationCancelledError(operation));
        this.drain();
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  private release(mode: LockMode): void {
    if (mode === 'read') {
      this.activeReaders--;
    } else {
      this.writerActive = false;
    }
    this.drain();
  }

  /**
   * Grant the lock to waiters at the head of the queue: one writer, or
   * every reader up to the next writer.
   */
  private drain(): void {
    let head = this.queue[0];
    while (head && this.canGrant(head.mode)) {
      head.grant();
      if (head.mode === 'write') return;
      head = this.queue[0];
    }
  }

  private async acquireFileLock(): Promise<() => Promise<void>> {
    const retries = Math.max(0, Math.floor(this.options.timeoutMs / FILE_LOCK_RETRY_MS));
    try {
      return await lockfile.lock(this.root, {
        lockfilePath: join(this.root, LOCK_DIRECTORY),
        stale: this.options.staleMs,
        retries: { retries, factor: 1, minTimeout: FILE_LOCK_RETRY_MS, maxTimeout: FILE_LOCK_RETRY_MS },
        onCompromised: (err) => {
          console.error(`[RepositoryLock] File lock on ${this.root} was compromised:`, err);
        },
      });
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ELOCKED') {
        throw new LockTimeoutError('write', this.options.timeoutMs);
      }
      throw err;
    }
  }
}
