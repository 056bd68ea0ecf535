import * as fs from 'fs/promises';
import * as path from 'path';
import { MediaLedgerError } from '../../types';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { LedgerLock } from '../ledger_host.types';

export type FsLedgerLockOptions = {
  /** Attempts before giving up (default: 50) */
  maxRetries?: number;
  /** Base delay between attempts in ms; each wait adds up to the same again as jitter (default: 100) */
  retryDelayMs?: number;
  logger?: Logger;
};

/**
 * Thrown when the lock file stays held for every attempt. A process that
 * crashed while holding the lock leaves the file behind; removing it by hand
 * releases the ledger.
 */
export class LedgerLockTimeoutError extends MediaLedgerError {
  constructor(public readonly lockPath: string, public readonly attempts: number) {
    super(`Ledger is locked by another process: could not create ${lockPath} after ${attempts} attempts`, 'LEDGER_LOCKED');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Exclusive lock over one ledger directory, shared by every process that
 * opens it. Acquiring creates the lock file with O_CREAT | O_EXCL ('wx');
 * releasing closes and removes it. Work inside one instance is queued, so the
 * lock is never requested twice by the same host.
 */
export class FsLedgerLock implements LedgerLock {
  private queue: Promise<void> = Promise.resolve();
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(
    readonly lockPath: string,
    options: FsLedgerLockOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? 50;
    this.retryDelayMs = options.retryDelayMs ?? 100;
    this.logger = options.logger ?? createLogger('[FsLedgerLock] ');
  }

  withLock<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const handle = await this.acquire();
      try {
        return await work();
      } finally {
        await this.release(handle);
      }
    });
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async acquire(): Promise<fs.FileHandle> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    for (let attempt = 1; ; attempt++) {
      try {
        return await fs.open(this.lockPath, 'wx');
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'EEXIST') throw error;
        if (attempt >= this.maxRetries) {
          throw new LedgerLockTimeoutError(this.lockPath, attempt);
        }
      }
      if (attempt === 1) {
        this.logger.debug(`Waiting for ${this.lockPath}`);
      }
      const delay = this.retryDelayMs * (1 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  private async release(handle: fs.FileHandle): Promise<void> {
    try {
      await handle.close();
    } finally {
      await fs.unlink(this.lockPath);
    }
  }
}
