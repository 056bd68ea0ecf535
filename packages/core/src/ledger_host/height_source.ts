import type { RecordStore } from '../record_store';
import type { Height, HeightState } from '../types';
import type { HeightSource } from './ledger_host.types';

export const HEIGHT_KEY = 'height';

/**
 * In-process counter. Starts after `start`.
 */
export class MemoryHeightSource implements HeightSource {
  private height: Height;

  constructor(start: Height = 0) {
    this.height = start;
  }

  async current(): Promise<Height> {
    return this.height;
  }

  async next(): Promise<Height> {
    this.height += 1;
    return this.height;
  }
}

/**
 * Height counter persisted in a RecordStore, so heights keep increasing
 * across runs. next() is queued within one instance; processes sharing the
 * store rely on the host's LedgerLock.
 */
export class StoredHeightSource implements HeightSource {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly store: RecordStore<HeightState>) {}

  async current(): Promise<Height> {
    const state = await this.store.get(HEIGHT_KEY);
    return state ? state.height : 0;
  }

  next(): Promise<Height> {
    const run = this.queue.then(async () => {
      const height = (await this.current()) + 1;
      await this.store.put(HEIGHT_KEY, { height });
      return height;
    });
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
