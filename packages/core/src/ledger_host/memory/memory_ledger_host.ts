import { createMemoryLedgerStores } from '../../record_store/memory';
import type { MemoryLedgerStores } from '../../record_store/memory';
import { MediaRegistry } from '../../media_registry';
import { EventBus } from '../../event_bus';
import { LedgerHost } from '../ledger_host';
import { MemoryHeightSource } from '../height_source';
import type { LedgerHostOptions, WiredLedgerHost } from '../fs/fs_ledger_host';

export type MemoryLedgerHost = WiredLedgerHost & {
  stores: MemoryLedgerStores;
  heights: MemoryHeightSource;
};

/**
 * Wires a LedgerHost over fresh in-memory stores. Heights start at 0, so the
 * first call runs at height 1.
 */
export function createMemoryLedgerHost(options: LedgerHostOptions = {}): MemoryLedgerHost {
  const stores = createMemoryLedgerStores();
  const heights = new MemoryHeightSource();
  const eventBus = options.eventBus ?? new EventBus({ logger: options.logger });
  const registry = new MediaRegistry({ stores, eventBus, logger: options.logger });
  const host = new LedgerHost({ registry, heights, logger: options.logger });
  return { host, registry, eventBus, stores, heights };
}
