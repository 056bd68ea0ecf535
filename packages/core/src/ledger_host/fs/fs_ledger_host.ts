import * as path from 'path';
import { createFsLedgerStores } from '../../record_store/fs';
import { MediaRegistry } from '../../media_registry';
import { EventBus } from '../../event_bus';
import type { IEventStream } from '../../event_bus';
import type { Logger } from '../../logger';
import { LedgerHost } from '../ledger_host';
import { StoredHeightSource } from '../height_source';
import { getLedgerPath } from '../../utils/ledger_discovery';
import { FsLedgerLock } from './fs_ledger_lock';
import type { FsLedgerLockOptions } from './fs_ledger_lock';

export const LOCK_FILE = 'ledger.lock';

export type LedgerHostOptions = {
  eventBus?: IEventStream;
  logger?: Logger;
};

export type FsLedgerHostOptions = LedgerHostOptions & {
  lock?: Omit<FsLedgerLockOptions, 'logger'>;
};

export type WiredLedgerHost = {
  host: LedgerHost;
  registry: MediaRegistry;
  eventBus: IEventStream;
};

/**
 * Wires a LedgerHost over the ledger persisted under `<ledgerRoot>/.medialedger`.
 * Heights are stored beside the records so they keep increasing across runs.
 * Calls hold `.medialedger/ledger.lock`, which serializes every host opened
 * on the same root, across processes.
 */
export function createFsLedgerHost(ledgerRoot: string, options: FsLedgerHostOptions = {}): WiredLedgerHost {
  const { stores, heights } = createFsLedgerStores(ledgerRoot);
  const eventBus = options.eventBus ?? new EventBus({ logger: options.logger });
  const registry = new MediaRegistry({ stores, eventBus, logger: options.logger });
  const lock = new FsLedgerLock(path.join(getLedgerPath(ledgerRoot), LOCK_FILE), {
    ...options.lock,
    logger: options.logger,
  });
  const host = new LedgerHost({
    registry,
    heights: new StoredHeightSource(heights),
    lock,
    logger: options.logger,
  });
  return { host, registry, eventBus };
}
