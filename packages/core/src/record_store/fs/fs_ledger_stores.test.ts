import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createFsLedgerStores } from './fs_ledger_stores';
import { MediaRegistry } from '../../media_registry';
import { LedgerHost, StoredHeightSource } from '../../ledger_host';
import { EventBus } from '../../event_bus';
import { DetailedValidationError } from '../../record_schemas/errors';
import type { Logger } from '../../logger';
import type { MediaMetadata } from '../../types';

const clip: MediaMetadata = {
  name: 'clip.mp4',
  byteCount: 512,
  summary: 'Opening shot',
  labels: ['video'],
};

const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  setLevel: () => undefined,
};

function openHost(ledgerRoot: string): LedgerHost {
  const { stores, heights } = createFsLedgerStores(ledgerRoot);
  const registry = new MediaRegistry({ stores, eventBus: new EventBus({ logger: silentLogger }), logger: silentLogger });
  return new LedgerHost({ registry, heights: new StoredHeightSource(heights), logger: silentLogger });
}

describe('createFsLedgerStores', () => {
  let ledgerRoot: string;
  let ledgerDir: string;

  beforeEach(async () => {
    ledgerRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-ledger-'));
    ledgerDir = path.join(ledgerRoot, '.medialedger');
  });

  afterEach(async () => {
    await fs.rm(ledgerRoot, { recursive: true, force: true });
  });

  it('[EARS-1] should lay out ledger state under .medialedger', async () => {
    const host = openHost(ledgerRoot);

    await host.as('human:alice').archiveNewMedia(clip);

    expect(await fs.readdir(path.join(ledgerDir, 'media'))).toEqual(['1.json']);
    expect(await fs.readdir(path.join(ledgerDir, 'access'))).toEqual(['1_human_alice.json']);
    expect(JSON.parse(await fs.readFile(path.join(ledgerDir, 'sequence', 'total_items.json'), 'utf-8')))
      .toEqual({ totalItems: 1 });
    expect(JSON.parse(await fs.readFile(path.join(ledgerDir, 'host', 'height.json'), 'utf-8')))
      .toEqual({ height: 1 });
  });

  it('[EARS-2] should keep state and heights across reopened hosts', async () => {
    await openHost(ledgerRoot).as('human:alice').archiveNewMedia(clip);

    const reopened = openHost(ledgerRoot);
    const result = await reopened.as('human:alice').archiveNewMedia(clip);

    expect(result).toEqual({ ok: true, value: 2 });
    expect((await reopened.getMediaRecord(2))?.createdAt).toBe(2);
    expect(await reopened.checkAccess(1, 'human:alice')).toBe(true);
  });

  it('[EARS-3] should reject a stored record that fails its schema', async () => {
    const host = openHost(ledgerRoot);
    await host.as('human:alice').archiveNewMedia(clip);
    const stored = await host.getMediaRecord(1);
    await fs.writeFile(
      path.join(ledgerDir, 'media', '1.json'),
      JSON.stringify({ ...stored, byteCount: -5 }),
      'utf-8'
    );

    await expect(openHost(ledgerRoot).getMediaRecord(1)).rejects.toBeInstanceOf(DetailedValidationError);
  });

  it('[EARS-4] should propagate corrupted state out of a mutating call', async () => {
    await openHost(ledgerRoot).as('human:alice').archiveNewMedia(clip);
    await fs.writeFile(path.join(ledgerDir, 'sequence', 'total_items.json'), '{"totalItems":"x"}', 'utf-8');

    await expect(openHost(ledgerRoot).as('human:alice').archiveNewMedia(clip))
      .rejects.toBeInstanceOf(DetailedValidationError);
    expect(await fs.readdir(path.join(ledgerDir, 'media'))).toEqual(['1.json']);
  });
});
