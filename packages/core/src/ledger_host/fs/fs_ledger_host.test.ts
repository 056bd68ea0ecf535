import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createFsLedgerHost } from './fs_ledger_host';
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

describe('createFsLedgerHost', () => {
  let ledgerRoot: string;
  let ledgerDir: string;

  beforeEach(async () => {
    ledgerRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-ledger-host-'));
    ledgerDir = path.join(ledgerRoot, '.medialedger');
  });

  afterEach(async () => {
    await fs.rm(ledgerRoot, { recursive: true, force: true });
  });

  function openHost() {
    return createFsLedgerHost(ledgerRoot, {
      logger: silentLogger,
      lock: { retryDelayMs: 2, maxRetries: 5000 },
    }).host;
  }

  it('[EARS-1] should issue unique sequential ids to two hosts writing one ledger at once', async () => {
    const first = openHost().as('human:alice');
    const second = openHost().as('human:bob');

    const results = await Promise.all(
      Array.from({ length: 10 }, () => [first.archiveNewMedia(clip), second.archiveNewMedia(clip)]).flat()
    );

    const ids = results.map((result) => (result.ok ? result.value : 0)).sort((a, b) => a - b);
    expect(ids).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
    expect(await openHost().getTotalItems()).toBe(20);
    expect(JSON.parse(await fs.readFile(path.join(ledgerDir, 'host', 'height.json'), 'utf-8')))
      .toEqual({ height: 20 });
    expect(await fs.readdir(path.join(ledgerDir, 'media'))).toHaveLength(20);
    expect(await fs.readdir(ledgerDir)).not.toContain('ledger.lock');
  }, 30000);

  it('[EARS-2] should give every record a distinct creation height across hosts', async () => {
    const first = openHost();
    const second = openHost();

    await Promise.all([
      first.as('human:alice').archiveNewMedia(clip),
      second.as('human:bob').archiveNewMedia(clip),
      first.as('human:alice').archiveNewMedia(clip),
    ]);

    const heights = await Promise.all([1, 2, 3].map(async (id) => (await first.getMediaRecord(id))?.createdAt));
    expect([...heights].sort()).toEqual([1, 2, 3]);
  }, 30000);
});
