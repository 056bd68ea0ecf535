import { createMemoryLedgerHost } from './memory_ledger_host';
import type { MediaArchivedEvent } from '../../event_bus';

describe('createMemoryLedgerHost', () => {
  it('[EARS-1] should run the first call at height 1 with fresh stores', async () => {
    const { host, stores } = createMemoryLedgerHost();

    const result = await host.as('human:alice').archiveNewMedia({
      name: 'clip.mp4',
      byteCount: 100,
      summary: 'Intro',
      labels: ['video'],
    });

    expect(result).toEqual({ ok: true, value: 1 });
    expect((await host.getMediaRecord(1))?.createdAt).toBe(1);
    expect(stores.media.size()).toBe(1);
    expect(stores.access.size()).toBe(1);
  });

  it('[EARS-2] should publish registry events on the returned bus', async () => {
    const { host, eventBus } = createMemoryLedgerHost();
    const received: MediaArchivedEvent[] = [];
    eventBus.subscribe('media.archived', (event) => {
      received.push(event);
    });

    await host.as('human:alice').archiveNewMedia({
      name: 'clip.mp4',
      byteCount: 100,
      summary: 'Intro',
      labels: ['video'],
    });
    await eventBus.waitForIdle();

    expect(received.map((event) => event.payload)).toEqual([
      { recordId: 1, owner: 'human:alice', createdAt: 1 },
    ]);
  });
});
