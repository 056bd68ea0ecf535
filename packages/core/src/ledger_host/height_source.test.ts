import { HEIGHT_KEY, MemoryHeightSource, StoredHeightSource } from './height_source';
import { MemoryRecordStore } from '../record_store/memory';
import type { HeightState } from '../types';

describe('MemoryHeightSource', () => {
  it('[EARS-1] should issue strictly increasing heights from the start value', async () => {
    const heights = new MemoryHeightSource(10);

    expect(await heights.current()).toBe(10);
    expect(await heights.next()).toBe(11);
    expect(await heights.next()).toBe(12);
  });
});

describe('StoredHeightSource', () => {
  let store: MemoryRecordStore<HeightState>;

  beforeEach(() => {
    store = new MemoryRecordStore<HeightState>();
  });

  it('[EARS-2] should persist the last issued height', async () => {
    const heights = new StoredHeightSource(store);

    expect(await heights.current()).toBe(0);
    expect(await heights.next()).toBe(1);
    expect(await store.get(HEIGHT_KEY)).toEqual({ height: 1 });
  });

  it('[EARS-3] should continue from a height written by another instance', async () => {
    await new StoredHeightSource(store).next();
    await new StoredHeightSource(store).next();

    expect(await new StoredHeightSource(store).next()).toBe(3);
  });

  it('[EARS-4] should not hand out the same height to concurrent calls', async () => {
    const heights = new StoredHeightSource(store);

    const issued = await Promise.all([heights.next(), heights.next(), heights.next()]);

    expect(issued).toEqual([1, 2, 3]);
  });
});
