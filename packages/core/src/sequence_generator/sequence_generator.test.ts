import { SequenceGenerator } from './sequence_generator';
import { MemoryRecordStore } from '../record_store/memory';
import { SEQUENCE_KEY } from '../record_store';
import type { SequenceState } from '../types';

describe('SequenceGenerator', () => {
  let store: MemoryRecordStore<SequenceState>;
  let sequence: SequenceGenerator;

  beforeEach(() => {
    store = new MemoryRecordStore<SequenceState>();
    sequence = new SequenceGenerator(store);
  });

  it('[EARS-1] should start at zero on an empty store', async () => {
    expect(await sequence.current()).toBe(0);
    expect(store.size()).toBe(0);
  });

  it('[EARS-2] should return prior + 1 without gaps', async () => {
    expect(await sequence.next()).toBe(1);
    expect(await sequence.next()).toBe(2);
    expect(await sequence.next()).toBe(3);
    expect(await store.get(SEQUENCE_KEY)).toEqual({ totalItems: 3 });
  });

  it('[EARS-3] should continue from a persisted counter', async () => {
    await store.put(SEQUENCE_KEY, { totalItems: 41 });

    expect(await sequence.next()).toBe(42);
  });

  it('[EARS-4] should refuse to pass the largest safe integer', async () => {
    await store.put(SEQUENCE_KEY, { totalItems: Number.MAX_SAFE_INTEGER });

    await expect(sequence.next()).rejects.toThrow('Record identifier sequence exhausted');
    expect(await sequence.current()).toBe(Number.MAX_SAFE_INTEGER);
  });
});
