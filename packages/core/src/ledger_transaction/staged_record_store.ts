import type { RecordStore } from '../record_store';

type StagedWrite<V> = { kind: 'put'; value: V } | { kind: 'delete' };

/**
 * StagedRecordStore<V> - write-set overlay over a backing RecordStore<V>
 *
 * Reads see staged writes first. Nothing reaches the backing store until
 * commit(), which replays the writes in the order they were staged.
 */
export class StagedRecordStore<V> implements RecordStore<V> {
  private readonly writes = new Map<string, StagedWrite<V>>();

  constructor(private readonly backing: RecordStore<V>) {}

  async get(id: string): Promise<V | null> {
    const staged = this.writes.get(id);
    if (!staged) return this.backing.get(id);
    return staged.kind === 'put' ? structuredClone(staged.value) : null;
  }

  async put(id: string, value: V): Promise<void> {
    // Re-inserting keeps the write order equal to the order of the last touch
    this.writes.delete(id);
    this.writes.set(id, { kind: 'put', value: structuredClone(value) });
  }

  async putMany(entries: Array<{ id: string; value: V }>): Promise<void> {
    for (const { id, value } of entries) {
      await this.put(id, value);
    }
  }

  async delete(id: string): Promise<void> {
    this.writes.delete(id);
    this.writes.set(id, { kind: 'delete' });
  }

  async list(): Promise<string[]> {
    const ids = new Set(await this.backing.list());
    for (const [id, write] of this.writes) {
      if (write.kind === 'put') {
        ids.add(id);
      } else {
        ids.delete(id);
      }
    }
    return Array.from(ids);
  }

  async exists(id: string): Promise<boolean> {
    const staged = this.writes.get(id);
    if (!staged) return this.backing.exists(id);
    return staged.kind === 'put';
  }

  /** Number of staged writes */
  pendingWrites(): number {
    return this.writes.size;
  }

  async commit(): Promise<void> {
    for (const [id, write] of this.writes) {
      if (write.kind === 'put') {
        await this.backing.put(id, write.value);
      } else {
        await this.backing.delete(id);
      }
    }
    this.writes.clear();
  }

  discard(): void {
    this.writes.clear();
  }
}
