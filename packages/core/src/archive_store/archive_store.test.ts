import { ArchiveStore } from './archive_store';
import { MemoryRecordStore } from '../record_store/memory';
import { SEQUENCE_KEY } from '../record_store';
import type { LedgerStores } from '../record_store';
import type { AccessEntry, CallContext, MediaMetadata, MediaRecord, SequenceState } from '../types';
import {
  InvalidNameError,
  InvalidPrincipalError,
  InvalidSizeError,
  OwnershipViolationError,
  RecordNotFoundError,
} from '../errors';

const alice: CallContext = { caller: 'human:alice', height: 5 };
const bob: CallContext = { caller: 'human:bob', height: 6 };

const metadata: MediaMetadata = {
  name: 'clip.mp4',
  byteCount: 1024,
  summary: 'Opening shot',
  labels: ['video'],
};

describe('ArchiveStore', () => {
  let media: MemoryRecordStore<MediaRecord>;
  let access: MemoryRecordStore<AccessEntry>;
  let sequence: MemoryRecordStore<SequenceState>;
  let archive: ArchiveStore;

  beforeEach(() => {
    media = new MemoryRecordStore<MediaRecord>();
    access = new MemoryRecordStore<AccessEntry>();
    sequence = new MemoryRecordStore<SequenceState>();
    const stores: LedgerStores = { media, access, sequence };
    archive = new ArchiveStore(stores);
  });

  describe('create', () => {
    it('[EARS-A1] should insert the record owned by the caller at the call height', async () => {
      const recordId = await archive.create(metadata, alice);

      expect(recordId).toBe(1);
      expect(await archive.read(1)).toEqual({
        recordId: 1,
        name: 'clip.mp4',
        owner: 'human:alice',
        byteCount: 1024,
        createdAt: 5,
        summary: 'Opening shot',
        labels: ['video'],
      });
      expect(await sequence.get(SEQUENCE_KEY)).toEqual({ totalItems: 1 });
      expect(await access.get('1:human:alice')).toEqual({
        recordId: 1,
        principal: 'human:alice',
        canAccess: true,
      });
    });

    it('[EARS-A2] should validate before drawing an identifier', async () => {
      await expect(archive.create({ ...metadata, byteCount: 0 }, alice))
        .rejects.toBeInstanceOf(InvalidSizeError);

      expect(sequence.size()).toBe(0);
      expect(media.size()).toBe(0);
      expect(access.size()).toBe(0);
    });
  });

  describe('read', () => {
    it('[EARS-B1] should return null for absent or impossible identifiers', async () => {
      expect(await archive.read(1)).toBeNull();
      expect(await archive.read(0)).toBeNull();
      expect(await archive.read(-3)).toBeNull();
      expect(await archive.read(1.5)).toBeNull();
    });
  });

  describe('requireOwned', () => {
    it('[EARS-C1] should check existence before ownership', async () => {
      await expect(archive.requireOwned(9, 'human:bob')).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('[EARS-C2] should reject a caller who is not the owner', async () => {
      await archive.create(metadata, alice);

      await expect(archive.requireOwned(1, 'human:bob')).rejects.toThrow(
        'human:bob is not the owner of media record 1'
      );
    });
  });

  describe('update', () => {
    it('[EARS-D1] should replace the mutable fields only', async () => {
      await archive.create(metadata, alice);

      await archive.update(1, { name: 'cut.mp4', byteCount: 2, summary: 'Cut', labels: ['a', 'b'] }, {
        caller: 'human:alice',
        height: 40,
      });

      expect(await archive.read(1)).toEqual({
        recordId: 1,
        name: 'cut.mp4',
        owner: 'human:alice',
        byteCount: 2,
        createdAt: 5,
        summary: 'Cut',
        labels: ['a', 'b'],
      });
    });

    it('[EARS-D2] should report ownership before validation', async () => {
      await archive.create(metadata, alice);

      await expect(archive.update(1, { ...metadata, name: '' }, bob))
        .rejects.toBeInstanceOf(OwnershipViolationError);
      await expect(archive.update(1, { ...metadata, name: '' }, alice))
        .rejects.toBeInstanceOf(InvalidNameError);
      expect((await archive.read(1))?.name).toBe('clip.mp4');
    });
  });

  describe('transfer', () => {
    it('[EARS-E1] should change only the owner', async () => {
      await archive.create(metadata, alice);

      await archive.transfer(1, 'human:bob', alice);

      expect(await archive.read(1)).toEqual({
        recordId: 1,
        name: 'clip.mp4',
        owner: 'human:bob',
        byteCount: 1024,
        createdAt: 5,
        summary: 'Opening shot',
        labels: ['video'],
      });
      await expect(archive.update(1, metadata, alice)).rejects.toBeInstanceOf(OwnershipViolationError);
      await expect(archive.update(1, metadata, bob)).resolves.toBeUndefined();
    });

    it('[EARS-E2] should allow a transfer to the current owner', async () => {
      await archive.create(metadata, alice);

      await archive.transfer(1, 'human:alice', alice);

      expect((await archive.read(1))?.owner).toBe('human:alice');
    });

    it('[EARS-E3] should reject a malformed new owner', async () => {
      await archive.create(metadata, alice);

      await expect(archive.transfer(1, 'Bob Smith', alice)).rejects.toBeInstanceOf(InvalidPrincipalError);
      expect((await archive.read(1))?.owner).toBe('human:alice');
    });
  });

  describe('delete', () => {
    it('[EARS-F1] should remove the record and its grants', async () => {
      await archive.create(metadata, alice);
      await access.put('1:human:bob', { recordId: 1, principal: 'human:bob', canAccess: true });

      await archive.delete(1, alice);

      expect(await archive.read(1)).toBeNull();
      expect(access.size()).toBe(0);
      expect(await sequence.get(SEQUENCE_KEY)).toEqual({ totalItems: 1 });
    });

    it('[EARS-F2] should never reuse a deleted identifier', async () => {
      await archive.create(metadata, alice);
      await archive.delete(1, alice);

      expect(await archive.create(metadata, alice)).toBe(2);
    });

    it('[EARS-F3] should reject later calls on a deleted record as missing', async () => {
      await archive.create(metadata, alice);
      await archive.delete(1, alice);

      await expect(archive.update(1, metadata, alice)).rejects.toBeInstanceOf(RecordNotFoundError);
      await expect(archive.transfer(1, 'human:bob', alice)).rejects.toBeInstanceOf(RecordNotFoundError);
      await expect(archive.delete(1, alice)).rejects.toBeInstanceOf(RecordNotFoundError);
    });
  });
});
