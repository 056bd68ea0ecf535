import {
  validateMediaRecordDetailed,
  isMediaRecord,
  isAccessEntry,
  isSequenceState,
  validateSequenceStateDetailed,
  isHeightState,
} from './record_validator';
import { SchemaValidationCache } from '../record_schemas/schema_cache';
import type { MediaRecord } from '../types';

describe('Record Schema Validators', () => {
  const record: MediaRecord = {
    recordId: 1,
    name: 'clip.mp4',
    owner: 'human:alice',
    byteCount: 1024,
    createdAt: 3,
    summary: 'demo',
    labels: ['video'],
  };

  afterEach(() => {
    SchemaValidationCache.clearCache();
  });

  it('[EARS-1] should accept a well-formed MediaRecord', () => {
    expect(validateMediaRecordDetailed(record)).toEqual({ isValid: true, errors: [] });
    expect(isMediaRecord(record)).toBe(true);
  });

  it('[EARS-2] should report the offending field for an out-of-bounds value', () => {
    const result = validateMediaRecordDetailed({ ...record, byteCount: 0 });

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      expect.objectContaining({ field: 'byteCount' }),
    ]);
  });

  it('[EARS-3] should report missing properties by name', () => {
    const { owner: _owner, ...withoutOwner } = record;
    const result = validateMediaRecordDetailed(withoutOwner);

    expect(result.isValid).toBe(false);
    expect(result.errors[0]?.field).toBe('owner');
  });

  it('[EARS-4] should reject unknown properties', () => {
    expect(isMediaRecord({ ...record, archived: true })).toBe(false);
  });

  it('[EARS-5] should validate access entries, sequence and height state', () => {
    expect(isAccessEntry({ recordId: 1, principal: 'human:alice', canAccess: true })).toBe(true);
    expect(isAccessEntry({ recordId: 0, principal: 'human:alice', canAccess: true })).toBe(false);
    expect(isSequenceState({ totalItems: 0 })).toBe(true);
    expect(validateSequenceStateDetailed({ totalItems: -1 }).isValid).toBe(false);
    expect(isHeightState({ height: 12 })).toBe(true);
  });

  it('[EARS-6] should reuse compiled validators', () => {
    isMediaRecord(record);
    isMediaRecord(record);
    isSequenceState({ totalItems: 1 });

    expect(SchemaValidationCache.getCacheStats()).toEqual({ cachedSchemas: 2 });
  });
});
