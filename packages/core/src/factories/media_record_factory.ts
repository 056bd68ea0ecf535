import type {
  AccessEntry,
  Height,
  HeightState,
  MediaMetadata,
  MediaRecord,
  Principal,
  RecordId,
  SequenceState,
} from "../types";
import {
  isAccessEntry,
  isHeightState,
  isMediaRecord,
  isSequenceState,
  validateAccessEntryDetailed,
  validateHeightStateDetailed,
  validateMediaRecordDetailed,
  validateSequenceStateDetailed,
} from "../validation/record_validator";
import { DetailedValidationError } from "../record_schemas/errors";

export type CreateMediaRecordPayload = {
  recordId: RecordId;
  owner: Principal;
  createdAt: Height;
  metadata: MediaMetadata;
};

function checkMediaRecord(record: MediaRecord): MediaRecord {
  const validation = validateMediaRecordDetailed(record);
  if (!validation.isValid) {
    throw new DetailedValidationError('MediaRecord', validation.errors);
  }
  return record;
}

/**
 * Creates a new, fully-formed MediaRecord with validation.
 */
export function createMediaRecord(payload: CreateMediaRecordPayload): MediaRecord {
  const { metadata } = payload;
  return checkMediaRecord({
    recordId: payload.recordId,
    name: metadata.name,
    owner: payload.owner,
    byteCount: metadata.byteCount,
    createdAt: payload.createdAt,
    summary: metadata.summary,
    labels: [...metadata.labels],
  });
}

/**
 * Returns a copy of the record with the four mutable fields replaced.
 * recordId, owner and createdAt are carried over unchanged.
 */
export function withMetadata(record: MediaRecord, metadata: MediaMetadata): MediaRecord {
  return checkMediaRecord({
    ...record,
    name: metadata.name,
    byteCount: metadata.byteCount,
    summary: metadata.summary,
    labels: [...metadata.labels],
  });
}

export function withOwner(record: MediaRecord, owner: Principal): MediaRecord {
  return checkMediaRecord({ ...record, labels: [...record.labels], owner });
}

export function createAccessEntry(recordId: RecordId, principal: Principal): AccessEntry {
  return { recordId, principal, canAccess: true };
}

// ─────────────────────────────────────────────────────────
// Loaders for values read back from a RecordStore
// ─────────────────────────────────────────────────────────

export function loadMediaRecord(data: unknown): MediaRecord {
  if (isMediaRecord(data)) return data;
  throw new DetailedValidationError('MediaRecord', validateMediaRecordDetailed(data).errors);
}

export function loadAccessEntry(data: unknown): AccessEntry {
  if (isAccessEntry(data)) return data;
  throw new DetailedValidationError('AccessEntry', validateAccessEntryDetailed(data).errors);
}

export function loadSequenceState(data: unknown): SequenceState {
  if (isSequenceState(data)) return data;
  throw new DetailedValidationError('SequenceState', validateSequenceStateDetailed(data).errors);
}

export function loadHeightState(data: unknown): HeightState {
  if (isHeightState(data)) return data;
  throw new DetailedValidationError('HeightState', validateHeightStateDetailed(data).errors);
}
