import type { Height, Principal, RecordId } from './common.types';

/**
 * The caller-controlled fields of a media record.
 * Accepted by create and update; every field is replaced as a whole.
 */
export type MediaMetadata = {
  name: string;
  byteCount: number;
  summary: string;
  labels: string[];
};

/**
 * A stored media-metadata entry.
 */
export type MediaRecord = MediaMetadata & {
  recordId: RecordId;
  owner: Principal;
  createdAt: Height;
};

/**
 * A boolean grant associating a principal with a record.
 */
export type AccessEntry = {
  recordId: RecordId;
  principal: Principal;
  canAccess: boolean;
};

/**
 * Persisted state of the record identifier sequence.
 */
export type SequenceState = {
  totalItems: number;
};

/**
 * Persisted state of a stored height source.
 */
export type HeightState = {
  height: Height;
};
