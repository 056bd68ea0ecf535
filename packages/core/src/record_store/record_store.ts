/**
 * IdEncoder for transforming keys to storage-safe strings.
 * Useful for characters not allowed in filesystem (e.g., `:` on Windows)
 */
export interface IdEncoder {
  /** Transform key to storage-safe string */
  encode: (id: string) => string;
  /** Recover original key from encoded string */
  decode: (encoded: string) => string;
}

/**
 * Default encoder: `:` → `_` (for keys like "1:human:alice")
 * Reversible because principals cannot contain `_` (see principal_validator.ts)
 */
export const DEFAULT_ID_ENCODER: IdEncoder = {
  encode: (id: string) => id.replace(/:/g, '_'),
  decode: (encoded: string) => encoded.replace(/_/g, ':'),
};

/**
 * RecordStore<V> - Generic interface for keyed value persistence
 *
 * Abstracts CRUD operations without assuming storage backend.
 * Each implementation decides how to persist (fs, memory).
 *
 * @typeParam V - Value type (the record being stored)
 */
export interface RecordStore<V> {
  /**
   * Gets a value by key
   * @returns The value or null if it doesn't exist
   */
  get(id: string): Promise<V | null>;

  /**
   * Persists a value under a key
   */
  put(id: string, value: V): Promise<void>;

  /**
   * Persists multiple values in a single operation.
   */
  putMany(entries: Array<{ id: string; value: V }>): Promise<void>;

  /**
   * Deletes a value. Deleting a missing key is not an error.
   */
  delete(id: string): Promise<void>;

  /**
   * Lists all keys
   */
  list(): Promise<string[]>;

  /**
   * Checks if a key exists
   */
  exists(id: string): Promise<boolean>;
}
