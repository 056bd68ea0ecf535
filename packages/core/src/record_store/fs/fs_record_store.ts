import * as fs from 'fs/promises';
import * as path from 'path';
import type { IdEncoder, RecordStore } from '../record_store';
import { writeJsonFile } from '../../utils/json_file';

export { DEFAULT_ID_ENCODER } from '../record_store';
export type { IdEncoder } from '../record_store';

/**
 * Options for FsRecordStore
 */
export interface FsRecordStoreOptions<T> {
  /** Base directory for files, created on the first write */
  basePath: string;

  /**
   * Validates parsed file content and returns it typed.
   * Throws (e.g. DetailedValidationError) when the file does not hold a valid T.
   */
  load: (data: unknown) => T;

  /** ID encoder for filesystem-safe filenames (default: undefined = no encoding) */
  idEncoder?: IdEncoder;
}

const EXTENSION = '.json';

/**
 * Validates that an ID does not contain path traversal.
 * Blocks: `..`, `/`, `\`
 * Allows: single `.` (e.g., "human:alice.v2")
 */
function validateId(id: string): void {
  if (!id || typeof id !== 'string') {
    throw new Error('ID must be a non-empty string');
  }
  if (id.includes('..') || /[\/\\]/.test(id)) {
    throw new Error(`Invalid ID: "${id}". IDs cannot contain /, \\, or ..`);
  }
}

/**
 * FsRecordStore<T> - Filesystem implementation of RecordStore<T>
 *
 * Persists values as `<id>.json` files on disk. Writes go to a uniquely named
 * temp file first and are renamed into place, so a reader never sees a
 * half-written value.
 *
 * @example
 * const store = new FsRecordStore<MediaRecord>({
 *   basePath: '.medialedger/media',
 *   load: loadMediaRecord,
 * });
 *
 * await store.put('1', record);
 * const record = await store.get('1');
 */
export class FsRecordStore<T> implements RecordStore<T> {
  private readonly basePath: string;
  private readonly load: (data: unknown) => T;
  private readonly idEncoder: IdEncoder | undefined;

  constructor(options: FsRecordStoreOptions<T>) {
    this.basePath = options.basePath;
    this.load = options.load;
    this.idEncoder = options.idEncoder;
  }

  private getFilePath(id: string): string {
    validateId(id);
    const fileId = this.idEncoder ? this.idEncoder.encode(id) : id;
    return path.join(this.basePath, `${fileId}${EXTENSION}`);
  }

  async get(id: string): Promise<T | null> {
    const filePath = this.getFilePath(id);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    return this.load(JSON.parse(content));
  }

  async put(id: string, value: T): Promise<void> {
    await writeJsonFile(this.getFilePath(id), value);
  }

  async putMany(entries: Array<{ id: string; value: T }>): Promise<void> {
    for (const { id, value } of entries) {
      await this.put(id, value);
    }
  }

  async delete(id: string): Promise<void> {
    const filePath = this.getFilePath(id);
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }

  async list(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.basePath);
      const ids = files
        .filter((f) => f.endsWith(EXTENSION))
        .map((f) => f.slice(0, -EXTENSION.length));
      const encoder = this.idEncoder;
      return encoder ? ids.map((id) => encoder.decode(id)) : ids;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  async exists(id: string): Promise<boolean> {
    const filePath = this.getFilePath(id);
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
