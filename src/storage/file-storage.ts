import { readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { isPrimaryKey } from '../types.js';
import type { PrimaryKey, RawRecord } from '../types.js';
import type { StorageOptions } from './base.js';
import { decodeValue, encodeValue } from './codec.js';
import { MemoryStorage } from './memory-storage.js';

export interface FileStorageOptions<T = RawRecord> extends StorageOptions<T> {
  /** Directory holding the collection file; defaults to the working directory. */
  directory?: string;
  prefix?: string;
  ext?: string;
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEntry(value: unknown): value is [PrimaryKey, RawRecord] {
  return Array.isArray(value) && value.length === 2 && isPrimaryKey(value[0]) && isRecord(value[1]);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * MemoryStorage persisted to `<directory>/<prefix><collection>.<ext>`. The
 * whole map is rewritten after every mutation: written to a sibling temp
 * file, then renamed over the original.
 */
export class FileStorage<T = RawRecord> extends MemoryStorage<T> {
  protected override readonly backend = 'file';
  readonly filename: string;

  // Use open(): a handle that skipped load() would overwrite the file.
  protected constructor(options: FileStorageOptions<T>) {
    super(options);
    const prefix = options.prefix ?? 'db_';
    const ext = options.ext ?? 'json';
    this.filename = path.join(options.directory ?? '.', `${prefix}${options.collection}.${ext}`);
  }

  /** Creates the storage and loads its file, if one exists. */
  static async open<T = RawRecord>(options: FileStorageOptions<T>): Promise<FileStorage<T>> {
    const storage = new FileStorage(options);
    await storage.load();
    return storage;
  }

  async load(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.filename, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return;
      throw err;
    }
    const entries = decodeValue(text);
    if (!Array.isArray(entries) || !entries.every(isEntry)) {
      throw new TypeError(`${this.filename} does not hold a ${this.collection} collection`);
    }
    this.store.clear();
    for (const [key, record] of entries) {
      this.store.set(key, record);
    }
    this.logger.debug({ filename: this.filename, records: this.store.size }, 'loaded collection file');
  }

  override async flush(): Promise<void> {
    const temporary = `${this.filename}.tmp`;
    await writeFile(temporary, encodeValue([...this.store.entries()]), 'utf8');
    await rename(temporary, this.filename);
  }
}
