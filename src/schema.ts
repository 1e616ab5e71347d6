import { NoResultsFoundError } from './errors.js';
import type { PrimaryKey, RawRecord, RecordSchema, Storage } from './types.js';

export type StorageReader = Pick<Storage<unknown>, 'collection' | 'get'>;

/**
 * Minimal record layer: records hydrate as the raw attribute map read back
 * through the storage they live in. Storages take their schema at
 * construction, so the schema is bound to its storage afterwards.
 */
export class CollectionSchema implements RecordSchema<RawRecord> {
  private storage: StorageReader | null = null;

  constructor(readonly primaryName: string) {}

  bind(storage: StorageReader): this {
    this.storage = storage;
    return this;
  }

  async load(key: PrimaryKey): Promise<RawRecord> {
    if (this.storage === null) {
      throw new Error(`Schema with primary key "${this.primaryName}" is not bound to a storage`);
    }
    const record = await this.storage.get(key);
    if (record === null) {
      throw new NoResultsFoundError(
        `No record with ${this.primaryName}=${String(key)} in collection "${this.storage.collection}"`,
      );
    }
    return record;
  }
}

/** Schema that hydrates through `hydrate`, e.g. into a model class. */
export function mappedSchema<T>(schema: RecordSchema<RawRecord>, hydrate: (record: RawRecord) => T): RecordSchema<T> {
  return {
    primaryName: schema.primaryName,
    load: async (key) => hydrate(await schema.load(key)),
  };
}
