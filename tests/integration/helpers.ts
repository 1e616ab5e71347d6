import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { CollectionSchema } from '../../src/schema.js';
import { DocumentStorage } from '../../src/storage/document-storage.js';
import { FileStorage } from '../../src/storage/file-storage.js';
import { MemoryStorage } from '../../src/storage/memory-storage.js';
import { RedisStorage } from '../../src/storage/redis-storage.js';
import { SearchStorage } from '../../src/storage/search-storage.js';
import type { RawRecord, Storage } from '../../src/types.js';
import { createFakeElasticsearch } from './fake-elasticsearch.js';
import { createFakeCollection } from './fake-mongo.js';
import { createFakeRedis } from './fake-redis.js';

export const BACKEND_NAMES = ['memory', 'file', 'redis', 'search', 'document'] as const;
export type BackendName = (typeof BACKEND_NAMES)[number];

export interface Harness {
  storage: Storage;
  schema: CollectionSchema;
  cleanup(): Promise<void>;
}

const noCleanup = async (): Promise<void> => {};

export async function openHarness(backend: BackendName, collection: string, primaryName = 'id'): Promise<Harness> {
  const schema = new CollectionSchema(primaryName);
  switch (backend) {
    case 'memory': {
      const storage = new MemoryStorage({ collection, schema });
      return { storage, schema: schema.bind(storage), cleanup: noCleanup };
    }
    case 'file': {
      const directory = await mkdtemp(path.join(tmpdir(), 'polyodm-'));
      const storage = await FileStorage.open({ collection, schema, directory });
      return {
        storage,
        schema: schema.bind(storage),
        cleanup: () => rm(directory, { recursive: true, force: true }),
      };
    }
    case 'redis': {
      const { client } = createFakeRedis();
      const storage = new RedisStorage({ collection, schema, client });
      return { storage, schema: schema.bind(storage), cleanup: noCleanup };
    }
    case 'search': {
      const { client } = createFakeElasticsearch();
      const storage = new SearchStorage({ collection, schema, client });
      return { storage, schema: schema.bind(storage), cleanup: noCleanup };
    }
    case 'document': {
      const { client } = createFakeCollection(collection);
      const storage = new DocumentStorage({ schema, client });
      return { storage, schema: schema.bind(storage), cleanup: noCleanup };
    }
  }
}

export async function seed(storage: Storage, records: readonly RawRecord[], primaryName = 'id'): Promise<void> {
  for (const record of records) {
    const key = record[primaryName];
    if (typeof key !== 'string' && typeof key !== 'number') {
      throw new Error(`fixture record has no ${primaryName}`);
    }
    await storage.insert(key, record);
  }
}
