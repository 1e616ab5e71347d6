import { Client } from '@elastic/elasticsearch';
import { Redis } from 'ioredis';
import { MongoClient } from 'mongodb';
import type { Backend, StorageConfig } from './config.js';
import { childLogger, configureLogger } from './logger.js';
import type { Logger } from './logger.js';
import { assertNever } from './query/types.js';
import { CollectionSchema } from './schema.js';
import { DocumentStorage } from './storage/document-storage.js';
import { FileStorage } from './storage/file-storage.js';
import { MemoryStorage } from './storage/memory-storage.js';
import { RedisStorage } from './storage/redis-storage.js';
import { SearchStorage } from './storage/search-storage.js';
import type { RawRecord, RecordSchema, Storage } from './types.js';

export interface OpenStorage<T = RawRecord> {
  storage: Storage<T>;
  /** Releases the backend client; a no-op for the in-process backends. */
  close(): Promise<void>;
}

const noop = async (): Promise<void> => {};

/**
 * Builds the configured backend's client and adapter for one collection. A
 * `CollectionSchema` is bound to the new storage.
 */
export async function createStorage<T = RawRecord>(
  config: StorageConfig,
  collection: string,
  schema: RecordSchema<T>,
): Promise<OpenStorage<T>> {
  configureLogger({ level: config.logLevel });
  const logger = childLogger({ collection, backend: config.backend });
  const opened = await open(config, collection, schema, logger);
  if (schema instanceof CollectionSchema) {
    schema.bind(opened.storage);
  }
  logger.info('storage opened');
  return opened;
}

async function open<T>(
  config: StorageConfig,
  collection: string,
  schema: RecordSchema<T>,
  logger: Logger,
): Promise<OpenStorage<T>> {
  const backend: Backend = config.backend;
  switch (backend) {
    case 'memory':
      return { storage: new MemoryStorage({ collection, schema, logger }), close: noop };
    case 'file': {
      const storage = await FileStorage.open({ collection, schema, logger, ...config.file });
      return { storage, close: () => storage.flush() };
    }
    case 'redis': {
      const client = new Redis(config.redis.url, { lazyConnect: true });
      client.on('error', (err: Error) => logger.warn({ err }, 'redis client error'));
      try {
        await client.connect();
      } catch (err) {
        // Stops the reconnect loop the failed attempt leaves running.
        client.disconnect();
        throw err;
      }
      return {
        storage: new RedisStorage({ collection, schema, logger, client }),
        close: async () => {
          await client.quit();
        },
      };
    }
    case 'mongo': {
      const client = new MongoClient(config.mongo.url);
      try {
        await client.connect();
      } catch (err) {
        await client.close();
        throw err;
      }
      const handle = client.db(config.mongo.database).collection(collection);
      return {
        storage: new DocumentStorage({ collection, schema, logger, client: handle }),
        close: () => client.close(),
      };
    }
    case 'elasticsearch': {
      const client = new Client({ node: config.elasticsearch.node });
      const storage = new SearchStorage({ collection, schema, logger, client });
      try {
        await storage.ensureIndex();
      } catch (err) {
        await client.close();
        throw err;
      }
      return { storage, close: () => client.close() };
    }
    default:
      return assertNever(backend, 'Unknown backend');
  }
}
