import type { Redis } from 'ioredis';
import { KeyExistsError } from '../errors.js';
import { describeQuery } from '../query/builder.js';
import { matches } from '../query/matcher.js';
import type { Query } from '../query/types.js';
import { QuerySet } from '../queryset/queryset.js';
import { MaterializedSource } from '../queryset/source.js';
import type { PrimaryKey, RawRecord } from '../types.js';
import { BaseStorage } from './base.js';
import type { StorageOptions } from './base.js';
import { decodeFields, encodeFields } from './codec.js';

export interface RedisStorageOptions<T = RawRecord> extends StorageOptions<T> {
  client: Redis;
}

/**
 * Storage backend for Redis.
 *
 * Each record is a hash at `<collection>:<primary key>` whose fields hold
 * Extended JSON values. The set `<collection>_keys` lists every primary key
 * in the collection. Redis cannot evaluate the query algebra, so `find`
 * walks the key set and filters with the in-process matcher.
 *
 * Multi-key writes are not atomic. Inserts write the hash before indexing
 * it and removals unindex before deleting, so the transient state a reader
 * can see is an unindexed hash, never an index entry without data.
 */
export class RedisStorage<T = RawRecord> extends BaseStorage<T> {
  protected readonly backend = 'redis';
  private readonly client: Redis;
  private readonly keySetName: string;

  constructor(options: RedisStorageOptions<T>) {
    super(options);
    this.client = options.client;
    this.keySetName = `${options.collection}_keys`;
  }

  keyFor(key: PrimaryKey): string {
    return `${this.collection}:${String(key)}`;
  }

  async keySet(): Promise<string[]> {
    return this.client.smembers(this.keySetName);
  }

  async get(key: PrimaryKey): Promise<RawRecord | null> {
    const hash = await this.client.hgetall(this.keyFor(key));
    return Object.keys(hash).length === 0 ? null : decodeFields(hash);
  }

  async insert(key: PrimaryKey, value: RawRecord): Promise<void> {
    const hashKey = this.keyFor(key);
    const record = this.withPrimaryKey(key, value);
    if ((await this.client.exists(hashKey)) > 0) {
      throw new KeyExistsError(key, this.collection);
    }
    await this.client.hset(hashKey, encodeFields(record));
    await this.client.sadd(this.keySetName, String(key));
  }

  async update(query: Query | null, data: RawRecord): Promise<number> {
    const fields = encodeFields(this.updateFields(data));
    const matched = await this.scan(query);
    if (Object.keys(fields).length === 0) return matched.length;
    for (const record of matched) {
      await this.client.hset(this.keyFor(this.keyOf(record)), fields);
    }
    return matched.length;
  }

  async remove(query: Query | null): Promise<number> {
    const matched = await this.scan(query);
    for (const record of matched) {
      const key = this.keyOf(record);
      await this.client.srem(this.keySetName, String(key));
      await this.client.del(this.keyFor(key));
    }
    return matched.length;
  }

  find(query: Query | null = null): QuerySet<T> {
    this.logger.debug({ backend: this.backend, query: describeQuery(query) }, 'find');
    return new QuerySet(this.schema, new MaterializedSource(() => this.scan(query)));
  }

  /** Redis persists each command itself. */
  async flush(): Promise<void> {}

  private async scan(query: Query | null): Promise<RawRecord[]> {
    const members = await this.keySet();
    const matched: RawRecord[] = [];
    for (const member of members) {
      const hash = await this.client.hgetall(`${this.collection}:${member}`);
      if (Object.keys(hash).length === 0) {
        this.logger.warn({ key: member, keySet: this.keySetName }, 'key set references a missing hash');
        continue;
      }
      const record = decodeFields(hash);
      if (matches(record, query)) matched.push(record);
    }
    return matched;
  }
}
