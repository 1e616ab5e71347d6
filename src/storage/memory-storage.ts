import { KeyExistsError } from '../errors.js';
import { describeQuery } from '../query/builder.js';
import { matches } from '../query/matcher.js';
import type { Query } from '../query/types.js';
import { QuerySet } from '../queryset/queryset.js';
import { MaterializedSource } from '../queryset/source.js';
import type { PrimaryKey, RawRecord } from '../types.js';
import { BaseStorage } from './base.js';
import { encodeValue } from './codec.js';

/**
 * Map-backed storage evaluated with the in-process matcher. Records are
 * copied on the way in and out, so callers never share state with the store.
 */
export class MemoryStorage<T = RawRecord> extends BaseStorage<T> {
  protected readonly backend: string = 'memory';
  protected readonly store = new Map<PrimaryKey, RawRecord>();

  async get(key: PrimaryKey): Promise<RawRecord | null> {
    const record = this.store.get(key);
    return record === undefined ? null : structuredClone(record);
  }

  async insert(key: PrimaryKey, value: RawRecord): Promise<void> {
    if (this.store.has(key)) {
      throw new KeyExistsError(key, this.collection);
    }
    this.store.set(key, structuredClone(this.withPrimaryKey(key, value)));
    await this.flush();
  }

  async update(query: Query | null, data: RawRecord): Promise<number> {
    const fields = this.updateFields(data);
    const matched = [...this.store.values()].filter((record) => matches(record, query));
    for (const record of matched) {
      Object.assign(record, structuredClone(fields));
    }
    if (matched.length > 0) await this.flush();
    return matched.length;
  }

  async remove(query: Query | null): Promise<number> {
    const doomed = [...this.store.entries()]
      .filter(([, record]) => matches(record, query))
      .map(([key]) => key);
    for (const key of doomed) {
      this.store.delete(key);
    }
    if (doomed.length > 0) await this.flush();
    return doomed.length;
  }

  find(query: Query | null = null): QuerySet<T> {
    this.logger.debug({ backend: this.backend, query: describeQuery(query) }, 'find');
    const source = new MaterializedSource(async () =>
      [...this.store.values()].filter((record) => matches(record, query)).map((record) => structuredClone(record)),
    );
    return new QuerySet(this.schema, source);
  }

  /** Nothing to persist for a purely in-memory store. */
  async flush(): Promise<void> {}

  override toString(): string {
    return `<${this.constructor.name}: '${this.collection}' ${encodeValue([...this.store.entries()])}>`;
  }
}
