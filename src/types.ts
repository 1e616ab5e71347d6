import type { Query } from './query/types.js';
import type { QuerySet } from './queryset/queryset.js';

export type PrimaryKey = string | number;

/** Attribute map as it sits in a backend. */
export type RawRecord = Record<string, unknown>;

/**
 * What the record layer hands the core: the primary-key attribute and a way
 * to hydrate a full record from its key.
 */
export interface RecordSchema<T = RawRecord> {
  readonly primaryName: string;
  load(key: PrimaryKey): Promise<T>;
}

export interface Storage<T = RawRecord> {
  readonly collection: string;
  get(key: PrimaryKey): Promise<RawRecord | null>;
  insert(key: PrimaryKey, value: RawRecord): Promise<void>;
  update(query: Query | null, data: RawRecord): Promise<number>;
  remove(query: Query | null): Promise<number>;
  find(query?: Query | null): QuerySet<T>;
  findOne(query?: Query | null): Promise<RawRecord>;
  flush(): Promise<void>;
  toString(): string;
}

export function isPrimaryKey(value: unknown): value is PrimaryKey {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}
