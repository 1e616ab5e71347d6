import { MultipleResultsFoundError, NoResultsFoundError, PrimaryKeyError } from '../errors.js';
import { childLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { QuerySet } from '../queryset/queryset.js';
import type { Query } from '../query/types.js';
import { isPrimaryKey } from '../types.js';
import type { PrimaryKey, RawRecord, RecordSchema, Storage } from '../types.js';

export interface StorageOptions<T = RawRecord> {
  collection: string;
  schema: RecordSchema<T>;
  logger?: Logger;
}

/**
 * Shared plumbing for the adapters: primary-key injection, the default
 * `findOne` cardinality check, logging.
 */
export abstract class BaseStorage<T = RawRecord> implements Storage<T> {
  readonly collection: string;
  readonly schema: RecordSchema<T>;
  protected readonly logger: Logger;
  protected abstract readonly backend: string;

  constructor(options: StorageOptions<T>) {
    this.collection = options.collection;
    this.schema = options.schema;
    this.logger = options.logger ?? childLogger({ collection: options.collection });
  }

  abstract get(key: PrimaryKey): Promise<RawRecord | null>;
  abstract insert(key: PrimaryKey, value: RawRecord): Promise<void>;
  abstract update(query: Query | null, data: RawRecord): Promise<number>;
  abstract remove(query: Query | null): Promise<number>;
  abstract find(query?: Query | null): QuerySet<T>;
  abstract flush(): Promise<void>;

  async findOne(query: Query | null = null): Promise<RawRecord> {
    const matches = await this.find(query).raw();
    return expectOne(matches);
  }

  toString(): string {
    return `<${this.constructor.name}: '${this.collection}'>`;
  }

  protected get primaryName(): string {
    return this.schema.primaryName;
  }

  /**
   * Copy of `value` carrying `key` under the primary-key attribute. The
   * caller's object is left alone.
   */
  protected withPrimaryKey(key: PrimaryKey, value: RawRecord): RawRecord {
    const existing = value[this.primaryName];
    if (existing !== undefined && existing !== key) {
      throw new PrimaryKeyError(
        `Value carries ${this.primaryName}=${String(existing)} but was inserted under key ${String(key)}`,
      );
    }
    return { ...value, [this.primaryName]: key };
  }

  protected keyOf(record: RawRecord): PrimaryKey {
    const key = record[this.primaryName];
    if (!isPrimaryKey(key)) {
      throw new PrimaryKeyError(`Record in "${this.collection}" has no usable "${this.primaryName}" attribute`);
    }
    return key;
  }

  /**
   * The attributes an update writes. Updates never move a record to another
   * key, and an attribute named with `undefined` is written as `null` so that
   * every backend clears it.
   */
  protected updateFields(data: RawRecord): RawRecord {
    if (Object.prototype.hasOwnProperty.call(data, this.primaryName)) {
      throw new PrimaryKeyError(`update() cannot change the primary key "${this.primaryName}"`);
    }
    const fields: RawRecord = {};
    for (const [attribute, value] of Object.entries(data)) {
      fields[attribute] = value === undefined ? null : value;
    }
    return fields;
  }
}

/**
 * Cardinality check for findOne. `total` is the backend's count when it
 * differs from the number of records fetched.
 */
export function expectOne(matches: readonly RawRecord[], total: number = matches.length): RawRecord {
  const [first] = matches;
  if (total === 0 || first === undefined) {
    throw new NoResultsFoundError();
  }
  if (total > 1) {
    throw new MultipleResultsFoundError(total);
  }
  return first;
}
