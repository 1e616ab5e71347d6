import { PrimaryKeyError } from '../errors.js';
import { isPrimaryKey } from '../types.js';
import type { PrimaryKey, RawRecord, RecordSchema } from '../types.js';
import { NO_DIRECTIVES, formatSortKey, parseSortKey } from './directives.js';
import type { Directives } from './directives.js';
import type { ResultSource } from './source.js';

function assertCount(value: number, directive: 'offset' | 'limit'): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${directive} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Lazy result of `find`. `sort`, `offset` and `limit` return new QuerySets
 * and never touch fetched data; the first materialisation (`keys`, `raw`,
 * `all`, `at`, `count` or iteration) evaluates once and memoises the result.
 */
export class QuerySet<T = RawRecord> implements AsyncIterable<T> {
  private evaluation: Promise<RawRecord[]> | null = null;

  constructor(
    readonly schema: RecordSchema<T>,
    private readonly source: ResultSource,
    readonly directives: Directives = NO_DIRECTIVES,
  ) {}

  /**
   * Orders by the given attributes (`'-name'` for descending). Within one call
   * the first key is most significant; a later `sort` call takes precedence
   * over keys from earlier calls.
   */
  sort(...keys: string[]): QuerySet<T> {
    const sortKeys = [...keys.map(parseSortKey), ...this.directives.sortKeys];
    return this.derive({ ...this.directives, sortKeys });
  }

  offset(n: number): QuerySet<T> {
    assertCount(n, 'offset');
    return this.derive({ ...this.directives, offset: n });
  }

  limit(n: number): QuerySet<T> {
    assertCount(n, 'limit');
    return this.derive({ ...this.directives, limit: n });
  }

  get isEvaluated(): boolean {
    return this.evaluation !== null;
  }

  /** Materialised raw records, in final order. */
  async raw(): Promise<RawRecord[]> {
    const records = await this.evaluate();
    return records.map((record) => ({ ...record }));
  }

  async keys(): Promise<PrimaryKey[]> {
    const records = await this.evaluate();
    return records.map((record) => this.keyOf(record));
  }

  async count(): Promise<number> {
    if (this.evaluation === null && this.source.count !== undefined) {
      return this.source.count(this.directives);
    }
    return (await this.evaluate()).length;
  }

  /** Hydrates the record at `index`; negative indexes count from the end. */
  async at(index: number): Promise<T | undefined> {
    const keys = await this.keys();
    const key = keys.at(index);
    return key === undefined ? undefined : this.schema.load(key);
  }

  async all(): Promise<T[]> {
    const loaded: T[] = [];
    for await (const record of this) {
      loaded.push(record);
    }
    return loaded;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    const keys = await this.keys();
    for (const key of keys) {
      yield await this.schema.load(key);
    }
  }

  toString(): string {
    const parts = [this.isEvaluated ? 'evaluated' : 'unevaluated'];
    if (this.directives.sortKeys.length > 0) {
      parts.push(`sort=${this.directives.sortKeys.map(formatSortKey).join(',')}`);
    }
    if (this.directives.offset !== null) parts.push(`offset=${this.directives.offset}`);
    if (this.directives.limit !== null) parts.push(`limit=${this.directives.limit}`);
    return `<QuerySet: ${parts.join(' ')}>`;
  }

  private derive(directives: Directives): QuerySet<T> {
    return new QuerySet(this.schema, this.source, directives);
  }

  private evaluate(): Promise<RawRecord[]> {
    if (this.evaluation === null) {
      this.evaluation = this.source.fetch(this.directives).catch((err: unknown) => {
        this.evaluation = null;
        throw err;
      });
    }
    return this.evaluation;
  }

  private keyOf(record: RawRecord): PrimaryKey {
    const key = record[this.schema.primaryName];
    if (!isPrimaryKey(key)) {
      throw new PrimaryKeyError(`Record has no usable "${this.schema.primaryName}" primary key`);
    }
    return key;
  }
}
