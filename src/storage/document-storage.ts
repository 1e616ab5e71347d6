import { MongoServerError } from 'mongodb';
import type { Collection, CountDocumentsOptions, Document, SortDirection } from 'mongodb';
import { KeyExistsError } from '../errors.js';
import { describeQuery } from '../query/builder.js';
import { translateDocumentQuery } from '../query/translators/document.js';
import type { Query } from '../query/types.js';
import type { Directives } from '../queryset/directives.js';
import { QuerySet } from '../queryset/queryset.js';
import type { ResultSource } from '../queryset/source.js';
import type { PrimaryKey, RawRecord } from '../types.js';
import { BaseStorage, expectOne } from './base.js';
import type { StorageOptions } from './base.js';

const DUPLICATE_KEY = 11000;

export interface DocumentStorageOptions<T = RawRecord> extends Omit<StorageOptions<T>, 'collection'> {
  client: Collection<Document>;
  /** Collection name used in logs and errors; defaults to the driver's. */
  collection?: string;
}

/**
 * Cursor-backed source: sort, skip and limit run on the server, and counts
 * use `countDocuments` with the same window.
 */
export class DocumentCursorSource implements ResultSource {
  constructor(
    private readonly collection: Collection<Document>,
    private readonly filter: Document,
    private readonly convert: (document: Document) => RawRecord,
  ) {}

  async fetch(directives: Directives): Promise<RawRecord[]> {
    // The driver reads limit(0) as "no limit".
    if (directives.limit === 0) return [];
    const cursor = this.collection.find(this.filter);
    const windowed = directives.offset !== null || directives.limit !== null;
    if (directives.sortKeys.length > 0 || windowed) {
      const sort: [string, SortDirection][] = directives.sortKeys.map(({ attribute, descending }) => [
        attribute,
        descending ? -1 : 1,
      ]);
      // The server orders ties arbitrarily; _id makes pages repeatable.
      if (!sort.some(([attribute]) => attribute === '_id')) sort.push(['_id', 1]);
      cursor.sort(sort);
    }
    if (directives.offset !== null) cursor.skip(directives.offset);
    if (directives.limit !== null) cursor.limit(directives.limit);
    const documents = await cursor.toArray();
    return documents.map(this.convert);
  }

  async count(directives: Directives): Promise<number> {
    if (directives.limit === 0) return 0;
    const options: CountDocumentsOptions = {};
    if (directives.offset !== null) options.skip = directives.offset;
    if (directives.limit !== null) options.limit = directives.limit;
    return this.collection.countDocuments(this.filter, options);
  }
}

/**
 * MongoDB-backed storage. The primary key doubles as `_id`; `_id` is hidden
 * from returned records unless it is the primary-key attribute itself.
 */
export class DocumentStorage<T = RawRecord> extends BaseStorage<T> {
  protected readonly backend = 'document';
  private readonly client: Collection<Document>;

  constructor(options: DocumentStorageOptions<T>) {
    super({ ...options, collection: options.collection ?? options.client.collectionName });
    this.client = options.client;
  }

  async get(key: PrimaryKey): Promise<RawRecord | null> {
    const filter: Document = { _id: key };
    const document = await this.client.findOne(filter);
    return document === null ? null : this.toRecord(document);
  }

  async insert(key: PrimaryKey, value: RawRecord): Promise<void> {
    try {
      const document: Document = { ...this.withPrimaryKey(key, value), _id: key };
      await this.client.insertOne(document);
    } catch (err) {
      if (err instanceof MongoServerError && err.code === DUPLICATE_KEY) {
        throw new KeyExistsError(key, this.collection);
      }
      throw err;
    }
  }

  async update(query: Query | null, data: RawRecord): Promise<number> {
    const fields = this.updateFields(data);
    const filter = this.compile(query);
    if (Object.keys(fields).length === 0) {
      return this.client.countDocuments(filter);
    }
    const result = await this.client.updateMany(filter, { $set: fields });
    return result.matchedCount;
  }

  async remove(query: Query | null): Promise<number> {
    const result = await this.client.deleteMany(this.compile(query));
    return result.deletedCount;
  }

  find(query: Query | null = null): QuerySet<T> {
    const source = new DocumentCursorSource(this.client, this.compile(query), (document) => this.toRecord(document));
    return new QuerySet(this.schema, source);
  }

  override async findOne(query: Query | null = null): Promise<RawRecord> {
    const filter = this.compile(query);
    const documents = await this.client.find(filter).limit(2).toArray();
    const total = documents.length > 1 ? await this.client.countDocuments(filter) : documents.length;
    return expectOne(documents.map((document) => this.toRecord(document)), total);
  }

  /** Writes are acknowledged by the server; nothing is buffered here. */
  async flush(): Promise<void> {}

  private compile(query: Query | null): Document {
    const filter = translateDocumentQuery(query);
    this.logger.debug({ backend: this.backend, query: describeQuery(query), filter }, 'translated query');
    return filter;
  }

  private toRecord(document: Document): RawRecord {
    if (this.primaryName === '_id') return { ...document };
    const { _id: _ignored, ...record } = document;
    return record;
  }
}
