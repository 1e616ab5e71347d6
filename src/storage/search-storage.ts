import type { Client, estypes } from '@elastic/elasticsearch';
import { KeyExistsError } from '../errors.js';
import { describeQuery } from '../query/builder.js';
import { toSearchQuery } from '../query/translators/search.js';
import type { Query } from '../query/types.js';
import { QuerySet } from '../queryset/queryset.js';
import { MaterializedSource } from '../queryset/source.js';
import type { PrimaryKey, RawRecord } from '../types.js';
import { BaseStorage, expectOne } from './base.js';
import type { StorageOptions } from './base.js';

export interface SearchStorageOptions<T = RawRecord> extends StorageOptions<T> {
  client: Client;
  /** Index name; defaults to the collection name. */
  index?: string;
}

// Term, prefix and regexp clauses compare whole values, so strings are
// indexed unanalysed.
const KEYWORD_STRINGS: estypes.MappingTypeMapping = {
  dynamic_templates: [{ strings_as_keywords: { match_mapping_type: 'string', mapping: { type: 'keyword' } } }],
};

/**
 * Elasticsearch-backed storage. One index per collection; the document id
 * is the stringified primary key and the key is also kept in the source.
 *
 * Sources are JSON, so a Date attribute is read back as its ISO-8601 string.
 * Range queries still compare it as a date. Reading a collection whose index
 * does not exist yet returns nothing.
 */
export class SearchStorage<T = RawRecord> extends BaseStorage<T> {
  protected readonly backend = 'search';
  readonly index: string;
  private readonly client: Client;

  constructor(options: SearchStorageOptions<T>) {
    super(options);
    this.client = options.client;
    this.index = options.index ?? options.collection;
  }

  /** Creates the index with keyword-mapped strings unless it already exists. */
  async ensureIndex(): Promise<void> {
    if (await this.client.indices.exists({ index: this.index })) return;
    await this.client.indices.create({ index: this.index, mappings: KEYWORD_STRINGS }, { ignore: [400] });
    this.logger.info({ index: this.index }, 'created index');
  }

  async get(key: PrimaryKey): Promise<RawRecord | null> {
    const response = await this.client.get<RawRecord>({ index: this.index, id: String(key) }, { ignore: [404] });
    if (!response.found || response._source === undefined) return null;
    return { ...response._source };
  }

  async insert(key: PrimaryKey, value: RawRecord): Promise<void> {
    const response = await this.client.create(
      {
        index: this.index,
        id: String(key),
        document: this.withPrimaryKey(key, value),
        refresh: 'wait_for',
      },
      { ignore: [409] },
    );
    if (response.result !== 'created') {
      throw new KeyExistsError(key, this.collection);
    }
  }

  async update(query: Query | null, data: RawRecord): Promise<number> {
    const fields = this.updateFields(data);
    const searchQuery = this.compile(query);
    const matched = await this.scroll(searchQuery);
    for (const record of matched) {
      await this.client.update({
        index: this.index,
        id: String(this.keyOf(record)),
        doc: fields,
        refresh: 'wait_for',
      });
    }
    return matched.length;
  }

  async remove(query: Query | null): Promise<number> {
    const searchQuery = this.compile(query);
    const response = await this.client.deleteByQuery({
      index: this.index,
      query: searchQuery,
      refresh: true,
      ignore_unavailable: true,
    });
    return response.deleted ?? 0;
  }

  find(query: Query | null = null): QuerySet<T> {
    const searchQuery = this.compile(query);
    return new QuerySet(this.schema, new MaterializedSource(() => this.scroll(searchQuery)));
  }

  override async findOne(query: Query | null = null): Promise<RawRecord> {
    const response = await this.client.search<RawRecord>({
      index: this.index,
      query: this.compile(query),
      size: 2,
      track_total_hits: true,
      ignore_unavailable: true,
    });
    const records = response.hits.hits.flatMap((hit) => (hit._source === undefined ? [] : [hit._source]));
    const { total } = response.hits;
    const count = typeof total === 'number' ? total : total?.value ?? records.length;
    return expectOne(records, count);
  }

  /** Makes every acknowledged write visible to search. */
  async flush(): Promise<void> {
    await this.client.indices.refresh({ index: this.index });
  }

  // Translation happens before any request leaves the process.
  private compile(query: Query | null): estypes.QueryDslQueryContainer {
    const searchQuery = toSearchQuery(query);
    this.logger.debug({ backend: this.backend, query: describeQuery(query), searchQuery }, 'translated query');
    return searchQuery;
  }

  private async scroll(query: estypes.QueryDslQueryContainer): Promise<RawRecord[]> {
    const records: RawRecord[] = [];
    for await (const document of this.client.helpers.scrollDocuments<RawRecord>({
      index: this.index,
      query,
      ignore_unavailable: true,
    })) {
      records.push({ ...document });
    }
    return records;
  }
}
