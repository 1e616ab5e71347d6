import type { Client, estypes } from '@elastic/elasticsearch';

type Source = Record<string, unknown>;

function isNil(value: unknown): boolean {
  return value === null || value === undefined;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Keyword fields: exact, case-sensitive comparison on the JSON value.
function order(a: unknown, b: unknown): number | null {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  return null;
}

function single(clause: unknown): [string, unknown] {
  if (!isObject(clause)) throw new Error('Expected a single-field clause');
  const [entry, ...rest] = Object.entries(clause);
  if (entry === undefined || rest.length > 0) throw new Error('Expected exactly one field');
  return entry;
}

type Clauses = estypes.QueryDslQueryContainer | estypes.QueryDslQueryContainer[] | undefined;

function asList(value: Clauses): estypes.QueryDslQueryContainer[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

// Lucene regexps are anchored; the escapes the translator emits are valid
// identity escapes for a non-unicode JS RegExp.
function luceneToRegExp(pattern: string, caseInsensitive: boolean): RegExp {
  return new RegExp(`^(?:${pattern})$`, caseInsensitive ? 'i' : '');
}

/** Evaluates the query clauses the search translator emits. */
export function evaluateQuery(source: Source, query: estypes.QueryDslQueryContainer): boolean {
  if (query.match_all !== undefined) return true;
  if (query.bool !== undefined) {
    const { filter, must, should, must_not: mustNot, minimum_should_match: minimum } = query.bool;
    const required = [...asList(filter), ...asList(must)];
    if (!required.every((clause) => evaluateQuery(source, clause))) return false;
    if (asList(mustNot).some((clause) => evaluateQuery(source, clause))) return false;
    const optional = asList(should);
    if (optional.length > 0) {
      const needed = typeof minimum === 'number' ? minimum : 1;
      return optional.filter((clause) => evaluateQuery(source, clause)).length >= needed;
    }
    return true;
  }
  if (query.term !== undefined) {
    const [field, clause] = single(query.term);
    const expected = isObject(clause) ? clause['value'] : clause;
    return source[field] === expected;
  }
  if (query.terms !== undefined) {
    const [field, values] = single(query.terms);
    return Array.isArray(values) && values.some((value) => source[field] === value);
  }
  if (query.range !== undefined) {
    const [field, bounds] = single(query.range);
    if (!isObject(bounds)) return false;
    const value = source[field];
    return Object.entries(bounds).every(([operator, bound]) => {
      const result = order(value, bound);
      if (result === null) return false;
      if (operator === 'gt') return result > 0;
      if (operator === 'gte') return result >= 0;
      if (operator === 'lt') return result < 0;
      if (operator === 'lte') return result <= 0;
      throw new Error(`Unsupported range bound ${operator}`);
    });
  }
  if (query.prefix !== undefined) {
    const [field, clause] = single(query.prefix);
    const prefix = isObject(clause) ? clause['value'] : clause;
    const value = source[field];
    return typeof value === 'string' && typeof prefix === 'string' && value.startsWith(prefix);
  }
  if (query.regexp !== undefined) {
    const [field, clause] = single(query.regexp);
    const value = source[field];
    if (typeof value !== 'string') return false;
    if (typeof clause === 'string') return luceneToRegExp(clause, false).test(value);
    if (!isObject(clause) || typeof clause['value'] !== 'string') return false;
    return luceneToRegExp(clause['value'], clause['case_insensitive'] === true).test(value);
  }
  if (query.exists !== undefined) {
    return !isNil(source[query.exists.field]);
  }
  throw new Error(`FakeElasticsearch does not support ${Object.keys(query).join(', ')}`);
}

interface SearchParams {
  index: string;
  query?: estypes.QueryDslQueryContainer;
  size?: number;
  ignore_unavailable?: boolean;
}

/**
 * In-process stand-in for the Elasticsearch client calls SearchStorage
 * makes. Sources are stored as JSON, the way the cluster would hold them.
 * Writes create a missing index; searches on one fail unless told to ignore
 * unavailable indices.
 */
export class FakeElasticsearch {
  readonly store = new Map<string, Map<string, Source>>();
  readonly mappings = new Map<string, estypes.MappingTypeMapping | undefined>();
  readonly queries: estypes.QueryDslQueryContainer[] = [];
  refreshes = 0;

  readonly indices = {
    exists: async (params: { index: string }): Promise<boolean> => this.store.has(params.index),
    create: async (params: { index: string; mappings?: estypes.MappingTypeMapping }): Promise<Record<string, unknown>> => {
      if (this.store.has(params.index)) {
        return { status: 400, error: { type: 'resource_already_exists_exception' } };
      }
      this.store.set(params.index, new Map());
      this.mappings.set(params.index, params.mappings);
      return { acknowledged: true, index: params.index };
    },
    refresh: async (_params: { index: string }): Promise<Record<string, unknown>> => {
      this.refreshes += 1;
      return {};
    },
  };

  readonly helpers = {
    scrollDocuments: (params: SearchParams): AsyncIterable<Source> => this.scroll(params),
  };

  async get(params: { index: string; id: string }): Promise<{ found: boolean; _source?: Source }> {
    const source = this.store.get(params.index)?.get(params.id);
    return source === undefined ? { found: false } : { found: true, _source: structuredClone(source) };
  }

  async create(params: { index: string; id: string; document: Source }): Promise<Record<string, unknown>> {
    const index = this.index(params.index);
    if (index.has(params.id)) {
      return { status: 409, error: { type: 'version_conflict_engine_exception' } };
    }
    index.set(params.id, JSON.parse(JSON.stringify(params.document)));
    return { _id: params.id, result: 'created' };
  }

  async update(params: { index: string; id: string; doc: Source }): Promise<Record<string, unknown>> {
    const source = this.index(params.index).get(params.id);
    if (source === undefined) throw new Error(`document ${params.id} missing`);
    Object.assign(source, JSON.parse(JSON.stringify(params.doc)));
    return { _id: params.id, result: 'updated' };
  }

  async deleteByQuery(params: SearchParams): Promise<{ deleted: number }> {
    const doomed = this.hits(params).map(([id]) => id);
    for (const id of doomed) this.store.get(params.index)?.delete(id);
    return { deleted: doomed.length };
  }

  async search(params: SearchParams): Promise<{
    hits: { total: { value: number; relation: string }; hits: { _id: string; _source: Source }[] };
  }> {
    const hits = this.hits(params);
    return {
      hits: {
        total: { value: hits.length, relation: 'eq' },
        hits: hits.slice(0, params.size ?? 10).map(([id, source]) => ({ _id: id, _source: structuredClone(source) })),
      },
    };
  }

  private async *scroll(params: SearchParams): AsyncGenerator<Source> {
    for (const [, source] of this.hits(params)) {
      yield structuredClone(source);
    }
  }

  private hits(params: SearchParams): [string, Source][] {
    const query = params.query ?? { match_all: {} };
    this.queries.push(query);
    const index = this.store.get(params.index);
    if (index === undefined) {
      if (params.ignore_unavailable === true) return [];
      throw new Error(`index_not_found_exception: no such index [${params.index}]`);
    }
    return [...index.entries()].filter(([, source]) => evaluateQuery(source, query));
  }

  private index(name: string): Map<string, Source> {
    let index = this.store.get(name);
    if (index === undefined) {
      index = new Map();
      this.store.set(name, index);
    }
    return index;
  }
}

export function createFakeElasticsearch(): { fake: FakeElasticsearch; client: Client } {
  const fake = new FakeElasticsearch();
  return { fake, client: fake as unknown as Client };
}
