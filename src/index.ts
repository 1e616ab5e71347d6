export { rawQuery, queryGroup, and, or, not, where, AttributeSelector, queryEquals, describeQuery } from './query/builder.js';
export {
  OPERATOR_NAMES,
  EQUALITY_OPERATORS,
  RANGE_OPERATORS,
  SET_OPERATORS,
  STRING_OPERATORS,
  NEGATION_OPERATORS,
  BOOL_OPERATORS,
  isOperatorName,
} from './query/types.js';
export type { OperatorName, BoolOp, Query, RawQuery, QueryGroup } from './query/types.js';
export { OPERATORS, applyOperator, compareValues, valuesEqual } from './query/operators.js';
export type { Comparator } from './query/operators.js';
export { matches, matcherFor } from './query/matcher.js';
export { translateDocumentQuery } from './query/translators/document.js';
export { translateSearchFilter, toSearchQuery } from './query/translators/search.js';
export type { SearchFilter } from './query/translators/search.js';
export { QuerySet } from './queryset/queryset.js';
export { MaterializedSource } from './queryset/source.js';
export type { ResultSource } from './queryset/source.js';
export type { Directives, SortKey } from './queryset/directives.js';
export type { PrimaryKey, RawRecord, RecordSchema, Storage } from './types.js';
export { BaseStorage } from './storage/base.js';
export type { StorageOptions } from './storage/base.js';
export { MemoryStorage } from './storage/memory-storage.js';
export { FileStorage } from './storage/file-storage.js';
export type { FileStorageOptions } from './storage/file-storage.js';
export { RedisStorage } from './storage/redis-storage.js';
export type { RedisStorageOptions } from './storage/redis-storage.js';
export { SearchStorage } from './storage/search-storage.js';
export type { SearchStorageOptions } from './storage/search-storage.js';
export { DocumentStorage } from './storage/document-storage.js';
export type { DocumentStorageOptions } from './storage/document-storage.js';
export { CollectionSchema, mappedSchema } from './schema.js';
export { loadConfig, BACKENDS } from './config.js';
export type { Backend, StorageConfig } from './config.js';
export { createStorage } from './store.js';
export type { OpenStorage } from './store.js';
export { configureLogger } from './logger.js';
export {
  MalformedQueryError,
  InvalidQueryGroupError,
  UnsupportedOperatorError,
  KeyExistsError,
  PrimaryKeyError,
  NoResultsFoundError,
  MultipleResultsFoundError,
  ConfigError,
} from './errors.js';
