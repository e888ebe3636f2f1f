/**
 * FlatDoc — Public API Entry Point
 *
 * Nested documents in, relational rows underneath, nested documents out.
 */

// Main class
export { FlatDoc } from './flatdoc.js';

// Error class
export { FlatDocError } from './errors.js';

// Configuration
export { configFromEnv, configSchema } from './config.js';

// Building blocks
export { NameCodec } from './name-codec.js';
export { flatten, unflatten } from './flatten.js';
export { parseCondition } from './filter-translator.js';
export { collectionToTableName } from './sanitize.js';

// Types
export type {
  CollectionDescription,
  ConnectionStatus,
  Document,
  DocumentValue,
  Driver,
  EqualityCondition,
  FlatDocConfig,
  FlatDocErrorCode,
  FlatDocEvents,
  InsertResult,
  OperationReceipt,
  PoolPreset,
  Scalar,
  SortDirection,
  SqlDialect,
  StoredDocument,
} from './types.js';
