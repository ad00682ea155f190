export {
  MemoryRecord,
  Message,
  MessageSchema,
  MESSAGE_ROLES,
  Passage,
  PassageSchema,
  RESERVED_FIELDS,
  TableType,
  tableDefinition,
} from './records/index.js';
export type {
  RecordInit,
  MessageInit,
  MessageRole,
  PassageInit,
  TableRecord,
  TableRecordMap,
  TableDefinition,
  MetadataValue,
  RecordMetadata,
  FieldMapping,
  FieldType,
  RecordSchema,
  DecodedRow,
  DecodedFields,
} from './records/index.js';

export {
  ChromaStorageConnector,
  HttpChromaClient,
  createStorageConnector,
  composeFilters,
  toWhere,
  toRows,
  fromRows,
} from './storage/index.js';
export type {
  StorageConnector,
  ChromaConnectorOptions,
  ConnectorScope,
  FilterSet,
  FilterInput,
  ChromaRows,
  StoredRow,
  ChromaClientLike,
  ChromaCollection,
  ChromaWhere,
  ChromaEquality,
  ChromaMetadata,
  ChromaScalar,
  ChromaInclude,
  ChromaGetParams,
  ChromaGetResult,
  ChromaQueryParams,
  ChromaQueryResult,
  ChromaAddParams,
} from './storage/index.js';

export {
  StorageError,
  ConfigError,
  MappingError,
  BackendError,
  UnsupportedOperationError,
  ConnectorClosedError,
  fail,
} from './errors.js';
export type { StorageErrorCode, StorageResult } from './errors.js';

export { loadConfig, parseEndpoint, logger, createLogger } from './utils/index.js';
export type { StoreConfig, StoreConfigInput } from './utils/index.js';
