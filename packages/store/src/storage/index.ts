import type { TableRecord, TableType } from '../records/tables.js';
import type { StoreConfig } from '../utils/config.js';
import type { ChromaClientLike } from './chroma-client.js';
import { ChromaStorageConnector } from './chroma.js';
import type { StorageConnector } from './interface.js';

export type { StorageConnector } from './interface.js';
export { ChromaStorageConnector, type ChromaConnectorOptions } from './chroma.js';
export { HttpChromaClient } from './chroma-http.js';
export { composeFilters, toWhere, type FilterSet, type FilterInput } from './filters.js';
export { toRows, fromRows, type ChromaRows, type StoredRow } from './mapper.js';
export type {
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
} from './chroma-client.js';

export interface ConnectorScope {
  userId?: string;
  agentId?: string;
  client?: ChromaClientLike;
}

export async function createStorageConnector<T extends TableType>(
  tableType: T,
  config: StoreConfig,
  scope: ConnectorScope = {},
): Promise<StorageConnector<TableRecord<T>>> {
  switch (config.backend) {
    case 'chroma':
      return ChromaStorageConnector.open({ tableType, config, ...scope });
  }
}
