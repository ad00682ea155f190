/**
 * StorageConnector interface — every storage backend shares this contract.
 */
import type { StorageResult } from '../errors.js';
import type { MemoryRecord } from '../records/record.js';
import type { TableType } from '../records/tables.js';
import type { FilterInput, FilterSet } from './filters.js';

export interface StorageConnector<R extends MemoryRecord> {
  readonly name: string;
  readonly tableType: TableType;
  /** Scoping filters merged into every read and delete */
  readonly defaultFilters: FilterSet;

  /** Fetch one record by id; undefined when nothing matches */
  get(id: string, filters?: FilterInput): Promise<R | undefined>;

  /** Single bounded fetch */
  getAll(limit?: number, filters?: FilterInput): Promise<R[]>;

  /** Lazily page through matching records, starting at offset 0 on every call */
  getAllPaginated(pageSize: number, filters?: FilterInput): AsyncGenerator<R[], void, undefined>;

  insert(record: R): Promise<void>;

  /** All-or-nothing: the batch is validated before anything is written */
  insertMany(records: readonly R[]): Promise<void>;

  delete(filters?: FilterInput): Promise<void>;

  /** Number of records matching the filters */
  size(filters?: FilterInput): Promise<number>;

  /** Nearest-neighbour search, in the backend's ranking order */
  query(queryText: string, queryVector: number[], topK?: number, filters?: FilterInput): Promise<R[]>;

  queryByDateRange(start: Date, end: Date): Promise<StorageResult<R[]>>;

  queryByText(text: string): Promise<StorageResult<R[]>>;

  listDataSources(): Promise<StorageResult<string[]>>;

  /** Flush pending writes, where the backend buffers any */
  save(): Promise<void>;

  /** Close/cleanup */
  close(): Promise<void>;
}
