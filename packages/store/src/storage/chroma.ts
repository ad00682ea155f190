import {
  BackendError,
  ConfigError,
  ConnectorClosedError,
  UnsupportedOperationError,
  fail,
  type StorageResult,
} from '../errors.js';
import { tableDefinition, type TableDefinition, type TableRecord, type TableType } from '../records/tables.js';
import { parseEndpoint, type StoreConfig } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import { sanitizeCollectionName } from '../utils/sanitize.js';
import type { ChromaClientLike, ChromaCollection, ChromaGetResult, ChromaInclude } from './chroma-client.js';
import { HttpChromaClient } from './chroma-http.js';
import { composeFilters, toWhere, type FilterInput, type FilterSet } from './filters.js';
import type { StorageConnector } from './interface.js';
import { fromRows, toRows } from './mapper.js';

const log = createLogger('chroma');

const INCLUDE: ChromaInclude[] = ['documents', 'embeddings', 'metadatas'];

export interface ChromaConnectorOptions<T extends TableType> {
  tableType: T;
  config: StoreConfig;
  /** Defaults to config.userId */
  userId?: string;
  /** Defaults to config.agentId; required for agent-scoped tables */
  agentId?: string;
  /** Pre-built client; otherwise one is created from config.archivalStorage */
  client?: ChromaClientLike;
}

/**
 * Chroma storage connector.
 *
 * Not safe for concurrent writes to the same collection: callers serialize
 * writes. Timestamps are stored as integer milliseconds since Chroma metadata has
 * no datetime type.
 */
export class ChromaStorageConnector<T extends TableType> implements StorageConnector<TableRecord<T>> {
  readonly name = 'chroma';
  private closed = false;

  private constructor(
    readonly tableType: T,
    private readonly table: TableDefinition<TableRecord<T>>,
    private readonly collection: ChromaCollection,
    readonly defaultFilters: FilterSet,
    private readonly sizePageSize: number,
  ) {}

  get collectionName(): string {
    return this.collection.name;
  }

  /** Connect and get-or-create the collection for the table and owner. */
  static async open<T extends TableType>(opts: ChromaConnectorOptions<T>): Promise<ChromaStorageConnector<T>> {
    const table = tableDefinition(opts.tableType);
    const userId = opts.userId ?? opts.config.userId;
    const agentId = opts.agentId ?? opts.config.agentId;

    const defaultFilters: FilterSet = { user_id: userId };
    let owner = userId;
    if (table.agentScoped) {
      if (!agentId) {
        throw new ConfigError(`Table "${opts.tableType}" is agent-scoped and needs an agentId`);
      }
      defaultFilters.agent_id = agentId;
      owner = agentId;
    }

    const client = opts.client ?? new HttpChromaClient(parseEndpoint(opts.config.archivalStorage));
    const name = sanitizeCollectionName(`${table.collection}_${owner}`);

    let collection: ChromaCollection;
    try {
      collection = await client.getOrCreateCollection({ name, metadata: { table_type: opts.tableType } });
    } catch (e: unknown) {
      log.error({ collection: name, error: e instanceof Error ? e.message : String(e) }, 'Failed to open Chroma collection');
      throw new BackendError('getOrCreateCollection', e);
    }

    log.info({ collection: name, tableType: opts.tableType }, 'Chroma collection ready');
    return new ChromaStorageConnector(opts.tableType, table, collection, defaultFilters, opts.config.sizePageSize);
  }

  private async call<V>(operation: string, fn: () => Promise<V>): Promise<V> {
    if (this.closed) throw new ConnectorClosedError(this.collection.name);
    try {
      return await fn();
    } catch (e: unknown) {
      log.error(
        { collection: this.collection.name, operation, error: e instanceof Error ? e.message : String(e) },
        'Chroma call failed',
      );
      throw new BackendError(operation, e);
    }
  }

  private toRecords(res: ChromaGetResult): TableRecord<T>[] {
    return fromRows(
      this.table.schema,
      res.ids.map((id, i) => ({
        id,
        document: res.documents[i] ?? '',
        embedding: res.embeddings?.[i],
        metadata: res.metadatas[i] ?? {},
      })),
    );
  }

  private where(filters?: FilterInput) {
    return toWhere(composeFilters(this.defaultFilters, filters));
  }

  async get(id: string, filters?: FilterInput): Promise<TableRecord<T> | undefined> {
    const where = this.where(filters);
    const res = await this.call('get', () => this.collection.get({ ids: [id], where, include: INCLUDE }));
    if (res.ids.length === 0) return undefined;
    return this.toRecords(res)[0];
  }

  async getAll(limit = 10, filters?: FilterInput): Promise<TableRecord<T>[]> {
    const where = this.where(filters);
    const res = await this.call('get', () => this.collection.get({ where, limit, include: INCLUDE }));
    return this.toRecords(res);
  }

  async *getAllPaginated(pageSize: number, filters?: FilterInput): AsyncGenerator<TableRecord<T>[], void, undefined> {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
    }
    const where = this.where(filters);
    let offset = 0;

    while (true) {
      const res = await this.call('get', () =>
        this.collection.get({ where, offset, limit: pageSize, include: INCLUDE }),
      );
      if (res.ids.length === 0) return;

      yield this.toRecords(res);

      // A short page is the last one
      if (res.ids.length < pageSize) return;
      offset += pageSize;
    }
  }

  async insert(record: TableRecord<T>): Promise<void> {
    await this.insertMany([record]);
  }

  async insertMany(records: readonly TableRecord<T>[]): Promise<void> {
    if (records.length === 0) return;
    const rows = toRows(this.table.schema, records);

    await this.call('add', () =>
      this.collection.add({
        ids: rows.ids,
        documents: rows.documents,
        metadatas: rows.metadatas,
        ...(rows.embeddings ? { embeddings: rows.embeddings } : {}),
      }),
    );
    log.debug(
      { collection: this.collection.name, count: rows.ids.length, embeddings: rows.embeddings !== undefined },
      'Inserted records',
    );
  }

  async delete(filters?: FilterInput): Promise<void> {
    const where = this.where(filters);
    await this.call('delete', () => this.collection.delete({ where }));
    log.debug({ collection: this.collection.name, where }, 'Deleted records');
  }

  /** Chroma has no filtered count, so this pages through every match. */
  async size(filters?: FilterInput): Promise<number> {
    let count = 0;
    for await (const batch of this.getAllPaginated(this.sizePageSize, filters)) {
      count += batch.length;
    }
    return count;
  }

  async query(queryText: string, queryVector: number[], topK = 10, filters?: FilterInput): Promise<TableRecord<T>[]> {
    const where = this.where(filters);
    log.debug({ collection: this.collection.name, queryText, topK }, 'Similarity query');
    const res = await this.call('query', () =>
      this.collection.query({ queryEmbeddings: [queryVector], nResults: topK, where, include: INCLUDE }),
    );
    return this.toRecords({
      ids: res.ids[0] ?? [],
      documents: res.documents[0] ?? [],
      embeddings: res.embeddings?.[0] ?? null,
      metadatas: res.metadatas[0] ?? [],
    });
  }

  async queryByDateRange(_start: Date, _end: Date): Promise<StorageResult<TableRecord<T>[]>> {
    return fail(new UnsupportedOperationError('queryByDateRange', this.name));
  }

  async queryByText(_text: string): Promise<StorageResult<TableRecord<T>[]>> {
    return fail(new UnsupportedOperationError('queryByText', this.name));
  }

  async listDataSources(): Promise<StorageResult<string[]>> {
    return fail(new UnsupportedOperationError('listDataSources', this.name));
  }

  async save(): Promise<void> {
    // Chroma persists on every write
    log.debug({ collection: this.collection.name }, 'save() is a no-op for Chroma');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    log.debug({ collection: this.collection.name }, 'Chroma connector closed');
  }
}
