import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  BackendError,
  ConfigError,
  ConnectorClosedError,
  MappingError,
  UnsupportedOperationError,
} from '../src/errors.js';
import { Message } from '../src/records/message.js';
import { Passage } from '../src/records/passage.js';
import { TableType } from '../src/records/tables.js';
import { ChromaStorageConnector } from '../src/storage/chroma.js';
import { createStorageConnector } from '../src/storage/index.js';
import { loadConfig, type StoreConfig } from '../src/utils/config.js';
import { FakeChromaClient, type FakeChromaCollection } from './fake-chroma.js';

function testConfig(): StoreConfig {
  return loadConfig({
    archivalStorage: { uri: 'localhost:8000' },
    userId: 'u1',
    agentId: 'a1',
    sizePageSize: 2,
  });
}

function passage(i: number, extra: Partial<ConstructorParameters<typeof Passage>[0]> = {}): Passage {
  return new Passage({
    id: `p${i}`,
    text: `passage ${i}`,
    embedding: [i, 0],
    userId: 'u1',
    agentId: 'a1',
    createdAt: new Date(Date.UTC(2024, 0, 1 + i)),
    ...extra,
  });
}

describe('ChromaStorageConnector', () => {
  let client: FakeChromaClient;
  let config: StoreConfig;

  beforeEach(() => {
    client = new FakeChromaClient();
    config = testConfig();
  });

  async function openArchival() {
    const connector = await ChromaStorageConnector.open({ tableType: TableType.ARCHIVAL_MEMORY, config, client });
    const collection: FakeChromaCollection = client.collection(connector.collectionName);
    return { connector, collection };
  }

  describe('open', () => {
    it('names the collection after table and agent', async () => {
      const { connector, collection } = await openArchival();

      expect(connector.collectionName).toBe('archival_memory_a1');
      expect(collection.metadata).toEqual({ table_type: 'archival_memory' });
      expect(connector.defaultFilters).toEqual({ user_id: 'u1', agent_id: 'a1' });
    });

    it('scopes the passages table to the user only', async () => {
      const connector = await ChromaStorageConnector.open({ tableType: TableType.PASSAGES, config, client });

      expect(connector.collectionName).toBe('passages_u1');
      expect(connector.defaultFilters).toEqual({ user_id: 'u1' });
    });

    it('sanitizes owner ids into valid collection names', async () => {
      const connector = await ChromaStorageConnector.open({
        tableType: TableType.RECALL_MEMORY,
        config,
        agentId: 'agent one/2',
        client,
      });

      expect(connector.collectionName).toBe('recall_memory_agent_one_2_92915206');
      expect(connector.defaultFilters).toEqual({ user_id: 'u1', agent_id: 'agent one/2' });
    });

    it('refuses an agent-scoped table without an agent id', async () => {
      const noAgent = loadConfig({ archivalStorage: { uri: 'localhost:8000' }, userId: 'u1' });

      await expect(
        ChromaStorageConnector.open({ tableType: TableType.RECALL_MEMORY, config: noAgent, client }),
      ).rejects.toThrow(ConfigError);
    });

    it('refuses a local path without a server uri', async () => {
      const localOnly = loadConfig({ archivalStorage: { path: '/var/lib/memvault' }, userId: 'u1', agentId: 'a1' });

      await expect(
        ChromaStorageConnector.open({ tableType: TableType.ARCHIVAL_MEMORY, config: localOnly }),
      ).rejects.toThrow(ConfigError);
    });

    it('wraps a failure to create the collection', async () => {
      vi.spyOn(client, 'getOrCreateCollection').mockRejectedValueOnce(new Error('connection refused'));

      await expect(
        ChromaStorageConnector.open({ tableType: TableType.ARCHIVAL_MEMORY, config, client }),
      ).rejects.toThrow('getOrCreateCollection failed: connection refused');
    });

    it('is reachable through the backend factory', async () => {
      const connector = await createStorageConnector(TableType.PASSAGES, config, { client });

      expect(connector.name).toBe('chroma');
      expect(connector.tableType).toBe('passages');
    });
  });

  describe('insert', () => {
    it('sends embeddings when every record has one', async () => {
      const { connector, collection } = await openArchival();

      await connector.insertMany([passage(1), passage(2)]);

      expect(collection.addCalls).toHaveLength(1);
      expect(collection.addCalls[0]?.embeddings).toEqual([[1, 0], [2, 0]]);
      expect(collection.addCalls[0]?.ids).toEqual(['p1', 'p2']);
    });

    it('omits the embeddings field when no record has one', async () => {
      const { connector, collection } = await openArchival();

      await connector.insertMany([passage(1, { embedding: undefined }), passage(2, { embedding: undefined })]);

      const call = collection.addCalls[0];
      expect(call).toBeDefined();
      expect(call !== undefined && 'embeddings' in call).toBe(false);
    });

    it('stores created_at as an integer timestamp', async () => {
      const { connector, collection } = await openArchival();

      await connector.insert(passage(0, { createdAt: new Date('2024-05-01T12:00:00Z') }));

      expect(collection.rows[0]?.metadata.created_at).toBe(1714564800000);
    });

    it('writes nothing when a batch fails to map', async () => {
      const { connector, collection } = await openArchival();

      await expect(connector.insertMany([passage(1), passage(2, { embedding: undefined })])).rejects.toThrow(
        MappingError,
      );
      expect(collection.addCalls).toHaveLength(0);
      expect(collection.rows).toHaveLength(0);
    });

    it('skips the backend for an empty batch', async () => {
      const { connector, collection } = await openArchival();

      await connector.insertMany([]);

      expect(collection.addCalls).toHaveLength(0);
    });

    it('propagates backend failures as BackendError', async () => {
      const { connector, collection } = await openArchival();
      const cause = new Error('disk full');
      vi.spyOn(collection, 'add').mockRejectedValueOnce(cause);

      const err = await connector.insert(passage(1)).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(BackendError);
      if (err instanceof BackendError) {
        expect(err.code).toBe('BACKEND_FAILURE');
        expect(err.operation).toBe('add');
        expect(err.message).toBe('add failed: disk full');
        expect(err.cause).toBe(cause);
      }
    });
  });

  describe('get', () => {
    it('returns the record for a known id', async () => {
      const { connector } = await openArchival();
      await connector.insertMany([passage(1), passage(2)]);

      const record = await connector.get('p2');

      expect(record).toBeInstanceOf(Passage);
      expect(record).toEqual(passage(2));
    });

    it('returns undefined for an unknown id', async () => {
      const { connector } = await openArchival();
      await connector.insert(passage(1));

      expect(await connector.get('missing')).toBeUndefined();
    });

    it('applies the composed filters to the lookup', async () => {
      const { connector, collection } = await openArchival();
      await connector.insert(passage(1));

      expect(await connector.get('p1', { agent_id: 'someone-else' })).toBeUndefined();
      expect(collection.getCalls[0]?.where).toEqual({
        $and: [{ user_id: { $eq: 'u1' } }, { agent_id: { $eq: 'someone-else' } }],
      });
      expect(collection.getCalls[0]?.ids).toEqual(['p1']);
    });

    it('rebuilds messages for the recall table', async () => {
      const connector = await ChromaStorageConnector.open({ tableType: TableType.RECALL_MEMORY, config, client });
      const msg = new Message({ id: 'm1', text: 'hi', userId: 'u1', agentId: 'a1', role: 'assistant', model: 'test-model' });
      await connector.insert(msg);

      const restored = await connector.get('m1');

      expect(restored).toBeInstanceOf(Message);
      expect(restored?.role).toBe('assistant');
      expect(restored?.model).toBe('test-model');
      expect(restored?.embedding).toBeUndefined();
    });
  });

  describe('getAll', () => {
    it('returns at most limit records', async () => {
      const { connector } = await openArchival();
      await connector.insertMany([1, 2, 3, 4].map(i => passage(i)));

      const records = await connector.getAll(3);

      expect(records.map(r => r.id)).toEqual(['p1', 'p2', 'p3']);
    });

    it('defaults to ten records', async () => {
      const { connector, collection } = await openArchival();

      await connector.getAll();

      expect(collection.getCalls[0]?.limit).toBe(10);
    });
  });

  describe('getAllPaginated', () => {
    const PAGE = 3;

    it.each([0, 1, PAGE, PAGE + 1, 2 * PAGE])('pages through %i records', async n => {
      const { connector } = await openArchival();
      if (n > 0) await connector.insertMany(Array.from({ length: n }, (_, i) => passage(i)));

      const batches: Passage[][] = [];
      for await (const batch of connector.getAllPaginated(PAGE)) batches.push(batch);

      expect(batches).toHaveLength(Math.ceil(n / PAGE));
      expect(batches.every(b => b.length > 0)).toBe(true);
      const all = await connector.getAll(n);
      expect(batches.flat().map(r => r.id)).toEqual(all.map(r => r.id));
    });

    it('advances the offset by the page size', async () => {
      const { connector, collection } = await openArchival();
      await connector.insertMany(Array.from({ length: 6 }, (_, i) => passage(i)));

      for await (const _batch of connector.getAllPaginated(3)) {
        // drain
      }

      expect(collection.getCalls.map(c => [c.offset, c.limit])).toEqual([
        [0, 3],
        [3, 3],
        [6, 3],
      ]);
    });

    it('restarts from the beginning on every call', async () => {
      const { connector } = await openArchival();
      await connector.insertMany([1, 2].map(i => passage(i)));

      const first = await connector.getAllPaginated(1).next();
      const second = await connector.getAllPaginated(1).next();

      expect(first.value).toEqual(second.value);
    });

    it('rejects a non-positive page size', async () => {
      const { connector } = await openArchival();

      await expect(connector.getAllPaginated(0).next()).rejects.toThrow(RangeError);
    });
  });

  describe('size', () => {
    it('counts records matching a filter', async () => {
      const connector = await ChromaStorageConnector.open({ tableType: TableType.PASSAGES, config, client });
      await connector.insertMany([
        passage(1, { dataSource: 'wiki' }),
        passage(2, { dataSource: 'wiki' }),
        passage(3, { dataSource: 'mail' }),
        passage(4, { dataSource: 'wiki' }),
        passage(5, { dataSource: 'mail' }),
      ]);

      const wiki = await connector.getAll(1000, { data_source: 'wiki' });

      expect(await connector.size({ data_source: 'wiki' })).toBe(3);
      expect(await connector.size({ data_source: 'wiki' })).toBe(wiki.length);
      expect(await connector.size()).toBe(5);
    });

    it('is zero for an empty collection', async () => {
      const { connector } = await openArchival();

      expect(await connector.size()).toBe(0);
    });
  });

  describe('delete', () => {
    it('removes only matching records', async () => {
      const connector = await ChromaStorageConnector.open({ tableType: TableType.PASSAGES, config, client });
      await connector.insertMany([
        passage(1, { dataSource: 'wiki' }),
        passage(2, { dataSource: 'mail' }),
      ]);

      await connector.delete({ data_source: 'mail' });

      expect((await connector.getAll()).map(r => r.id)).toEqual(['p1']);
    });

    it('does not fail when nothing matches', async () => {
      const { connector, collection } = await openArchival();

      await connector.delete({ doc_id: 'nothing' });

      expect(collection.deleteCalls).toHaveLength(1);
    });
  });

  describe('query', () => {
    it('returns topK records ordered by distance', async () => {
      const { connector } = await openArchival();
      await connector.insertMany([0, 1, 2, 3].map(i => passage(i)));

      const results = await connector.query('near two', [2.1, 0], 2);

      expect(results.map(r => r.id)).toEqual(['p2', 'p3']);
    });

    it('returns every match when fewer than topK exist', async () => {
      const { connector } = await openArchival();
      await connector.insertMany([0, 1, 2, 3].map(i => passage(i)));

      const results = await connector.query('near two', [2.1, 0], 10);

      expect(results.map(r => r.id)).toEqual(['p2', 'p3', 'p1', 'p0']);
    });

    it('scopes the search with the composed filters', async () => {
      const connector = await ChromaStorageConnector.open({ tableType: TableType.PASSAGES, config, client });
      await connector.insertMany([
        passage(1, { dataSource: 'wiki' }),
        passage(2, { dataSource: 'mail' }),
      ]);

      const results = await connector.query('anything', [2, 0], 5, { data_source: 'wiki' });

      expect(results.map(r => r.id)).toEqual(['p1']);
    });
  });

  describe('unsupported operations', () => {
    it('fails queryByDateRange without touching the backend', async () => {
      const { connector, collection } = await openArchival();

      const result = await connector.queryByDateRange(new Date('2024-01-01'), new Date('2024-02-01'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(UnsupportedOperationError);
        expect(result.error.code).toBe('UNSUPPORTED_OPERATION');
        expect(result.error.message).toBe('queryByDateRange is not supported by the chroma backend');
      }
      expect(collection.getCalls).toHaveLength(0);
      expect(collection.queryCalls).toHaveLength(0);
    });

    it('fails queryByText', async () => {
      const { connector } = await openArchival();

      const result = await connector.queryByText('ocean');

      expect(result).toEqual({ ok: false, error: expect.any(UnsupportedOperationError) });
    });

    it('fails listDataSources', async () => {
      const { connector } = await openArchival();

      const result = await connector.listDataSources();

      expect(result.ok).toBe(false);
    });
  });

  describe('lifetime', () => {
    it('treats save as a no-op', async () => {
      const { connector } = await openArchival();

      await expect(connector.save()).resolves.toBeUndefined();
    });

    it('rejects operations after close', async () => {
      const { connector } = await openArchival();
      await connector.close();
      await connector.close();

      await expect(connector.get('p1')).rejects.toThrow(ConnectorClosedError);
      await expect(connector.insert(passage(1))).rejects.toThrow(
        'Connector for collection "archival_memory_a1" is closed',
      );
    });
  });
});
