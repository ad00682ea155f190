import { ChromaClient, IncludeEnum, type Collection } from 'chromadb';
import type {
  ChromaAddParams,
  ChromaClientLike,
  ChromaCollection,
  ChromaGetParams,
  ChromaGetResult,
  ChromaInclude,
  ChromaMetadata,
  ChromaQueryParams,
  ChromaQueryResult,
  ChromaWhere,
} from './chroma-client.js';

const INCLUDE: Record<ChromaInclude, IncludeEnum> = {
  documents: IncludeEnum.Documents,
  embeddings: IncludeEnum.Embeddings,
  metadatas: IncludeEnum.Metadatas,
  distances: IncludeEnum.Distances,
};

function toMetadata(value: Record<string, unknown> | null | undefined): ChromaMetadata | null {
  if (!value) return null;
  const out: ChromaMetadata = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') out[key] = v;
  }
  return out;
}

function copyEmbeddings(value: readonly ArrayLike<number>[] | null | undefined): number[][] | null {
  return value ? value.map(e => Array.from(e)) : null;
}

class HttpChromaCollection implements ChromaCollection {
  constructor(private readonly collection: Collection) {}

  get name(): string {
    return this.collection.name;
  }

  async get(params: ChromaGetParams): Promise<ChromaGetResult> {
    const res = await this.collection.get({
      ids: params.ids,
      where: params.where,
      limit: params.limit,
      offset: params.offset,
      include: params.include.map(i => INCLUDE[i]),
    });
    return {
      ids: res.ids,
      documents: res.documents.map(d => d ?? null),
      embeddings: copyEmbeddings(res.embeddings),
      metadatas: res.metadatas.map(m => toMetadata(m)),
    };
  }

  async query(params: ChromaQueryParams): Promise<ChromaQueryResult> {
    const res = await this.collection.query({
      queryEmbeddings: params.queryEmbeddings,
      nResults: params.nResults,
      where: params.where,
      include: params.include.map(i => INCLUDE[i]),
    });
    return {
      ids: res.ids,
      documents: res.documents.map(batch => batch.map(d => d ?? null)),
      embeddings: res.embeddings ? res.embeddings.map(batch => copyEmbeddings(batch) ?? []) : null,
      metadatas: res.metadatas.map(batch => batch.map(m => toMetadata(m))),
      distances: res.distances ? res.distances.map(batch => Array.from(batch ?? [])) : null,
    };
  }

  async add(params: ChromaAddParams): Promise<void> {
    await this.collection.add({
      ids: params.ids,
      documents: params.documents,
      metadatas: params.metadatas,
      ...(params.embeddings ? { embeddings: params.embeddings } : {}),
    });
  }

  async delete(params: { where?: ChromaWhere }): Promise<void> {
    await this.collection.delete({ where: params.where });
  }
}

/**
 * Chroma server reached over HTTP.
 */
export class HttpChromaClient implements ChromaClientLike {
  private client: ChromaClient;

  constructor(readonly url: string) {
    this.client = new ChromaClient({ path: url });
  }

  async getOrCreateCollection(params: { name: string; metadata?: ChromaMetadata }): Promise<ChromaCollection> {
    const collection = await this.client.getOrCreateCollection({
      name: params.name,
      metadata: params.metadata,
    });
    return new HttpChromaCollection(collection);
  }
}
