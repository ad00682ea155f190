/**
 * The slice of the Chroma collection API the connector relies on.
 * `HttpChromaClient` backs it with the chromadb package; tests plug in an
 * in-process fake.
 */
export type ChromaScalar = string | number | boolean;
export type ChromaMetadata = Record<string, ChromaScalar>;
export type ChromaInclude = 'documents' | 'embeddings' | 'metadatas' | 'distances';

export type ChromaEquality = Record<string, { $eq: ChromaScalar }>;
export type ChromaWhere = ChromaEquality | { $and: ChromaEquality[] };

export interface ChromaGetParams {
  ids?: string[];
  where?: ChromaWhere;
  limit?: number;
  offset?: number;
  include: ChromaInclude[];
}

export interface ChromaGetResult {
  ids: string[];
  documents: (string | null)[];
  /** null when embeddings were not requested or not stored */
  embeddings: number[][] | null;
  metadatas: (ChromaMetadata | null)[];
}

export interface ChromaQueryParams {
  queryEmbeddings: number[][];
  nResults: number;
  where?: ChromaWhere;
  include: ChromaInclude[];
}

/** One inner array per query embedding. */
export interface ChromaQueryResult {
  ids: string[][];
  documents: (string | null)[][];
  embeddings: number[][][] | null;
  metadatas: (ChromaMetadata | null)[][];
  distances: number[][] | null;
}

export interface ChromaAddParams {
  ids: string[];
  documents: string[];
  metadatas: ChromaMetadata[];
  embeddings?: number[][];
}

export interface ChromaCollection {
  readonly name: string;
  get(params: ChromaGetParams): Promise<ChromaGetResult>;
  query(params: ChromaQueryParams): Promise<ChromaQueryResult>;
  add(params: ChromaAddParams): Promise<void>;
  delete(params: { where?: ChromaWhere }): Promise<void>;
}

export interface ChromaClientLike {
  getOrCreateCollection(params: { name: string; metadata?: ChromaMetadata }): Promise<ChromaCollection>;
}
