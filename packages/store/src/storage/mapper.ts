import { MappingError } from '../errors.js';
import type { MemoryRecord } from '../records/record.js';
import {
  RESERVED_FIELDS,
  type DecodedFields,
  type FieldMapping,
  type MetadataValue,
  type RecordMetadata,
  type RecordSchema,
} from '../records/types.js';
import { dateToTimestamp, timestampToDate } from '../utils/helpers.js';
import type { ChromaMetadata, ChromaScalar } from './chroma-client.js';

/** Parallel arrays in the shape of a Chroma `add` call. */
export interface ChromaRows {
  ids: string[];
  documents: string[];
  metadatas: ChromaMetadata[];
  /** undefined when no record in the batch carries an embedding */
  embeddings?: number[][];
}

/** One row as read back from Chroma. */
export interface StoredRow {
  id: string;
  document: string;
  embedding?: number[];
  metadata: ChromaMetadata;
}

const RESERVED_KEYS: ReadonlySet<string> = new Set<string>(RESERVED_FIELDS);

function isScalar(value: unknown): value is MetadataValue {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

function encodeField<R>(value: unknown, mapping: FieldMapping<R>, id: string): ChromaScalar | undefined {
  if (value === null || value === undefined) return undefined;
  if (mapping.type === 'date') {
    if (value instanceof Date && !Number.isNaN(value.getTime())) return dateToTimestamp(value);
  } else if (typeof value === mapping.type && isScalar(value)) {
    return value;
  }
  throw new MappingError(`Record ${id}: field "${mapping.field}" is not a valid ${mapping.type}`);
}

function decodeField<R>(value: ChromaScalar, mapping: FieldMapping<R>, id: string): MetadataValue | Date {
  if (mapping.type === 'date') {
    if (typeof value === 'number') return timestampToDate(value);
  } else if (typeof value === mapping.type) {
    return value;
  }
  throw new MappingError(`Stored row ${id}: "${mapping.key}" is not a valid ${mapping.type}`);
}

/**
 * Flatten records into Chroma's parallel arrays. Declared fields go to
 * metadata under their stored keys and nested metadata is merged in; nulls
 * are dropped. The whole batch is converted before anything is written.
 */
export function toRows<R extends MemoryRecord>(schema: RecordSchema<R>, records: readonly R[]): ChromaRows {
  const storedKeys = new Set(schema.fields.map(f => f.key));
  const withEmbedding = records.filter(r => r.embedding !== undefined).length;
  if (withEmbedding > 0 && withEmbedding < records.length) {
    throw new MappingError(
      `Batch mixes records with and without embeddings (${withEmbedding} of ${records.length} have one)`,
    );
  }

  const rows: ChromaRows = { ids: [], documents: [], metadatas: [] };
  const embeddings: number[][] = [];

  for (const record of records) {
    const metadata: ChromaMetadata = {};

    for (const mapping of schema.fields) {
      const value = encodeField(record[mapping.field], mapping, record.id);
      if (value !== undefined) metadata[mapping.key] = value;
    }

    for (const [key, value] of Object.entries(record.metadata ?? {})) {
      if (RESERVED_KEYS.has(key) || storedKeys.has(key)) {
        throw new MappingError(`Record ${record.id}: metadata key "${key}" collides with a ${schema.kind} field`);
      }
      if (value === null || value === undefined) continue;
      if (!isScalar(value)) {
        throw new MappingError(`Record ${record.id}: metadata "${key}" must be a string, number or boolean`);
      }
      metadata[key] = value;
    }

    rows.ids.push(record.id);
    rows.documents.push(record.text);
    rows.metadatas.push(metadata);
    if (record.embedding) embeddings.push([...record.embedding]);
  }

  if (withEmbedding > 0) rows.embeddings = embeddings;
  return rows;
}

/**
 * Rebuild records from stored rows. Keys outside the schema's field map
 * become the record's free-form metadata.
 */
export function fromRows<R extends MemoryRecord>(schema: RecordSchema<R>, rows: readonly StoredRow[]): R[] {
  const byKey = new Map(schema.fields.map((f): [string, FieldMapping<R>] => [f.key, f]));

  return rows.map(row => {
    const fields: DecodedFields = {};
    const metadata: RecordMetadata = {};

    for (const [key, value] of Object.entries(row.metadata)) {
      const mapping = byKey.get(key);
      if (mapping) {
        fields[mapping.field] = decodeField(value, mapping, row.id);
      } else {
        metadata[key] = value;
      }
    }

    return schema.create({
      id: row.id,
      text: row.document,
      embedding: row.embedding,
      metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
      fields,
    });
  });
}
