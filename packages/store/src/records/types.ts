import type { MemoryRecord } from './record.js';

export type MetadataValue = string | number | boolean;

/** Free-form metadata carried by a record. `null` entries are never stored. */
export type RecordMetadata = Record<string, MetadataValue | null>;

/** Record fields that travel in their own column, never as metadata. */
export const RESERVED_FIELDS = ['id', 'text', 'embedding', 'metadata'] as const;
export type ReservedField = (typeof RESERVED_FIELDS)[number];

export type FieldType = 'string' | 'number' | 'boolean' | 'date';

/**
 * Declared mapping of one record field to its stored metadata key.
 * Dates are stored as integer Unix timestamps in milliseconds.
 */
export interface FieldMapping<R> {
  readonly field: Exclude<keyof R, ReservedField> & string;
  readonly key: string;
  readonly type: FieldType;
}

/** Decoded field values keyed by record field name. */
export type DecodedFields = Partial<Record<string, MetadataValue | Date>>;

export interface DecodedRow {
  id: string;
  text: string;
  embedding?: number[];
  metadata?: RecordMetadata;
  fields: DecodedFields;
}

export interface RecordSchema<R extends MemoryRecord> {
  readonly kind: string;
  readonly fields: readonly FieldMapping<R>[];
  create(row: DecodedRow): R;
}
