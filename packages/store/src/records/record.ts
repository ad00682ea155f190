import { MappingError } from '../errors.js';
import { generateId } from '../utils/helpers.js';
import type { DecodedFields, RecordMetadata } from './types.js';

export interface RecordInit {
  id?: string;
  text: string;
  embedding?: number[];
  createdAt?: Date;
  metadata?: RecordMetadata;
  userId: string;
  agentId?: string;
}

/**
 * A persisted unit of text, optional embedding and metadata.
 */
export abstract class MemoryRecord {
  readonly id: string;
  text: string;
  embedding?: number[];
  createdAt?: Date;
  metadata?: RecordMetadata;
  userId: string;
  agentId?: string;

  constructor(init: RecordInit) {
    this.id = init.id ?? generateId();
    this.text = init.text;
    this.embedding = init.embedding;
    this.createdAt = init.createdAt;
    this.metadata = init.metadata;
    this.userId = init.userId;
    this.agentId = init.agentId;
  }
}

// ─── Field readers used when rebuilding records from stored rows ───

export function requireString(fields: DecodedFields, name: string, id: string): string {
  const value = fields[name];
  if (typeof value !== 'string') {
    throw new MappingError(`Stored row ${id} has no "${name}" field`);
  }
  return value;
}

export function optionalString(fields: DecodedFields, name: string): string | undefined {
  const value = fields[name];
  return typeof value === 'string' ? value : undefined;
}

export function optionalDate(fields: DecodedFields, name: string): Date | undefined {
  const value = fields[name];
  return value instanceof Date ? value : undefined;
}
