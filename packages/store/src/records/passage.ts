import { MemoryRecord, optionalDate, optionalString, requireString, type RecordInit } from './record.js';
import type { RecordSchema } from './types.js';

export interface PassageInit extends RecordInit {
  docId?: string;
  dataSource?: string;
}

/** A chunk of archival memory or of a loaded document. */
export class Passage extends MemoryRecord {
  docId?: string;
  dataSource?: string;

  constructor(init: PassageInit) {
    super(init);
    this.docId = init.docId;
    this.dataSource = init.dataSource;
  }
}

export const PassageSchema: RecordSchema<Passage> = {
  kind: 'passage',
  fields: [
    { field: 'userId', key: 'user_id', type: 'string' },
    { field: 'agentId', key: 'agent_id', type: 'string' },
    { field: 'createdAt', key: 'created_at', type: 'date' },
    { field: 'docId', key: 'doc_id', type: 'string' },
    { field: 'dataSource', key: 'data_source', type: 'string' },
  ],
  create(row) {
    return new Passage({
      id: row.id,
      text: row.text,
      embedding: row.embedding,
      metadata: row.metadata,
      userId: requireString(row.fields, 'userId', row.id),
      agentId: optionalString(row.fields, 'agentId'),
      createdAt: optionalDate(row.fields, 'createdAt'),
      docId: optionalString(row.fields, 'docId'),
      dataSource: optionalString(row.fields, 'dataSource'),
    });
  },
};
