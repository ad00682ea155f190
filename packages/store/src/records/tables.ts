import { MessageSchema, type Message } from './message.js';
import { PassageSchema, type Passage } from './passage.js';
import type { MemoryRecord } from './record.js';
import type { RecordSchema } from './types.js';

export const TableType = {
  ARCHIVAL_MEMORY: 'archival_memory',
  RECALL_MEMORY: 'recall_memory',
  PASSAGES: 'passages',
} as const;

export type TableType = (typeof TableType)[keyof typeof TableType];

export interface TableRecordMap {
  archival_memory: Passage;
  recall_memory: Message;
  passages: Passage;
}

export type TableRecord<T extends TableType> = TableRecordMap[T];

export interface TableDefinition<R extends MemoryRecord> {
  /** Collection name prefix; the owner id is appended */
  readonly collection: string;
  /** Agent-scoped tables are filtered by agent_id as well as user_id */
  readonly agentScoped: boolean;
  readonly schema: RecordSchema<R>;
}

const TABLES: { [T in TableType]: TableDefinition<TableRecordMap[T]> } = {
  archival_memory: { collection: 'archival_memory', agentScoped: true, schema: PassageSchema },
  recall_memory: { collection: 'recall_memory', agentScoped: true, schema: MessageSchema },
  passages: { collection: 'passages', agentScoped: false, schema: PassageSchema },
};

export function tableDefinition<T extends TableType>(tableType: T): TableDefinition<TableRecord<T>> {
  return TABLES[tableType];
}

