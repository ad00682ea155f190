export { MemoryRecord, type RecordInit } from './record.js';
export { Message, MessageSchema, MESSAGE_ROLES, type MessageInit, type MessageRole } from './message.js';
export { Passage, PassageSchema, type PassageInit } from './passage.js';
export {
  TableType,
  tableDefinition,
  type TableRecord,
  type TableRecordMap,
  type TableDefinition,
} from './tables.js';
export type {
  MetadataValue,
  RecordMetadata,
  FieldMapping,
  FieldType,
  RecordSchema,
  DecodedRow,
  DecodedFields,
} from './types.js';
export { RESERVED_FIELDS } from './types.js';
