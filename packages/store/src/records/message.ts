import { MappingError } from '../errors.js';
import { MemoryRecord, optionalDate, optionalString, requireString, type RecordInit } from './record.js';
import type { RecordSchema } from './types.js';

export const MESSAGE_ROLES = ['system', 'user', 'assistant', 'tool'] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

export interface MessageInit extends RecordInit {
  role: MessageRole;
  model?: string;
  name?: string;
  toolCallId?: string;
}

/** One conversation turn, stored in recall memory. */
export class Message extends MemoryRecord {
  role: MessageRole;
  model?: string;
  name?: string;
  toolCallId?: string;

  constructor(init: MessageInit) {
    super(init);
    this.role = init.role;
    this.model = init.model;
    this.name = init.name;
    this.toolCallId = init.toolCallId;
  }
}

function isMessageRole(value: string): value is MessageRole {
  return MESSAGE_ROLES.some(role => role === value);
}

export const MessageSchema: RecordSchema<Message> = {
  kind: 'message',
  fields: [
    { field: 'userId', key: 'user_id', type: 'string' },
    { field: 'agentId', key: 'agent_id', type: 'string' },
    { field: 'createdAt', key: 'created_at', type: 'date' },
    { field: 'role', key: 'role', type: 'string' },
    { field: 'model', key: 'model', type: 'string' },
    { field: 'name', key: 'name', type: 'string' },
    { field: 'toolCallId', key: 'tool_call_id', type: 'string' },
  ],
  create(row) {
    const role = requireString(row.fields, 'role', row.id);
    if (!isMessageRole(role)) {
      throw new MappingError(`Stored row ${row.id} has unknown role "${role}"`);
    }
    return new Message({
      id: row.id,
      text: row.text,
      embedding: row.embedding,
      metadata: row.metadata,
      userId: requireString(row.fields, 'userId', row.id),
      agentId: optionalString(row.fields, 'agentId'),
      createdAt: optionalDate(row.fields, 'createdAt'),
      role,
      model: optionalString(row.fields, 'model'),
      name: optionalString(row.fields, 'name'),
      toolCallId: optionalString(row.fields, 'toolCallId'),
    });
  },
};
