import type { ConversationStore } from '../models/collaborators';
import type { ConversationRecord, StoredConversation } from '../models/conversation';
import { ClarificationEngineError, ConcurrencyConflictError, ConversationNotFoundError } from '../errors';

/** Process-local store; records are copied on the way in and out. */
export class MemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, StoredConversation>();

  async get(conversationId: string): Promise<StoredConversation | null> {
    const stored = this.conversations.get(conversationId);
    return stored ? structuredClone(stored) : null;
  }

  async create(record: ConversationRecord): Promise<StoredConversation> {
    if (this.conversations.has(record.id)) {
      throw new ClarificationEngineError(`Conversation ${record.id} already exists`);
    }

    const stored = { record: structuredClone(record), version: 1 };
    this.conversations.set(record.id, stored);
    return structuredClone(stored);
  }

  async update(record: ConversationRecord, expectedVersion: number): Promise<StoredConversation> {
    const current = this.conversations.get(record.id);
    if (!current) {
      throw new ConversationNotFoundError(record.id);
    }
    if (current.version !== expectedVersion) {
      throw new ConcurrencyConflictError(record.id, expectedVersion);
    }

    const stored = { record: structuredClone(record), version: expectedVersion + 1 };
    this.conversations.set(record.id, stored);
    return structuredClone(stored);
  }

  /** Number of stored conversations. */
  get size(): number {
    return this.conversations.size;
  }
}
