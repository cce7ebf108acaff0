import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { ConversationStore } from '../models/collaborators';
import type { ConversationRecord, StoredConversation, Turn } from '../models/conversation';
import { LIFECYCLE_STATES, PREFERENCE_TYPES, TURN_STATUSES } from '../models/conversation';
import { ClarificationEngineError, ConcurrencyConflictError, ConversationNotFoundError } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('Conversation Store');

export const CONVERSATIONS_TABLE = 'clarification_conversations';

const UNIQUE_VIOLATION = '23505';

const turnShape = z
  .object({
    number: z.number().int().positive(),
    input: z.string(),
    status: z.enum(TURN_STATUSES),
    rounds: z.array(
      z
        .object({
          round: z.number().int().positive(),
          request: z.object({ id: z.string(), category: z.string(), presentation: z.object({ mode: z.string() }) }).passthrough(),
          presentedAt: z.string()
        })
        .passthrough()
    ),
    bindings: z
      .object({
        entities: z.record(z.unknown()),
        parameters: z.record(z.unknown()),
        mitigations: z.record(z.unknown()),
        resolvedRounds: z.number()
      })
      .passthrough(),
    iterations: z.number().int().nonnegative(),
    startedAt: z.string()
  })
  .passthrough();

const conversationRecordSchema = z.object({
  id: z.string(),
  userId: z.string().optional(),
  lifecycle: z.enum(LIFECYCLE_STATES),
  // Turns are written only by this engine; the check guards against foreign rows.
  turns: z.array(z.custom<Turn>(value => turnShape.safeParse(value).success, 'Malformed turn')),
  preferences: z.record(
    z.object({
      type: z.enum(PREFERENCE_TYPES),
      key: z.string(),
      value: z.string(),
      frequency: z.number().int().positive(),
      lastUsed: z.string()
    })
  ),
  createdAt: z.string(),
  updatedAt: z.string()
});

const rowSchema = z.object({
  id: z.string(),
  state: conversationRecordSchema,
  version: z.number().int()
});

function toStored(row: unknown): StoredConversation {
  const parsed = rowSchema.safeParse(row);
  if (!parsed.success) {
    throw new ClarificationEngineError(`Malformed ${CONVERSATIONS_TABLE} row: ${parsed.error.message}`);
  }
  const record: ConversationRecord = parsed.data.state;
  return { record, version: parsed.data.version };
}

/**
 * Conversations as one JSONB document per row. `version` is the
 * compare-and-swap token: updates match on it and bump it.
 */
export class SupabaseConversationStore implements ConversationStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async get(conversationId: string): Promise<StoredConversation | null> {
    const { data, error } = await this.supabase
      .from(CONVERSATIONS_TABLE)
      .select('id, state, version')
      .eq('id', conversationId)
      .maybeSingle();

    if (error) {
      logger.error('Error loading conversation:', error);
      throw new Error(`Failed to load conversation ${conversationId}: ${error.message}`);
    }

    return data ? toStored(data) : null;
  }

  async create(record: ConversationRecord): Promise<StoredConversation> {
    const { data, error } = await this.supabase
      .from(CONVERSATIONS_TABLE)
      .insert({ id: record.id, state: record, version: 1, updated_at: record.updatedAt })
      .select('id, state, version')
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new ClarificationEngineError(`Conversation ${record.id} already exists`);
      }
      logger.error('Error creating conversation:', error);
      throw new Error(`Failed to create conversation ${record.id}: ${error.message}`);
    }

    return toStored(data);
  }

  async update(record: ConversationRecord, expectedVersion: number): Promise<StoredConversation> {
    const { data, error } = await this.supabase
      .from(CONVERSATIONS_TABLE)
      .update({ state: record, version: expectedVersion + 1, updated_at: record.updatedAt })
      .eq('id', record.id)
      .eq('version', expectedVersion)
      .select('id, state, version')
      .maybeSingle();

    if (error) {
      logger.error('Error updating conversation:', error);
      throw new Error(`Failed to update conversation ${record.id}: ${error.message}`);
    }

    if (!data) {
      const exists = await this.get(record.id);
      if (!exists) throw new ConversationNotFoundError(record.id);
      throw new ConcurrencyConflictError(record.id, expectedVersion);
    }

    return toStored(data);
  }
}
