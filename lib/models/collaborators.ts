import type { ClarificationRequest } from './clarification';
import type { ConversationRecord, StoredConversation } from './conversation';
import type { AmbiguityCondition, EntityKind, ParameterValue } from './intent';

export interface CompletionOptions {
  temperature: number;
  maxOutputTokens?: number;
}

export interface TextCompletionService {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface EntityRecord {
  id: string;
  label: string;
  /** ISO timestamp of the most recent activity. */
  lastActivity: string | null;
}

export interface EntityStore {
  findByNameFragment(fragment: string, kind: EntityKind): Promise<EntityRecord[]>;
}

export type ToolResult =
  | { ok: true; data: unknown }
  | {
      ok: false;
      error: string;
      /** Set when the failure is really an ambiguity the user can resolve. */
      condition?: AmbiguityCondition;
    };

export interface ToolExecutor {
  execute(toolName: string, parameters: Record<string, ParameterValue>): Promise<ToolResult>;
}

/**
 * Durable conversation state with compare-and-swap updates. `update` must fail
 * with ConcurrencyConflictError when the stored version differs.
 */
export interface ConversationStore {
  get(conversationId: string): Promise<StoredConversation | null>;
  create(record: ConversationRecord): Promise<StoredConversation>;
  update(record: ConversationRecord, expectedVersion: number): Promise<StoredConversation>;
}

export interface PresentationChannel {
  present(conversationId: string, turnNumber: number, request: ClarificationRequest): Promise<void>;
}
