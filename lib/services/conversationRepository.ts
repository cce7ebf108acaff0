import type { ConversationStore } from '../models/collaborators';
import type { ConversationRecord, LifecycleState, Turn } from '../models/conversation';
import { BUSY_STATES, emptyBindings } from '../models/conversation';
import {
  ClarificationEngineError,
  CollaboratorUnavailableError,
  ConcurrencyConflictError,
  ConversationBusyError,
  ConversationNotFoundError
} from '../errors';
import { createLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

const logger = createLogger('Conversation Repository');

export interface ConversationRepositoryOptions {
  storeConflictRetries: number;
  storeTimeoutMs: number;
}

export type RecordMutation = (record: ConversationRecord) => void;

/**
 * Read-modify-write access to conversations. Every write is a compare-and-swap
 * on the stored version, re-read and re-applied on conflict.
 */
export class ConversationRepository {
  constructor(
    private readonly store: ConversationStore,
    private readonly options: ConversationRepositoryOptions
  ) {}

  async get(conversationId: string): Promise<ConversationRecord | null> {
    const stored = await this.call('get', () => this.store.get(conversationId));
    return stored ? stored.record : null;
  }

  async create(conversationId: string, userId?: string): Promise<ConversationRecord> {
    const now = new Date().toISOString();
    const record: ConversationRecord = {
      id: conversationId,
      userId,
      lifecycle: 'idle',
      turns: [],
      preferences: {},
      createdAt: now,
      updatedAt: now
    };

    const stored = await this.call('create', () => this.store.create(record));
    logger.info(`Created conversation ${conversationId}`);
    return stored.record;
  }

  /**
   * Applies `mutation` to a fresh copy of the latest record and stores it.
   * Errors thrown by the mutation abort the write and propagate unchanged.
   */
  async mutate(conversationId: string, mutation: RecordMutation): Promise<ConversationRecord> {
    let conflict: ConcurrencyConflictError | undefined;

    for (let attempt = 0; attempt <= this.options.storeConflictRetries; attempt++) {
      const stored = await this.call('get', () => this.store.get(conversationId));
      if (!stored) {
        throw new ConversationNotFoundError(conversationId);
      }

      const record = structuredClone(stored.record);
      mutation(record);
      record.updatedAt = new Date().toISOString();

      try {
        const updated = await this.call('update', () => this.store.update(record, stored.version));
        return updated.record;
      } catch (error) {
        if (!(error instanceof ConcurrencyConflictError)) throw error;
        conflict = error;
        logger.warn(`Version conflict on ${conversationId}, attempt ${attempt + 1}`);
      }
    }

    throw conflict ?? new ConcurrencyConflictError(conversationId, -1);
  }

  /** Starts turn n+1. Fails with ConversationBusyError if a turn is still in progress. */
  async appendTurn(conversationId: string, input: string): Promise<{ record: ConversationRecord; turn: Turn }> {
    const record = await this.mutate(conversationId, current => {
      if (BUSY_STATES.includes(current.lifecycle)) {
        throw new ConversationBusyError(conversationId);
      }

      current.turns.push({
        number: current.turns.length + 1,
        input,
        status: 'open',
        rounds: [],
        bindings: emptyBindings(),
        iterations: 0,
        startedAt: new Date().toISOString()
      });
      current.lifecycle = 'analyzing';
    });

    return { record, turn: record.turns[record.turns.length - 1] };
  }

  /**
   * Changes the open turn `turnNumber` and moves the conversation to `lifecycle`.
   * With `expected` set, the write only happens from that lifecycle state.
   */
  async updateTurn(
    conversationId: string,
    turnNumber: number,
    lifecycle: LifecycleState,
    update: (turn: Turn, record: ConversationRecord) => void,
    expected?: LifecycleState
  ): Promise<ConversationRecord> {
    return this.mutate(conversationId, current => {
      if (expected && current.lifecycle !== expected) {
        throw new ConversationBusyError(conversationId);
      }

      const turn = current.turns.find(candidate => candidate.number === turnNumber);
      if (!turn || turn.status !== 'open') {
        throw new ClarificationEngineError(`Turn ${turnNumber} of ${conversationId} is not open`);
      }

      update(turn, current);
      current.lifecycle = lifecycle;
    });
  }

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(run(), this.options.storeTimeoutMs, `conversation store ${operation}`);
    } catch (error) {
      if (error instanceof ConcurrencyConflictError || error instanceof CollaboratorUnavailableError) throw error;
      throw new CollaboratorUnavailableError('conversation-store', `Conversation store ${operation} failed`, {
        cause: error
      });
    }
  }
}
