import type { AmbiguityCategory } from './models/clarification';

export class ClarificationEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The model's output could not be decoded into an intent analysis. */
export class MalformedAnalysisError extends ClarificationEngineError {
  constructor(message: string, readonly rawResponse?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Raised after the strict retry also produced malformed output. */
export class AnalysisFailureError extends ClarificationEngineError {}

export class CategoryMismatchError extends ClarificationEngineError {
  constructor(
    readonly expected: AmbiguityCategory,
    readonly received: AmbiguityCategory
  ) {
    super(`Clarification response for '${received}' does not match pending '${expected}' request`);
  }
}

export class InvalidClarificationResponseError extends ClarificationEngineError {}

/** The response targets a round another request has already answered. */
export class StaleClarificationError extends ClarificationEngineError {
  constructor(readonly conversationId: string, readonly round: number) {
    super(`Round ${round} of conversation ${conversationId} was already answered`);
  }
}

export class ToolExecutionFailure extends ClarificationEngineError {
  constructor(readonly toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A collaborator could not be reached within its own retry budget. */
export class CollaboratorUnavailableError extends ClarificationEngineError {
  constructor(readonly collaborator: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CollaboratorTimeoutError extends ClarificationEngineError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export class ConcurrencyConflictError extends ClarificationEngineError {
  constructor(readonly conversationId: string, readonly expectedVersion: number) {
    super(`Conversation ${conversationId} changed since version ${expectedVersion}`);
  }
}

export class ConversationBusyError extends ClarificationEngineError {
  constructor(readonly conversationId: string) {
    super(`Conversation ${conversationId} already has a request in flight`);
  }
}

export class ConversationNotFoundError extends ClarificationEngineError {
  constructor(readonly conversationId: string) {
    super(`Conversation ${conversationId} not found`);
  }
}
