import { v4 as uuidv4 } from 'uuid';
import type { ClarificationRequest, ClarificationResponse } from '../models/clarification';
import type { PresentationChannel, ToolExecutor, ToolResult } from '../models/collaborators';
import type {
  ClarificationRound,
  ConversationContext,
  ConversationRecord,
  DegradedReason,
  EnrichedContext,
  RejectionReason,
  Turn,
  TurnOutcome
} from '../models/conversation';
import { BUSY_STATES } from '../models/conversation';
import type { AmbiguityCondition, IntentAnalysis } from '../models/intent';
import {
  AnalysisFailureError,
  CategoryMismatchError,
  ClarificationEngineError,
  CollaboratorUnavailableError,
  ConversationBusyError,
  ConversationNotFoundError,
  InvalidClarificationResponseError,
  StaleClarificationError,
  ToolExecutionFailure
} from '../errors';
import { createLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import type { AmbiguityClassifier } from './ambiguityClassifier';
import type { ClarificationBuilder } from './clarificationBuilder';
import { applyPreferenceUses, type ContextMerger } from './contextMerger';
import type { ConversationRepository } from './conversationRepository';
import { CONFIDENCE_MARGIN, type IntentAnalyzer } from './intentAnalyzer';
import type { ResponseGenerator } from './responseGenerator';

const logger = createLogger('Conversation Controller');

const UNAVAILABLE_MESSAGE =
  "Sorry, a service I depend on isn't responding right now. Please try again in a few minutes.";
const UNEXPECTED_MESSAGE = 'Sorry, something went wrong while handling your request. Please try again.';

export interface ConversationControllerOptions {
  confidenceHigh: number;
  roundCap: number;
  toolRetries: number;
  maxToolIterations: number;
  historyLimit: number;
  toolTimeoutMs: number;
}

export interface ConversationControllerDependencies {
  analyzer: IntentAnalyzer;
  classifier: AmbiguityClassifier;
  builder: ClarificationBuilder;
  merger: ContextMerger;
  repository: ConversationRepository;
  tools: ToolExecutor;
  responses: ResponseGenerator;
  presentation?: PresentationChannel;
}

type ExecutionOutcome =
  | { type: 'done'; outcome: TurnOutcome }
  | { type: 'clarify'; condition: AmbiguityCondition; iterations: number };

/**
 * Drives a turn through analyze -> execute or clarify. The only suspension
 * point is a clarification; handleClarification resumes it. Public methods
 * always return an outcome.
 */
export class ConversationController {
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly deps: ConversationControllerDependencies,
    private readonly options: ConversationControllerOptions
  ) {}

  async handleInput(input: string, conversationId?: string, userId?: string): Promise<TurnOutcome> {
    const id = conversationId ?? uuidv4();
    if (!this.acquire(id)) return this.busy(id);

    let turnNumber: number | null = null;
    try {
      const existing = conversationId ? await this.deps.repository.get(id) : null;
      if (!existing) {
        await this.deps.repository.create(id, userId);
      }

      const { record, turn } = await this.deps.repository.appendTurn(id, input);
      turnNumber = turn.number;
      logger.info(`Turn ${turn.number} started on ${id}`);

      return await this.advance(record, turn.number);
    } catch (error) {
      return this.handleError(id, turnNumber, error);
    } finally {
      this.release(id);
    }
  }

  async handleClarification(conversationId: string, response: ClarificationResponse): Promise<TurnOutcome> {
    if (!this.acquire(conversationId)) return this.busy(conversationId);

    let turnNumber: number | null = null;
    try {
      const record = await this.deps.repository.get(conversationId);
      if (!record) {
        return this.reject(conversationId, null, 'not_found', `Conversation ${conversationId} not found`);
      }

      const suspended = this.suspendedTurn(record);
      if (!suspended) {
        if (BUSY_STATES.includes(record.lifecycle) && record.lifecycle !== 'awaiting_clarification') {
          return this.busy(conversationId);
        }
        return this.reject(
          conversationId,
          null,
          'no_pending_clarification',
          'There is no clarification waiting for an answer'
        );
      }

      const { turn, round } = suspended;
      turnNumber = turn.number;
      const answeredAt = new Date().toISOString();

      // Only reachable when another process presented the round under a higher cap.
      if (round.round > this.options.roundCap) {
        logger.warn(`Response to round ${round.round} exceeds the cap of ${this.options.roundCap}`);
        return await this.degrade(conversationId, turn, 'round_cap', {
          expected: 'awaiting_clarification',
          update: current => this.recordResponse(conversationId, current, round.round, response, answeredAt)
        });
      }

      let enriched: EnrichedContext;
      try {
        enriched = this.deps.merger.merge(round.request, response, this.contextFor(record, turn));
      } catch (error) {
        if (error instanceof CategoryMismatchError) {
          return this.reject(conversationId, turn.number, 'stale_clarification', error.message, round.request);
        }
        if (error instanceof InvalidClarificationResponseError) {
          return this.reject(conversationId, turn.number, 'invalid_response', error.message, round.request);
        }
        throw error;
      }

      const { learned, context } = enriched;
      const claimed = await this.deps.repository.mutate(conversationId, latest => {
        const current = latest.turns.find(candidate => candidate.number === turn.number);
        if (!current || current.status !== 'open' || latest.lifecycle !== 'awaiting_clarification') {
          throw new StaleClarificationError(conversationId, round.round);
        }
        this.recordResponse(conversationId, current, round.round, response, answeredAt);
        current.bindings = structuredClone(context.bindings);
        latest.preferences = applyPreferenceUses(latest.preferences, learned, answeredAt);
        latest.lifecycle = 'analyzing';
      });

      logger.info(`Merged round ${round.round} of turn ${turn.number} on ${conversationId}`);
      return await this.advance(claimed, turn.number);
    } catch (error) {
      if (error instanceof StaleClarificationError) {
        const pending = await this.pendingRequest(conversationId);
        return this.reject(conversationId, turnNumber, 'stale_clarification', error.message, pending);
      }
      return this.handleError(conversationId, turnNumber, error);
    } finally {
      this.release(conversationId);
    }
  }

  /** Ends a suspended turn with a degraded answer. */
  async abandon(conversationId: string): Promise<TurnOutcome> {
    if (!this.acquire(conversationId)) return this.busy(conversationId);

    let turnNumber: number | null = null;
    try {
      const record = await this.deps.repository.get(conversationId);
      if (!record) {
        return this.reject(conversationId, null, 'not_found', `Conversation ${conversationId} not found`);
      }

      const suspended = this.suspendedTurn(record);
      if (!suspended) {
        return this.reject(conversationId, null, 'no_pending_clarification', 'There is no clarification to abandon');
      }

      turnNumber = suspended.turn.number;
      logger.info(`Abandoning turn ${turnNumber} on ${conversationId}`);
      return await this.degrade(conversationId, suspended.turn, 'abandoned', { expected: 'awaiting_clarification' });
    } catch (error) {
      return this.handleError(conversationId, turnNumber, error);
    } finally {
      this.release(conversationId);
    }
  }

  async getConversation(conversationId: string): Promise<ConversationRecord | null> {
    try {
      return await this.deps.repository.get(conversationId);
    } catch (error) {
      logger.error(`Error loading conversation ${conversationId}:`, error);
      return null;
    }
  }

  private async advance(record: ConversationRecord, turnNumber: number): Promise<TurnOutcome> {
    const turn = turnOf(record, turnNumber);
    const context = this.contextFor(record, turn);
    const input = turn.bindings.rephrasedInput ?? turn.input;

    const analysis = await this.analyze(input, context);
    if (analysis.conditions.length > 0 || analysis.confidence < this.options.confidenceHigh) {
      return this.clarify(record.id, turn, analysis, context, turn.iterations);
    }

    const execution = await this.execute(record.id, turn, analysis);
    if (execution.type === 'done') return execution.outcome;

    logger.info(`Tool reported ${execution.condition.tag}, asking the user`);
    const blocked: IntentAnalysis = {
      ...analysis,
      conditions: [execution.condition],
      confidence: Math.max(0, Math.min(analysis.confidence, this.options.confidenceHigh - CONFIDENCE_MARGIN))
    };
    return this.clarify(record.id, turn, blocked, context, execution.iterations);
  }

  private async analyze(input: string, context: ConversationContext): Promise<IntentAnalysis> {
    try {
      return await this.deps.analyzer.analyze(input, context);
    } catch (error) {
      if (!(error instanceof AnalysisFailureError)) throw error;
      logger.warn('Model analysis failed, using rules:', error.message);
      return this.deps.analyzer.fallbackAnalysis(input, context);
    }
  }

  private async clarify(
    conversationId: string,
    turn: Turn,
    analysis: IntentAnalysis,
    context: ConversationContext,
    iterations: number
  ): Promise<TurnOutcome> {
    const round = turn.rounds.length + 1;
    if (round > this.options.roundCap) {
      logger.warn(`Turn ${turn.number} on ${conversationId} did not converge in ${this.options.roundCap} rounds`);
      return this.degrade(conversationId, turn, 'round_cap', { analysis, iterations });
    }

    const category = this.deps.classifier.classify(analysis);
    const request = await this.deps.builder.build(category, {
      analysis,
      context,
      round,
      userInput: turn.bindings.rephrasedInput ?? turn.input
    });

    await this.deps.repository.updateTurn(conversationId, turn.number, 'awaiting_clarification', current => {
      current.analysis = analysis;
      current.bindings = structuredClone(context.bindings);
      current.iterations = Math.max(current.iterations, iterations);
      current.rounds.push({ round, request, presentedAt: new Date().toISOString() });
    });

    logger.info(`Round ${round} of turn ${turn.number}: ${request.category}`);
    await this.present(conversationId, turn.number, request);

    return { type: 'clarification_needed', conversationId, turnNumber: turn.number, request, analysis };
  }

  private async execute(conversationId: string, turn: Turn, analysis: IntentAnalysis): Promise<ExecutionOutcome> {
    await this.deps.repository.updateTurn(conversationId, turn.number, 'executing', current => {
      current.analysis = analysis;
    });

    let iterations = turn.iterations;
    let failures = 0;

    while (iterations < this.options.maxToolIterations) {
      iterations += 1;
      const result = await this.runTool(analysis);

      if (result.ok) {
        const answer = this.deps.responses.resultAnswer(analysis, result.data);
        await this.deps.repository.updateTurn(conversationId, turn.number, 'resolved', current => {
          current.iterations = iterations;
          current.status = 'resolved';
          current.result = { answer, data: result.data };
          current.resolvedAt = new Date().toISOString();
        });

        logger.info(`Turn ${turn.number} on ${conversationId} resolved after ${iterations} tool call(s)`);
        return {
          type: 'done',
          outcome: { type: 'result', conversationId, turnNumber: turn.number, answer, data: result.data, iterations }
        };
      }

      if (result.condition) {
        return { type: 'clarify', condition: result.condition, iterations };
      }

      failures += 1;
      logger.warn(`Tool ${analysis.intent} failed (${failures}/${this.options.toolRetries + 1}): ${result.error}`);
      if (failures > this.options.toolRetries) {
        return { type: 'done', outcome: await this.degrade(conversationId, turn, 'tool_failure', { analysis, iterations }) };
      }
    }

    return { type: 'done', outcome: await this.degrade(conversationId, turn, 'iteration_cap', { analysis, iterations }) };
  }

  private async runTool(analysis: IntentAnalysis): Promise<ToolResult> {
    try {
      return await withTimeout(
        this.deps.tools.execute(analysis.intent, analysis.parameters),
        this.options.toolTimeoutMs,
        `tool ${analysis.intent}`
      );
    } catch (error) {
      if (error instanceof CollaboratorUnavailableError) throw error;
      const failure =
        error instanceof ToolExecutionFailure
          ? error
          : new ToolExecutionFailure(analysis.intent, error instanceof Error ? error.message : 'Tool execution failed', {
              cause: error
            });
      return { ok: false, error: failure.message };
    }
  }

  private async degrade(
    conversationId: string,
    turn: Turn,
    reason: DegradedReason,
    extra: {
      analysis?: IntentAnalysis;
      iterations?: number;
      expected?: 'awaiting_clarification';
      update?: (turn: Turn) => void;
    } = {}
  ): Promise<TurnOutcome> {
    const analysis = extra.analysis ?? turn.analysis;
    const answer = await this.deps.responses.degradedAnswer({ input: turn.input, reason, analysis });

    await this.deps.repository.updateTurn(
      conversationId,
      turn.number,
      'resolved_degraded',
      current => {
        extra.update?.(current);
        if (analysis) current.analysis = analysis;
        current.iterations = Math.max(current.iterations, extra.iterations ?? 0);
        current.status = 'degraded';
        current.result = { answer, degradedReason: reason };
        current.resolvedAt = new Date().toISOString();
      },
      extra.expected
    );

    return { type: 'degraded', conversationId, turnNumber: turn.number, answer, reason };
  }

  private async present(conversationId: string, turnNumber: number, request: ClarificationRequest): Promise<void> {
    if (!this.deps.presentation) return;

    try {
      await this.deps.presentation.present(conversationId, turnNumber, request);
    } catch (error) {
      // The request is stored; the client can still fetch it with getConversation.
      logger.error('Presentation channel push failed:', error);
    }
  }

  private contextFor(record: ConversationRecord, turn: Turn): ConversationContext {
    const history = record.turns
      .filter(previous => previous.number < turn.number)
      .slice(-this.options.historyLimit)
      .map(previous => ({ turnNumber: previous.number, input: previous.input, answer: previous.result?.answer }));

    const pending = turn.status === 'open' ? lastUnanswered(turn) : undefined;

    return {
      conversationId: record.id,
      userId: record.userId,
      history,
      preferences: record.preferences,
      bindings: turn.bindings,
      pendingClarification: pending?.request
    };
  }

  private suspendedTurn(record: ConversationRecord): { turn: Turn; round: ClarificationRound } | null {
    if (record.lifecycle !== 'awaiting_clarification') return null;

    const turn = record.turns[record.turns.length - 1];
    if (!turn || turn.status !== 'open') return null;

    const round = lastUnanswered(turn);
    return round ? { turn, round } : null;
  }

  /** Attaches the response to `roundNumber` if that round is still the one waiting. */
  private recordResponse(
    conversationId: string,
    turn: Turn,
    roundNumber: number,
    response: ClarificationResponse,
    at: string
  ): void {
    const round = lastUnanswered(turn);
    if (!round || round.round !== roundNumber) {
      throw new StaleClarificationError(conversationId, roundNumber);
    }
    round.response = response;
    round.respondedAt = at;
  }

  private async handleError(conversationId: string, turnNumber: number | null, error: unknown): Promise<TurnOutcome> {
    if (error instanceof ConversationBusyError) {
      return this.busy(conversationId);
    }
    if (error instanceof ConversationNotFoundError) {
      return this.reject(conversationId, turnNumber, 'not_found', error.message);
    }

    const unavailable = error instanceof CollaboratorUnavailableError;
    logger.error(`Turn ${turnNumber ?? '-'} on ${conversationId} failed:`, error);
    const message = unavailable ? UNAVAILABLE_MESSAGE : UNEXPECTED_MESSAGE;

    if (turnNumber !== null) {
      const number = turnNumber;
      try {
        await this.deps.repository.mutate(conversationId, current => {
          const turn = current.turns.find(candidate => candidate.number === number);
          // A turn someone else already finished keeps its outcome.
          if (!turn || turn.status !== 'open') return;
          turn.status = 'failed';
          turn.error = error instanceof Error ? error.message : String(error);
          turn.resolvedAt = new Date().toISOString();
          current.lifecycle = 'failed';
        });
      } catch (persistError) {
        logger.error(`Could not record failure of turn ${number} on ${conversationId}:`, persistError);
      }
    }

    return { type: 'failed', conversationId, turnNumber, message };
  }

  private async pendingRequest(conversationId: string): Promise<ClarificationRequest | undefined> {
    try {
      const record = await this.deps.repository.get(conversationId);
      return record ? this.suspendedTurn(record)?.round.request : undefined;
    } catch (error) {
      logger.error(`Could not load the pending question of ${conversationId}:`, error);
      return undefined;
    }
  }

  private reject(
    conversationId: string,
    turnNumber: number | null,
    reason: RejectionReason,
    message: string,
    pending?: ClarificationRequest
  ): TurnOutcome {
    logger.warn(`Rejected request on ${conversationId}: ${reason}`);
    return { type: 'rejected', conversationId, turnNumber, reason, message, pending };
  }

  private busy(conversationId: string): TurnOutcome {
    return this.reject(
      conversationId,
      null,
      'conversation_busy',
      `Conversation ${conversationId} is busy. Answer the pending question or wait for the current request to finish.`
    );
  }

  private acquire(conversationId: string): boolean {
    if (this.inFlight.has(conversationId)) return false;
    this.inFlight.add(conversationId);
    return true;
  }

  private release(conversationId: string): void {
    this.inFlight.delete(conversationId);
  }
}

function turnOf(record: ConversationRecord, turnNumber: number): Turn {
  const turn = record.turns.find(candidate => candidate.number === turnNumber);
  if (!turn) {
    throw new ClarificationEngineError(`Turn ${turnNumber} missing from conversation ${record.id}`);
  }
  return turn;
}

function lastUnanswered(turn: Turn): ClarificationRound | undefined {
  const last = turn.rounds[turn.rounds.length - 1];
  return last && !last.response ? last : undefined;
}
