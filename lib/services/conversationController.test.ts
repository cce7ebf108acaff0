import { describe, it, expect } from 'vitest';
import { createClarificationEngine } from '../engine';
import type { EngineConfig } from '../config';
import { CollaboratorUnavailableError } from '../errors';
import type { ClarificationRequest, ClarificationResponse } from '../models/clarification';
import type { ConversationStore, TextCompletionService, ToolResult } from '../models/collaborators';
import type { ConversationRecord, StoredConversation, TurnOutcome } from '../models/conversation';
import { MemoryConversationStore } from '../stores/memoryConversationStore';
import { MemoryEntityStore } from '../stores/memoryEntityStore';
import {
  FakeToolExecutor,
  JOHNS,
  RecordingPresentation,
  ScriptedCompletion,
  analysisReply,
  deferred,
  testConfig,
  type CompletionScript
} from '../testing/fakes';

const NO_SUGGESTIONS = '{"actions": []}';

const JOHN_CLAIMS = analysisReply({
  intent: 'get_claims',
  entities: [{ name: 'patient', kind: 'patient', reference: 'John' }],
  confidence: 0.95
});
const P1_CLAIMS = analysisReply({ intent: 'get_claims', parameters: { patient_id: 'P-1' }, confidence: 0.95 });
const UNKNOWN = analysisReply({ intent: 'unknown', confidence: 0.3 });

const ONE_CLAIM: ToolResult = { ok: true, data: [{ claim_id: 'CLM-1' }] };

interface SetupOptions {
  script?: CompletionScript;
  completion?: TextCompletionService;
  tools?: FakeToolExecutor;
  config?: Partial<EngineConfig>;
  store?: ConversationStore;
}

function setup(options: SetupOptions = {}) {
  const completion = options.completion ?? new ScriptedCompletion({ scope: NO_SUGGESTIONS, ...options.script });
  const store = options.store ?? new MemoryConversationStore();
  const tools = options.tools ?? new FakeToolExecutor(() => ONE_CLAIM);
  const presentation = new RecordingPresentation();

  const controller = createClarificationEngine(testConfig(options.config), {
    completion,
    entityStore: new MemoryEntityStore({ patient: JOHNS }),
    conversationStore: store,
    tools,
    presentation
  });

  return { controller, store, tools, presentation, completion };
}

/** Holds the `pauseOnRead`-th read until `resume` resolves, like a slow replica. */
class PausingStore implements ConversationStore {
  readonly paused = deferred<void>();
  readonly resume = deferred<void>();
  private reads = 0;

  constructor(
    private readonly inner: ConversationStore,
    private readonly pauseOnRead: number
  ) {}

  async get(conversationId: string): Promise<StoredConversation | null> {
    this.reads += 1;
    if (this.reads === this.pauseOnRead) {
      this.paused.resolve();
      await this.resume.promise;
    }
    return this.inner.get(conversationId);
  }

  create(record: ConversationRecord): Promise<StoredConversation> {
    return this.inner.create(record);
  }

  update(record: ConversationRecord, expectedVersion: number): Promise<StoredConversation> {
    return this.inner.update(record, expectedVersion);
  }
}

function requestOf(outcome: TurnOutcome): ClarificationRequest {
  if (outcome.type !== 'clarification_needed') {
    throw new Error(`expected clarification_needed, got ${outcome.type}`);
  }
  return outcome.request;
}

function optionIds(request: ClarificationRequest): string[] {
  switch (request.presentation.mode) {
    case 'single_select':
    case 'multi_select':
    case 'single_select_with_details':
      return request.presentation.options.map(option => option.id);
    case 'action_list':
      return request.presentation.actions.map(action => action.id);
    default:
      return [];
  }
}

function choose(request: ClarificationRequest, optionId: string, text?: string): ClarificationResponse {
  return { category: request.category, requestId: request.id, selection: { kind: 'option', optionIds: [optionId], text } };
}

async function versionOf(store: ConversationStore, conversationId: string): Promise<number | undefined> {
  return (await store.get(conversationId))?.version;
}

// ============================================================================
// Happy paths
// ============================================================================

describe('ConversationController', () => {
  it('should execute right away when the request is unambiguous', async () => {
    const { controller, tools } = setup({ script: { analysis: [P1_CLAIMS] } });

    const outcome = await controller.handleInput('Show claims for patient P-1', 'conv-1');

    expect(outcome).toEqual({
      type: 'result',
      conversationId: 'conv-1',
      turnNumber: 1,
      answer: 'List the claims of a specific patient: 1 record found.',
      data: [{ claim_id: 'CLM-1' }],
      iterations: 1
    });
    expect(tools.calls).toEqual([{ toolName: 'get_claims', parameters: { patient_id: 'P-1' } }]);

    const record = await controller.getConversation('conv-1');
    expect(record?.lifecycle).toBe('resolved');
    expect(record?.turns[0]).toMatchObject({ status: 'resolved', iterations: 1 });
  });

  it('should create a conversation when none is named', async () => {
    const { controller, store } = setup({ script: { analysis: [P1_CLAIMS] } });

    const outcome = await controller.handleInput('Show claims for patient P-1');

    expect(outcome.type).toBe('result');
    expect(outcome.conversationId).toMatch(/^[0-9a-f-]{36}$/);
    expect(await versionOf(store, outcome.conversationId)).toBeGreaterThan(1);
  });

  it('should ask which John, then answer for the chosen one', async () => {
    const { controller, tools, presentation } = setup({ script: { analysis: [JOHN_CLAIMS] } });

    const first = await controller.handleInput('Show claims for John', 'conv-1');
    const request = requestOf(first);

    expect(request.category).toBe('entity_disambiguation');
    expect(request.round).toBe(1);
    expect(optionIds(request)).toEqual(['A', 'B', 'C']);
    expect(first.type === 'clarification_needed' && first.analysis.confidence).toBeLessThan(0.9);
    expect(presentation.presented).toEqual([{ conversationId: 'conv-1', turnNumber: 1, request }]);
    expect((await controller.getConversation('conv-1'))?.lifecycle).toBe('awaiting_clarification');
    expect(tools.calls).toEqual([]);

    const second = await controller.handleClarification('conv-1', choose(request, 'B'));

    expect(second).toMatchObject({ type: 'result', turnNumber: 1, iterations: 1 });
    expect(tools.calls).toEqual([{ toolName: 'get_claims', parameters: { patient_id: 'B' } }]);

    const record = await controller.getConversation('conv-1');
    expect(record?.lifecycle).toBe('resolved');
    expect(record?.turns[0].rounds[0].response?.selection).toEqual({ kind: 'option', optionIds: ['B'], text: undefined });
    expect(record?.turns[0].bindings.entities.patient).toEqual({ id: 'B', label: 'John Brown', kind: 'patient' });
    expect(record?.preferences['entity_selection:john:B'].frequency).toBe(1);
  });

  it('should recommend the earlier choice on the next turn', async () => {
    const { controller, completion } = setup({ script: { analysis: [JOHN_CLAIMS] } });

    const first = requestOf(await controller.handleInput('Show claims for John', 'conv-1'));
    await controller.handleClarification('conv-1', choose(first, 'B'));
    const next = requestOf(await controller.handleInput('Show claims for John again', 'conv-1'));

    expect(next.presentation.mode === 'single_select' && next.presentation.options.map(o => o.recommended)).toEqual([
      false,
      true,
      false
    ]);
    const prompts = completion instanceof ScriptedCompletion ? completion.analysisPrompts : [];
    expect(prompts[prompts.length - 1]).toContain(
      'Turn 1: user: Show claims for John | assistant: List the claims of a specific patient: 1 record found.'
    );
  });

  it('should ask for scope before naming candidates when the model is unsure', async () => {
    const unsure = analysisReply({
      intent: 'get_claims',
      entities: [{ name: 'patient', kind: 'patient', reference: 'John' }],
      confidence: 0.3
    });
    const { controller } = setup({ script: { analysis: [unsure] } });

    const outcome = await controller.handleInput('claims for John maybe', 'conv-1');

    expect(requestOf(outcome).category).toBe('scope_guidance');
    expect(outcome.type === 'clarification_needed' && outcome.analysis.conditions.map(c => c.tag)).toEqual([
      'entity_ambiguous',
      'low_confidence'
    ]);
  });

  it('should fall back to rules when the model output is unusable', async () => {
    const { controller } = setup({
      script: {
        analysis: ['not json'],
        scope: JSON.stringify({ actions: [{ id: 'get_claims', label: "Show a patient's claims" }] })
      }
    });

    const outcome = await controller.handleInput('hello there', 'conv-1');

    expect(outcome.type === 'clarification_needed' && outcome.analysis.source).toBe('rules');
    const request = requestOf(outcome);
    expect(request.category).toBe('scope_guidance');
    expect(request.presentation.mode === 'action_list' && request.presentation.actions).toEqual([
      { id: 'get_claims', label: "Show a patient's claims" }
    ]);
  });

  // ==========================================================================
  // Busy conversations
  // ==========================================================================

  it('should reject input while a request is in flight without touching the conversation', async () => {
    const started = deferred<void>();
    const gate = deferred<string>();
    const completion: TextCompletionService = {
      complete: async () => {
        started.resolve();
        return gate.promise;
      }
    };
    const { controller, store } = setup({ completion });

    const first = controller.handleInput('Show claims for patient P-1', 'conv-busy');
    await started.promise;
    const before = await versionOf(store, 'conv-busy');

    const second = await controller.handleInput('Show claims for John', 'conv-busy');
    const clarification = await controller.handleClarification('conv-busy', {
      category: 'entity_disambiguation',
      selection: { kind: 'option', optionIds: ['A'] }
    });

    expect(second).toMatchObject({ type: 'rejected', reason: 'conversation_busy', turnNumber: null });
    expect(clarification).toMatchObject({ type: 'rejected', reason: 'conversation_busy' });
    expect(await versionOf(store, 'conv-busy')).toBe(before);

    gate.resolve(P1_CLAIMS);
    expect((await first).type).toBe('result');
  });

  it('should reject new input while a clarification is pending', async () => {
    const { controller, store } = setup({ script: { analysis: [JOHN_CLAIMS] } });
    await controller.handleInput('Show claims for John', 'conv-1');
    const before = await versionOf(store, 'conv-1');

    const outcome = await controller.handleInput('Show claims for patient P-1', 'conv-1');

    expect(outcome).toEqual({
      type: 'rejected',
      conversationId: 'conv-1',
      turnNumber: null,
      reason: 'conversation_busy',
      message: 'Conversation conv-1 is busy. Answer the pending question or wait for the current request to finish.',
      pending: undefined
    });
    expect(await versionOf(store, 'conv-1')).toBe(before);
  });

  // ==========================================================================
  // Clarification responses
  // ==========================================================================

  it('should reject a stale response and keep the pending question', async () => {
    const { controller, store } = setup({ script: { analysis: [JOHN_CLAIMS] } });
    const request = requestOf(await controller.handleInput('Show claims for John', 'conv-1'));
    const before = await versionOf(store, 'conv-1');

    const outcome = await controller.handleClarification('conv-1', {
      category: 'parameter_elicitation',
      selection: { kind: 'fields', values: { patient_id: 'A' } }
    });

    expect(outcome).toMatchObject({ type: 'rejected', reason: 'stale_clarification', turnNumber: 1 });
    expect(outcome.type === 'rejected' && outcome.pending).toEqual(request);
    expect(await versionOf(store, 'conv-1')).toBe(before);

    const answered = await controller.handleClarification('conv-1', choose(request, 'C'));
    expect(answered.type).toBe('result');
  });

  it('should reject an option that was not offered', async () => {
    const { controller } = setup({ script: { analysis: [JOHN_CLAIMS] } });
    const request = requestOf(await controller.handleInput('Show claims for John', 'conv-1'));

    const outcome = await controller.handleClarification('conv-1', choose(request, 'Z'));

    expect(outcome).toMatchObject({ type: 'rejected', reason: 'invalid_response', message: "Unknown option 'Z'" });
    expect((await controller.getConversation('conv-1'))?.lifecycle).toBe('awaiting_clarification');
  });

  it('should report unknown conversations and missing questions', async () => {
    const { controller } = setup({ script: { analysis: [P1_CLAIMS] } });
    const response: ClarificationResponse = {
      category: 'scope_guidance',
      selection: { kind: 'text', value: 'anything' }
    };

    expect(await controller.handleClarification('conv-missing', response)).toMatchObject({
      type: 'rejected',
      reason: 'not_found'
    });

    await controller.handleInput('Show claims for patient P-1', 'conv-1');
    expect(await controller.handleClarification('conv-1', response)).toMatchObject({
      type: 'rejected',
      reason: 'no_pending_clarification'
    });
    expect(await controller.getConversation('conv-missing')).toBeNull();
  });

  // ==========================================================================
  // Round cap
  // ==========================================================================

  it('should degrade when the turn needs more rounds than the cap', async () => {
    const { controller } = setup({ script: { analysis: [UNKNOWN] }, config: { roundCap: 2 } });

    const round1 = requestOf(await controller.handleInput('do the thing', 'conv-1'));
    expect(optionIds(round1)).toEqual(['rephrase']);

    const round2 = requestOf(await controller.handleClarification('conv-1', choose(round1, 'rephrase', 'do the other thing')));
    expect(round2.round).toBe(2);

    const outcome = await controller.handleClarification('conv-1', choose(round2, 'rephrase', 'do a third thing'));

    expect(outcome).toEqual({
      type: 'degraded',
      conversationId: 'conv-1',
      turnNumber: 1,
      reason: 'round_cap',
      answer:
        "I couldn't complete your request. Note: Clarification did not converge within the allowed number of rounds. Try rephrasing it with the exact names or IDs involved."
    });

    const record = await controller.getConversation('conv-1');
    expect(record?.lifecycle).toBe('resolved_degraded');
    expect(record?.turns[0].rounds).toHaveLength(2);
    expect(record?.turns[0].result?.degradedReason).toBe('round_cap');
  });

  it('should degrade a response to a round past the cap whatever it says', async () => {
    const store = new MemoryConversationStore();
    const generous = setup({ script: { analysis: [UNKNOWN] }, store, config: { roundCap: 5 } });
    const strict = setup({ script: { analysis: [UNKNOWN] }, store, config: { roundCap: 2 } });

    const round1 = requestOf(await generous.controller.handleInput('do the thing', 'conv-1'));
    const round2 = requestOf(await generous.controller.handleClarification('conv-1', choose(round1, 'rephrase', 'again')));
    const round3 = requestOf(await generous.controller.handleClarification('conv-1', choose(round2, 'rephrase', 'and again')));
    expect(round3.round).toBe(3);

    const response: ClarificationResponse = {
      category: 'entity_disambiguation',
      selection: { kind: 'option', optionIds: ['nope'] }
    };
    const outcome = await strict.controller.handleClarification('conv-1', response);

    expect(outcome).toMatchObject({ type: 'degraded', reason: 'round_cap', turnNumber: 1 });
    const record = await store.get('conv-1');
    expect(record?.record.turns[0].rounds[2].response).toEqual(response);
    expect(record?.record.turns[0].status).toBe('degraded');
  });

  it('should reject input from another process while a clarification is pending', async () => {
    const store = new MemoryConversationStore();
    const first = setup({ script: { analysis: [JOHN_CLAIMS] }, store });
    const second = setup({ script: { analysis: [P1_CLAIMS] }, store });

    await first.controller.handleInput('Show claims for John', 'conv-1');
    const outcome = await second.controller.handleInput('Show claims for patient P-1', 'conv-1');

    expect(outcome).toMatchObject({ type: 'rejected', reason: 'conversation_busy' });
    expect(second.tools.calls).toEqual([]);
  });

  it('should reject a duplicate response once the round has moved on', async () => {
    const store = new MemoryConversationStore();
    const pausing = new PausingStore(store, 2);
    const first = setup({ script: { analysis: [JOHN_CLAIMS, UNKNOWN] }, store });
    const second = setup({ script: { analysis: [JOHN_CLAIMS, UNKNOWN] }, store: pausing });

    const round1 = requestOf(await first.controller.handleInput('Show claims for John', 'conv-1'));
    const duplicate = second.controller.handleClarification('conv-1', choose(round1, 'B'));
    await pausing.paused.promise;

    const round2 = requestOf(await first.controller.handleClarification('conv-1', choose(round1, 'B')));
    expect(round2).toMatchObject({ round: 2, category: 'scope_guidance' });

    pausing.resume.resolve();
    const outcome = await duplicate;

    expect(outcome).toMatchObject({
      type: 'rejected',
      reason: 'stale_clarification',
      turnNumber: 1,
      message: 'Round 1 of conversation conv-1 was already answered'
    });
    expect(outcome.type === 'rejected' && outcome.pending).toEqual(round2);

    const record = await store.get('conv-1');
    expect(record?.record.lifecycle).toBe('awaiting_clarification');
    expect(record?.record.turns[0].status).toBe('open');
    expect(record?.record.turns[0].rounds).toHaveLength(2);
    expect(record?.record.preferences['entity_selection:john:B'].frequency).toBe(1);
    expect(second.tools.calls).toEqual([]);
  });

  it('should reject a duplicate response once the turn is resolved', async () => {
    const store = new MemoryConversationStore();
    const pausing = new PausingStore(store, 2);
    const first = setup({ script: { analysis: [JOHN_CLAIMS] }, store });
    const second = setup({ script: { analysis: [JOHN_CLAIMS] }, store: pausing });

    const request = requestOf(await first.controller.handleInput('Show claims for John', 'conv-1'));
    const duplicate = second.controller.handleClarification('conv-1', choose(request, 'B'));
    await pausing.paused.promise;

    expect((await first.controller.handleClarification('conv-1', choose(request, 'B'))).type).toBe('result');
    pausing.resume.resolve();

    expect(await duplicate).toMatchObject({ type: 'rejected', reason: 'stale_clarification', pending: undefined });
    const record = await store.get('conv-1');
    expect(record?.record.lifecycle).toBe('resolved');
    expect(record?.record.turns[0].status).toBe('resolved');
    expect(record?.record.preferences['entity_selection:john:B'].frequency).toBe(1);
    expect(first.tools.calls).toHaveLength(1);
    expect(second.tools.calls).toEqual([]);
  });

  // ==========================================================================
  // Abandon
  // ==========================================================================

  it('should degrade an abandoned turn and accept new input afterwards', async () => {
    const { controller } = setup({ script: { analysis: [JOHN_CLAIMS] } });
    await controller.handleInput('Show claims for John', 'conv-1');

    const outcome = await controller.abandon('conv-1');

    expect(outcome).toEqual({
      type: 'degraded',
      conversationId: 'conv-1',
      turnNumber: 1,
      reason: 'abandoned',
      answer:
        "My best guess is that you wanted to list the claims of a specific patient, but I couldn't complete it. Note: The conversation was abandoned before clarification finished."
    });
    expect(await controller.abandon('conv-1')).toMatchObject({ type: 'rejected', reason: 'no_pending_clarification' });

    const next = await controller.handleInput('Show claims for John', 'conv-1');
    expect(next).toMatchObject({ type: 'clarification_needed', turnNumber: 2 });
  });

  // ==========================================================================
  // Tool execution
  // ==========================================================================

  it('should degrade after the tool fails past its retries', async () => {
    const tools = new FakeToolExecutor(() => ({ ok: false, error: 'upstream 502' }));
    const { controller } = setup({ script: { analysis: [P1_CLAIMS] }, tools, config: { toolRetries: 3 } });

    const outcome = await controller.handleInput('Show claims for patient P-1', 'conv-1');

    expect(tools.calls).toHaveLength(4);
    expect(outcome).toEqual({
      type: 'degraded',
      conversationId: 'conv-1',
      turnNumber: 1,
      reason: 'tool_failure',
      answer:
        "My best guess is that you wanted to list the claims of a specific patient (patient_id: P-1), but I couldn't complete it. Note: The tool kept failing after several retries."
    });
    expect((await controller.getConversation('conv-1'))?.turns[0].iterations).toBe(4);
  });

  it('should use the model for the best guess when it answers', async () => {
    const tools = new FakeToolExecutor(() => ({ ok: false, error: 'upstream 502' }));
    const { controller } = setup({
      script: { analysis: [P1_CLAIMS], degraded: 'You wanted the claims of patient P-1.' },
      tools,
      config: { toolRetries: 0 }
    });

    const outcome = await controller.handleInput('Show claims for patient P-1', 'conv-1');

    expect(outcome.type === 'degraded' && outcome.answer).toBe(
      'You wanted the claims of patient P-1.\n\nNote: The tool kept failing after several retries.'
    );
    expect(tools.calls).toHaveLength(1);
  });

  it('should stop at the per-turn iteration limit', async () => {
    const tools = new FakeToolExecutor(() => ({ ok: false, error: 'upstream 502' }));
    const { controller } = setup({
      script: { analysis: [P1_CLAIMS] },
      tools,
      config: { toolRetries: 10, maxToolIterations: 2 }
    });

    const outcome = await controller.handleInput('Show claims for patient P-1', 'conv-1');

    expect(outcome).toMatchObject({ type: 'degraded', reason: 'iteration_cap' });
    expect(tools.calls).toHaveLength(2);
  });

  it('should count a tool timeout as a failed attempt', async () => {
    const tools = new FakeToolExecutor(() => new Promise<ToolResult>(() => undefined));
    const { controller } = setup({
      script: { analysis: [P1_CLAIMS] },
      tools,
      config: { toolRetries: 0, toolTimeoutMs: 5 }
    });

    const outcome = await controller.handleInput('Show claims for patient P-1', 'conv-1');

    expect(outcome).toMatchObject({ type: 'degraded', reason: 'tool_failure' });
  });

  it('should turn a tool-reported limit into a clarification', async () => {
    const tools = new FakeToolExecutor(call =>
      call === 1
        ? {
            ok: false,
            error: 'Tool get_claims needs clarification',
            condition: { tag: 'constraint_conflict', constraint: 'result_limit', parameter: 'limit', requested: 150, limit: 50 }
          }
        : ONE_CLAIM
    );
    const { controller } = setup({ script: { analysis: [P1_CLAIMS] }, tools });

    const first = await controller.handleInput('Show claims for patient P-1', 'conv-1');
    const request = requestOf(first);

    expect(request.category).toBe('constraint_negotiation');
    expect(request.question).toBe('You asked for 150 records, but the result limit is 50. How would you like to proceed?');
    expect(optionIds(request)).toEqual(['partial_batch', 'narrow_filter']);
    expect(first.type === 'clarification_needed' && first.analysis.confidence).toBeCloseTo(0.89);

    const second = await controller.handleClarification('conv-1', choose(request, 'partial_batch'));

    expect(second).toMatchObject({ type: 'result', iterations: 2 });
    expect(tools.calls[1]).toEqual({ toolName: 'get_claims', parameters: { patient_id: 'P-1', limit: 50 } });
  });

  // ==========================================================================
  // Unavailable collaborators
  // ==========================================================================

  it('should fail the turn when the completion service is down', async () => {
    const { controller } = setup({ script: { analysis: [new Error('socket hang up')] } });

    const outcome = await controller.handleInput('Show claims for John', 'conv-1');

    expect(outcome).toEqual({
      type: 'failed',
      conversationId: 'conv-1',
      turnNumber: 1,
      message: "Sorry, a service I depend on isn't responding right now. Please try again in a few minutes."
    });
    const record = await controller.getConversation('conv-1');
    expect(record?.lifecycle).toBe('failed');
    expect(record?.turns[0].status).toBe('failed');
  });

  it('should fail the turn when the tool registry is unreachable', async () => {
    const tools = new FakeToolExecutor(() => {
      throw new CollaboratorUnavailableError('tool-executor', 'Tool registry unreachable');
    });
    const { controller } = setup({ script: { analysis: [P1_CLAIMS] }, tools });

    const outcome = await controller.handleInput('Show claims for patient P-1', 'conv-1');

    expect(outcome).toMatchObject({ type: 'failed', turnNumber: 1 });
    expect(tools.calls).toHaveLength(1);
  });
});
