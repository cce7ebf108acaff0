import type { ClarificationRequest, ClarificationResponse, AmbiguityCategory } from './clarification';
import type { BoundEntity, IntentAnalysis, ParameterValue } from './intent';

export const LIFECYCLE_STATES = [
  'idle',
  'analyzing',
  'executing',
  'awaiting_clarification',
  'resolved',
  'resolved_degraded',
  'failed'
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

export const BUSY_STATES: readonly LifecycleState[] = ['analyzing', 'executing', 'awaiting_clarification'];

export const PREFERENCE_TYPES = ['entity_selection', 'parameter_default', 'mitigation_choice', 'action_choice'] as const;

export type PreferenceType = (typeof PREFERENCE_TYPES)[number];

export interface PreferenceUse {
  type: PreferenceType;
  /** What the choice was about: an entity reference, a parameter name, a constraint. */
  key: string;
  value: string;
}

export interface LearnedPreference extends PreferenceUse {
  frequency: number;
  lastUsed: string;
}

export interface AcceptedMitigation {
  constraint: string;
  optionId: string;
  parameters: Record<string, ParameterValue>;
  requires: string[];
}

/** Values fixed by clarifications for the rest of a turn. */
export interface ContextBindings {
  entities: Record<string, BoundEntity>;
  parameters: Record<string, ParameterValue>;
  mitigations: Record<string, AcceptedMitigation>;
  chosenAction?: string;
  rephrasedInput?: string;
  resolvedRounds: number;
}

export interface HistoryEntry {
  turnNumber: number;
  input: string;
  answer?: string;
}

export interface ConversationContext {
  readonly conversationId: string;
  readonly userId?: string;
  readonly history: readonly HistoryEntry[];
  readonly preferences: Readonly<Record<string, LearnedPreference>>;
  readonly bindings: Readonly<ContextBindings>;
  readonly pendingClarification?: ClarificationRequest;
}

export interface EnrichedContext {
  context: ConversationContext;
  category: AmbiguityCategory;
  learned: PreferenceUse[];
}

export type DegradedReason = 'round_cap' | 'iteration_cap' | 'tool_failure' | 'abandoned';

export interface ClarificationRound {
  round: number;
  request: ClarificationRequest;
  response?: ClarificationResponse;
  presentedAt: string;
  respondedAt?: string;
}

export interface TurnResult {
  answer: string;
  data?: unknown;
  degradedReason?: DegradedReason;
}

export const TURN_STATUSES = ['open', 'resolved', 'degraded', 'failed'] as const;

export type TurnStatus = (typeof TURN_STATUSES)[number];

export interface Turn {
  number: number;
  input: string;
  status: TurnStatus;
  analysis?: IntentAnalysis;
  rounds: ClarificationRound[];
  bindings: ContextBindings;
  /** Tool execution attempts so far; never decreases. */
  iterations: number;
  result?: TurnResult;
  error?: string;
  startedAt: string;
  resolvedAt?: string;
}

export interface ConversationRecord {
  id: string;
  userId?: string;
  lifecycle: LifecycleState;
  turns: Turn[];
  preferences: Record<string, LearnedPreference>;
  createdAt: string;
  updatedAt: string;
}

export interface StoredConversation {
  record: ConversationRecord;
  version: number;
}

export type RejectionReason =
  | 'conversation_busy'
  | 'stale_clarification'
  | 'invalid_response'
  | 'not_found'
  | 'no_pending_clarification';

interface OutcomeBase {
  conversationId: string;
  turnNumber: number | null;
}

export type TurnOutcome =
  | (OutcomeBase & { type: 'result'; answer: string; data: unknown; iterations: number })
  | (OutcomeBase & { type: 'clarification_needed'; request: ClarificationRequest; analysis: IntentAnalysis })
  | (OutcomeBase & { type: 'degraded'; answer: string; reason: DegradedReason })
  | (OutcomeBase & { type: 'failed'; message: string })
  | (OutcomeBase & { type: 'rejected'; reason: RejectionReason; message: string; pending?: ClarificationRequest });

export function emptyBindings(): ContextBindings {
  return { entities: {}, parameters: {}, mitigations: {}, resolvedRounds: 0 };
}

export function preferenceKey(use: PreferenceUse): string {
  return `${use.type}:${use.key.toLowerCase()}:${use.value}`;
}
