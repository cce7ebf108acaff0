import { v4 as uuidv4 } from 'uuid';
import type { AmbiguityCategory, ClarificationRequest } from '../../models/clarification';
import type { ConversationContext, LearnedPreference, PreferenceType } from '../../models/conversation';
import type { AmbiguityCondition, AmbiguityTag, Capability, IntentAnalysis } from '../../models/intent';

export interface BuildInput {
  analysis: IntentAnalysis;
  context: ConversationContext;
  round: number;
  /** The text the analysis was made from. */
  userInput: string;
}

export abstract class BaseClarificationBuilder {
  abstract readonly category: AmbiguityCategory;

  constructor(protected readonly capabilities: readonly Capability[]) {}

  /** Null means the analysis holds nothing this category can ask about. */
  abstract build(input: BuildInput): Promise<ClarificationRequest | null>;

  protected createBase(analysis: IntentAnalysis, round: number, question: string) {
    return {
      id: uuidv4(),
      question,
      intent: analysis.intent,
      round,
      createdAt: new Date().toISOString()
    };
  }

  protected conditionsOf<T extends AmbiguityTag>(
    analysis: IntentAnalysis,
    tag: T
  ): Array<Extract<AmbiguityCondition, { tag: T }>> {
    return analysis.conditions.filter(
      (condition): condition is Extract<AmbiguityCondition, { tag: T }> => condition.tag === tag
    );
  }

  /**
   * The value the user picked most often for this key, most recent on ties.
   * `accept` limits the answer to values that make sense right now.
   */
  protected preferredValue(
    context: ConversationContext,
    type: PreferenceType,
    key: string,
    accept: (value: string) => boolean = () => true
  ): string | undefined {
    const matches = Object.values(context.preferences).filter(
      (preference: LearnedPreference) =>
        preference.type === type && preference.key.toLowerCase() === key.toLowerCase() && accept(preference.value)
    );

    matches.sort((a, b) => b.frequency - a.frequency || b.lastUsed.localeCompare(a.lastUsed));
    return matches[0]?.value;
  }
}
