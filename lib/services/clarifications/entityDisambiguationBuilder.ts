import type { ClarificationOption, ClarificationRequest } from '../../models/clarification';
import type { Candidate } from '../../models/intent';
import { BaseClarificationBuilder, type BuildInput } from './baseClarificationBuilder';

export class EntityDisambiguationBuilder extends BaseClarificationBuilder {
  readonly category = 'entity_disambiguation' as const;

  async build({ analysis, context, round }: BuildInput): Promise<ClarificationRequest | null> {
    const [condition] = this.conditionsOf(analysis, 'entity_ambiguous');
    if (!condition || condition.candidates.length === 0) return null;

    const { candidates, kind, reference } = condition;
    const preferred = this.preferredValue(context, 'entity_selection', reference, value =>
      candidates.some(candidate => candidate.id === value)
    );
    const recommendedId = preferred ?? candidates[0].id;

    const noun = candidates.length === 1 ? kind : `${kind}s`;
    const request: ClarificationRequest = {
      ...this.createBase(analysis, round, `I found ${candidates.length} ${noun} matching '${reference}'. Which one do you mean?`),
      category: this.category,
      entity: { name: condition.entityName, kind, reference },
      presentation: {
        mode: 'single_select',
        options: candidates.map(candidate => this.toOption(candidate, candidate.id === recommendedId))
      }
    };

    return request;
  }

  private toOption(candidate: Candidate, recommended: boolean): ClarificationOption {
    const lastActivity =
      candidate.recencyTimestamp === null ? null : new Date(candidate.recencyTimestamp).toISOString();

    return {
      id: candidate.id,
      label: candidate.displayLabel,
      sublabel: lastActivity ? `ID: ${candidate.id} · Last activity: ${lastActivity.slice(0, 10)}` : `ID: ${candidate.id}`,
      relevance: candidate.relevanceScore,
      recommended,
      metadata: {
        relevance_score: candidate.relevanceScore,
        last_activity: lastActivity
      }
    };
  }
}
