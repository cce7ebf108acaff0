import type { ClarificationRequest, MitigationOption } from '../../models/clarification';
import type { AmbiguityCondition, Capability } from '../../models/intent';
import { findCapability } from '../../capabilities';
import { BaseClarificationBuilder, type BuildInput } from './baseClarificationBuilder';

type ConstraintConflict = Extract<AmbiguityCondition, { tag: 'constraint_conflict' }>;

export class ConstraintNegotiationBuilder extends BaseClarificationBuilder {
  readonly category = 'constraint_negotiation' as const;

  async build({ analysis, context, round }: BuildInput): Promise<ClarificationRequest | null> {
    const [conflict] = this.conditionsOf(analysis, 'constraint_conflict');
    if (!conflict) return null;

    const capability = findCapability(this.capabilities, analysis.intent);
    const options = this.mitigations(conflict, capability);
    if (options.length === 0) return null;

    const preferred = this.preferredValue(context, 'mitigation_choice', conflict.constraint, value =>
      options.some(option => option.id === value)
    );
    const recommendedId = preferred ?? options[0].id;

    const label =
      capability?.constraints?.find(constraint => constraint.name === conflict.constraint)?.label ??
      conflict.constraint.replace(/_/g, ' ');

    const request: ClarificationRequest = {
      ...this.createBase(
        analysis,
        round,
        `You asked for ${conflict.requested} records, but the ${label} is ${conflict.limit}. How would you like to proceed?`
      ),
      category: this.category,
      constraint: {
        name: conflict.constraint,
        parameter: conflict.parameter,
        requested: conflict.requested,
        limit: conflict.limit
      },
      presentation: {
        mode: 'single_select_with_details',
        options: options.map(option => ({ ...option, recommended: option.id === recommendedId }))
      }
    };

    return request;
  }

  /** Only mitigations that keep the request within the limit. */
  private mitigations(conflict: ConstraintConflict, capability: Capability | undefined): MitigationOption[] {
    const { parameter, requested, limit } = conflict;
    const options: MitigationOption[] = [];

    if (limit > 0) {
      options.push({
        id: 'partial_batch',
        label: `Process the first ${limit} now`,
        tradeoff: `The remaining ${requested - limit} are queued for a follow-up request`,
        parameters: { [parameter]: limit },
        requires: []
      });
    }

    const filters = capability?.filterParameters ?? [];
    if (filters.length > 0 && limit > 0) {
      const labels = filters.map(filter => filter.label.toLowerCase()).join(' or ');
      options.push({
        id: 'narrow_filter',
        label: `Narrow the request by ${labels}`,
        tradeoff: `Only matching records are included, up to ${limit}`,
        parameters: { [parameter]: limit },
        requires: filters.map(filter => filter.name)
      });
    }

    if (capability?.supportsAsync) {
      options.push({
        id: 'async_export',
        label: 'Run it in the background',
        tradeoff: `All ${requested} records are processed, but results arrive later instead of in this conversation`,
        parameters: { execution_mode: 'async' },
        requires: []
      });
    }

    return options;
  }
}
