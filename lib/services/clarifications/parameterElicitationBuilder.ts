import type { ClarificationRequest, GuidedField } from '../../models/clarification';
import type { ConversationContext } from '../../models/conversation';
import type { ParameterSpec, ParameterValue } from '../../models/intent';
import { findParameterSpec } from '../../capabilities';
import { coerceParameter } from '../../utils/parameterUtils';
import { BaseClarificationBuilder, type BuildInput } from './baseClarificationBuilder';

export class ParameterElicitationBuilder extends BaseClarificationBuilder {
  readonly category = 'parameter_elicitation' as const;

  async build({ analysis, context, round }: BuildInput): Promise<ClarificationRequest | null> {
    const missing = [...new Set(this.conditionsOf(analysis, 'missing_parameter').map(condition => condition.parameter))];
    if (missing.length === 0) return null;

    const fields = missing.map(name =>
      this.toField(findParameterSpec(this.capabilities, analysis.intent, name), context)
    );

    const base = this.createBase(analysis, round, this.question(fields));
    const [only] = fields;

    // A single plain-text value with nothing to suggest is just a text box.
    if (fields.length === 1 && only.type === 'string' && only.suggestedValue === undefined && !only.suggestions.length) {
      const request: ClarificationRequest = {
        ...base,
        category: this.category,
        presentation: { mode: 'free_text', parameterName: only.name, suggestions: [] }
      };
      return request;
    }

    const request: ClarificationRequest = {
      ...base,
      category: this.category,
      presentation: { mode: 'guided_fields', fields }
    };
    return request;
  }

  private toField(spec: ParameterSpec, context: ConversationContext): GuidedField {
    return {
      name: spec.name,
      label: spec.label,
      type: spec.type,
      required: true,
      suggestedValue: this.suggestValue(spec, context),
      suggestions: spec.suggestions ?? []
    };
  }

  private suggestValue(spec: ParameterSpec, context: ConversationContext): ParameterValue | undefined {
    const fromContext = context.bindings.parameters[spec.name];
    if (fromContext !== undefined) return fromContext;

    const learned = this.preferredValue(
      context,
      'parameter_default',
      spec.name,
      value => coerceParameter(value, spec.type) !== null
    );
    if (learned !== undefined) {
      return coerceParameter(learned, spec.type) ?? undefined;
    }

    return spec.defaultValue;
  }

  private question(fields: GuidedField[]): string {
    if (fields.length === 1) {
      return `What ${fields[0].label.toLowerCase()} should I use?`;
    }
    const labels = fields.map(field => field.label.toLowerCase());
    return `I need a few more details: ${labels.slice(0, -1).join(', ')} and ${labels[labels.length - 1]}.`;
  }
}
