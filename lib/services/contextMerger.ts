import type {
  ClarificationOption,
  ClarificationRequest,
  ClarificationResponse,
  ClarificationSelection
} from '../models/clarification';
import { REPHRASE_OPTION_ID } from '../models/clarification';
import type {
  ContextBindings,
  ConversationContext,
  EnrichedContext,
  LearnedPreference,
  PreferenceUse
} from '../models/conversation';
import { preferenceKey } from '../models/conversation';
import type { ParameterType, ParameterValue } from '../models/intent';
import { entityParameter } from '../capabilities';
import { CategoryMismatchError, InvalidClarificationResponseError } from '../errors';
import { coerceParameter, formatParameterValue } from '../utils/parameterUtils';
import { createLogger } from '../utils/logger';

const logger = createLogger('Context Merger');

/**
 * Adds one use per preference, bumping the frequency of ones seen before.
 * Returns a new map; the input is not modified.
 */
export function applyPreferenceUses(
  preferences: Readonly<Record<string, LearnedPreference>>,
  uses: PreferenceUse[],
  now: string = new Date().toISOString()
): Record<string, LearnedPreference> {
  const next = { ...preferences };
  for (const use of uses) {
    const key = preferenceKey(use);
    const existing = next[key];
    next[key] = { ...use, frequency: (existing?.frequency ?? 0) + 1, lastUsed: now };
  }
  return next;
}

export class ContextMerger {
  merge(pending: ClarificationRequest, response: ClarificationResponse, context: ConversationContext): EnrichedContext {
    if (response.category !== pending.category) {
      throw new CategoryMismatchError(pending.category, response.category);
    }
    if (response.requestId !== undefined && response.requestId !== pending.id) {
      throw new CategoryMismatchError(pending.category, response.category);
    }

    const bindings: ContextBindings = {
      entities: { ...context.bindings.entities },
      parameters: { ...context.bindings.parameters },
      mitigations: { ...context.bindings.mitigations },
      chosenAction: context.bindings.chosenAction,
      rephrasedInput: context.bindings.rephrasedInput,
      resolvedRounds: context.bindings.resolvedRounds + 1
    };
    const learned = this.apply(pending, response.selection, bindings);

    logger.debug(`Merged ${pending.category} response for request ${pending.id}`, learned);

    return {
      category: pending.category,
      learned,
      context: {
        ...context,
        bindings,
        preferences: applyPreferenceUses(context.preferences, learned),
        pendingClarification: undefined
      }
    };
  }

  /** Writes the selection into `bindings` and returns the preferences it teaches. */
  private apply(
    pending: ClarificationRequest,
    selection: ClarificationSelection,
    bindings: ContextBindings
  ): PreferenceUse[] {
    switch (pending.category) {
      case 'entity_disambiguation': {
        const { presentation, entity } = pending;
        const chosen = selectOptions(selection, presentation.options, presentation.mode === 'multi_select');
        const [first] = chosen;

        bindings.entities[entity.name] = { id: first.id, label: first.label, kind: entity.kind };
        if (chosen.length > 1) {
          bindings.parameters[`${entityParameter(entity.kind)}s`] = chosen.map(option => option.id);
        }
        return chosen.map((option): PreferenceUse => ({
          type: 'entity_selection',
          key: entity.reference,
          value: option.id
        }));
      }

      case 'parameter_elicitation': {
        const { presentation } = pending;
        const fields: Array<{ name: string; label: string; type: ParameterType; required: boolean }> =
          presentation.mode === 'guided_fields'
            ? presentation.fields
            : [{ name: presentation.parameterName, label: presentation.parameterName, type: 'string', required: true }];

        const raw = fieldValues(selection, fields.map(field => field.name));
        const learned: PreferenceUse[] = [];

        for (const field of fields) {
          const value: ParameterValue | null = coerceParameter(raw[field.name], field.type);
          if (value === null) {
            if (field.required) {
              throw new InvalidClarificationResponseError(`A valid value for '${field.label}' is required`);
            }
            continue;
          }
          bindings.parameters[field.name] = value;
          learned.push({ type: 'parameter_default', key: field.name, value: formatParameterValue(value) });
        }
        return learned;
      }

      case 'constraint_negotiation': {
        const { presentation, constraint } = pending;
        const [choice] = selectOptions(selection, presentation.options, false);

        bindings.mitigations[constraint.name] = {
          constraint: constraint.name,
          optionId: choice.id,
          parameters: { ...choice.parameters },
          requires: [...choice.requires]
        };
        return [{ type: 'mitigation_choice', key: constraint.name, value: choice.id }];
      }

      case 'scope_guidance': {
        const { presentation } = pending;

        if (selection.kind === 'text' && presentation.allowText) {
          bindings.rephrasedInput = requireText(selection.value);
          bindings.chosenAction = undefined;
          return [];
        }

        const [choice] = selectOptions(selection, presentation.actions, false);
        if (choice.id === REPHRASE_OPTION_ID) {
          bindings.rephrasedInput = requireText(selection.kind === 'option' ? selection.text : undefined);
          bindings.chosenAction = undefined;
          return [];
        }

        bindings.chosenAction = choice.id;
        return [{ type: 'action_choice', key: pending.intent, value: choice.id }];
      }
    }
  }
}

/** The options the selection names, in selection order; never empty. */
function selectOptions<T extends ClarificationOption>(
  selection: ClarificationSelection,
  options: T[],
  allowMultiple: boolean
): [T, ...T[]] {
  if (selection.kind !== 'option' || selection.optionIds.length === 0) {
    throw new InvalidClarificationResponseError('A selected option is required');
  }
  if (!allowMultiple && selection.optionIds.length > 1) {
    throw new InvalidClarificationResponseError('Only one option may be selected');
  }

  const chosen: T[] = [];
  for (const id of selection.optionIds) {
    const option = options.find(candidate => candidate.id === id);
    if (!option) {
      throw new InvalidClarificationResponseError(`Unknown option '${id}'`);
    }
    if (!chosen.includes(option)) chosen.push(option);
  }

  const [first, ...rest] = chosen;
  return [first, ...rest];
}

function fieldValues(selection: ClarificationSelection, names: string[]): Record<string, unknown> {
  if (selection.kind === 'fields') return selection.values;
  if (selection.kind === 'text' && names.length === 1) return { [names[0]]: selection.value };
  throw new InvalidClarificationResponseError('Field values are required');
}

function requireText(text: string | undefined): string {
  const trimmed = text?.trim();
  if (!trimmed) {
    throw new InvalidClarificationResponseError('Rephrased request text is required');
  }
  return trimmed;
}
