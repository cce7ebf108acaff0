import { z } from 'zod';
import type {
  AmbiguityCategory,
  ClarificationOption,
  ClarificationRequest,
  ClarificationResponse,
  ClarificationSelection,
  GuidedField
} from '../models/clarification';
import type { ParameterType } from '../models/intent';
import { InvalidClarificationResponseError } from '../errors';

export type UIType = 'radio' | 'checkbox' | 'text' | 'date' | 'number';

export interface ClarificationUIOption {
  id: string;
  label: string;
  sublabel?: string;
  metadata?: Record<string, unknown>;
  recommended?: boolean;
  relevance?: number;
}

/** The JSON shape the chat widget renders. */
export interface ClarificationUI {
  type: AmbiguityCategory;
  entity_type?: string;
  question: string;
  ui_type: UIType;
  options?: ClarificationUIOption[];
  allow_multiple?: boolean;
  parameter_name?: string;
  parameter_type?: string;
  suggestions?: unknown[];
  required?: boolean;
  metadata?: Record<string, unknown>;
}

const CATEGORIES = [
  'entity_disambiguation',
  'parameter_elicitation',
  'constraint_negotiation',
  'scope_guidance'
] as const satisfies readonly AmbiguityCategory[];

const wireResponseSchema = z.object({
  clarification_type: z.enum(CATEGORIES),
  request_id: z.string().optional(),
  original_intent: z.union([z.string(), z.record(z.unknown())]).optional(),
  user_selection: z.object({
    entity_type: z.string().optional(),
    selected_id: z.string().optional(),
    selected_ids: z.array(z.string()).optional(),
    selected_label: z.string().optional(),
    value: z.unknown().optional(),
    values: z.record(z.unknown()).optional(),
    text: z.string().optional(),
    parameter_name: z.string().optional(),
    parameter_type: z.string().optional(),
    metadata: z.record(z.unknown()).optional()
  })
});

export type WireClarificationResponse = z.infer<typeof wireResponseSchema>;

function uiTypeFor(type: ParameterType, hasSuggestions: boolean): UIType {
  switch (type) {
    case 'date':
      return 'date';
    case 'number':
      return 'number';
    case 'boolean':
      return 'checkbox';
    case 'array':
      return hasSuggestions ? 'checkbox' : 'text';
    case 'string':
      return 'text';
  }
}

function toUIOption(option: ClarificationOption): ClarificationUIOption {
  return {
    id: option.id,
    label: option.label,
    sublabel: option.sublabel,
    metadata: option.metadata ?? {},
    recommended: option.recommended ?? false,
    relevance: option.relevance
  };
}

function fieldMetadata(field: GuidedField): Record<string, unknown> {
  return { name: field.name, label: field.label, type: field.type, suggested_value: field.suggestedValue ?? null };
}

export function toClarificationUI(request: ClarificationRequest): ClarificationUI {
  const metadata: Record<string, unknown> = {
    request_id: request.id,
    round: request.round,
    original_intent: request.intent,
    generated_at: request.createdAt
  };

  switch (request.category) {
    case 'entity_disambiguation': {
      const multiple = request.presentation.mode === 'multi_select';
      return {
        type: request.category,
        entity_type: request.entity.kind,
        question: request.question,
        ui_type: multiple ? 'checkbox' : 'radio',
        options: request.presentation.options.map(toUIOption),
        allow_multiple: multiple,
        metadata: { ...metadata, total_options: request.presentation.options.length }
      };
    }

    case 'parameter_elicitation': {
      const { presentation } = request;
      if (presentation.mode === 'free_text') {
        return {
          type: request.category,
          question: request.question,
          ui_type: 'text',
          parameter_name: presentation.parameterName,
          parameter_type: 'string',
          suggestions: presentation.suggestions,
          required: true,
          metadata
        };
      }

      const [first] = presentation.fields;
      return {
        type: request.category,
        question: request.question,
        ui_type: uiTypeFor(first.type, first.suggestions.length > 0),
        parameter_name: first.name,
        parameter_type: first.type,
        suggestions: first.suggestions,
        required: first.required,
        metadata: {
          ...metadata,
          suggested_value: first.suggestedValue ?? null,
          ...(presentation.fields.length > 1 ? { fields: presentation.fields.map(fieldMetadata) } : {})
        }
      };
    }

    case 'constraint_negotiation':
      return {
        type: request.category,
        question: request.question,
        ui_type: 'radio',
        options: request.presentation.options.map(option => ({
          ...toUIOption(option),
          sublabel: option.tradeoff,
          metadata: { tradeoff: option.tradeoff, requires: option.requires }
        })),
        allow_multiple: false,
        metadata: {
          ...metadata,
          constraint: request.constraint.name,
          requested: request.constraint.requested,
          limit: request.constraint.limit
        }
      };

    case 'scope_guidance':
      return {
        type: request.category,
        question: request.question,
        ui_type: 'radio',
        options: request.presentation.actions.map(toUIOption),
        allow_multiple: false,
        metadata: { ...metadata, detected_intent: request.intent, allow_text: request.presentation.allowText }
      };
  }
}

function toSelection(selection: WireClarificationResponse['user_selection']): ClarificationSelection {
  const text = selection.text ?? (typeof selection.value === 'string' ? selection.value : undefined);

  if (selection.selected_ids?.length) {
    return { kind: 'option', optionIds: selection.selected_ids, text };
  }
  if (selection.selected_id) {
    return { kind: 'option', optionIds: [selection.selected_id], text };
  }
  if (selection.values) {
    return { kind: 'fields', values: selection.values };
  }
  if (selection.parameter_name && selection.value !== undefined) {
    return { kind: 'fields', values: { [selection.parameter_name]: selection.value } };
  }
  if (text !== undefined) {
    return { kind: 'text', value: text };
  }

  throw new InvalidClarificationResponseError('user_selection carries no selection');
}

/** Decodes the widget's response payload. */
export function parseClarificationResponse(payload: unknown): ClarificationResponse {
  const parsed = wireResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidClarificationResponseError(`Malformed clarification response: ${parsed.error.message}`);
  }

  const { clarification_type, request_id, original_intent, user_selection } = parsed.data;
  const intent =
    typeof original_intent === 'string'
      ? original_intent
      : typeof original_intent?.intent === 'string'
        ? original_intent.intent
        : undefined;

  return {
    category: clarification_type,
    requestId: request_id,
    intent,
    selection: toSelection(user_selection)
  };
}
