import type { EntityKind, ParameterType, ParameterValue } from './intent';

export type AmbiguityCategory =
  | 'entity_disambiguation'
  | 'parameter_elicitation'
  | 'constraint_negotiation'
  | 'scope_guidance';

export interface ClarificationOption {
  id: string;
  label: string;
  sublabel?: string;
  relevance?: number;
  recommended?: boolean;
  metadata?: Record<string, string | number | boolean | null>;
}

export interface GuidedField {
  name: string;
  label: string;
  type: ParameterType;
  required: boolean;
  suggestedValue?: ParameterValue;
  suggestions: string[];
}

export interface MitigationOption extends ClarificationOption {
  tradeoff: string;
  /** Parameter values the mitigation fixes once accepted. */
  parameters: Record<string, ParameterValue>;
  /** Parameters the user still has to supply after accepting. */
  requires: string[];
}

export type Presentation =
  | { mode: 'single_select'; options: ClarificationOption[] }
  | { mode: 'multi_select'; options: ClarificationOption[] }
  | { mode: 'free_text'; parameterName: string; suggestions: string[] }
  | { mode: 'guided_fields'; fields: GuidedField[] }
  | { mode: 'single_select_with_details'; options: MitigationOption[] }
  | { mode: 'action_list'; actions: ClarificationOption[]; allowText: boolean };

export type PresentationMode = Presentation['mode'];

interface ClarificationRequestBase {
  id: string;
  question: string;
  /** The intent that triggered the request. */
  intent: string;
  round: number;
  createdAt: string;
}

export type ClarificationRequest = ClarificationRequestBase &
  (
    | {
        category: 'entity_disambiguation';
        entity: { name: string; kind: EntityKind; reference: string };
        presentation: Extract<Presentation, { mode: 'single_select' | 'multi_select' }>;
      }
    | {
        category: 'parameter_elicitation';
        presentation: Extract<Presentation, { mode: 'guided_fields' | 'free_text' }>;
      }
    | {
        category: 'constraint_negotiation';
        constraint: { name: string; parameter: string; requested: number; limit: number };
        presentation: Extract<Presentation, { mode: 'single_select_with_details' }>;
      }
    | {
        category: 'scope_guidance';
        presentation: Extract<Presentation, { mode: 'action_list' }>;
      }
  );

export type ClarificationSelection =
  | { kind: 'option'; optionIds: string[]; text?: string }
  | { kind: 'fields'; values: Record<string, unknown> }
  | { kind: 'text'; value: string };

export interface ClarificationResponse {
  category: AmbiguityCategory;
  /** When present, must name the pending request. */
  requestId?: string;
  intent?: string;
  selection: ClarificationSelection;
}

export const REPHRASE_OPTION_ID = 'rephrase';
