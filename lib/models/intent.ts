export type EntityKind = 'patient' | 'claim';

export type ParameterValue = string | number | boolean | string[];

export type ParameterType = 'string' | 'number' | 'date' | 'array' | 'boolean';

export interface ParameterSpec {
  name: string;
  label: string;
  type: ParameterType;
  suggestions?: string[];
  defaultValue?: ParameterValue;
}

/** A hard limit on a numeric parameter, e.g. the maximum export batch size. */
export interface ConstraintSpec {
  name: string;
  parameter: string;
  max: number;
  label: string;
}

export interface Capability {
  name: string;
  description: string;
  requiredParameters: ParameterSpec[];
  /** Entity kinds the capability accepts by reference; each binds `<kind>_id`. */
  entityKinds?: EntityKind[];
  constraints?: ConstraintSpec[];
  /** Parameters that can narrow the result set. */
  filterParameters?: ParameterSpec[];
  supportsAsync?: boolean;
}

export interface Candidate {
  id: string;
  displayLabel: string;
  relevanceScore: number;
  /** Epoch milliseconds of the most recent activity, null when unknown. */
  recencyTimestamp: number | null;
  kind: EntityKind;
}

export interface EntityReference {
  name: string;
  kind: EntityKind;
  reference: string;
}

export interface BoundEntity {
  id: string;
  label: string;
  kind: EntityKind;
}

export type AmbiguityCondition =
  | {
      tag: 'entity_ambiguous';
      entityName: string;
      kind: EntityKind;
      reference: string;
      candidates: Candidate[];
    }
  | { tag: 'missing_parameter'; parameter: string }
  | {
      tag: 'constraint_conflict';
      constraint: string;
      parameter: string;
      requested: number;
      limit: number;
    }
  | { tag: 'low_confidence'; level: 'low' | 'medium'; confidence: number }
  | { tag: 'intent_unrecognized'; intent: string };

export type AmbiguityTag = AmbiguityCondition['tag'];

export interface IntentAnalysis {
  intent: string;
  entities: Record<string, BoundEntity>;
  parameters: Record<string, ParameterValue>;
  /** Reconciled score; at or above the high threshold only when `conditions` is empty. */
  confidence: number;
  /** The score reported by the model before reconciliation. */
  modelConfidence: number;
  conditions: AmbiguityCondition[];
  missingParameters: string[];
  reasoning?: string;
  source: 'model' | 'rules';
}

export function conditionKey(condition: AmbiguityCondition): string {
  switch (condition.tag) {
    case 'entity_ambiguous':
      return `entity_ambiguous:${condition.entityName}`;
    case 'missing_parameter':
      return `missing_parameter:${condition.parameter}`;
    case 'constraint_conflict':
      return `constraint_conflict:${condition.constraint}`;
    case 'low_confidence':
      return 'low_confidence';
    case 'intent_unrecognized':
      return 'intent_unrecognized';
  }
}

export function conditionTags(analysis: IntentAnalysis): Set<AmbiguityTag> {
  return new Set(analysis.conditions.map(condition => condition.tag));
}
