import { describe, it, expect } from 'vitest';
import { AmbiguityClassifier } from './ambiguityClassifier';
import type { AmbiguityCondition, IntentAnalysis } from '../models/intent';

const ENTITY: AmbiguityCondition = {
  tag: 'entity_ambiguous',
  entityName: 'patient',
  kind: 'patient',
  reference: 'John',
  candidates: []
};
const MISSING: AmbiguityCondition = { tag: 'missing_parameter', parameter: 'count' };
const CONSTRAINT: AmbiguityCondition = {
  tag: 'constraint_conflict',
  constraint: 'export_size',
  parameter: 'count',
  requested: 50000,
  limit: 10000
};
const LOW: AmbiguityCondition = { tag: 'low_confidence', level: 'medium', confidence: 0.7 };
const UNRECOGNIZED: AmbiguityCondition = { tag: 'intent_unrecognized', intent: 'dance' };

function analysisWith(conditions: AmbiguityCondition[]): IntentAnalysis {
  return {
    intent: 'export_claims',
    entities: {},
    parameters: {},
    confidence: 0.8,
    modelConfidence: 0.8,
    conditions,
    missingParameters: [],
    source: 'model'
  };
}

describe('AmbiguityClassifier', () => {
  const classifier = new AmbiguityClassifier();

  it('should map each single condition to its category', () => {
    expect(classifier.classify(analysisWith([ENTITY]))).toBe('entity_disambiguation');
    expect(classifier.classify(analysisWith([MISSING]))).toBe('parameter_elicitation');
    expect(classifier.classify(analysisWith([CONSTRAINT]))).toBe('constraint_negotiation');
    expect(classifier.classify(analysisWith([LOW]))).toBe('scope_guidance');
    expect(classifier.classify(analysisWith([UNRECOGNIZED]))).toBe('scope_guidance');
  });

  it('should prefer the constraint conflict over an ambiguous entity', () => {
    expect(classifier.classify(analysisWith([ENTITY, CONSTRAINT]))).toBe('constraint_negotiation');
  });

  it('should prefer an ambiguous entity over a missing parameter', () => {
    expect(classifier.classify(analysisWith([MISSING, ENTITY]))).toBe('entity_disambiguation');
  });

  it('should prefer scope guidance over entity and parameter questions', () => {
    expect(classifier.classify(analysisWith([MISSING, ENTITY, LOW]))).toBe('scope_guidance');
  });

  it('should ask for scope before an ambiguous name when the score is low', () => {
    const low: AmbiguityCondition = { tag: 'low_confidence', level: 'low', confidence: 0.3 };

    expect(classifier.classify({ ...analysisWith([ENTITY, low]), confidence: 0.3, modelConfidence: 0.3 })).toBe(
      'scope_guidance'
    );
  });

  it('should not depend on the order of the conditions', () => {
    const conditions = [ENTITY, MISSING, CONSTRAINT, UNRECOGNIZED];
    const orders = [
      conditions,
      [...conditions].reverse(),
      [MISSING, CONSTRAINT, UNRECOGNIZED, ENTITY],
      [UNRECOGNIZED, ENTITY, MISSING, CONSTRAINT]
    ];

    for (const order of orders) {
      expect(classifier.classify(analysisWith(order))).toBe('constraint_negotiation');
    }
  });

  it('should fall back to scope guidance when there are no conditions', () => {
    expect(classifier.classify(analysisWith([]))).toBe('scope_guidance');
  });
});
