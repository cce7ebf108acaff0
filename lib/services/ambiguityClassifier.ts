import type { AmbiguityCategory } from '../models/clarification';
import type { AmbiguityTag, IntentAnalysis } from '../models/intent';
import { conditionTags } from '../models/intent';

/** First matching rule wins; the order of conditions in the analysis is irrelevant. */
const PRECEDENCE: ReadonlyArray<{ tags: AmbiguityTag[]; category: AmbiguityCategory }> = [
  { tags: ['constraint_conflict'], category: 'constraint_negotiation' },
  { tags: ['low_confidence', 'intent_unrecognized'], category: 'scope_guidance' },
  { tags: ['entity_ambiguous'], category: 'entity_disambiguation' },
  { tags: ['missing_parameter'], category: 'parameter_elicitation' }
];

export class AmbiguityClassifier {
  classify(analysis: IntentAnalysis): AmbiguityCategory {
    const tags = conditionTags(analysis);
    const rule = PRECEDENCE.find(candidate => candidate.tags.some(tag => tags.has(tag)));
    // Nothing concrete to ask about, so ask what the user wants to do.
    return rule?.category ?? 'scope_guidance';
  }
}
