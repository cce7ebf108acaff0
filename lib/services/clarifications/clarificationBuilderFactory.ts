import type { AmbiguityCategory } from '../../models/clarification';
import type { TextCompletionService } from '../../models/collaborators';
import type { Capability } from '../../models/intent';
import type { BaseClarificationBuilder } from './baseClarificationBuilder';
import { ConstraintNegotiationBuilder } from './constraintNegotiationBuilder';
import { EntityDisambiguationBuilder } from './entityDisambiguationBuilder';
import { ParameterElicitationBuilder } from './parameterElicitationBuilder';
import { ScopeGuidanceBuilder, type ScopeGuidanceOptions } from './scopeGuidanceBuilder';

export class ClarificationBuilderFactory {
  private builders = new Map<AmbiguityCategory, BaseClarificationBuilder>();
  readonly scopeGuidance: ScopeGuidanceBuilder;

  constructor(
    private readonly capabilities: readonly Capability[],
    completion: TextCompletionService,
    options: ScopeGuidanceOptions
  ) {
    this.scopeGuidance = new ScopeGuidanceBuilder(capabilities, completion, options);
  }

  getBuilder(category: AmbiguityCategory): BaseClarificationBuilder {
    let builder = this.builders.get(category);
    if (!builder) {
      builder = this.createBuilder(category);
      this.builders.set(category, builder);
    }
    return builder;
  }

  private createBuilder(category: AmbiguityCategory): BaseClarificationBuilder {
    switch (category) {
      case 'entity_disambiguation':
        return new EntityDisambiguationBuilder(this.capabilities);

      case 'parameter_elicitation':
        return new ParameterElicitationBuilder(this.capabilities);

      case 'constraint_negotiation':
        return new ConstraintNegotiationBuilder(this.capabilities);

      case 'scope_guidance':
        return this.scopeGuidance;
    }
  }
}
