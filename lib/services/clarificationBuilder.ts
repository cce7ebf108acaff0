import type { AmbiguityCategory, ClarificationRequest } from '../models/clarification';
import { createLogger } from '../utils/logger';
import type { BuildInput } from './clarifications/baseClarificationBuilder';
import type { ClarificationBuilderFactory } from './clarifications/clarificationBuilderFactory';

const logger = createLogger('Clarification Builder');

export class ClarificationBuilder {
  constructor(private readonly factory: ClarificationBuilderFactory) {}

  /**
   * Builds the request for a category. A category whose builder finds nothing
   * to ask about is downgraded to scope guidance, which always has an option.
   */
  async build(category: AmbiguityCategory, input: BuildInput): Promise<ClarificationRequest> {
    const request = await this.factory.getBuilder(category).build(input);
    if (request) return request;

    logger.warn(`No content for ${category}, downgrading to scope_guidance`);
    return this.factory.scopeGuidance.build(input);
  }
}
