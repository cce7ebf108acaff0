import { z } from 'zod';
import type { ClarificationOption, ClarificationRequest } from '../../models/clarification';
import { REPHRASE_OPTION_ID } from '../../models/clarification';
import type { TextCompletionService } from '../../models/collaborators';
import type { Capability } from '../../models/intent';
import { findCapability } from '../../capabilities';
import { prompts } from '../../prompts';
import { extractJsonObject } from '../../utils/analysisUtils';
import { createLogger } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';
import { BaseClarificationBuilder, type BuildInput } from './baseClarificationBuilder';

const logger = createLogger('Scope Guidance');

export const MAX_SCOPE_ACTIONS = 4;

const suggestionSchema = z.object({
  actions: z.array(z.object({ id: z.string(), label: z.string().optional() })).default([])
});

export const REPHRASE_OPTION: ClarificationOption = {
  id: REPHRASE_OPTION_ID,
  label: 'Rephrase your request'
};

export interface ScopeGuidanceOptions {
  completionTimeoutMs: number;
  suggestionTemperature: number;
}

export class ScopeGuidanceBuilder extends BaseClarificationBuilder {
  readonly category = 'scope_guidance' as const;

  constructor(
    capabilities: readonly Capability[],
    private readonly completion: TextCompletionService,
    private readonly options: ScopeGuidanceOptions
  ) {
    super(capabilities);
  }

  async build({ analysis, round, userInput }: BuildInput): Promise<ClarificationRequest> {
    const suggested = await this.suggestActions(userInput, analysis.intent);
    const detected = findCapability(this.capabilities, analysis.intent);

    const actions: ClarificationOption[] = [];
    if (detected) {
      actions.push({ id: detected.name, label: detected.description, recommended: true });
    }
    for (const action of suggested) {
      if (!actions.some(existing => existing.id === action.id)) {
        actions.push(action);
      }
    }
    if (suggested.length === 0) {
      actions.push(REPHRASE_OPTION);
    }

    const question = detected
      ? `It looks like you want to ${detected.description.toLowerCase()}. Is that right, or did you mean something else?`
      : "I'm not sure what you'd like to do. Here is what I can help with:";

    const request: ClarificationRequest = {
      ...this.createBase(analysis, round, question),
      category: this.category,
      presentation: { mode: 'action_list', actions: actions.slice(0, MAX_SCOPE_ACTIONS), allowText: true }
    };

    return request;
  }

  /** In-catalog suggestions from the model; empty on any failure. */
  private async suggestActions(userInput: string, detectedIntent: string): Promise<ClarificationOption[]> {
    try {
      const response = await withTimeout(
        this.completion.complete(prompts.scopeGuidancePrompt(userInput, detectedIntent, this.capabilities), {
          temperature: this.options.suggestionTemperature
        }),
        this.options.completionTimeoutMs,
        'scope suggestions'
      );

      const json = extractJsonObject(response);
      const parsed = json ? suggestionSchema.safeParse(JSON.parse(json)) : null;
      if (!parsed?.success) {
        logger.warn('Unusable scope suggestions, falling back to rephrase');
        return [];
      }

      const actions: ClarificationOption[] = [];
      for (const action of parsed.data.actions) {
        const capability = findCapability(this.capabilities, action.id);
        if (capability && !actions.some(existing => existing.id === capability.name)) {
          actions.push({ id: capability.name, label: action.label?.trim() || capability.description });
        }
      }
      return actions;
    } catch (error) {
      logger.error('Error getting scope suggestions:', error);
      return [];
    }
  }
}
