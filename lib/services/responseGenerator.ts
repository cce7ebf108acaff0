import type { TextCompletionService } from '../models/collaborators';
import type { DegradedReason } from '../models/conversation';
import type { Capability, IntentAnalysis } from '../models/intent';
import { findCapability } from '../capabilities';
import { prompts } from '../prompts';
import { formatParameterValue } from '../utils/parameterUtils';
import { createLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

const logger = createLogger('Response Generator');

export const DEGRADED_NOTES: Record<DegradedReason, string> = {
  round_cap: 'Clarification did not converge within the allowed number of rounds.',
  iteration_cap: 'The request needed more tool attempts than one turn allows.',
  tool_failure: 'The tool kept failing after several retries.',
  abandoned: 'The conversation was abandoned before clarification finished.'
};

export interface DegradedAnswerInput {
  input: string;
  reason: DegradedReason;
  analysis?: IntentAnalysis;
}

export interface ResponseGeneratorOptions {
  completionTimeoutMs: number;
  suggestionTemperature: number;
}

export class ResponseGenerator {
  constructor(
    private readonly capabilities: readonly Capability[],
    private readonly options: ResponseGeneratorOptions,
    private readonly completion?: TextCompletionService
  ) {}

  resultAnswer(analysis: IntentAnalysis, data: unknown): string {
    if (isRecord(data) && typeof data.message === 'string' && data.message.trim()) {
      return data.message;
    }

    const description = findCapability(this.capabilities, analysis.intent)?.description ?? analysis.intent;

    if (Array.isArray(data)) {
      return `${description}: ${data.length} ${data.length === 1 ? 'record' : 'records'} found.`;
    }
    if (isRecord(data) && typeof data.total === 'number') {
      return `${description}: total ${data.total}.`;
    }
    if (isRecord(data) && Array.isArray(data.results)) {
      return `${description}: ${data.results.length} ${data.results.length === 1 ? 'record' : 'records'} found.`;
    }

    return `${description}: done.`;
  }

  /**
   * Best guess plus an explicit note on why the turn stopped. Uses the model
   * when one is configured, otherwise (or when it fails) a fixed template.
   */
  async degradedAnswer({ input, reason, analysis }: DegradedAnswerInput): Promise<string> {
    const note = DEGRADED_NOTES[reason];

    if (this.completion) {
      const guess = await this.generateAIGuess(input, note, analysis);
      if (guess) {
        return `${guess}\n\nNote: ${note}`;
      }
    }

    return this.formatDegraded(note, analysis);
  }

  private async generateAIGuess(input: string, note: string, analysis?: IntentAnalysis): Promise<string | null> {
    if (!this.completion) return null;

    try {
      const knownFacts = JSON.stringify(
        analysis ? { intent: analysis.intent, entities: analysis.entities, parameters: analysis.parameters } : {},
        null,
        2
      );
      const text = await withTimeout(
        this.completion.complete(prompts.degradedAnswerPrompt(input, note, knownFacts), {
          temperature: this.options.suggestionTemperature
        }),
        this.options.completionTimeoutMs,
        'degraded answer'
      );
      return text.trim() || null;
    } catch (error) {
      logger.error('Degraded answer generation failed:', error);
      return null;
    }
  }

  private formatDegraded(note: string, analysis?: IntentAnalysis): string {
    const capability = analysis ? findCapability(this.capabilities, analysis.intent) : undefined;
    if (!analysis || !capability) {
      return `I couldn't complete your request. Note: ${note} Try rephrasing it with the exact names or IDs involved.`;
    }

    const description = capability.description;
    const details = Object.entries(analysis.parameters)
      .map(([name, value]) => `${name}: ${formatParameterValue(value)}`)
      .join(', ');

    return `My best guess is that you wanted to ${description.toLowerCase()}${details ? ` (${details})` : ''}, but I couldn't complete it. Note: ${note}`;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
