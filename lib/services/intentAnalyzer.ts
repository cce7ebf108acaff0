import { z } from 'zod';
import type { TextCompletionService } from '../models/collaborators';
import type { ConversationContext } from '../models/conversation';
import type {
  AmbiguityCondition,
  BoundEntity,
  Capability,
  EntityKind,
  EntityReference,
  IntentAnalysis,
  ParameterValue
} from '../models/intent';
import { entityParameter, findCapability } from '../capabilities';
import {
  AnalysisFailureError,
  CollaboratorTimeoutError,
  CollaboratorUnavailableError,
  MalformedAnalysisError
} from '../errors';
import { prompts } from '../prompts';
import { detectIntentByKeywords, extractJsonObject, extractNameReferences } from '../utils/analysisUtils';
import { createLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import type { EntityResolver } from './entityResolver';

const logger = createLogger('Intent Analyzer');

/** Keeps a reconciled score strictly below the high threshold while conditions remain. */
export const CONFIDENCE_MARGIN = 0.01;

const ENTITY_KINDS: readonly EntityKind[] = ['patient', 'claim'];

const parameterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

const rawAnalysisSchema = z.object({
  intent: z.string().min(1),
  entities: z
    .array(
      z.object({
        name: z.string().min(1).optional(),
        kind: z.string(),
        reference: z.string().min(1)
      })
    )
    .default([]),
  parameters: z.record(z.unknown()).default({}),
  confidence: z.number().default(0.5),
  reasoning: z.string().optional()
});

export interface RawAnalysis {
  intent: string;
  entities: EntityReference[];
  parameters: Record<string, ParameterValue>;
  confidence: number;
  reasoning?: string;
}

export interface IntentAnalyzerOptions {
  confidenceHigh: number;
  confidenceLow: number;
  completionTimeoutMs: number;
  analysisTemperature: number;
  capabilities: readonly Capability[];
}

const isEntityKind = (kind: string): kind is EntityKind => ENTITY_KINDS.some(known => known === kind);

/**
 * Decodes a model response into a raw analysis. Anything that is not a JSON
 * object of the expected shape raises MalformedAnalysisError.
 */
export function parseAnalysisResponse(response: string): RawAnalysis {
  const json = extractJsonObject(response);
  if (!json) {
    throw new MalformedAnalysisError('No JSON object found in analysis response', response);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(json);
  } catch (error) {
    throw new MalformedAnalysisError('Analysis response is not valid JSON', response, { cause: error });
  }

  const parsed = rawAnalysisSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedAnalysisError(`Analysis response has the wrong shape: ${parsed.error.message}`, response);
  }

  const parameters: Record<string, ParameterValue> = {};
  for (const [name, value] of Object.entries(parsed.data.parameters)) {
    const checked = parameterValueSchema.safeParse(value);
    if (checked.success) {
      parameters[name] = checked.data;
    }
  }

  const entities: EntityReference[] = [];
  for (const entity of parsed.data.entities) {
    if (isEntityKind(entity.kind)) {
      entities.push({ name: entity.name ?? entity.kind, kind: entity.kind, reference: entity.reference });
    }
  }

  return {
    intent: parsed.data.intent,
    entities,
    parameters,
    confidence: Math.min(Math.max(parsed.data.confidence, 0), 1),
    reasoning: parsed.data.reasoning
  };
}

export class IntentAnalyzer {
  constructor(
    private readonly completion: TextCompletionService,
    private readonly resolver: EntityResolver,
    private readonly options: IntentAnalyzerOptions
  ) {}

  async analyze(userInput: string, context: ConversationContext): Promise<IntentAnalysis> {
    const raw = await this.extract(userInput, context);
    const analysis = await this.reconcile(raw, context, 'model');

    logger.debug('Analysis:', {
      intent: analysis.intent,
      confidence: analysis.confidence,
      conditions: analysis.conditions.map(condition => condition.tag)
    });

    return analysis;
  }

  /**
   * Keyword-based analysis for when the model cannot produce a usable answer.
   * Never reaches the high threshold unless the user already chose an action.
   */
  async fallbackAnalysis(userInput: string, context: ConversationContext): Promise<IntentAnalysis> {
    logger.warn('Using fallback rule-based analysis');
    const detected = detectIntentByKeywords(userInput);

    const raw: RawAnalysis = {
      intent: detected.intent,
      entities: extractNameReferences(userInput),
      parameters: {},
      confidence: detected.confidence,
      reasoning: 'Fallback rule-based analysis'
    };

    return this.reconcile(raw, context, 'rules');
  }

  private async extract(userInput: string, context: ConversationContext): Promise<RawAnalysis> {
    try {
      return await this.attempt(userInput, context, false);
    } catch (error) {
      if (!(error instanceof MalformedAnalysisError)) throw error;
      logger.warn('Malformed analysis, retrying with strict prompt:', error.message);
    }

    try {
      return await this.attempt(userInput, context, true);
    } catch (error) {
      if (error instanceof MalformedAnalysisError) {
        throw new AnalysisFailureError('Intent analysis failed after strict retry', { cause: error });
      }
      throw error;
    }
  }

  private async attempt(userInput: string, context: ConversationContext, strict: boolean): Promise<RawAnalysis> {
    const prompt = prompts.intentAnalysisPrompt(
      userInput,
      this.options.capabilities,
      this.serializeContext(context),
      strict
    );

    let response: string;
    try {
      response = await withTimeout(
        this.completion.complete(prompt, { temperature: strict ? 0 : this.options.analysisTemperature }),
        this.options.completionTimeoutMs,
        'intent analysis'
      );
    } catch (error) {
      if (error instanceof CollaboratorTimeoutError) {
        throw new MalformedAnalysisError(error.message, undefined, { cause: error });
      }
      if (error instanceof CollaboratorUnavailableError) throw error;
      throw new CollaboratorUnavailableError('text-completion', 'Text completion request failed', { cause: error });
    }

    return parseAnalysisResponse(response);
  }

  private serializeContext(context: ConversationContext): string {
    const lines = context.history.map(
      entry => `Turn ${entry.turnNumber}: user: ${entry.input}${entry.answer ? ` | assistant: ${entry.answer}` : ''}`
    );

    const { bindings } = context;
    const clarified = {
      ...(Object.keys(bindings.entities).length ? { entities: bindings.entities } : {}),
      ...(Object.keys(bindings.parameters).length ? { parameters: bindings.parameters } : {}),
      ...(bindings.chosenAction ? { action: bindings.chosenAction } : {})
    };
    if (Object.keys(clarified).length) {
      lines.push(`[User clarified: ${JSON.stringify(clarified)}]`);
    }

    return lines.join('\n');
  }

  private async reconcile(
    raw: RawAnalysis,
    context: ConversationContext,
    source: IntentAnalysis['source']
  ): Promise<IntentAnalysis> {
    const { bindings } = context;
    const { confidenceHigh, confidenceLow } = this.options;

    const intent = bindings.chosenAction ?? raw.intent;
    const capability = findCapability(this.options.capabilities, intent);
    const conditions: AmbiguityCondition[] = [];
    const entities: Record<string, BoundEntity> = {};
    const parameters: Record<string, ParameterValue> = { ...raw.parameters };
    const missing = new Set<string>();
    const awaitingEntity = new Set<string>();

    if (!capability) {
      conditions.push({ tag: 'intent_unrecognized', intent });
    }

    for (const mitigation of Object.values(bindings.mitigations)) {
      Object.assign(parameters, mitigation.parameters);
    }
    Object.assign(parameters, bindings.parameters);

    for (const [name, bound] of Object.entries(bindings.entities)) {
      entities[name] = bound;
      parameters[entityParameter(bound.kind)] = bound.id;
    }

    const acceptedKinds = capability?.entityKinds ?? [];
    for (const reference of raw.entities) {
      if (!acceptedKinds.includes(reference.kind)) {
        logger.debug(`${intent} takes no ${reference.kind} reference, ignoring '${reference.reference}'`);
        continue;
      }
      const parameter = entityParameter(reference.kind);
      if (entities[reference.name] || parameters[parameter] !== undefined) continue;

      const candidates = await this.resolver.resolve(reference.reference, reference.kind);
      if (candidates.length === 1) {
        const [only] = candidates;
        entities[reference.name] = { id: only.id, label: only.displayLabel, kind: only.kind };
        parameters[parameter] = only.id;
      } else if (candidates.length > 1) {
        conditions.push({
          tag: 'entity_ambiguous',
          entityName: reference.name,
          kind: reference.kind,
          reference: reference.reference,
          candidates
        });
        awaitingEntity.add(parameter);
      } else {
        missing.add(parameter);
      }
    }

    for (const mitigation of Object.values(bindings.mitigations)) {
      mitigation.requires.filter(name => parameters[name] === undefined).forEach(name => missing.add(name));
    }

    for (const spec of capability?.requiredParameters ?? []) {
      if (parameters[spec.name] === undefined && !awaitingEntity.has(spec.name)) {
        missing.add(spec.name);
      }
    }

    for (const constraint of capability?.constraints ?? []) {
      const requested = toNumber(parameters[constraint.parameter]);
      if (requested !== null && requested > constraint.max && !bindings.mitigations[constraint.name]) {
        conditions.push({
          tag: 'constraint_conflict',
          constraint: constraint.name,
          parameter: constraint.parameter,
          requested,
          limit: constraint.max
        });
      }
    }

    for (const parameter of missing) {
      if (!awaitingEntity.has(parameter)) {
        conditions.push({ tag: 'missing_parameter', parameter });
      }
    }

    // A low score outranks entity and parameter questions; a medium one only
    // matters when there is nothing concrete to ask.
    const uncertaintyAddressed =
      bindings.chosenAction !== undefined || (source === 'model' && bindings.resolvedRounds > 0);
    const lowScore = raw.confidence < confidenceLow;
    if (
      capability &&
      !uncertaintyAddressed &&
      (lowScore || (conditions.length === 0 && (source === 'rules' || raw.confidence < confidenceHigh)))
    ) {
      conditions.push({
        tag: 'low_confidence',
        level: lowScore ? 'low' : 'medium',
        confidence: raw.confidence
      });
    }

    const confidence =
      conditions.length > 0
        ? Math.max(0, Math.min(raw.confidence, confidenceHigh - CONFIDENCE_MARGIN))
        : Math.max(raw.confidence, confidenceHigh);

    return {
      intent,
      entities,
      parameters,
      confidence,
      modelConfidence: raw.confidence,
      conditions,
      missingParameters: [...missing],
      reasoning: raw.reasoning,
      source
    };
  }
}

function toNumber(value: ParameterValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
