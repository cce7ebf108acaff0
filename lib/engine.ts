import { DEFAULT_CAPABILITIES } from './capabilities';
import { loadEngineConfig, type EngineConfig } from './config';
import type {
  ConversationStore,
  EntityStore,
  PresentationChannel,
  TextCompletionService,
  ToolExecutor
} from './models/collaborators';
import type { Capability } from './models/intent';
import { AmbiguityClassifier } from './services/ambiguityClassifier';
import { ClarificationBuilder } from './services/clarificationBuilder';
import { ClarificationBuilderFactory } from './services/clarifications/clarificationBuilderFactory';
import { ContextMerger } from './services/contextMerger';
import { ConversationController } from './services/conversationController';
import { ConversationRepository } from './services/conversationRepository';
import { EntityResolver } from './services/entityResolver';
import { GeminiTextCompletion } from './services/geminiTextCompletion';
import { IntentAnalyzer } from './services/intentAnalyzer';
import { ResponseGenerator } from './services/responseGenerator';
import { HttpToolExecutor } from './services/toolRegistryClient';
import { MemoryConversationStore } from './stores/memoryConversationStore';
import { MemoryEntityStore } from './stores/memoryEntityStore';
import { SupabaseConversationStore } from './stores/supabaseConversationStore';
import { SupabaseEntityStore } from './stores/supabaseEntityStore';
import { createSupabaseClient } from './supabase';
import { createLogger } from './utils/logger';

const logger = createLogger('Clarification Engine');

/** Collaborators to use instead of the ones built from configuration. */
export interface EngineCollaborators {
  completion?: TextCompletionService;
  entityStore?: EntityStore;
  conversationStore?: ConversationStore;
  tools?: ToolExecutor;
  presentation?: PresentationChannel;
  capabilities?: Capability[];
}

export function createClarificationEngine(
  config: EngineConfig = loadEngineConfig(),
  collaborators: EngineCollaborators = {}
): ConversationController {
  const capabilities = collaborators.capabilities ?? DEFAULT_CAPABILITIES;
  const completion =
    collaborators.completion ?? new GeminiTextCompletion({ apiKey: config.geminiApiKey, model: config.geminiModel });

  let { entityStore, conversationStore } = collaborators;
  if (!entityStore || !conversationStore) {
    if (config.supabaseUrl && config.supabaseServiceKey) {
      const supabase = createSupabaseClient(config.supabaseUrl, config.supabaseServiceKey);
      entityStore ??= new SupabaseEntityStore(supabase);
      conversationStore ??= new SupabaseConversationStore(supabase);
    } else {
      logger.warn('SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY not set, using in-memory stores');
      entityStore ??= new MemoryEntityStore();
      conversationStore ??= new MemoryConversationStore();
    }
  }

  const resolver = new EntityResolver(entityStore, {
    maxCandidates: config.maxCandidates,
    lookupTimeoutMs: config.lookupTimeoutMs
  });
  const analyzer = new IntentAnalyzer(completion, resolver, {
    confidenceHigh: config.confidenceHigh,
    confidenceLow: config.confidenceLow,
    completionTimeoutMs: config.completionTimeoutMs,
    analysisTemperature: config.analysisTemperature,
    capabilities
  });
  const suggestionOptions = {
    completionTimeoutMs: config.completionTimeoutMs,
    suggestionTemperature: config.suggestionTemperature
  };

  return new ConversationController(
    {
      analyzer,
      classifier: new AmbiguityClassifier(),
      builder: new ClarificationBuilder(new ClarificationBuilderFactory(capabilities, completion, suggestionOptions)),
      merger: new ContextMerger(),
      repository: new ConversationRepository(conversationStore, {
        storeConflictRetries: config.storeConflictRetries,
        storeTimeoutMs: config.storeTimeoutMs
      }),
      tools: collaborators.tools ?? new HttpToolExecutor(config.toolRegistryUrl, config.toolTimeoutMs),
      responses: new ResponseGenerator(capabilities, suggestionOptions, completion),
      presentation: collaborators.presentation
    },
    {
      confidenceHigh: config.confidenceHigh,
      roundCap: config.roundCap,
      toolRetries: config.toolRetries,
      maxToolIterations: config.maxToolIterations,
      historyLimit: config.historyLimit,
      toolTimeoutMs: config.toolTimeoutMs
    }
  );
}
