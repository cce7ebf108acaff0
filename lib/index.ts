export { createClarificationEngine, type EngineCollaborators } from './engine';
export { loadEngineConfig, type EngineConfig } from './config';
export { DEFAULT_CAPABILITIES, findCapability } from './capabilities';
export * from './errors';

export type * from './models/intent';
export type * from './models/clarification';
export type * from './models/conversation';
export type * from './models/collaborators';
export { REPHRASE_OPTION_ID } from './models/clarification';
export { emptyBindings } from './models/conversation';

export { ConversationController } from './services/conversationController';
export { IntentAnalyzer } from './services/intentAnalyzer';
export { EntityResolver } from './services/entityResolver';
export { AmbiguityClassifier } from './services/ambiguityClassifier';
export { ClarificationBuilder } from './services/clarificationBuilder';
export { ContextMerger } from './services/contextMerger';
export { toClarificationUI, parseClarificationResponse, type ClarificationUI } from './services/wireFormat';

export { GeminiTextCompletion } from './services/geminiTextCompletion';
export { HttpToolExecutor } from './services/toolRegistryClient';
export { MemoryConversationStore } from './stores/memoryConversationStore';
export { MemoryEntityStore } from './stores/memoryEntityStore';
export { SupabaseConversationStore } from './stores/supabaseConversationStore';
export { SupabaseEntityStore } from './stores/supabaseEntityStore';
