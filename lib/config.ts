import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? fallback : Number(value)),
    z.number().finite()
  );

const engineConfigSchema = z
  .object({
    confidenceHigh: numberFromEnv(0.9).pipe(z.number().gt(0).max(1)),
    confidenceLow: numberFromEnv(0.6).pipe(z.number().min(0).lt(1)),
    maxCandidates: numberFromEnv(10).pipe(z.number().int().positive()),
    roundCap: numberFromEnv(5).pipe(z.number().int().positive()),
    toolRetries: numberFromEnv(3).pipe(z.number().int().min(0)),
    maxToolIterations: numberFromEnv(5).pipe(z.number().int().positive()),
    historyLimit: numberFromEnv(10).pipe(z.number().int().min(0)),
    completionTimeoutMs: numberFromEnv(30000).pipe(z.number().int().positive()),
    lookupTimeoutMs: numberFromEnv(10000).pipe(z.number().int().positive()),
    toolTimeoutMs: numberFromEnv(30000).pipe(z.number().int().positive()),
    storeTimeoutMs: numberFromEnv(10000).pipe(z.number().int().positive()),
    storeConflictRetries: numberFromEnv(5).pipe(z.number().int().positive()),
    analysisTemperature: numberFromEnv(0.1).pipe(z.number().min(0).max(2)),
    suggestionTemperature: numberFromEnv(0.4).pipe(z.number().min(0).max(2)),
    geminiApiKey: z.string().optional(),
    geminiModel: z.string().default('gemini-1.5-pro'),
    supabaseUrl: z.string().optional(),
    supabaseServiceKey: z.string().optional(),
    toolRegistryUrl: z.string().default('http://localhost:8003')
  })
  .refine(config => config.confidenceLow < config.confidenceHigh, {
    message: 'confidenceLow must be below confidenceHigh',
    path: ['confidenceLow']
  });

export type EngineConfig = z.infer<typeof engineConfigSchema>;

const trimmed = (value: string | undefined): string | undefined => {
  const result = value?.trim();
  return result ? result : undefined;
};

/**
 * Reads the engine configuration from the environment. Overrides win over
 * environment values; the merged result is validated as a whole.
 */
export function loadEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const fromEnv = {
    confidenceHigh: env.CLARIFY_CONFIDENCE_HIGH,
    confidenceLow: env.CLARIFY_CONFIDENCE_LOW,
    maxCandidates: env.CLARIFY_MAX_CANDIDATES,
    roundCap: env.CLARIFY_ROUND_CAP,
    toolRetries: env.CLARIFY_TOOL_RETRIES,
    maxToolIterations: env.CLARIFY_MAX_TOOL_ITERATIONS,
    historyLimit: env.CLARIFY_HISTORY_LIMIT,
    completionTimeoutMs: env.CLARIFY_COMPLETION_TIMEOUT_MS,
    lookupTimeoutMs: env.CLARIFY_LOOKUP_TIMEOUT_MS,
    toolTimeoutMs: env.CLARIFY_TOOL_TIMEOUT_MS,
    storeTimeoutMs: env.CLARIFY_STORE_TIMEOUT_MS,
    storeConflictRetries: env.CLARIFY_STORE_CONFLICT_RETRIES,
    analysisTemperature: env.CLARIFY_ANALYSIS_TEMPERATURE,
    suggestionTemperature: env.CLARIFY_SUGGESTION_TEMPERATURE,
    geminiApiKey: trimmed(env.GEMINI_API_KEY),
    geminiModel: trimmed(env.GEMINI_MODEL),
    supabaseUrl: trimmed(env.SUPABASE_URL),
    supabaseServiceKey: trimmed(env.SUPABASE_SERVICE_ROLE_KEY),
    toolRegistryUrl: trimmed(env.TOOL_REGISTRY_URL)
  };

  return engineConfigSchema.parse({ ...fromEnv, ...overrides });
}
