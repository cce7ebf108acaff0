import { z } from 'zod';
import type { ToolExecutor, ToolResult } from '../models/collaborators';
import type { AmbiguityCondition, ParameterValue } from '../models/intent';
import { CollaboratorTimeoutError, CollaboratorUnavailableError } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('Tool Registry');

const conditionSchema = z.discriminatedUnion('tag', [
  z.object({
    tag: z.literal('constraint_conflict'),
    constraint: z.string(),
    parameter: z.string(),
    requested: z.number(),
    limit: z.number()
  }),
  z.object({ tag: z.literal('missing_parameter'), parameter: z.string() })
]);

const executionResponseSchema = z.object({
  tool: z.string(),
  result: z.unknown(),
  metadata: z
    .object({ condition: conditionSchema.optional() })
    .passthrough()
    .default({}),
  timestamp: z.string().optional()
});

const errorBodySchema = z.object({ detail: z.unknown() }).partial();

const toolErrorSchema = z.object({ error: z.string() });

/**
 * Executes tools through the registry's `POST /tools/execute`. HTTP and tool
 * errors come back as failed results; an unreachable registry throws. A call
 * still running after `timeoutMs` is aborted and throws CollaboratorTimeoutError.
 */
export class HttpToolExecutor implements ToolExecutor {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number = 30_000
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async execute(toolName: string, parameters: Record<string, ParameterValue>): Promise<ToolResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let body: unknown;
    try {
      response = await fetch(`${this.baseUrl}/tools/execute`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ tool_name: toolName, parameters }),
        signal: controller.signal
      });
      body = await response.json().catch(() => null);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new CollaboratorTimeoutError(`tool ${toolName}`, this.timeoutMs);
      }
      throw new CollaboratorUnavailableError('tool-executor', `Tool registry unreachable at ${this.baseUrl}`, {
        cause: error
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const detail = errorBodySchema.safeParse(body);
      const message =
        detail.success && typeof detail.data.detail === 'string'
          ? detail.data.detail
          : `Tool registry responded ${response.status}`;
      logger.warn(`Tool ${toolName} failed: ${message}`);
      return { ok: false, error: message };
    }

    const parsed = executionResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { ok: false, error: `Unexpected tool registry response: ${parsed.error.message}` };
    }

    const { result, metadata } = parsed.data;
    const condition: AmbiguityCondition | undefined = metadata.condition;
    if (condition) {
      return { ok: false, error: `Tool ${toolName} needs clarification`, condition };
    }

    const failure = toolErrorSchema.safeParse(result);
    if (failure.success) {
      return { ok: false, error: failure.data.error };
    }

    return { ok: true, data: result };
  }
}
