import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import type { CompletionOptions, TextCompletionService } from '../models/collaborators';
import { CollaboratorUnavailableError } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('Gemini');

export interface GeminiTextCompletionOptions {
  apiKey?: string;
  model: string;
  /** Extra attempts after a 429. */
  rateLimitRetries?: number;
  retryDelayMs?: number;
}

const isRateLimited = (error: unknown): boolean =>
  (error instanceof GoogleGenerativeAIFetchError && error.status === 429) ||
  (error instanceof Error && error.message.includes('429 Too Many Requests'));

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class GeminiTextCompletion implements TextCompletionService {
  private genAI?: GoogleGenerativeAI;

  constructor(private readonly options: GeminiTextCompletionOptions) {
    if (options.apiKey) {
      this.genAI = new GoogleGenerativeAI(options.apiKey);
    }
  }

  async complete(prompt: string, { temperature, maxOutputTokens }: CompletionOptions): Promise<string> {
    if (!this.genAI) {
      throw new CollaboratorUnavailableError('text-completion', 'GEMINI_API_KEY is not configured');
    }

    const model = this.genAI.getGenerativeModel({
      model: this.options.model,
      generationConfig: { temperature, maxOutputTokens }
    });
    const retries = this.options.rateLimitRetries ?? 2;
    const delay = this.options.retryDelayMs ?? 1000;

    for (let attempt = 0; ; attempt++) {
      try {
        const result = await model.generateContent(prompt);
        logger.debug('Received response from Gemini');
        return result.response.text();
      } catch (error) {
        if (isRateLimited(error) && attempt < retries) {
          logger.warn(`Gemini rate limited, retry ${attempt + 1} of ${retries}`);
          await sleep(delay * 2 ** attempt);
          continue;
        }

        throw new CollaboratorUnavailableError(
          'text-completion',
          isRateLimited(error) ? 'Gemini quota exceeded' : 'Gemini request failed',
          { cause: error }
        );
      }
    }
  }
}
