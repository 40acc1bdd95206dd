import { OpenAI, APIError } from 'openai';
import type { CompletionOptions, TextCompletion } from './text-completion.js';
import { CompletionError } from './text-completion.js';
import { errorMessage } from '../logging/logger.js';

export interface OpenAICompletionOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

const SYSTEM_PROMPT =
  'You are an expert web automation agent. Generate precise, executable automation plans. Always respond with valid JSON.';

const DEFAULT_MAX_TOKENS = 1000;

export class OpenAICompletion implements TextCompletion {
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAICompletionOptions, client?: OpenAI) {
    this.model = options.model;
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeoutMs ?? 60000,
        maxRetries: options.maxRetries ?? 1,
      });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        temperature: options.temperature,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      });

      const content = response.choices[0]?.message.content;
      if (!content) {
        throw new CompletionError('Completion returned no content', 'openai');
      }
      return content;
    } catch (error) {
      if (error instanceof CompletionError) throw error;
      const status = error instanceof APIError ? error.status : undefined;
      throw new CompletionError(errorMessage(error), 'openai', status);
    }
  }
}
