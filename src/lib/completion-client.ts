/**
 * Completion Client
 *
 * Thin seam over an OpenAI-compatible chat completion endpoint so the
 * summarizer can be exercised without the network.
 */
import OpenAI from 'openai';
import type { CompletionConfig } from './config.js';
import { ConfigError, SummaryServiceError } from './errors.js';

export interface CompletionRequest {
  system: string;
  user: string;
}

export interface CompletionClient {
  /** Resolves to the completion text, or null when the service sent none */
  complete(request: CompletionRequest): Promise<string | null>;
}

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI;

  constructor(private readonly config: CompletionConfig) {
    if (!config.baseUrl || !config.apiKey) {
      throw new ConfigError('Completion client needs a base URL and an API key', [
        ...(config.baseUrl ? [] : ['OPENAI_BASE is not set']),
        ...(config.apiKey ? [] : ['OPENAI_API_KEY is not set']),
      ]);
    }

    this.client = new OpenAI({
      baseURL: config.baseUrl,
      apiKey: config.apiKey,
      timeout: config.timeout,
      // One attempt per call
      maxRetries: 0,
      defaultHeaders: {
        'HTTP-Referer': 'https://news.ycombinator.com',
        'X-Title': 'HN Podcast Assistant',
      },
    });
  }

  async complete(request: CompletionRequest): Promise<string | null> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
      });
      return response.choices[0]?.message?.content ?? null;
    } catch (err) {
      if (err instanceof OpenAI.APIError) {
        const status = err.status ?? undefined;
        throw new SummaryServiceError(
          status ? `Completion request failed with HTTP ${status}: ${err.message}` : `Completion request failed: ${err.message}`,
          { cause: err, status }
        );
      }
      throw err;
    }
  }
}
