import { describe, expect, it } from 'vitest';
import { OpenAICompletionClient } from './completion-client.js';
import type { CompletionConfig } from './config.js';
import { ConfigError } from './errors.js';

const config: CompletionConfig = {
  baseUrl: 'http://llm.test/v1',
  apiKey: 'test-openai-key',
  model: 'test-model',
  maxTokens: 100,
  temperature: 0.7,
  timeout: 1000,
};

describe('OpenAICompletionClient', () => {
  it('needs a base URL and an API key', () => {
    let caught: unknown;
    try {
      new OpenAICompletionClient({ ...config, baseUrl: undefined, apiKey: undefined });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues).toEqual(['OPENAI_BASE is not set', 'OPENAI_API_KEY is not set']);
  });

  it('builds when both are set', () => {
    expect(() => new OpenAICompletionClient(config)).not.toThrow();
  });
});
