import { AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import { Agent } from 'http';
import { DEFAULT_LLM_SETTINGS } from '../../config.js';
import {
  LLMClientError,
  LLMParseError,
  LLMRateLimitError,
  LLMTimeoutError,
  LLMValidationError,
} from '../../errors.js';
import type { LLMClassifyInput } from '../../types/index.js';
import { OllamaClient } from './ollama-client.js';

const options = {
  ...DEFAULT_LLM_SETTINGS,
  model: 'qwen2.5:1.5b',
  maxRetries: 2,
  retryInitialDelayMs: 1,
  retryMaxDelayMs: 5,
  enableRequestLogging: false,
  baseUrl: 'http://localhost:11434',
};

const input: LLMClassifyInput = {
  paymentText: 'SHELL OIL 5741 HOUSTON TX',
  categories: ['transport', 'other'],
  correlationId: 'corr-1',
};

function createClient(overrides: Partial<typeof options> = {}) {
  const post = jest.fn();
  const client = new OllamaClient({ ...options, ...overrides }, { post } as unknown as AxiosInstance);
  return { client, post };
}

function httpError(status: number): AxiosError {
  const response = { status, statusText: '', data: {}, headers: {}, config: {} } as AxiosResponse;
  return new AxiosError(
    `Request failed with status code ${status}`,
    'ERR_BAD_RESPONSE',
    undefined,
    undefined,
    response
  );
}

const okResponse = {
  data: {
    model: 'qwen2.5:1.5b',
    response: '{"category": "transport", "reasoning": "Gas station purchase"}',
    done: true,
    eval_duration: 1234,
  },
};

describe('OllamaClient', () => {
  it('classifies through /api/generate', async () => {
    const { client, post } = createClient();
    post.mockResolvedValue(okResponse);

    const result = await client.classify(input);

    expect(result).toMatchObject({
      category: 'transport',
      reasoning: 'Gas station purchase',
      confidence: null,
      model: 'qwen2.5:1.5b',
      metadata: { evalDuration: 1234 },
    });
    expect(post).toHaveBeenCalledWith(
      '/api/generate',
      {
        model: 'qwen2.5:1.5b',
        prompt: expect.stringContaining('Available categories: transport, other'),
        stream: false,
        format: 'json',
        options: { temperature: 0 },
      },
      { headers: { 'X-Correlation-ID': 'corr-1' } }
    );
  });

  it('includes search results in the prompt', async () => {
    const { client, post } = createClient();
    post.mockResolvedValue(okResponse);

    await client.classify({
      ...input,
      searchResults: [{ title: 'Shell', snippet: 'Fuel station chain', link: '' }],
    });

    expect(post.mock.calls[0][1].prompt).toContain('- Shell: Fuel station chain');
  });

  it('raises a parse error for invalid JSON', async () => {
    const { client, post } = createClient();
    post.mockResolvedValue({ data: { response: 'invalid json{' } });

    await expect(client.classify(input)).rejects.toThrow(
      '[qwen2.5:1.5b] Invalid JSON response from ollama: invalid json{'
    );
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('raises a parse error when the response field is missing', async () => {
    const { client, post } = createClient();
    post.mockResolvedValue({ data: { done: true } });

    await expect(client.classify(input)).rejects.toThrow(LLMParseError);
  });

  it('raises a parse error for an empty body', async () => {
    const { client, post } = createClient();
    post.mockResolvedValue({ data: null });

    const error: unknown = await client.classify(input).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMParseError);
    expect(error).toHaveProperty('message', '[qwen2.5:1.5b] Empty response from ollama');
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('validates inputs before calling the server', async () => {
    const { client, post } = createClient({ maxCategories: 1 });

    await expect(client.classify(input)).rejects.toThrow(
      new LLMValidationError('Too many categories (max 1)', { model: 'qwen2.5:1.5b' })
    );
    await expect(client.classify({ ...input, paymentText: '  ' })).rejects.toThrow(
      '[qwen2.5:1.5b] payment_text cannot be empty'
    );
    expect(post).not.toHaveBeenCalled();
  });

  it('rejects payment text over the length limit', async () => {
    const { client } = createClient({ maxPaymentTextLength: 10 });

    await expect(client.classify(input)).rejects.toThrow(
      '[qwen2.5:1.5b] payment_text too long (max 10 chars)'
    );
  });

  it('retries server errors and succeeds', async () => {
    const { client, post } = createClient();
    post.mockRejectedValueOnce(httpError(500)).mockResolvedValue(okResponse);

    const result = await client.classify(input);

    expect(result.category).toBe('transport');
    expect(post).toHaveBeenCalledTimes(2);
  });

  it('raises a rate limit error after exhausting retries', async () => {
    const { client, post } = createClient();
    post.mockRejectedValue(httpError(429));

    await expect(client.classify(input)).rejects.toThrow(LLMRateLimitError);
    expect(post).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    const { client, post } = createClient();
    post.mockRejectedValue(httpError(404));

    const error: unknown = await client.classify(input).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMClientError);
    expect(error).not.toBeInstanceOf(LLMRateLimitError);
    expect(error).toHaveProperty('message', '[qwen2.5:1.5b] Ollama request failed (status 404)');
    expect(error).toHaveProperty('retryable', false);
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('maps request timeouts to a timeout error', async () => {
    const { client, post } = createClient({ maxRetries: 0 });
    post.mockRejectedValue(new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED'));

    await expect(client.classify(input)).rejects.toThrow(LLMTimeoutError);
  });

  it('retries when the server is unreachable', async () => {
    const { client, post } = createClient();
    post.mockRejectedValue(new AxiosError('connect ECONNREFUSED 127.0.0.1:11434', 'ECONNREFUSED'));

    await expect(client.classify(input)).rejects.toThrow(
      '[qwen2.5:1.5b] Ollama unreachable: connect ECONNREFUSED 127.0.0.1:11434'
    );
    expect(post).toHaveBeenCalledTimes(3);
  });

  it('wraps unexpected errors', async () => {
    const { client, post } = createClient();
    post.mockRejectedValue(new TypeError('boom'));

    await expect(client.classify(input)).rejects.toThrow(
      '[qwen2.5:1.5b] Unexpected error in OllamaClient'
    );
    expect(post).toHaveBeenCalledTimes(1);
  });

  describe('close', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('destroys the connection pool it created', async () => {
      const destroy = jest.spyOn(Agent.prototype, 'destroy');
      const client = new OllamaClient(options);

      await client.close();

      expect(destroy).toHaveBeenCalledTimes(1);
    });

    it('leaves an injected HTTP client alone', async () => {
      const destroy = jest.spyOn(Agent.prototype, 'destroy');
      const { client } = createClient();

      await client.close();

      expect(destroy).not.toHaveBeenCalled();
    });
  });
});
