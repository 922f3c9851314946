import { GoogleGenerativeAIError, type GenerativeModel } from '@google-cloud/vertexai';
import { DEFAULT_LLM_SETTINGS } from '../../config.js';
import {
  LLMConfigurationError,
  LLMParseError,
  LLMRateLimitError,
  LLMTimeoutError,
} from '../../errors.js';
import type { LLMClassifyInput } from '../../types/index.js';
import { CLASSIFICATION_SYSTEM_PROMPT } from '../prompts.js';
import { VertexAIClient, isAbortError } from './vertexai-client.js';

const MODEL = 'gemini-2.5-flash';

const options = {
  ...DEFAULT_LLM_SETTINGS,
  model: MODEL,
  maxRetries: 2,
  retryInitialDelayMs: 1,
  retryMaxDelayMs: 5,
  enableRequestLogging: false,
  projectId: 'test-project',
  location: 'us-central1',
  maxOutputTokens: 1024,
};

const input: LLMClassifyInput = {
  paymentText: 'HYDRO ONE PAYMENT',
  categories: ['utilities', 'other'],
  correlationId: 'corr-1',
};

function createClient() {
  const generateContent = jest.fn();
  const model = { generateContent } as unknown as GenerativeModel;
  return { client: new VertexAIClient(options, model), generateContent };
}

function result(text: string) {
  return {
    response: {
      candidates: [{ index: 0, content: { role: 'model', parts: [{ text }] }, finishReason: 'STOP' }],
    },
  };
}

describe('VertexAIClient', () => {
  it('requires a project id when no model is given', () => {
    expect(() => new VertexAIClient({ ...options, projectId: undefined })).toThrow(
      LLMConfigurationError
    );
  });

  it('sends the combined prompt as one user turn', async () => {
    const { client, generateContent } = createClient();
    generateContent.mockResolvedValue(
      result('{"category": "utilities", "reasoning": "Electricity bill"}')
    );

    const classification = await client.classify(input);

    expect(classification).toMatchObject({
      category: 'utilities',
      reasoning: 'Electricity bill',
      confidence: null,
      model: MODEL,
      metadata: { finishReason: 'STOP' },
    });
    expect(generateContent).toHaveBeenCalledWith({
      contents: [
        {
          role: 'user',
          parts: [{ text: expect.stringContaining(`${CLASSIFICATION_SYSTEM_PROMPT}\n\nClassify this payment:`) }],
        },
      ],
    });
  });

  it('raises a parse error when there are no candidates', async () => {
    const { client, generateContent } = createClient();
    generateContent.mockResolvedValue({ response: {} });

    await expect(client.classify(input)).rejects.toThrow(LLMParseError);
    await expect(client.classify(input)).rejects.toThrow(`[${MODEL}] Empty response from vertexai`);
  });

  it('reads the status from the SDK error message', async () => {
    const { client, generateContent } = createClient();
    generateContent.mockRejectedValue(
      new Error('[VertexAI.ClientError]: got status: 429 Too Many Requests')
    );

    await expect(client.classify(input)).rejects.toThrow(LLMRateLimitError);
    expect(generateContent).toHaveBeenCalledTimes(3);
  });

  it('retries errors carrying a 5xx code', async () => {
    const { client, generateContent } = createClient();
    generateContent
      .mockRejectedValueOnce(Object.assign(new Error('Service unavailable'), { code: 503 }))
      .mockResolvedValue(result('{"category": "utilities", "reasoning": "Electricity bill"}'));

    await expect(client.classify(input)).resolves.toMatchObject({ category: 'utilities' });
    expect(generateContent).toHaveBeenCalledTimes(2);
  });

  it('retries network failures', async () => {
    const { client, generateContent } = createClient();
    const failure = new GoogleGenerativeAIError(
      'exception posting request to model',
      new TypeError('fetch failed')
    );
    generateContent.mockRejectedValue(failure);

    const error: unknown = await client.classify(input).catch((e: unknown) => e);

    expect(error).toHaveProperty('message', `[${MODEL}] Vertex AI error: ${failure.message}`);
    expect(error).toHaveProperty('retryable', true);
    expect(generateContent).toHaveBeenCalledTimes(3);
  });

  it('maps an aborted request to a timeout error', async () => {
    const { client, generateContent } = createClient();
    const abort = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
    generateContent.mockRejectedValue(
      new GoogleGenerativeAIError('exception posting request to model', abort)
    );

    await expect(client.classify(input)).rejects.toThrow(LLMTimeoutError);
    await expect(client.classify(input)).rejects.toThrow(`[${MODEL}] Vertex AI request timed out`);
  });

  it('does not retry other errors without a status', async () => {
    const { client, generateContent } = createClient();
    generateContent.mockRejectedValue(new Error('boom'));

    await expect(client.classify(input)).rejects.toThrow(`[${MODEL}] Vertex AI error: boom`);
    expect(generateContent).toHaveBeenCalledTimes(1);
  });
});

describe('isAbortError', () => {
  it('recognises abort and timeout errors at the top level or one level down', () => {
    const abort = Object.assign(new Error('aborted'), { name: 'AbortError' });
    const timeout = Object.assign(new Error('timed out'), { name: 'TimeoutError' });

    expect(isAbortError(abort)).toBe(true);
    expect(isAbortError(new Error('wrapped', { cause: timeout }))).toBe(true);
    expect(
      isAbortError(new GoogleGenerativeAIError('exception posting request to model', abort))
    ).toBe(true);
  });

  it('ignores other errors', () => {
    expect(isAbortError(new Error('boom'))).toBe(false);
    expect(
      isAbortError(
        new GoogleGenerativeAIError('exception posting request to model', new TypeError('fetch failed'))
      )
    ).toBe(false);
    expect(isAbortError('AbortError')).toBe(false);
  });
});
