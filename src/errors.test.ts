import {
  LLMClientError,
  LLMParseError,
  LLMRateLimitError,
  LLMTimeoutError,
  RequestValidationError,
  errorMessage,
  isRetryableError,
} from './errors.js';

describe('LLMClientError', () => {
  it('prefixes the message with the model name', () => {
    const error = new LLMClientError('boom', { model: 'gpt-4o-mini', correlationId: 'corr-1' });

    expect(error.message).toBe('[gpt-4o-mini] boom');
    expect(error.name).toBe('LLMClientError');
    expect(error.correlationId).toBe('corr-1');
    expect(error.retryable).toBe(false);
  });

  it('uses a placeholder when the model is unknown', () => {
    expect(new LLMParseError('bad output').message).toBe('[Unknown Model] bad output');
  });

  it('names subclasses after themselves', () => {
    expect(new LLMParseError('x').name).toBe('LLMParseError');
    expect(new LLMTimeoutError('x').name).toBe('LLMTimeoutError');
  });

  it('keeps the cause', () => {
    const cause = new Error('socket closed');
    expect(new LLMClientError('x', { cause }).cause).toBe(cause);
  });
});

describe('isRetryableError', () => {
  it('retries timeouts and rate limits', () => {
    expect(isRetryableError(new LLMTimeoutError('x'))).toBe(true);
    expect(isRetryableError(new LLMRateLimitError('x', { retryable: false }))).toBe(true);
  });

  it('retries client errors only when flagged', () => {
    expect(isRetryableError(new LLMClientError('x', { retryable: true }))).toBe(true);
    expect(isRetryableError(new LLMClientError('x'))).toBe(false);
    expect(isRetryableError(new LLMParseError('x'))).toBe(false);
    expect(isRetryableError(new Error('x'))).toBe(false);
  });
});

describe('RequestValidationError', () => {
  it('joins issues into the message', () => {
    const error = new RequestValidationError(['a: missing', 'b: invalid']);
    expect(error.message).toBe('a: missing; b: invalid');
    expect(error.issues).toEqual(['a: missing', 'b: invalid']);
  });

  it('falls back to a generic message', () => {
    expect(new RequestValidationError([]).message).toBe('Invalid request');
  });
});

describe('errorMessage', () => {
  it('reads Error messages and ignores other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('boom')).toBe('Unknown error');
  });
});
