/**
 * Tests for retry and error classification
 */

import {
  withRetry,
  computeBackoffDelay,
  DEFAULT_RETRY_CONFIG,
  RetryLog,
  isRetryableError,
  toTransientError,
  classifyStatus,
  STATUS_CLASSIFICATION,
  ErrorClassification,
} from '../src/utils/retry.js';
import {
  AssistantApiError,
  RequestValidationError,
  RunTimeoutError,
  TransientAssistantError,
} from '../src/core/errors.js';

const FAST = { maxAttempts: 3, initialDelayMs: 5, maxDelayMs: 8, multiplier: 2 };

describe('Retry Logic', () => {
  describe('computeBackoffDelay', () => {
    it('should double from the initial delay up to the cap', () => {
      const delays = [1, 2, 3, 4, 5, 6].map((attempt) => computeBackoffDelay(attempt, DEFAULT_RETRY_CONFIG));
      expect(delays).toEqual([1000, 2000, 4000, 8000, 10000, 10000]);
    });
  });

  describe('withRetry - Success Cases', () => {
    it('should succeed on first attempt', async () => {
      const fn = jest.fn().mockResolvedValue('success');
      const result = await withRetry(fn, FAST);

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on failure and eventually succeed', async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new TransientAssistantError('Temporary failure'))
        .mockRejectedValueOnce(new TransientAssistantError('Temporary failure'))
        .mockResolvedValueOnce('success');

      const result = await withRetry(fn, FAST, undefined, isRetryableError);
      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(fn.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
    });
  });

  describe('withRetry - Failure Cases', () => {
    it('should re-throw the last error unchanged after max attempts', async () => {
      const errors = [1, 2, 3].map((n) => new TransientAssistantError(`fail ${n}`));
      let call = 0;
      const fn = jest.fn(() => Promise.reject(errors[call++]));

      await expect(withRetry(fn, FAST, undefined, isRetryableError)).rejects.toBe(errors[2]);
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should not retry errors the predicate rejects', async () => {
      const error = new RequestValidationError('Session ID must not be empty');
      const fn = jest.fn().mockRejectedValue(error);

      await expect(withRetry(fn, FAST, undefined, isRetryableError)).rejects.toBe(error);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should log non-decreasing delays capped at maxDelayMs', async () => {
      const logs: RetryLog[] = [];
      const fn = jest.fn().mockRejectedValue(new TransientAssistantError('down'));

      await expect(withRetry(fn, FAST, (log) => logs.push(log), isRetryableError)).rejects.toThrow('down');

      expect(logs.map((log) => log.attempt)).toEqual([1, 2, 3]);
      expect(logs.map((log) => log.nextRetryInMs)).toEqual([5, 8, undefined]);
      expect(logs.every((log) => !log.success && log.error === 'down')).toBe(true);
    });

    it('should log a successful attempt', async () => {
      const logs: RetryLog[] = [];
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new TransientAssistantError('Fail 1'))
        .mockResolvedValueOnce('ok');

      await withRetry(fn, FAST, (log) => logs.push(log));

      expect(logs).toHaveLength(2);
      expect(logs[0]).toMatchObject({ attempt: 1, success: false, error: 'Fail 1', nextRetryInMs: 5 });
      expect(logs[1]).toMatchObject({ attempt: 2, success: true });
    });
  });
});

describe('Error classification', () => {
  it('should label rate limits and server errors', () => {
    expect(classifyStatus(429)).toEqual({ retryable: true, label: 'Rate limit exceeded' });
    expect(classifyStatus(503)).toEqual({ retryable: true, label: 'Server error' });
    expect(classifyStatus(400)).toEqual({ retryable: true, label: 'API error' });
  });

  it('should wrap API errors as transient, keeping the status', () => {
    const error = toTransientError(new AssistantApiError('HTTP 429 POST /threads: slow down', 429));

    expect(error).toBeInstanceOf(TransientAssistantError);
    expect(error.status).toBe(429);
    expect(error.message).toBe('Rate limit exceeded (429): HTTP 429 POST /threads: slow down');
  });

  it('should wrap unknown errors as transient', () => {
    const error = toTransientError(new Error('socket hang up'));
    expect(error.message).toBe('Assistant API error: socket hang up');
    expect(error.status).toBeUndefined();
    expect(isRetryableError(error)).toBe(true);
  });

  it('should pass transient errors through untouched', () => {
    const original = new RunTimeoutError('run_1', 1500);
    expect(toTransientError(original)).toBe(original);
  });

  it('should honour an extended classification table', () => {
    const table = new Map<number, ErrorClassification>(STATUS_CLASSIFICATION);
    table.set(400, { retryable: false, label: 'Bad request' });

    const error = toTransientError(new AssistantApiError('bad', 400), table);
    expect(error.message).toBe('Bad request (400): bad');
    expect(isRetryableError(error, table)).toBe(false);
    expect(isRetryableError(error)).toBe(true);
  });

  it('should never retry validation errors', () => {
    expect(isRetryableError(new RequestValidationError('bad input'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});
