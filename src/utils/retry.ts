/**
 * Bounded exponential-backoff retry and error classification for
 * calls into the remote assistant service
 */

import { AssistantApiError, TransientAssistantError } from '../core/errors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  multiplier: 2,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

/**
 * Delay before the attempt that follows `attempt` (1-based)
 */
export function computeBackoffDelay(attempt: number, config: RetryConfig): number {
  const delay = config.initialDelayMs * Math.pow(config.multiplier, attempt - 1);
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Executes a function with exponential backoff retry logic.
 * Errors rejected by `shouldRetry` propagate immediately; after the last
 * attempt the final error is re-thrown as is.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn(attempt);
      onLog?.({ timestamp: new Date(), attempt, success: true });
      return result;
    } catch (error) {
      const retryable = attempt < config.maxAttempts && shouldRetry(error);
      const delay = retryable ? computeBackoffDelay(attempt, config) : undefined;

      onLog?.({
        timestamp: new Date(),
        attempt,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: delay,
      });

      if (delay === undefined) {
        throw error;
      }

      await sleep(delay);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface ErrorClassification {
  retryable: boolean;
  label: string;
}

/**
 * HTTP status → retry policy. Statuses missing from the table fall back to
 * DEFAULT_CLASSIFICATION, which retries as well.
 */
export const STATUS_CLASSIFICATION: ReadonlyMap<number, ErrorClassification> = new Map([
  [408, { retryable: true, label: 'Request timeout' }],
  [409, { retryable: true, label: 'Conflict' }],
  [429, { retryable: true, label: 'Rate limit exceeded' }],
  [500, { retryable: true, label: 'Server error' }],
  [502, { retryable: true, label: 'Server error' }],
  [503, { retryable: true, label: 'Server error' }],
  [504, { retryable: true, label: 'Server error' }],
]);

export const DEFAULT_CLASSIFICATION: ErrorClassification = { retryable: true, label: 'API error' };

export function classifyStatus(
  status: number,
  table: ReadonlyMap<number, ErrorClassification> = STATUS_CLASSIFICATION
): ErrorClassification {
  return table.get(status) ?? DEFAULT_CLASSIFICATION;
}

/**
 * Normalise anything thrown while driving a run into a TransientAssistantError
 */
export function toTransientError(
  error: unknown,
  table: ReadonlyMap<number, ErrorClassification> = STATUS_CLASSIFICATION
): TransientAssistantError {
  if (error instanceof TransientAssistantError) {
    return error;
  }

  if (error instanceof AssistantApiError) {
    const { label } = classifyStatus(error.status, table);
    return new TransientAssistantError(`${label} (${error.status}): ${error.message}`, error.status, {
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransientAssistantError(`Assistant API error: ${message}`, undefined, { cause: error });
}

/**
 * Whether a failure raised by the run driver should be attempted again
 */
export function isRetryableError(
  error: unknown,
  table: ReadonlyMap<number, ErrorClassification> = STATUS_CLASSIFICATION
): boolean {
  if (!(error instanceof TransientAssistantError)) {
    return false;
  }
  if (error.status === undefined) {
    return true;
  }
  return classifyStatus(error.status, table).retryable;
}
