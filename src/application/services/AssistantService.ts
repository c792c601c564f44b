import { AssistantProfile, TurnResult } from '../../core/entities/Assistant.js';
import { RequestValidationError } from '../../core/errors.js';
import { DEFAULT_RETRY_CONFIG, RetryConfig, RetryLog, isRetryableError, withRetry } from '../../utils/retry.js';
import { SessionLock } from '../../utils/sessionLock.js';
import type { Logger } from '../../utils/logger.js';
import { RunService } from './RunService.js';

/**
 * Public entry point of the orchestration core: one conversational turn,
 * retried as a whole on transient failures.
 */
export class AssistantService {
  private locks = new SessionLock();

  constructor(
    private runService: RunService,
    private logger: Logger,
    private retryConfig: RetryConfig = DEFAULT_RETRY_CONFIG
  ) {}

  /**
   * Turns for the same session are serialized in this process so they cannot
   * race on thread creation or message order.
   */
  async respond(sessionId: string, message: string, profile: AssistantProfile): Promise<TurnResult> {
    if (sessionId.length === 0) {
      throw new RequestValidationError('Session ID must not be empty');
    }

    return this.locks.run(sessionId, () =>
      withRetry(
        () => this.runService.execute(sessionId, message, profile),
        this.retryConfig,
        (log) => this.logAttempt(sessionId, log),
        isRetryableError
      )
    );
  }

  private logAttempt(sessionId: string, log: RetryLog): void {
    if (log.success) {
      return;
    }
    this.logger.error(
      {
        sessionId,
        attempt: log.attempt,
        error: log.error,
        nextRetryInMs: log.nextRetryInMs,
        severity: log.attempt >= this.retryConfig.maxAttempts ? 'HIGH' : 'MEDIUM',
      },
      'Assistant call failed'
    );
  }
}
