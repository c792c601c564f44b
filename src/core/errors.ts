/**
 * Error taxonomy shared across layers
 */

/**
 * Non-2xx response from the remote assistant service
 */
export class AssistantApiError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'AssistantApiError';
  }
}

/**
 * A failure worth retrying: rate limits, remote 5xx, failed or unexpected runs,
 * missing replies. Every error raised while driving a run ends up as one of these.
 */
export class TransientAssistantError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransientAssistantError';
  }
}

/**
 * The run did not reach a terminal state within the configured wait
 */
export class RunTimeoutError extends TransientAssistantError {
  constructor(
    public readonly runId: string,
    public readonly waitedMs: number
  ) {
    super(`Run ${runId} did not finish within ${waitedMs}ms`);
    this.name = 'RunTimeoutError';
  }
}

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
