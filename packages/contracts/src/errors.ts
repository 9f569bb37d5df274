/**
 * @fileoverview Error taxonomy for the minute-bar collector.
 *
 * Defines a hierarchy of structured error classes with machine-readable codes
 * and contextual data for logging, retry decisions, and failure isolation.
 *
 * All errors extend the CollectorError base class and include:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * @module @minutely/contracts/errors
 */

/**
 * Base error class for all collector and supervisor errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new CollectorError('CUSTOM_ERROR', 'Something went wrong', { item: 'A005930' });
 * ```
 */
export class CollectorError extends Error {
  /**
   * Machine-readable error code (e.g., 'PROVIDER_RATE_LIMIT').
   */
  readonly code: string;

  /**
   * Structured error data for debugging and retry logic.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'CollectorError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();

    // Keep instanceof working when compiled to ES5-style prototypes
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to a JSON-safe object.
   *
   * @example
   * ```typescript
   * const err = new CollectorError('TEST', 'Test error');
   * JSON.stringify(err.toJSON());
   * ```
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when the upstream provider reports its request quota is exhausted.
 *
 * The fetcher honours `retryAfterMs` when it is longer than the policy delay.
 *
 * @example
 * ```typescript
 * throw new ProviderRateLimitError('Quota exhausted', {
 *   provider: 'gateway',
 *   retryAfterMs: 15000
 * });
 * ```
 */
export class ProviderRateLimitError extends CollectorError {
  constructor(
    message: string,
    data: {
      provider: string;
      retryAfterMs?: number;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_RATE_LIMIT', message, data);
    this.name = 'ProviderRateLimitError';
  }

  /**
   * Milliseconds the provider asked us to wait, if it said.
   */
  get retryAfterMs(): number | undefined {
    const value = this.data?.['retryAfterMs'];
    return typeof value === 'number' ? value : undefined;
  }
}

/**
 * Thrown when a single provider request fails (transport error, non-2xx status,
 * timeout). Treated as transient by the fetcher.
 */
export class ProviderRequestError extends CollectorError {
  /**
   * HTTP status code, when the failure came from an HTTP response.
   */
  readonly statusCode?: number;

  constructor(
    message: string,
    data: {
      provider: string;
      statusCode?: number;
      url?: string;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_REQUEST', message, data);
    this.name = 'ProviderRequestError';
    this.statusCode = data.statusCode;
  }
}

/**
 * Thrown when a provider response cannot be turned into bars.
 */
export class ProviderParseError extends CollectorError {
  constructor(
    message: string,
    data?: {
      provider?: string;
      field?: string;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_PARSE', message, data);
    this.name = 'ProviderParseError';
  }
}

/**
 * Thrown when the checkpoint or an output artifact cannot be written.
 */
export class CheckpointError extends CollectorError {
  constructor(message: string, data: { path: string; [key: string]: unknown }) {
    super('CHECKPOINT_IO', message, data);
    this.name = 'CheckpointError';
  }
}

/**
 * Thrown when configuration from env or flags fails validation.
 *
 * @example
 * ```typescript
 * throw new ConfigError('Configuration validation failed', {
 *   issues: ['rate.maxCalls: Expected number, received string']
 * });
 * ```
 */
export class ConfigError extends CollectorError {
  /**
   * One `path: message` line per validation issue.
   */
  readonly issues: string[];

  constructor(message: string, data: { issues: string[] }) {
    super('CONFIG_INVALID', message, data);
    this.name = 'ConfigError';
    this.issues = data.issues;
  }
}

/**
 * Type guard to check if an error is a CollectorError.
 *
 * @example
 * ```typescript
 * try {
 *   // ... code
 * } catch (err) {
 *   if (isCollectorError(err)) {
 *     logger.error('Collector error', { error_code: err.code });
 *   }
 * }
 * ```
 */
export function isCollectorError(error: unknown): error is CollectorError {
  return error instanceof CollectorError;
}

/**
 * Type guard to check if an error is a ProviderRateLimitError.
 */
export function isProviderRateLimitError(error: unknown): error is ProviderRateLimitError {
  return error instanceof ProviderRateLimitError;
}

/**
 * Type guard to check if an error is a ProviderRequestError.
 */
export function isProviderRequestError(error: unknown): error is ProviderRequestError {
  return error instanceof ProviderRequestError;
}

/**
 * Type guard to check if an error is a ProviderParseError.
 */
export function isProviderParseError(error: unknown): error is ProviderParseError {
  return error instanceof ProviderParseError;
}

/**
 * Type guard to check if an error is a ConfigError.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Extracts a printable message from any thrown value.
 *
 * @example
 * ```typescript
 * errorMessage(new Error('boom')); // 'boom'
 * errorMessage('plain');           // 'plain'
 * ```
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
