/**
 * ErrorHandler - Centralized Error Handling Utilities
 *
 * Provides:
 * - Error codes and the EndovoxError class
 * - Classification of collaborator failures (LLM transport, format, timeout)
 * - Exponential backoff delays for the semantic parser's retries
 */

export enum ErrorCode {
  // Command schema
  SCHEMA_VIOLATION = 'SCHEMA_VIOLATION',

  // Semantic parser / LLM API
  RATE_LIMIT = 'RATE_LIMIT',
  SERVER_ERROR = 'SERVER_ERROR',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  TIMEOUT = 'TIMEOUT',
  NETWORK_ERROR = 'NETWORK_ERROR',
  SEMANTIC_TIMEOUT = 'SEMANTIC_TIMEOUT',

  // Configuration
  CONFIG_PARSE_ERROR = 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',
  CONFIG_MISSING_KEYS = 'CONFIG_MISSING_KEYS',

  // Generic
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error with a code, context and retry hint
 */
export class EndovoxError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: number;
  public readonly isRetryable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    context?: Record<string, unknown>,
    isRetryable = false,
  ) {
    super(message);
    this.name = 'EndovoxError';
    this.code = code;
    this.context = context;
    this.timestamp = Date.now();
    this.isRetryable = isRetryable;
  }

  /**
   * Get user-friendly error message
   */
  getUserMessage(): string {
    return getUserFriendlyMessage(this.code, this.message);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
      isRetryable: this.isRetryable,
      stack: this.stack,
    };
  }
}

const USER_MESSAGES: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.SCHEMA_VIOLATION]: 'Command does not match the robot command schema.',

  [ErrorCode.RATE_LIMIT]: 'Language model is temporarily busy. Falling back to local parsing.',
  [ErrorCode.SERVER_ERROR]: 'Language model service encountered an error.',
  [ErrorCode.INVALID_RESPONSE]: 'Received an unexpected response from the language model.',
  [ErrorCode.TIMEOUT]: 'Language model request timed out.',
  [ErrorCode.NETWORK_ERROR]: 'Network connection issue. Please check connectivity.',
  [ErrorCode.SEMANTIC_TIMEOUT]: 'Semantic parsing took too long. Falling back to local parsing.',

  [ErrorCode.CONFIG_PARSE_ERROR]: 'Configuration file has invalid format. Please check syntax.',
  [ErrorCode.CONFIG_VALIDATION_ERROR]: 'Configuration values are out of allowed range.',
  [ErrorCode.CONFIG_MISSING_KEYS]: 'Configuration is missing required values.',

  [ErrorCode.UNKNOWN]: 'An unexpected error occurred.',
};

export function getUserFriendlyMessage(code: ErrorCode, details?: string): string {
  const baseMessage = USER_MESSAGES[code];
  return details ? `${baseMessage} (${details})` : baseMessage;
}

/**
 * Exponential backoff configuration
 */
export interface BackoffConfig {
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for each retry */
  multiplier: number;
  /** Jitter factor (0-1) to add randomness */
  jitter: number;
}

const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitter: 0.1,
};

/**
 * Calculate delay for exponential backoff
 */
export function calculateBackoffDelay(
  attempt: number,
  config: Partial<BackoffConfig> = {},
): number {
  const { initialDelayMs, maxDelayMs, multiplier, jitter } = {
    ...DEFAULT_BACKOFF_CONFIG,
    ...config,
  };

  const baseDelay = initialDelayMs * Math.pow(multiplier, attempt);
  const jitterAmount = baseDelay * jitter * (Math.random() * 2 - 1);

  return Math.min(baseDelay + jitterAmount, maxDelayMs);
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof EndovoxError) {
    return error.isRetryable;
  }
  return classifyError(error).isRetryable;
}

/**
 * Classify an arbitrary thrown value into an EndovoxError
 */
export function classifyError(error: unknown, context?: Record<string, unknown>): EndovoxError {
  if (error instanceof EndovoxError) {
    return error;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('429') || message.includes('rate limit') || message.includes('quota')) {
      return new EndovoxError(ErrorCode.RATE_LIMIT, error.message, context, true);
    }
    if (message.includes('500') || message.includes('503') || message.includes('internal')) {
      return new EndovoxError(ErrorCode.SERVER_ERROR, error.message, context, true);
    }
    if (message.includes('timeout') || message.includes('deadline')) {
      return new EndovoxError(ErrorCode.TIMEOUT, error.message, context, true);
    }
    if (
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('fetch failed')
    ) {
      return new EndovoxError(ErrorCode.NETWORK_ERROR, error.message, context, true);
    }
    if (error instanceof SyntaxError || message.includes('json')) {
      return new EndovoxError(ErrorCode.INVALID_RESPONSE, error.message, context, false);
    }

    return new EndovoxError(ErrorCode.UNKNOWN, error.message, context, false);
  }

  return new EndovoxError(ErrorCode.UNKNOWN, String(error), context, false);
}

/**
 * Reduce any thrown value to an Error for logging
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
