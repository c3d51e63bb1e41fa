/**
 * Error types for llvision
 *
 * Decoding never throws; these cover option validation, configuration,
 * the snapshot HTTP call and the JSON results dump.
 */

export type ErrorCategory = 'VALIDATION' | 'CONFIGURATION' | 'NETWORK' | 'PARSE' | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export const ERROR_CODES = {
  INVALID_OPTIONS: 'E1001',
  INVALID_CONFIGURATION: 'E2001',
  REQUEST_FAILED: 'E3001',
  BAD_RESPONSE: 'E3002',
  RESULTS_PARSE: 'E4001',
  UNKNOWN: 'E9999',
} as const;

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  /** Table name of the camera involved, when there is one */
  camera?: string;
  [key: string]: unknown;
}

type ContextDefaults = Pick<ErrorContext, 'category' | 'severity' | 'retryable'>;

const UNKNOWN_DEFAULTS: ContextDefaults = { category: 'UNKNOWN', severity: 'MEDIUM', retryable: false };

export class LimelightError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message);
    this.name = 'LimelightError';
    this.code = code;
    this.context = { ...UNKNOWN_DEFAULTS, ...context };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Bad options passed to a camera handle
 */
export class ValidationError extends LimelightError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, ERROR_CODES.INVALID_OPTIONS, { category: 'VALIDATION', severity: 'LOW', ...context });
    this.name = 'ValidationError';
  }
}

/**
 * Environment variables that fail the config schema
 */
export class ConfigurationError extends LimelightError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, ERROR_CODES.INVALID_CONFIGURATION, {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * HTTP request to the camera failed (no status) or was answered with a non-200 status
 */
export class NetworkError extends LimelightError {
  public readonly status?: number;

  constructor(message: string, status?: number, context: Partial<ErrorContext> = {}) {
    super(message, status === undefined ? ERROR_CODES.REQUEST_FAILED : ERROR_CODES.BAD_RESPONSE, {
      category: 'NETWORK',
      retryable: true,
      status,
      ...context,
    });
    this.name = 'NetworkError';
    this.status = status;
  }
}

/**
 * The JSON results dump could not be decoded. A later frame may decode fine.
 */
export class ResultsParseError extends LimelightError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(`lljson error: ${message}`, ERROR_CODES.RESULTS_PARSE, {
      category: 'PARSE',
      severity: 'LOW',
      retryable: true,
      ...context,
    });
    this.name = 'ResultsParseError';
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof LimelightError && error.context.retryable;
}

/**
 * Normalize anything thrown into a LimelightError; LimelightErrors pass through
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): LimelightError {
  if (error instanceof LimelightError) {
    return error;
  }

  if (error instanceof Error) {
    return new LimelightError(error.message, ERROR_CODES.UNKNOWN, { originalError: error.name, ...context });
  }

  return new LimelightError(String(error), ERROR_CODES.UNKNOWN, context);
}
