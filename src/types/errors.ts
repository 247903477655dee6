/**
 * Structured Error System for kbreason
 *
 * Provides machine-readable errors with codes and suggestions for the
 * failures that sit outside the parse/evaluate core (which reports
 * diagnostics instead of throwing).
 */

/**
 * Error codes for reasoner operations
 */
export type ReasonerErrorCode =
  | 'CONFIG_ERROR'          // Invalid environment/configuration value
  | 'LLM_ERROR'             // Text-generation call failed
  | 'INVALID_ARGUMENT'      // Tool or CLI argument rejected
  | 'FILE_ERROR';           // Input file could not be read

/**
 * Structured error with code, message and suggestion
 */
export interface ReasonerError {
  code: ReasonerErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending input, if any
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping ReasonerError for throw/catch patterns
 */
export class ReasonerException extends Error {
  public readonly error: ReasonerError;

  constructor(error: ReasonerError) {
    super(error.message);
    this.name = 'ReasonerException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReasonerException);
    }
  }

  /**
   * Serialize error for tool responses
   */
  toJSON(): ReasonerError {
    return this.error;
  }
}

/**
 * Create a configuration error
 */
export function createConfigError(
  message: string,
  details?: Record<string, unknown>
): ReasonerException {
  return new ReasonerException({
    code: 'CONFIG_ERROR',
    message: `Invalid configuration: ${message}`,
    suggestion: 'Check the environment variables (or .env file) used to configure kbreason',
    details,
  });
}

/**
 * Create an LLM call error
 */
export function createLLMError(
  message: string,
  details?: Record<string, unknown>
): ReasonerException {
  return new ReasonerException({
    code: 'LLM_ERROR',
    message: `LLM call failed: ${message}`,
    suggestion: 'Verify OPENAI_API_KEY / OPENAI_BASE_URL and that the model is reachable',
    details,
  });
}

/**
 * Create an invalid argument error
 */
export function createInvalidArgumentError(
  message: string,
  context?: string
): ReasonerException {
  return new ReasonerException({
    code: 'INVALID_ARGUMENT',
    message,
    context,
  });
}

/**
 * Create a file error
 */
export function createFileError(path: string, cause: string): ReasonerException {
  return new ReasonerException({
    code: 'FILE_ERROR',
    message: `Could not read '${path}': ${cause}`,
    details: { path },
  });
}

/**
 * Serialize a ReasonerError for JSON output
 */
export function serializeReasonerError(error: ReasonerError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
