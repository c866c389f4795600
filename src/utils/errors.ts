import { BuildPathError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure modes of classpath resolution
 */

/**
 * A purpose outside compile/runtime/test reached the scope mapper.
 * This is a caller bug and is never downgraded to a partial result.
 */
export class UnsupportedPurposeError extends BuildPathError {
  constructor(purpose: unknown) {
    super(
      `Unsupported dependency purpose '${String(purpose)}' (expected compile, runtime or test)`,
      ErrorCodes.UNSUPPORTED_PURPOSE,
      { purpose }
    );
    this.name = 'UnsupportedPurposeError';
  }
}

/**
 * The external dependency resolver could not produce an artifact list.
 */
export class ResolutionError extends BuildPathError {
  constructor(message: string, details?: { scopes?: readonly string[]; descriptor?: string; cause?: unknown }) {
    super(message, ErrorCodes.RESOLUTION_FAILED, details);
    this.name = 'ResolutionError';
  }
}

export class FileSystemError extends BuildPathError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends BuildPathError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends BuildPathError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Render any thrown value as a one-line reason.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * The `code` of a Node.js system error (ENOENT, EACCES, ...), if it has one.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof BuildPathError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
