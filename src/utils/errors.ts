/**
 * @fileoverview Standardized error handling utilities.
 *
 * The validation path never throws; these helpers cover the I/O around it
 * (template loading, LLM collaborators, HTTP input):
 * - AppError: Base class for application-specific errors
 * - withErrorContext: Wraps operations with consistent error logging
 * - safeExecute: Returns result objects instead of throwing
 */

import { createLogger } from './observability/index.js';

const logger = createLogger({ domain: 'errors' });

export type AppErrorCode =
  | 'UNKNOWN_SCENARIO'
  | 'INVALID_ARGUMENT'
  | 'LLM_NOT_CONFIGURED'
  | 'LLM_EMPTY_RESPONSE';

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: AppErrorCode,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute an async function with consistent error logging.
 * Errors are logged and re-thrown for the caller to handle.
 */
export async function withErrorContext<T>(
  fn: () => Promise<T>,
  context: string
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logger.error('operation_failed', {
      operation: context,
      error: errorMessage(error),
      code: error instanceof AppError ? error.code : undefined,
    });
    throw error;
  }
}

/**
 * Execute an async function and return a Result object.
 * Use for operations where the caller wants to handle failure without exceptions.
 */
export async function safeExecute<T>(
  fn: () => Promise<T>,
  context: string
): Promise<Result<T>> {
  try {
    const data = await fn();
    return { success: true, data };
  } catch (error) {
    logger.error('operation_failed', {
      operation: context,
      error: errorMessage(error),
    });
    return {
      success: false,
      error: errorMessage(error),
    };
  }
}
