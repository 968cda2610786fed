import { logger } from './logger';

export type PipelineErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'TRANSFORM_FAILED'
  | 'TRANSFORM_CANCELLED'
  | 'REFERENCE_FACE_UNAVAILABLE'
  | 'MODEL_UNAVAILABLE'
  | 'REGENERATION_TIMEOUT'
  | 'REGENERATION_FAILED'
  | 'REQUEST_ABORTED'
  | 'INVALID_INPUT'
  | 'CONFIG_INVALID';

export class PipelineError extends Error {
  constructor(
    message: string,
    public code: PipelineErrorCode,
    public statusCode: number = 500,
    public recoverable: boolean = false,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'PipelineError';
  }

  /**
   * Plain-object form for JSON responses and cached diagnostics.
   */
  toJSON(): { name: string; code: PipelineErrorCode; message: string; cause?: string } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause === undefined ? undefined : describeError(this.cause),
    };
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * True for the errors produced when an AbortSignal fires: DOM-style AbortError,
 * axios CanceledError, or our own cancellation codes.
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof PipelineError) {
    return error.code === 'TRANSFORM_CANCELLED' || error.code === 'REQUEST_ABORTED';
  }
  if (error instanceof Error) {
    return error.name === 'AbortError' || error.name === 'CanceledError' || ('code' in error && error.code === 'ERR_CANCELED');
  }
  return false;
}

/**
 * Wraps anything thrown into a PipelineError, keeping the original as the cause.
 */
export function toPipelineError(
  error: unknown,
  code: PipelineErrorCode,
  message?: string
): PipelineError {
  if (error instanceof PipelineError) return error;
  return new PipelineError(message || describeError(error), code, 500, false, error);
}

/**
 * Handles errors with appropriate logging and recovery
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof PipelineError) {
    logger.error(`[${context}] ${error.code}: ${error.message}`);
    if (error.cause !== undefined) {
      logger.debug(`[${context}] Caused by: ${describeError(error.cause)}`);
    }
    if (error.recoverable) {
      logger.info(`[${context}] Error is recoverable, will retry on the next cycle`);
    }
  } else if (error instanceof Error) {
    logger.error(`[${context}] Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`[${context}] Stack trace: ${error.stack}`);
    }
  } else {
    logger.error(`[${context}] Unexpected error: ${String(error)}`);
  }
}
