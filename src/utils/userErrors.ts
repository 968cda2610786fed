import type { Response } from 'express';
import { logger } from './logger';
import { PipelineError } from './errorHandler';

/**
 * Maps technical error messages to user-friendly messages.
 * This prevents exposing internal implementation details to end users.
 */

// Common error patterns and their user-friendly equivalents
const ERROR_PATTERNS: Array<{ pattern: RegExp; message: string; }> = [
  // Network errors
  { pattern: /ECONNREFUSED/i, message: 'Unable to connect to the service. Please try again later.' },
  { pattern: /ECONNRESET/i, message: 'Connection was interrupted. Please try again.' },
  { pattern: /ETIMEDOUT|timeout of \d+ms exceeded/i, message: 'The request timed out. Please try again.' },
  { pattern: /ENOTFOUND/i, message: 'Service is temporarily unavailable. Please try again later.' },
  { pattern: /socket hang up/i, message: 'Connection was lost. Please try again.' },

  // File system errors
  { pattern: /ENOENT/i, message: 'The requested file or folder was not found.' },
  { pattern: /EACCES|EPERM/i, message: 'Permission denied. Please contact support.' },
  { pattern: /ENOSPC/i, message: 'Storage space is full. Please contact support.' },

  // Image decoding errors (sharp)
  { pattern: /unsupported image format|Input buffer contains unsupported/i, message: 'That link does not point to a supported image.' },

  // API and HTTP errors
  { pattern: /status code 403|forbidden/i, message: 'The image host refused the request.' },
  { pattern: /status code 404|not found/i, message: 'The requested resource was not found.' },
  { pattern: /status code 429|too many requests|rate.?limit/i, message: 'Too many requests. Please wait a moment and try again.' },
  { pattern: /status code 5\d\d/i, message: 'Service temporarily unavailable. Please try again later.' },

  // Validation errors (pass through - these are often user-actionable)
  { pattern: /invalid|required|missing/i, message: '$0' },
];

// Error codes with specific messages
const ERROR_CODE_MAP: Record<string, string> = {
  SOURCE_UNAVAILABLE: 'The image could not be downloaded. Please try another one.',
  TRANSFORM_CANCELLED: 'The request was cancelled.',
  REFERENCE_FACE_UNAVAILABLE: 'The reference face is not configured correctly. Please contact support.',
  MODEL_UNAVAILABLE: 'The face model service is not available right now. Please try again later.',
  REGENERATION_TIMEOUT: 'Fresh results are still being prepared. Please try again shortly.',
  REQUEST_ABORTED: 'The request was cancelled.',
  REGENERATION_FAILED: 'Fresh results could not be generated. Please try again later.',
};

function messageOf(error: unknown): string {
  if (typeof error === 'string') return error;
  if (error instanceof Error) return error.message;
  return 'Unknown error';
}

function codeOf(error: unknown): string | undefined {
  if (error instanceof PipelineError) return error.code;
  return undefined;
}

/**
 * Converts a technical error to a user-friendly message.
 *
 * @param context - Optional context for logging (e.g., 'swap', 'batch')
 */
export function toUserFriendlyError(error: unknown, context?: string): string {
  const originalMessage = messageOf(error);

  if (context) {
    logger.debug(`[${context}] Original error: ${originalMessage}`);
  }

  // Check for error codes first (most specific)
  const code = codeOf(error);
  if (code && ERROR_CODE_MAP[code]) {
    return ERROR_CODE_MAP[code];
  }

  for (const { pattern, message } of ERROR_PATTERNS) {
    if (pattern.test(originalMessage)) {
      if (message === '$0') {
        return cleanValidationMessage(originalMessage);
      }
      return message;
    }
  }

  logger.warn(`Unrecognized error (${context || 'unknown'}): ${originalMessage}`);

  if (isUserFriendlyMessage(originalMessage)) {
    return originalMessage;
  }

  return 'An unexpected error occurred. Please try again later.';
}

/**
 * Checks if a message is already user-friendly (no technical jargon)
 */
function isUserFriendlyMessage(message: string): boolean {
  if (message.length > 200) return false;
  if (/^\s*at\s+/m.test(message)) return false;
  if (/\.(js|ts):\d+/.test(message)) return false;
  if (/\b[A-Z]{3,}_[A-Z_]+\b/.test(message)) return false;
  if (/[\/\\][\w-]+[\/\\][\w-]+/.test(message)) return false;
  return true;
}

function cleanValidationMessage(message: string): string {
  return message
    .replace(/^Error:\s*/i, '')
    .replace(/\.$/, '') + '.';
}

/**
 * Writes a standardized error response with a user-friendly message
 */
export function wrapErrorResponse(res: Response, error: unknown, statusCode?: number, context?: string): void {
  const code = codeOf(error);
  const status = statusCode ?? (error instanceof PipelineError ? error.statusCode : 500);
  res.status(status).json({
    success: false,
    error: toUserFriendlyError(error, context),
    ...(code ? { code } : {})
  });
}
