/**
 * Utility functions
 */

import { randomUUID } from 'crypto';

export { getLogger, createLogger, silentLogger } from './logger.js';

/**
 * Format a date as ISO string (full timestamp)
 */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}

/**
 * Generate a short request ID for log correlation
 */
export function generateRequestId(): string {
  return `req_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/**
 * Describe an unknown thrown value as a single line
 * Includes the cause chain, which is where fetch puts DNS and socket errors
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const parts = [error.message];
  let cause: unknown = error.cause;
  while (cause instanceof Error) {
    parts.push(cause.message);
    cause = cause.cause;
  }
  return parts.filter((part) => part.length > 0).join(': ') || error.name;
}

/**
 * Truncate long text for error messages
 */
export function truncate(text: string, maxLength = 500): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}...`;
}
