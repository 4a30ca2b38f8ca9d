/**
 * Utility functions shared across the rate limiter
 */

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Type guard to check if value is an Error instance
 *
 * @example
 * ```typescript
 * catch (error: unknown) {
 *   if (isError(error)) {
 *     logger.error(error.message);
 *   }
 * }
 * ```
 */
export function isError(e: unknown): e is Error {
  return e instanceof Error;
}

/**
 * Normalize unknown thrown value to Error
 *
 * JavaScript allows throwing any type (string, number, object); callers
 * always get an Error with a message.
 *
 * @param error - Unknown thrown value
 * @returns Error instance (original if already Error, wrapped otherwise)
 */
export function normalizeError(error: unknown): Error;
/**
 * Normalize unknown thrown value to Error with a contextual prefix
 *
 * @param error - Unknown thrown value
 * @param context - Prefix for the error message
 */
export function normalizeError(error: unknown, context: string): Error;
export function normalizeError(error: unknown, context?: string): Error {
  if (isError(error)) {
    return context ? new Error(`${context}: ${error.message}`) : error;
  }

  if (typeof error === 'string') {
    return new Error(context ? `${context}: ${error}` : error);
  }

  if (typeof error === 'object' && error !== null) {
    let serialized: string;
    try {
      serialized = JSON.stringify(error);
    } catch {
      // Circular reference or BigInt
      serialized = String(error);
    }
    return new Error(context ? `${context}: ${serialized}` : serialized);
  }

  const stringified = String(error);
  return new Error(context ? `${context}: ${stringified}` : stringified);
}
