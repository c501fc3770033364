import { z } from 'zod';

/**
 * Formats an unknown error into a readable string message.
 * Zod validation errors are rendered as one line per issue.
 *
 * @param error - The caught value (Error, ZodError, string, or anything else)
 * @returns Formatted error message string
 *
 * @example
 * ```typescript
 * try {
 *   await keyCache.refresh(issuer);
 * } catch (error) {
 *   logger.error({ issuer, error: formatError(error) }, 'failed to fetch keys');
 * }
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return z.prettifyError(error);
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
