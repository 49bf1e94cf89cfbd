/**
 * Retry helper for bridge connection attempts.
 */

import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from './logger.js';

export const RETRY_DELAYS_MS = [1000, 3000, 5000];

export async function withRetry<T>(
  operation: () => Promise<T>,
  context: { component: string; operation: string; logger?: Logger },
  maxAttempts = 3,
): Promise<T> {
  const log = context.logger ?? rootLogger.child(context.component);
  let lastMessage = '';

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastMessage = errorMessage(error);
      if (attempt < maxAttempts - 1) {
        const delay = RETRY_DELAYS_MS[attempt] ?? 5000;
        log.warn(`${context.operation} failed (attempt ${attempt + 1}/${maxAttempts}): ${lastMessage}, retrying in ${delay}ms...`);
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  throw new Error(`${context.component}: ${context.operation} failed after ${maxAttempts} attempts: ${lastMessage}`);
}
