/**
 * Retry and circuit breaker helpers for the bridge connection.
 */

import {
  CIRCUIT_BREAKER_RESET_MS,
  CIRCUIT_BREAKER_THRESHOLD,
  DEFAULT_MAX_RETRIES,
  RETRY_DELAYS_MS,
} from '../constants.js';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from './logger.js';

export interface RetryContext {
  component: string;
  operation: string;
}

export interface CircuitBreaker {
  call<T>(operation: () => Promise<T>): Promise<T>;
  isOpen(): boolean;
}

export class ErrorRecovery {
  static async withRetry<T>(
    operation: () => Promise<T>,
    context: RetryContext,
    maxAttempts = DEFAULT_MAX_RETRIES,
    log: Logger = rootLogger
  ): Promise<T> {
    let lastMessage = 'no attempts made';
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastMessage = errorMessage(error);
        if (attempt < maxAttempts - 1) {
          const delay = RETRY_DELAYS_MS[attempt] ?? 5000;
          log.warn(`${context.operation} failed, retrying`, {
            component: context.component,
            attempt: attempt + 1,
            maxAttempts,
            delayMs: delay,
            error: lastMessage,
          });
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }
    throw new Error(`${context.component}: ${context.operation} failed after ${maxAttempts} attempts: ${lastMessage}`);
  }

  static createCircuitBreaker(
    threshold = CIRCUIT_BREAKER_THRESHOLD,
    resetTimeout = CIRCUIT_BREAKER_RESET_MS,
    log: Logger = rootLogger
  ): CircuitBreaker {
    let failureCount = 0;
    let lastFailureTime = 0;
    let isOpen = false;

    return {
      async call<T>(operation: () => Promise<T>): Promise<T> {
        if (isOpen && Date.now() - lastFailureTime > resetTimeout) {
          isOpen = false;
          failureCount = 0;
        }

        if (isOpen) {
          throw new Error('Circuit breaker open - bridge unavailable');
        }

        try {
          const result = await operation();
          failureCount = 0;
          return result;
        } catch (error) {
          failureCount++;
          lastFailureTime = Date.now();
          if (failureCount >= threshold && !isOpen) {
            isOpen = true;
            log.error(`Circuit breaker opened after ${threshold} failures`);
          }
          throw error;
        }
      },
      isOpen: () => isOpen,
    };
  }
}
