/**
 * Database retry utility with exponential backoff.
 * Handles SQLite SQLITE_BUSY and SQLITE_LOCKED errors.
 */

import { DatabaseLockedError, errorMessage } from "../core/errors.js";

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 100) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 2000) */
  maxDelayMs?: number;
  /** Exponential backoff multiplier (default: 2) */
  backoffMultiplier?: number;
}

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
};

/**
 * Check if an error is a SQLite locked/busy error.
 */
export function isDatabaseLockedError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  const code = "code" in error && typeof error.code === "string" ? error.code : "";

  return (
    code === "SQLITE_BUSY" ||
    code === "SQLITE_LOCKED" ||
    message.includes("sqlite_busy") ||
    message.includes("sqlite_locked") ||
    message.includes("database is locked") ||
    message.includes("database is busy")
  );
}

/**
 * Delay before the next attempt. No jitter: a single process is the
 * normal writer and callers block synchronously anyway.
 */
export function calculateDelay(attempt: number, config: Required<RetryConfig>): number {
  const baseDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(baseDelay, config.maxDelayMs);
}

/**
 * Execute a synchronous database operation with retry on lock errors.
 *
 * @throws DatabaseLockedError if all retries are exhausted
 * @throws The original error if it's not a lock error
 */
export function withRetrySync<T>(operation: () => T, config?: RetryConfig): T {
  const mergedConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < mergedConfig.maxAttempts; attempt++) {
    try {
      return operation();
    } catch (error) {
      if (!isDatabaseLockedError(error)) {
        throw error;
      }

      lastError = error;

      if (attempt < mergedConfig.maxAttempts - 1) {
        // better-sqlite3 is synchronous, so block instead of yielding
        const end = Date.now() + calculateDelay(attempt, mergedConfig);
        while (Date.now() < end) {
          // spin
        }
      }
    }
  }

  throw new DatabaseLockedError(mergedConfig.maxAttempts, errorMessage(lastError));
}
