// ============================================================================
// RETRY SERVICE
// Re-runs Result-returning operations on retryable failures
// ============================================================================

import { logger } from "../utils/logger.js";
import { metrics } from "../utils/metrics.js";
import type { AppError } from "../errors/index.js";
import type { Result } from "../types/result.types.js";

export interface RetryConfig {
  /** Total attempts including the first */
  maxAttempts: number;
  delayMs: number;
  shouldRetry: (error: AppError) => boolean;
}

const DEFAULT_CONFIG: RetryConfig = {
  maxAttempts: 2,
  delayMs: 0,
  shouldRetry: (error) => error.retryable,
};

export class RetryService {
  private readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async execute<T, E extends AppError>(
    operation: () => Promise<Result<T, E>>,
    operationName: string = "operation"
  ): Promise<Result<T, E>> {
    let attempt = 1;
    let result = await operation();

    while (!result.ok && attempt < this.config.maxAttempts && this.config.shouldRetry(result.error)) {
      metrics.incCounter("retry_attempts_total", { operation: operationName });

      logger.warn(
        {
          operationName,
          attempt,
          maxAttempts: this.config.maxAttempts,
          nextRetryMs: this.config.delayMs,
          errorCode: result.error.code,
          error: result.error.message,
        },
        "Operation failed, retrying"
      );

      await this.sleep(this.config.delayMs);
      attempt++;
      result = await operation();
    }

    if (result.ok && attempt > 1) {
      logger.info({ operationName, attempt }, "Retry succeeded");
    } else if (!result.ok && attempt > 1) {
      logger.error(
        { operationName, attempt, errorCode: result.error.code, error: result.error.message },
        "Operation failed, no more retries"
      );
    }

    return result;
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
