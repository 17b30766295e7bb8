/**
 * Timeout Manager
 *
 * Bounds the duration of asynchronous operations (metadata lookups).
 * The operation receives an AbortSignal that fires when the timeout
 * elapses, so clients that accept a signal stop their request too.
 *
 * @module automation
 */

/**
 * Timeout error
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly operation?: string
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Timeout configuration
 */
export interface TimeoutConfig {
  /** Timeout duration in milliseconds */
  timeoutMs: number;

  /** Operation name for error messages */
  operation?: string;
}

/**
 * Timeout result
 */
export interface TimeoutResult<T> {
  /** Operation result (undefined if timed out) */
  result?: T;

  /** Whether operation timed out */
  timedOut: boolean;

  /** Actual duration in milliseconds */
  durationMs: number;

  /** Timeout error if timed out */
  error?: TimeoutError;
}

export class TimeoutManager {
  /**
   * Execute operation with timeout
   *
   * @param operation - Async operation; receives a signal aborted on timeout
   * @param config - Timeout configuration
   * @returns Operation result
   * @throws TimeoutError if operation times out
   */
  static async execute<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    config: TimeoutConfig
  ): Promise<T> {
    this.validateTimeout(config.timeoutMs, 1);

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(
          config.operation
            ? `Operation "${config.operation}" timed out after ${this.formatTimeout(config.timeoutMs)}`
            : `Operation timed out after ${this.formatTimeout(config.timeoutMs)}`,
          config.timeoutMs,
          config.operation
        );
        controller.abort(error);
        reject(error);
      }, config.timeoutMs);
    });

    try {
      return await Promise.race([operation(controller.signal), timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Execute operation with timeout (non-throwing for timeouts).
   * Errors raised by the operation itself still propagate.
   */
  static async executeWithResult<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    config: TimeoutConfig
  ): Promise<TimeoutResult<T>> {
    const startTime = Date.now();

    try {
      const result = await this.execute(operation, config);
      return {
        result,
        timedOut: false,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      if (this.isTimeoutError(error)) {
        return {
          timedOut: true,
          durationMs: Date.now() - startTime,
          error,
        };
      }

      throw error;
    }
  }

  /**
   * Format milliseconds to human-readable string
   *
   * @returns Formatted string (e.g., "250ms", "10.0s")
   */
  static formatTimeout(ms: number): string {
    if (ms < 1000) {
      return `${ms}ms`;
    }
    if (ms < 60000) {
      return `${(ms / 1000).toFixed(1)}s`;
    }
    return `${(ms / 60000).toFixed(1)}m`;
  }

  static isTimeoutError(error: unknown): error is TimeoutError {
    return error instanceof TimeoutError;
  }

  /**
   * @throws Error if timeout is outside [min, max]
   */
  static validateTimeout(timeoutMs: number, min = 0, max = Infinity): void {
    if (!Number.isFinite(timeoutMs) || timeoutMs < min) {
      throw new Error(`Timeout must be >= ${min}ms, got: ${timeoutMs}ms`);
    }
    if (timeoutMs > max) {
      throw new Error(`Timeout must be <= ${max}ms, got: ${timeoutMs}ms`);
    }
  }
}
