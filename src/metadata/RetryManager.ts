import { EventEmitter } from 'events';
import { delay } from '../common/utils';

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  backoffFactor?: number;
  jitter?: boolean;
  jitterRange?: number;
  retryCondition?: (error: unknown, attempt: number) => boolean;
  name?: string;
}

export interface RetryAttempt {
  attempt: number;
  duration: number;
  error?: unknown;
  timestamp: number;
}

/**
 * Retry policy with exponential backoff and jitter.
 * Wraps metadata requests when the caller opts into retries; the
 * metadata contract itself stays fail-fast.
 */
export class RetryManager extends EventEmitter {
  private readonly options: Required<RetryOptions>;

  constructor(options: RetryOptions = {}) {
    super();

    this.options = {
      maxRetries: options.maxRetries ?? 3,
      baseDelay: options.baseDelay ?? 1000,
      maxDelay: options.maxDelay ?? 30000,
      backoffFactor: options.backoffFactor ?? 2,
      jitter: options.jitter !== false,
      jitterRange: options.jitterRange ?? 0.1,
      retryCondition: options.retryCondition ?? (() => true),
      name: options.name ?? 'retry-manager'
    };
  }

  get maxRetries(): number {
    return this.options.maxRetries;
  }

  /**
   * Execute operation with retry logic. The last error is rethrown unchanged.
   */
  async execute<T>(operation: () => Promise<T>, operationId: string = this.options.name): Promise<T> {
    const attempts: RetryAttempt[] = [];

    for (let attempt = 1; ; attempt++) {
      const attemptStart = Date.now();

      try {
        this.emit('attempt-start', { operationId, attempt });
        const result = await operation();
        attempts.push({ attempt, duration: Date.now() - attemptStart, timestamp: attemptStart });
        this.emit('operation-success', { operationId, attempts: attempts.length });
        return result;
      } catch (error) {
        attempts.push({ attempt, duration: Date.now() - attemptStart, error, timestamp: attemptStart });

        const willRetry = attempt <= this.options.maxRetries && this.options.retryCondition(error, attempt);
        this.emit('attempt-failure', { operationId, attempt, error, willRetry });

        if (!willRetry) {
          this.emit('operation-failed', { operationId, error, attempts });
          throw error;
        }

        const wait = this.calculateDelay(attempt);
        this.emit('retry-scheduled', { operationId, attempt, delay: wait, error });
        await delay(wait);
      }
    }
  }

  /**
   * Calculate delay with backoff and jitter
   */
  calculateDelay(attempt: number): number {
    let wait = this.options.baseDelay * Math.pow(this.options.backoffFactor, attempt - 1);

    // Apply maximum delay cap
    wait = Math.min(wait, this.options.maxDelay);

    if (this.options.jitter) {
      const jitterAmount = wait * this.options.jitterRange;
      const jitter = (Math.random() - 0.5) * 2 * jitterAmount;
      wait = Math.max(0, wait + jitter);
    }

    return Math.round(wait);
  }
}
