import PQueue from 'p-queue';
import { Errors, isRetryableError } from './errors.js';
import type { DispatchJobOptions, DispatchPoolStats } from '../types/index.js';
import type { Config, Logger } from '../config.js';

// Retry configuration
const RETRY_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAYS = [1000, 2000, 4000]; // Exponential: 1s, 2s, 4s

export type DispatchPoolConfig = Pick<Config, 'upstreamConcurrency' | 'maxQueueSize' | 'queueTimeoutMs'>;

/**
 * Pool that bounds concurrent backend requests
 * using p-queue for job queuing and concurrency control.
 */
export class DispatchPool {
  private queue: PQueue;
  private config: DispatchPoolConfig;
  private logger: Logger;
  private retryDelays: number[];
  private isShuttingDown = false;

  constructor(config: DispatchPoolConfig, logger: Logger, retryDelays: number[] = DEFAULT_RETRY_DELAYS) {
    this.config = config;
    this.logger = logger;
    this.retryDelays = retryDelays;

    this.queue = new PQueue({
      concurrency: config.upstreamConcurrency,
    });

    this.logger.info('Dispatch pool initialized', {
      concurrency: config.upstreamConcurrency,
      maxQueueSize: config.maxQueueSize,
      queueTimeoutMs: config.queueTimeoutMs,
    });
  }

  /**
   * Run a backend job once a slot is free.
   * With `retry`, transient failures are retried with exponential backoff + jitter.
   *
   * @throws ApiError if the queue is full, the wait was too long, or the client went away
   */
  async submit<T>(job: () => Promise<T>, options: DispatchJobOptions): Promise<T> {
    if (this.isShuttingDown) {
      throw Errors.upstreamError('Server is shutting down', { reason: 'shutdown' });
    }

    // Streaming requests don't retry (fail fast)
    if (!options.retry) {
      return this.executeWithQueue(job, options);
    }

    let lastError: unknown;
    for (let attempt = 0; attempt < RETRY_MAX_ATTEMPTS; attempt++) {
      if (options.abortSignal?.aborted) {
        throw Errors.clientClosed();
      }

      try {
        return await this.executeWithQueue(job, options);
      } catch (error) {
        lastError = error;

        // Don't retry non-retryable errors or on last attempt
        if (!isRetryableError(error) || attempt >= RETRY_MAX_ATTEMPTS - 1) {
          throw error;
        }

        // Exponential backoff with jitter (±15%)
        const baseDelay = this.retryDelays[attempt] ?? this.retryDelays[this.retryDelays.length - 1] ?? 0;
        const jitter = baseDelay * 0.15 * (Math.random() * 2 - 1);
        const delay = Math.round(baseDelay + jitter);

        this.logger.info('Retrying request', {
          requestId: options.requestId,
          attempt: attempt + 1,
          maxAttempts: RETRY_MAX_ATTEMPTS,
          delayMs: delay,
          error: error instanceof Error ? error.message : 'Unknown',
        });

        await this.sleep(delay, options.abortSignal);
      }
    }

    throw lastError;
  }

  /**
   * Abortable delay between attempts
   */
  private sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const abortHandler = () => {
        clearTimeout(timeoutId);
        reject(Errors.clientClosed());
      };
      const timeoutId = setTimeout(() => {
        signal?.removeEventListener('abort', abortHandler);
        resolve();
      }, delayMs);
      signal?.addEventListener('abort', abortHandler, { once: true });
    });
  }

  /**
   * Execute a job through the queue (internal method)
   */
  private async executeWithQueue<T>(job: () => Promise<T>, options: DispatchJobOptions): Promise<T> {
    const { requestId, abortSignal } = options;

    if (this.queue.size >= this.config.maxQueueSize) {
      this.logger.warn('Queue capacity exceeded, rejecting request', {
        requestId,
        queueSize: this.queue.size,
        maxQueueSize: this.config.maxQueueSize,
      });
      throw Errors.queueFull(this.config.maxQueueSize);
    }

    const queuedAt = Date.now();
    this.logger.debug('Request queued', {
      requestId,
      queuePosition: this.queue.size,
      pending: this.queue.pending,
    });

    try {
      return await this.queue.add(
        async () => {
          const queueWaitMs = Date.now() - queuedAt;
          this.logger.debug('Request starting execution', {
            requestId,
            queueWaitMs,
          });

          if (queueWaitMs > this.config.queueTimeoutMs) {
            throw Errors.queueTimeout(this.config.queueTimeoutMs);
          }

          return job();
        },
        { signal: abortSignal, throwOnTimeout: true }
      );
    } catch (err) {
      // p-queue rejects queued jobs whose signal fired
      if (abortSignal?.aborted) {
        throw Errors.clientClosed();
      }
      throw err;
    }
  }

  /**
   * Get current dispatch pool statistics
   */
  getStats(): DispatchPoolStats {
    return {
      pending: this.queue.size,
      processing: this.queue.pending, // p-queue: pending = currently running
      concurrency: this.config.upstreamConcurrency,
      maxQueueSize: this.config.maxQueueSize,
      isPaused: this.queue.isPaused,
    };
  }

  /**
   * Number of jobs waiting for a slot
   */
  get size(): number {
    return this.queue.size;
  }

  /**
   * Number of jobs currently running
   */
  get pending(): number {
    return this.queue.pending;
  }

  /**
   * Check if the pool is healthy (not at capacity)
   */
  isHealthy(): boolean {
    return this.queue.size < this.config.maxQueueSize * 0.9; // 90% threshold
  }

  /**
   * Gracefully shutdown the dispatch pool
   * - Stop accepting new requests
   * - Wait for current requests to complete
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    this.logger.info('Shutting down dispatch pool', {
      pending: this.queue.pending,
      size: this.queue.size,
    });

    this.queue.pause();

    // Waiting items haven't started yet
    this.queue.clear();

    await this.queue.onIdle();

    this.logger.info('Dispatch pool shutdown complete');
  }
}
