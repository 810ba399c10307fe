/**
 * Request Queue Utility
 * Limits concurrent upstream requests and retries rate-limited ones after a backoff
 */

import { createLogger } from './logger';

const log = createLogger('RequestQueue');

interface QueuedRequest {
  id: string;
  // Runs the request and settles the caller's promise on success
  run: () => Promise<void>;
  reject: (error: unknown) => void;
  retries: number;
}

export interface RequestQueueOptions {
  maxConcurrent?: number;
  delayBetweenBatches?: number;
  maxRetries?: number;
  backoffMs?: number;
  /** Decides whether a failure is worth retrying. */
  isRetryable?: (error: unknown) => boolean;
}

function isRateLimitStatus(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === 429;
}

export class RequestQueue {
  private queue: QueuedRequest[] = [];
  private concurrent = 0;
  private readonly maxConcurrent: number;
  private readonly delayBetweenBatches: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly isRetryable: (error: unknown) => boolean;

  constructor(options: RequestQueueOptions = {}) {
    this.maxConcurrent = options.maxConcurrent ?? 2;
    this.delayBetweenBatches = options.delayBetweenBatches ?? 100;
    this.maxRetries = options.maxRetries ?? 1;
    this.backoffMs = options.backoffMs ?? 2000;
    this.isRetryable = options.isRetryable ?? isRateLimitStatus;
  }

  /**
   * Add a request to the queue
   */
  enqueue<T>(fn: () => Promise<T>, id?: string): Promise<T> {
    const requestId = id || `req-${Date.now()}-${Math.random()}`;

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        id: requestId,
        run: async () => {
          resolve(await fn());
        },
        reject,
        retries: 0,
      });
      this.process();
    });
  }

  /**
   * Process the queue
   */
  private process(): void {
    while (this.queue.length > 0 && this.concurrent < this.maxConcurrent) {
      const request = this.queue.shift();
      if (!request) break;

      if (this.queue.length > 10) {
        log.warn(`⚠️ Queue backing up: ${this.queue.length} requests waiting, ${this.concurrent} concurrent`);
      }

      this.concurrent++;
      void this.executeRequest(request).finally(() => {
        this.concurrent--;
        // Spread batches out to stay under upstream rate limits
        setTimeout(() => this.process(), this.delayBetweenBatches);
      });
    }
  }

  /**
   * Execute a request with retry logic
   */
  private async executeRequest(request: QueuedRequest): Promise<void> {
    try {
      await request.run();
    } catch (error) {
      if (this.isRetryable(error) && request.retries < this.maxRetries) {
        request.retries++;
        log.warn(`Rate limited, retrying ${request.id} in ${this.backoffMs}ms (attempt ${request.retries}/${this.maxRetries})`);
        setTimeout(() => {
          this.queue.unshift(request);
          this.process();
        }, this.backoffMs);
      } else {
        request.reject(error);
      }
    }
  }

  /**
   * Get queue status
   */
  getStatus() {
    return {
      queueLength: this.queue.length,
      concurrent: this.concurrent,
      maxConcurrent: this.maxConcurrent,
    };
  }
}
