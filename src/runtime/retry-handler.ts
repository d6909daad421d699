import type { Logger } from 'pino'
import type { Metrics } from '../observability'
import { toError } from '../graph/errors'

export interface RetryPolicy {
  /** Total attempts, the first one included */
  maxAttempts: number
  initialIntervalMs: number
  backoffFactor: number
  maxIntervalMs?: number
  jitter: boolean
  /** Message fragments that mark an error retryable; empty retries everything */
  retryableErrors?: string[]
}

export const DEFAULT_RETRY_POLICIES = {
  // Single attempt
  none: {
    maxAttempts: 1,
    initialIntervalMs: 500,
    backoffFactor: 2,
    jitter: false,
  },

  // Flaky upstream calls (scrapers, third-party APIs)
  transient: {
    maxAttempts: 3,
    initialIntervalMs: 2000,
    backoffFactor: 2,
    maxIntervalMs: 30000,
    jitter: true,
  },
} satisfies Record<string, RetryPolicy>

export interface RetryHandlerOptions {
  sleep?: (ms: number) => Promise<void>
  random?: () => number
  metrics?: Metrics
  logger?: Logger
  /** Errors that must surface immediately whatever the policy says */
  neverRetry?: (error: Error) => boolean
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * RetryHandler - bounded retries around a single invocation
 *
 * Features:
 * - Exponential backoff with optional jitter
 * - Configurable retry policies, merged over a default
 * - Retry tracking and metrics
 */
export class RetryHandler {
  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number

  constructor(
    private readonly defaultPolicy: RetryPolicy,
    private readonly options: RetryHandlerOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
  }

  resolvePolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
    return { ...this.defaultPolicy, ...overrides }
  }

  /**
   * Delay after the given failed attempt (1-based)
   */
  calculateDelay(attempt: number, policy: RetryPolicy): number {
    const baseDelay = policy.initialIntervalMs * Math.pow(policy.backoffFactor, attempt - 1)
    const cappedDelay = policy.maxIntervalMs !== undefined ? Math.min(baseDelay, policy.maxIntervalMs) : baseDelay

    if (!policy.jitter) {
      return cappedDelay
    }

    // ±25% to keep retrying branches from stampeding the same upstream
    const jitter = cappedDelay * 0.25 * (this.random() * 2 - 1)
    return Math.max(0, Math.floor(cappedDelay + jitter))
  }

  isRetryable(error: Error, policy: RetryPolicy): boolean {
    if (this.options.neverRetry?.(error)) {
      return false
    }

    if (!policy.retryableErrors || policy.retryableErrors.length === 0) {
      return true
    }

    const errorMessage = error.message.toLowerCase()
    return policy.retryableErrors.some(pattern =>
      errorMessage.includes(pattern.toLowerCase())
    )
  }

  /**
   * Run an operation, retrying failures per policy. The attempt number is
   * passed to the operation and starts at 1 for every call.
   */
  async withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    overrides?: Partial<RetryPolicy>,
    labels?: Record<string, string>
  ): Promise<T> {
    const policy = this.resolvePolicy(overrides)
    const maxAttempts = Math.max(1, policy.maxAttempts)

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt)
      } catch (caught) {
        const error = toError(caught)

        if (attempt >= maxAttempts || !this.isRetryable(error, policy)) {
          if (attempt > 1) {
            this.options.metrics?.increment('graph.node.retry_exhausted', 1, labels)
          }
          throw caught
        }

        const delay = this.calculateDelay(attempt, policy)
        this.options.metrics?.increment('graph.node.retry', 1, labels)
        this.options.logger?.warn(
          { ...labels, attempt, maxAttempts, delayMs: delay, err: error },
          'attempt failed, retrying'
        )
        await this.sleep(delay)
      }
    }
  }
}
