/**
 * Retry logic with exponential backoff, jitter and the shared circuit breaker.
 */

import { LogRing } from '../diagnostics/log-ring'
import { AssetJobError, AssetJobErrorCode, toAssetJobError } from '../errors/asset-job-error'
import { CircuitBreaker } from './circuit-breaker'
import { systemClock, type Clock } from './clock'

const logger = LogRing.getInstance()

export interface RetryConfig {
  /** Total attempts per call, including the first. */
  maxAttempts: number
  /** Delay before the second attempt. */
  baseDelayMs: number
  /** Ceiling for computed and server-suggested delays. */
  maxDelayMs: number
  /** Jitter factor (0-1): the delay varies by up to ± this share. */
  jitterFactor: number
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitterFactor: 0.2
}

/** Upper bound for a server-suggested `Retry-After`. */
const MAX_SERVER_DELAY_MS = 60_000

export interface ExecuteOptions {
  /** Label for logs, e.g. the gateway operation name. */
  operation: string
  /**
   * Whether repeating the call is harmless. Non-idempotent calls are only
   * retried when the remote service provably never accepted the request.
   */
  idempotent: boolean
  signal?: AbortSignal
}

export interface ExecuteResult<T> {
  value: T
  /** Attempts made, including the successful one. */
  attempts: number
}

export interface RetryExecutorOptions {
  breaker: CircuitBreaker
  config?: Partial<RetryConfig>
  clock?: Clock
  /** Uniform random source in [0, 1); replaceable for tests. */
  random?: () => number
}

/**
 * Wraps single transport calls with classification, backoff and the
 * circuit breaker.
 *
 * @example
 * ```ts
 * const executor = new RetryExecutor({ breaker })
 * const { value } = await executor.execute(
 *   (signal) => gateway.call('getInference', { inferenceId }, { signal }),
 *   { operation: 'getInference', idempotent: true }
 * )
 * ```
 */
export class RetryExecutor {
  private readonly config: RetryConfig
  private readonly breaker: CircuitBreaker
  private readonly clock: Clock
  private readonly random: () => number

  constructor(options: RetryExecutorOptions) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...options.config }
    this.breaker = options.breaker
    this.clock = options.clock ?? systemClock
    this.random = options.random ?? Math.random
  }

  /**
   * Runs `call` until it succeeds, fails permanently or the attempt ceiling
   * is reached.
   *
   * @throws {AssetJobError} The permanent error unchanged, `RetriesExhausted`
   *   wrapping the last transient error, `CircuitOpen`, or `Cancelled`.
   */
  async execute<T>(call: (signal?: AbortSignal) => Promise<T>, options: ExecuteOptions): Promise<ExecuteResult<T>> {
    const { operation, idempotent, signal } = options
    let lastError: AssetJobError | null = null

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw AssetJobError.cancelled()
      }

      if (!this.breaker.tryAcquire()) {
        logger.warn('Call rejected by open circuit', { operation, attempt })
        throw AssetJobError.circuitOpen(this.breaker.getRetryInMs())
      }

      try {
        const value = await call(signal)
        this.breaker.recordSuccess()
        return { value, attempts: attempt }
      } catch (err) {
        const error = toAssetJobError(err)

        if (error.code === AssetJobErrorCode.Cancelled) {
          this.breaker.releaseProbe()
          throw error
        }

        if (!error.isRetryable()) {
          this.breaker.releaseProbe()
          logger.warn('Permanent failure, not retrying', { operation, attempt, code: error.code })
          throw error
        }

        this.breaker.recordFailure()
        lastError = error

        if (!idempotent && !this.isSafeToRepeat(error)) {
          logger.warn('Not retrying non-idempotent call that may have reached the service', {
            operation,
            attempt,
            code: error.code
          })
          throw error
        }

        if (attempt === this.config.maxAttempts) {
          break
        }

        const delayMs = this.getDelay(error, attempt)
        logger.warn('Transient failure, backing off', { operation, attempt, code: error.code, delayMs })

        if (signal?.aborted) {
          throw AssetJobError.cancelled()
        }
        await this.clock.sleep(delayMs, signal)
      }
    }

    if (!lastError) {
      throw AssetJobError.configuration('Retry executor requires maxAttempts >= 1')
    }

    logger.error('Retries exhausted', { operation, attempts: this.config.maxAttempts, code: lastError.code })
    throw AssetJobError.retriesExhausted(this.config.maxAttempts, lastError)
  }

  /**
   * Delay before attempt `attempt + 1`. A server-suggested delay wins over
   * the computed backoff.
   */
  getDelay(error: AssetJobError, attempt: number): number {
    const suggested = error.details.retryAfterMs
    if (error.code === AssetJobErrorCode.RateLimited && suggested !== undefined) {
      return Math.min(suggested, MAX_SERVER_DELAY_MS)
    }

    const exponential = this.config.baseDelayMs * Math.pow(2, attempt - 1)
    const capped = Math.min(exponential, this.config.maxDelayMs)
    const jitter = capped * this.config.jitterFactor * (this.random() * 2 - 1)
    return Math.max(0, Math.round(capped + jitter))
  }

  /** A rate-limited request was refused; a connection failure never left the client. */
  private isSafeToRepeat(error: AssetJobError): boolean {
    return error.code === AssetJobErrorCode.RateLimited || error.details.delivered === false
  }
}
