/**
 * Process-wide circuit breaker shared by every retry executor.
 */

import { LogRing } from '../diagnostics/log-ring'
import { systemClock, type Clock } from './clock'

const logger = LogRing.getInstance()

export enum CircuitMode {
  /** Requests flow normally. */
  Closed = 'closed',
  /** Requests are rejected without contacting the remote service. */
  Open = 'open',
  /** One probe request is allowed through. */
  HalfOpen = 'half_open'
}

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit. */
  failureThreshold: number
  /** How long the circuit stays open before allowing a probe. */
  coolDownMs: number
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  coolDownMs: 30_000
}

export interface CircuitState {
  mode: CircuitMode
  consecutiveFailures: number
  openedAt: number | null
}

/**
 * Counts consecutive call failures across all operations.
 *
 * All mutation happens in synchronous methods, so concurrent jobs on the
 * event loop never interleave inside a transition. In half-open mode exactly
 * one caller holds the probe until it records an outcome.
 */
export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig
  private readonly clock: Clock
  private mode: CircuitMode = CircuitMode.Closed
  private consecutiveFailures = 0
  private openedAt: number | null = null
  private probeInFlight = false

  constructor(config: Partial<CircuitBreakerConfig> = {}, clock: Clock = systemClock) {
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config }
    this.clock = clock
  }

  /**
   * Asks permission for one call. Returns `false` while open (and while a
   * half-open probe is outstanding).
   */
  tryAcquire(): boolean {
    switch (this.mode) {
      case CircuitMode.Closed:
        return true

      case CircuitMode.Open:
        if (this.openedAt !== null && this.clock.now() - this.openedAt >= this.config.coolDownMs) {
          this.mode = CircuitMode.HalfOpen
          this.probeInFlight = true
          logger.info('Circuit half-open, allowing probe request')
          return true
        }
        return false

      case CircuitMode.HalfOpen:
        if (this.probeInFlight) {
          return false
        }
        this.probeInFlight = true
        return true
    }
  }

  /**
   * Closes the circuit after a successful half-open probe. A success that
   * lands while open belongs to a call admitted before the circuit opened
   * and leaves the cool-down running.
   */
  recordSuccess(): void {
    if (this.mode === CircuitMode.Open) {
      return
    }
    if (this.mode === CircuitMode.HalfOpen) {
      logger.info('Circuit closed after successful probe')
    }
    this.mode = CircuitMode.Closed
    this.consecutiveFailures = 0
    this.openedAt = null
    this.probeInFlight = false
  }

  recordFailure(): void {
    this.consecutiveFailures++

    if (this.mode === CircuitMode.HalfOpen) {
      this.open('probe failed')
      return
    }

    if (this.mode === CircuitMode.Closed && this.consecutiveFailures >= this.config.failureThreshold) {
      this.open(`${this.consecutiveFailures} consecutive failures`)
    }
  }

  /**
   * Returns a held half-open probe without judging the service, e.g. when
   * the probe ended in a permanent error that says nothing about availability.
   * The circuit reopens so the next probe waits for a fresh cool-down.
   */
  releaseProbe(): void {
    if (this.mode === CircuitMode.HalfOpen && this.probeInFlight) {
      this.open('probe inconclusive')
    }
  }

  /** Milliseconds until an open circuit admits a probe; 0 otherwise. */
  getRetryInMs(): number {
    if (this.mode !== CircuitMode.Open || this.openedAt === null) {
      return 0
    }
    return Math.max(0, this.config.coolDownMs - (this.clock.now() - this.openedAt))
  }

  getState(): CircuitState {
    return {
      mode: this.mode,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt
    }
  }

  reset(): void {
    this.mode = CircuitMode.Closed
    this.consecutiveFailures = 0
    this.openedAt = null
    this.probeInFlight = false
  }

  private open(reason: string): void {
    this.mode = CircuitMode.Open
    this.openedAt = this.clock.now()
    this.probeInFlight = false
    logger.warn('Circuit opened', { reason, coolDownMs: this.config.coolDownMs })
  }
}
