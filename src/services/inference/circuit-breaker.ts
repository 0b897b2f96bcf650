/**
 * Circuit breaker guarding the inference server.
 *
 * Only server-side failures (HTTP 429/5xx, socket errors, model loading) trip
 * the breaker. A malformed oracle answer is a successful HTTP exchange as far
 * as the breaker is concerned; the stages deal with those themselves.
 *
 * @module services/inference/circuit-breaker
 */

import { isTransientError } from '../../utils/backoff.js';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 1,
};

/** Recovery window never grows past 16x the base or 16 minutes. */
const MAX_RECOVERY_MS = 960_000;

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

/**
 * Error thrown when circuit breaker is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  /** Consecutive trips double the recovery window */
  private consecutiveTrips = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getRecoveryTimeMs(): number {
    const tripExponent = Math.max(0, this.consecutiveTrips - 1);
    const multiplier = Math.pow(2, Math.min(tripExponent, 4));
    return Math.min(this.config.recoveryTimeMs * multiplier, MAX_RECOVERY_MS);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Inference circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isTransientError(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state !== CircuitState.OPEN || this.lastFailureTime === null) return;
    const recoveryTime = this.getRecoveryTimeMs();
    if (Date.now() - this.lastFailureTime >= recoveryTime) {
      console.error(
        `[CircuitBreaker] OPEN -> HALF_OPEN (recovery: ${recoveryTime}ms, trip #${this.consecutiveTrips})`
      );
      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, HALF_OPEN -> CLOSED');
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
        this.successCount = 0;
        this.lastFailureTime = null;
        this.consecutiveTrips = 0;
      }
    } else if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN) {
      // Any failure while probing reopens immediately
      this.consecutiveTrips++;
      this.state = CircuitState.OPEN;
      this.successCount = 0;
      console.error(
        `[CircuitBreaker] Trial call failed, HALF_OPEN -> OPEN (trip #${this.consecutiveTrips}, recovery: ${this.getRecoveryTimeMs()}ms)`
      );
    } else if (this.failureCount >= this.config.failureThreshold) {
      this.consecutiveTrips++;
      this.state = CircuitState.OPEN;
      console.error(
        `[CircuitBreaker] ${this.failureCount} consecutive failures, CLOSED -> OPEN (trip #${this.consecutiveTrips})`
      );
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (Date.now() - this.lastFailureTime));
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.consecutiveTrips = 0;
  }
}
