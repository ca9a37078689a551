/**
 * Circuit Breaker around the Ollama endpoint
 *
 * Only transport-level failures (HTTP 429/5xx, timeouts, refused or reset
 * connections) count against the breaker. A model answering with output
 * that fails schema validation is a healthy server and never trips it.
 *
 * @module services/llm/circuit-breaker
 */

import { BatchDispatchError } from '../extraction/errors.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

/** Recovery time doubles per consecutive trip up to this multiplier */
const MAX_RECOVERY_MULTIPLIER = 16;

/**
 * Whether an error means the Ollama server (not the request) is in trouble
 */
export function isServerError(error: unknown): boolean {
  if (error instanceof BatchDispatchError) {
    if (error.code === 'MODEL_TIMEOUT' || error.code === 'MODEL_NETWORK_ERROR') return true;
    const status = error.details?.status;
    return typeof status === 'number' && (status === 429 || status >= 500);
  }
  if (!(error instanceof Error)) {
    return false;
  }
  const cause = error.cause instanceof Error ? error.cause.message : '';
  const combined = `${error.message} ${cause}`;
  if (/\b(429|500|502|503|504)\b/.test(combined)) return true;
  return /ECONNRESET|ETIMEDOUT|ECONNREFUSED|ENOTFOUND|socket hang up|fetch failed/i.test(combined);
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60_000,
  halfOpenSuccessThreshold: 2,
};

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private consecutiveTrips = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Recovery time for the current trip: base * 2^(trips - 1), capped
   */
  getRecoveryTimeMs(): number {
    const exponent = Math.max(0, this.consecutiveTrips - 1);
    return this.config.recoveryTimeMs * Math.min(2 ** exponent, MAX_RECOVERY_MULTIPLIER);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === 'OPEN') {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isServerError(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state !== 'OPEN' || this.lastFailureTime === null) return;
    if (Date.now() - this.lastFailureTime >= this.getRecoveryTimeMs()) {
      console.error(`[CircuitBreaker] OPEN -> HALF_OPEN (trip #${this.consecutiveTrips})`);
      this.state = 'HALF_OPEN';
      this.successCount = 0;
    }
  }

  private recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, HALF_OPEN -> CLOSED');
        this.state = 'CLOSED';
        this.failureCount = 0;
        this.successCount = 0;
        this.lastFailureTime = null;
        this.consecutiveTrips = 0;
      }
    } else {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      this.consecutiveTrips++;
      this.state = 'OPEN';
      this.successCount = 0;
      console.error(
        `[CircuitBreaker] -> OPEN after ${this.failureCount} failures (recovery ${this.getRecoveryTimeMs()}ms)`
      );
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (Date.now() - this.lastFailureTime));
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === 'OPEN' ? this.getTimeToRecovery() : null,
    };
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.consecutiveTrips = 0;
  }
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
