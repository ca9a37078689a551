/**
 * Rate Limiter for the Ollama endpoint
 * Fixed one-minute window on requests per minute (RPM)
 */

export interface RateLimiterStatus {
  requestsRemaining: number;
  resetInMs: number;
}

export class RateLimiter {
  private requestCount: number = 0;
  private windowStart: number = Date.now();
  private readonly windowMs: number = 60000;

  /**
   * Mutex queue to serialize acquire() calls.
   * Concurrent batches must not all pass the check before any of them
   * increments the count.
   */
  private _acquireQueue: Promise<void> = Promise.resolve();

  /**
   * @param maxRPM - Requests allowed per window; 0 means unlimited
   */
  constructor(private readonly maxRPM: number) {}

  private checkWindow(): void {
    const now = Date.now();
    if (now - this.windowStart >= this.windowMs) {
      this.requestCount = 0;
      this.windowStart = now;
    }
  }

  /**
   * Wait until a request may be sent, then reserve it.
   */
  async acquire(): Promise<void> {
    if (this.maxRPM === 0) return;

    const prev = this._acquireQueue;
    let release: () => void = () => undefined;
    this._acquireQueue = new Promise<void>((r) => {
      release = r;
    });

    try {
      await prev;
      await this._doAcquire();
    } finally {
      release();
    }
  }

  private async _doAcquire(): Promise<void> {
    this.checkWindow();

    if (this.requestCount >= this.maxRPM) {
      const waitTime = this.windowMs - (Date.now() - this.windowStart);
      if (waitTime > 0) {
        console.error(`[RateLimiter] ${this.maxRPM} RPM reached, waiting ${waitTime}ms`);
        await new Promise<void>((resolve) => setTimeout(resolve, waitTime));
      }
      this.requestCount = 0;
      this.windowStart = Date.now();
    }

    this.requestCount++;
  }

  getStatus(): RateLimiterStatus {
    this.checkWindow();
    return {
      requestsRemaining:
        this.maxRPM === 0 ? Number.POSITIVE_INFINITY : Math.max(0, this.maxRPM - this.requestCount),
      resetInMs: Math.max(0, this.windowMs - (Date.now() - this.windowStart)),
    };
  }

  isLimited(): boolean {
    this.checkWindow();
    return this.maxRPM > 0 && this.requestCount >= this.maxRPM;
  }

  reset(): void {
    this.requestCount = 0;
    this.windowStart = Date.now();
  }
}
