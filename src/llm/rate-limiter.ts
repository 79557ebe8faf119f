/**
 * Sliding-window rate limiter: at most `maxCalls` acquisitions in any
 * `windowMs` span. Never waits; callers that are refused move on.
 */
export class RateLimiter {
  private calls: number[] = [];
  private maxCalls: number;
  private windowMs: number;

  constructor(
    options: { maxCalls?: number; windowMs?: number } = {},
    private readonly now: () => number = Date.now,
  ) {
    this.maxCalls = options.maxCalls ?? 30;
    this.windowMs = options.windowMs ?? 60_000;
  }

  /** Record a call if the window has room; returns whether it did. */
  tryAcquire(): boolean {
    this.evict();
    if (this.calls.length >= this.maxCalls) {
      return false;
    }
    this.calls.push(this.now());
    return true;
  }

  remaining(): number {
    this.evict();
    return Math.max(0, this.maxCalls - this.calls.length);
  }

  configure(options: { maxCalls?: number; windowMs?: number }): void {
    this.maxCalls = options.maxCalls ?? this.maxCalls;
    this.windowMs = options.windowMs ?? this.windowMs;
  }

  private evict(): void {
    const cutoff = this.now() - this.windowMs;
    let expired = 0;
    while (expired < this.calls.length && this.calls[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      this.calls = this.calls.slice(expired);
    }
  }
}
