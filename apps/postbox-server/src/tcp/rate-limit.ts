/** Sliding-window request limiter for one remote address */
export class RateLimiter {
  private timestamps: number[] = [];

  constructor(
    private maxRequests: number,
    private windowMs: number
  ) {}

  /** Returns true if the request is allowed */
  check(now: number = Date.now()): boolean {
    this.timestamps = this.timestamps.filter((t) => now - t < this.windowMs);

    if (this.timestamps.length >= this.maxRequests) {
      return false;
    }

    this.timestamps.push(now);
    return true;
  }

  /** True when no request falls inside the window any more */
  isIdle(now: number = Date.now()): boolean {
    return this.timestamps.every((t) => now - t >= this.windowMs);
  }
}

export class RateLimitedError extends Error {
  constructor(public readonly address: string) {
    super(`Too many requests from ${address}`);
    this.name = "RateLimitedError";
  }
}

/**
 * One limiter per remote address. Each connection carries a single request,
 * so limiting per socket would never trigger.
 */
export class AddressRateLimiter {
  private limiters = new Map<string, RateLimiter>();

  constructor(
    private maxRequests: number,
    private windowMs: number
  ) {}

  check(address: string, now: number = Date.now()): boolean {
    let limiter = this.limiters.get(address);
    if (!limiter) {
      limiter = new RateLimiter(this.maxRequests, this.windowMs);
      this.limiters.set(address, limiter);
    }
    return limiter.check(now);
  }

  /** Forget addresses with no request inside the window */
  sweep(now: number = Date.now()): void {
    for (const [address, limiter] of this.limiters) {
      if (limiter.isIdle(now)) this.limiters.delete(address);
    }
  }

  get size(): number {
    return this.limiters.size;
  }
}
