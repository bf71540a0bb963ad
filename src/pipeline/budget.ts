export type BudgetSnapshot = Readonly<{
  remaining: number | null;
  resetAt: Date | null;
  blockedUntil: Date | null;
  exhausted: boolean;
}>;

export type BudgetGate =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly retryAfterMs: number };

/**
 * Remaining upstream quota shared by every fetch in the process.
 *
 * Two limits are tracked separately. The primary quota is unknown (null)
 * until the first response reports it; each granted request decrements it,
 * so concurrent fetches stop being issued once it hits zero, until its reset
 * time passes. A block set by {@link exhaust} (a `Retry-After` or an
 * exhausted response) holds for exactly its delay, whatever the quota
 * headers of later responses say. All methods are synchronous, so updates
 * never interleave.
 */
export class RateLimitBudget {
  private remaining: number | null = null;
  private resetAt = 0;
  private blockedUntil = 0;

  constructor(private readonly now: () => number = Date.now) {}

  tryAcquire(): BudgetGate {
    const now = this.now();

    if (now < this.blockedUntil) {
      return { allowed: false, retryAfterMs: this.blockedUntil - now };
    }

    if (this.remaining !== null && this.remaining <= 0) {
      if (now < this.resetAt) {
        return { allowed: false, retryAfterMs: this.resetAt - now };
      }
      this.remaining = null;
    }

    if (this.remaining !== null) {
      this.remaining -= 1;
    }
    return { allowed: true };
  }

  /**
   * Records the primary quota reported by an upstream response. Never lifts
   * a block set by {@link exhaust}.
   */
  record(remaining: number, resetAtMs: number): void {
    // Responses can arrive out of order: ignore an earlier window, and within
    // one window keep the lowest count.
    if (resetAtMs < this.resetAt) return;
    if (
      this.remaining !== null &&
      resetAtMs === this.resetAt &&
      remaining > this.remaining
    ) {
      return;
    }
    this.remaining = remaining;
    this.resetAt = resetAtMs;
  }

  /**
   * Denies every request for the next `retryAfterMs`.
   */
  exhaust(retryAfterMs: number): void {
    this.blockedUntil = Math.max(this.blockedUntil, this.now() + retryAfterMs);
  }

  snapshot(): BudgetSnapshot {
    const now = this.now();
    const blocked = now < this.blockedUntil;
    return {
      remaining: this.remaining,
      resetAt: this.resetAt > 0 ? new Date(this.resetAt) : null,
      blockedUntil: blocked ? new Date(this.blockedUntil) : null,
      exhausted:
        blocked ||
        (this.remaining !== null && this.remaining <= 0 && now < this.resetAt),
    };
  }
}
