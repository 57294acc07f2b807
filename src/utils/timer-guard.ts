/**
 * Timer Lifecycle Guard
 *
 * Owns at most one pending timeout. Every `schedule()` clears the previous
 * one first, and `clear()` is idempotent, so a stopped owner never leaves an
 * orphaned timer behind (tests would otherwise hang on open handles).
 *
 * Usage:
 * ```typescript
 * const guard = new TimerGuard('system-sampler');
 * guard.schedule(() => tick(), 5000);
 * // Later...
 * guard.clear();
 * ```
 */
export class TimerGuard {
  private timer?: NodeJS.Timeout;
  private readonly name: string;

  constructor(name = 'anonymous') {
    this.name = name;
  }

  /**
   * Schedule a one-shot callback, replacing any pending one
   */
  schedule(callback: () => void, delayMs: number): void {
    this.clear();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      callback();
    }, delayMs);
  }

  /**
   * Cancel the pending callback if there is one
   */
  clear(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  isActive(): boolean {
    return this.timer !== undefined;
  }

  getName(): string {
    return this.name;
  }
}
