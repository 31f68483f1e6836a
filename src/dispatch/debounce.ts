export const DEFAULT_DEBOUNCE_MS = 2000;

export type DebounceGuardOptions = {
  windowMs?: number;
  /** Defaults to -Infinity, so the first activation always passes. */
  lastActivation?: number;
};

/**
 * Drops an activation that follows the previous permitted one by
 * `windowMs` or less. Some hosts fire their load hook twice for one open.
 */
export class DebounceGuard {
  readonly windowMs: number;
  private last: number;

  constructor(opts: DebounceGuardOptions = {}) {
    this.windowMs = Math.max(0, opts.windowMs ?? DEFAULT_DEBOUNCE_MS);
    this.last = opts.lastActivation ?? Number.NEGATIVE_INFINITY;
  }

  get lastActivation(): number {
    return this.last;
  }

  /** Check and record in one step; a rejected call leaves the timestamp alone. */
  tryActivate(now: number): boolean {
    if (now - this.last <= this.windowMs) return false;
    this.last = now;
    return true;
  }
}
