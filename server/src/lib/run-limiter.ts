/**
 * Bounds how many runs the host executes at once. The runtime itself has
 * no limit beyond the per-run step cap; this is the host's backpressure.
 */
export class RunLimiter {
  private active = 0;
  private rejected = 0;

  constructor(readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent <= 0) {
      throw new RangeError(`maxConcurrent must be a positive integer (got ${maxConcurrent})`);
    }
  }

  /** Returns a release function, or null when the host is at capacity. */
  tryAcquire(): (() => void) | null {
    if (this.active >= this.maxConcurrent) {
      this.rejected += 1;
      return null;
    }
    this.active += 1;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active -= 1;
    };
  }

  stats(): { active: number; max: number; rejected: number } {
    return { active: this.active, max: this.maxConcurrent, rejected: this.rejected };
  }
}
