import type { SegmentWindow } from './types';

/**
 * Fixed-cadence segment boundaries.
 *
 * Windows are contiguous and non-overlapping: window `i` covers
 * `[i * step, (i + 1) * step)`. With a positive `maxDuration` the clock is
 * exhausted once a window would start at or past the bound, so it issues
 * exactly `ceil(maxDuration / step)` windows. A `maxDuration` of 0 never
 * exhausts.
 */
export class SegmentClock {
  readonly step: number;
  readonly maxDuration: number;

  constructor(step: number, maxDuration = 0) {
    if (!Number.isFinite(step) || step <= 0) {
      throw new RangeError(`step must be a positive number of seconds, got ${step}`);
    }
    if (!Number.isFinite(maxDuration) || maxDuration < 0) {
      throw new RangeError(`maxDuration must be >= 0, got ${maxDuration}`);
    }
    this.step = step;
    this.maxDuration = maxDuration;
  }

  next(index: number): SegmentWindow {
    return {
      index,
      start: index * this.step,
      duration: this.step,
    };
  }

  isExhausted(index: number): boolean {
    return this.maxDuration > 0 && index * this.step >= this.maxDuration;
  }

  /// Number of windows the clock will issue, or null when unbounded.
  windowCount(): number | null {
    if (this.maxDuration === 0) { return null; }
    return Math.ceil(this.maxDuration / this.step);
  }

  *windows(): Generator<SegmentWindow, void, unknown> {
    for (let i = 0; !this.isExhausted(i); i++) {
      yield this.next(i);
    }
  }
}
