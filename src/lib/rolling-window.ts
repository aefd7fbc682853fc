/**
 * RollingWindow - time-bounded tick buffer for the volatility detector
 *
 * Holds (timeMs, price) ticks no older than `windowMs` relative to the newest
 * tick. Eviction moves a head index instead of shifting the array; the
 * backing array is compacted once the dead prefix outgrows the live part.
 *
 * Owned by a single CoinbaseFeed. Not meant for shared writers.
 */

export interface Tick {
  timeMs: number;
  price: number;
}

// Compact once this many evicted slots have piled up
const COMPACT_THRESHOLD = 64;

export class RollingWindow {
  private ticks: Tick[] = [];
  private head = 0;

  constructor(readonly windowMs: number) {
    if (!Number.isFinite(windowMs) || windowMs < 0) {
      throw new RangeError(`windowMs must be >= 0, got ${windowMs}`);
    }
  }

  /**
   * Append a tick and evict everything older than newest - windowMs
   */
  add(timeMs: number, price: number): void {
    this.ticks.push({ timeMs, price });

    const cutoff = timeMs - this.windowMs;
    while (this.head < this.ticks.length && this.ticks[this.head].timeMs < cutoff) {
      this.head++;
    }

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.ticks.length) {
      this.ticks = this.ticks.slice(this.head);
      this.head = 0;
    }
  }

  /**
   * Fractional change from oldest to newest tick in the window.
   * Null when there are fewer than two ticks or the oldest price is not positive.
   */
  pctChange(): number | null {
    if (this.size < 2) return null;

    const oldest = this.ticks[this.head];
    const newest = this.ticks[this.ticks.length - 1];
    if (oldest.price <= 0) return null;

    return (newest.price - oldest.price) / oldest.price;
  }

  clear(): void {
    this.ticks = [];
    this.head = 0;
  }

  get size(): number {
    return this.ticks.length - this.head;
  }

  /** Copy of the live ticks, oldest first */
  snapshot(): Tick[] {
    return this.ticks.slice(this.head).map((t) => ({ ...t }));
  }
}
