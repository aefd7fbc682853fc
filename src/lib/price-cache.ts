/**
 * PriceCache - live best bid/ask per token
 *
 * Written by the market data stream, read by the executor, the signal gate and
 * the exit checker. Snapshots are frozen and replaced wholesale on update, so
 * readers can hold one without seeing later writes. Every method body is
 * synchronous: nothing interleaves between reading the previous snapshot and
 * storing the merged one.
 *
 * Reads older than `staleMs` are reported as unavailable (null), never served.
 */

export interface PriceSnapshot {
  readonly tokenId: string;
  readonly bestBid: number | null;
  readonly bestAsk: number | null;
  /** Unix ms of the last update */
  readonly capturedAt: number;
}

/** Bid/ask/spread at a moment, as recorded in the event log */
export interface SpreadSnapshot {
  tokenId: string;
  bestBid: number;
  bestAsk: number;
  spreadCents: number;
}

export interface PriceCacheOptions {
  staleMs?: number;
  /** Clock override for tests */
  now?: () => number;
}

export const DEFAULT_PRICE_CACHE_STALE_MS = 5000;

export class PriceCache {
  private readonly snapshots = new Map<string, PriceSnapshot>();
  private readonly staleMs: number;
  private readonly now: () => number;

  constructor(options?: PriceCacheOptions) {
    this.staleMs = options?.staleMs ?? DEFAULT_PRICE_CACHE_STALE_MS;
    this.now = options?.now ?? Date.now;
  }

  /**
   * Merge a partial update. A side passed as undefined keeps its previous value.
   */
  update(tokenId: string, bestBid?: number | null, bestAsk?: number | null): void {
    const existing = this.snapshots.get(tokenId);

    const snapshot: PriceSnapshot = Object.freeze({
      tokenId,
      bestBid: bestBid ?? existing?.bestBid ?? null,
      bestAsk: bestAsk ?? existing?.bestAsk ?? null,
      capturedAt: this.now(),
    });

    this.snapshots.set(tokenId, snapshot);
  }

  /**
   * Fresh snapshot for a token, or null if missing or stale
   */
  get(tokenId: string): PriceSnapshot | null {
    const snapshot = this.snapshots.get(tokenId);
    if (!snapshot) return null;

    if (this.now() - snapshot.capturedAt > this.staleMs) {
      return null;
    }
    return { ...snapshot };
  }

  getBestBid(tokenId: string): number | null {
    return this.get(tokenId)?.bestBid ?? null;
  }

  getBestAsk(tokenId: string): number | null {
    return this.get(tokenId)?.bestAsk ?? null;
  }

  /**
   * True when both sides are present and fresh, the bid is positive and the
   * spread is within `maxSpreadCents`. Prices sit on the cent grid, so the
   * comparison is done on whole cents.
   */
  isSpreadAcceptable(tokenId: string, maxSpreadCents: number): boolean {
    const snapshot = this.get(tokenId);
    if (!snapshot) return false;

    const { bestBid, bestAsk } = snapshot;
    if (bestBid === null || bestAsk === null) return false;
    if (bestBid <= 0) return false;

    return spreadCents(bestBid, bestAsk) <= maxSpreadCents;
  }

  /**
   * Fresh two-sided quote with its spread, null if either side is missing
   */
  spreadSnapshot(tokenId: string): SpreadSnapshot | null {
    const snapshot = this.get(tokenId);
    if (!snapshot || snapshot.bestBid === null || snapshot.bestAsk === null) {
      return null;
    }
    if (snapshot.bestBid <= 0) return null;
    return {
      tokenId,
      bestBid: snapshot.bestBid,
      bestAsk: snapshot.bestAsk,
      spreadCents: spreadCents(snapshot.bestBid, snapshot.bestAsk),
    };
  }

  isStale(tokenId: string): boolean {
    return this.get(tokenId) === null;
  }

  /**
   * Age of the cached entry in ms (stale or not), null if never updated
   */
  getAgeMs(tokenId: string): number | null {
    const snapshot = this.snapshots.get(tokenId);
    if (!snapshot) return null;
    return this.now() - snapshot.capturedAt;
  }

  clear(): void {
    this.snapshots.clear();
  }
}

/**
 * Spread between two cent-grid prices, in whole cents
 */
export function spreadCents(bestBid: number, bestAsk: number): number {
  return Math.round(bestAsk * 100) - Math.round(bestBid * 100);
}
