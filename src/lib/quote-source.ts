/**
 * QuoteSource - best bid/ask lookups for the execution path
 *
 * `getBestBid`/`getBestAsk` read the PriceCache first and fall back to the
 * REST order book when the cache has nothing fresh. `fetchQuote` always goes
 * to the order book; the exit loop uses it so every attempt sees the book as
 * it is after the previous fill.
 */

import type { OrderClient } from "../clob/order-client";
import type { Logger } from "../utils/logger.util";
import { extractBestPrices, type BestPrices } from "./orderbook-utils";
import type { PriceCache } from "./price-cache";

export class QuoteSource {
  constructor(
    private readonly client: OrderClient,
    private readonly cache: PriceCache | null = null,
    private readonly logger?: Logger,
  ) {}

  async getBestBid(tokenId: string): Promise<number | null> {
    const cached = this.cache?.getBestBid(tokenId) ?? null;
    if (cached !== null) return cached;
    return (await this.fetchQuote(tokenId)).bestBid;
  }

  async getBestAsk(tokenId: string): Promise<number | null> {
    const cached = this.cache?.getBestAsk(tokenId) ?? null;
    if (cached !== null) return cached;
    return (await this.fetchQuote(tokenId)).bestAsk;
  }

  /**
   * Both sides, cache first. A side the cache lacks is filled from the book.
   */
  async getQuote(tokenId: string): Promise<BestPrices> {
    const snapshot = this.cache?.get(tokenId) ?? null;
    if (snapshot && snapshot.bestBid !== null && snapshot.bestAsk !== null) {
      return { bestBid: snapshot.bestBid, bestAsk: snapshot.bestAsk };
    }
    const live = await this.fetchQuote(tokenId);
    return {
      bestBid: snapshot?.bestBid ?? live.bestBid,
      bestAsk: snapshot?.bestAsk ?? live.bestAsk,
    };
  }

  /**
   * Best prices straight from the REST order book. A failed lookup reads as
   * an empty book.
   */
  async fetchQuote(tokenId: string): Promise<BestPrices> {
    const book = await this.client.getOrderBook(tokenId);
    if (!book.ok) {
      this.logger?.warn(`[Quote] Order book fetch failed for ${tokenId.slice(0, 12)}...: ${book.error}`);
      return { bestBid: null, bestAsk: null };
    }
    return extractBestPrices(book.value);
  }
}
