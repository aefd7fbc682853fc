/**
 * Orderbook Normalization Utilities
 *
 * Polymarket returns orderbook levels in different sort orders depending on
 * the source:
 * - REST /book: bids ascending (worst first), asks descending (worst first)
 * - WebSocket book: bids ascending (worst first), asks ascending (best first)
 *
 * Rather than trusting either, best prices are taken from the two ends of
 * each array: best bid = max(first, last), best ask = min(first, last).
 */

import { isRecord, readNumber } from "./error-handling";

/** Orderbook level with numeric price/size */
export interface OrderbookLevel {
  price: number;
  size: number;
}

/** Raw level as the exchange sends it */
export interface RawOrderbookLevel {
  price: string;
  size: string;
}

export interface BestPrices {
  bestBid: number | null;
  bestAsk: number | null;
}

/**
 * Parse raw orderbook levels from an API or WebSocket payload.
 * Accepts string or numeric price/size, drops invalid and empty levels,
 * keeps the original order.
 */
export function parseRawLevels(rawLevels: unknown): OrderbookLevel[] {
  if (!Array.isArray(rawLevels)) {
    return [];
  }

  const levels: OrderbookLevel[] = [];
  for (const raw of rawLevels) {
    if (!isRecord(raw)) continue;
    const price = readNumber(raw.price);
    const size = readNumber(raw.size);
    if (price === undefined || size === undefined || size <= 0) continue;
    levels.push({ price, size });
  }
  return levels;
}

/**
 * Best bid from levels in either sort order
 */
export function bestBidFromLevels(bids: OrderbookLevel[]): number | null {
  if (bids.length === 0) return null;
  return Math.max(bids[0].price, bids[bids.length - 1].price);
}

/**
 * Best ask from levels in either sort order
 */
export function bestAskFromLevels(asks: OrderbookLevel[]): number | null {
  if (asks.length === 0) return null;
  return Math.min(asks[0].price, asks[asks.length - 1].price);
}

/**
 * Best bid and ask from a raw orderbook (REST or WebSocket), sort order
 * auto-detected
 */
export function extractBestPrices(book: { bids?: unknown; asks?: unknown }): BestPrices {
  return {
    bestBid: bestBidFromLevels(parseRawLevels(book.bids)),
    bestAsk: bestAskFromLevels(parseRawLevels(book.asks)),
  };
}
