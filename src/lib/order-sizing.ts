/**
 * Order sizing in exact decimal arithmetic
 *
 * The CLOB rejects orders whose notional (size x price) is not exact to the
 * cent. Everything here runs on decimal.js and truncates toward zero; the
 * results are handed back as plain numbers for the order client.
 */

import Decimal from "decimal.js";
import { PRICE_BOUNDS } from "./constants";

export interface SizedOrder {
  size: number;
  price: number;
}

export interface EntryOrder extends SizedOrder {
  /** Whole shares affordable at the original (pre-slippage) ask */
  wholeShares: number;
  /** True when sizing fell back to wholeShares at the original ask */
  usedFallback: boolean;
}

const CENT = new Decimal("0.01");

// Worst price the sizer may step down to, in cents below the request
const MAX_PRICE_ADJUSTMENTS = 5;

/**
 * Truncate to two decimals (never rounds up)
 */
export function truncateCents(value: number | Decimal): Decimal {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_DOWN);
}

function isCentExact(value: Decimal): boolean {
  return value.equals(value.toDecimalPlaces(2));
}

/**
 * Find the largest size <= `size` whose notional at `price` is cent-exact.
 *
 * Both inputs are truncated to two decimals first. When no size works at the
 * requested price, the price steps down a cent at a time (at most five
 * times). Returns size 0 with the truncated price when nothing fits.
 */
export function cleanOrderAmounts(size: number, price: number): SizedOrder {
  const originalSize = truncateCents(size);
  const truncatedPrice = truncateCents(price);
  let candidatePrice = truncatedPrice;

  for (let step = 0; step <= MAX_PRICE_ADJUSTMENTS; step++) {
    if (candidatePrice.lte(0)) break;

    let candidateSize = originalSize;
    while (candidateSize.gt(0)) {
      if (isCentExact(candidateSize.times(candidatePrice))) {
        return {
          size: candidateSize.toNumber(),
          price: candidatePrice.toNumber(),
        };
      }
      candidateSize = candidateSize.minus(CENT);
    }

    candidatePrice = candidatePrice.minus(CENT);
  }

  return { size: 0, price: truncatedPrice.toNumber() };
}

/**
 * Size a fill-and-kill BUY for a dollar amount at the current best ask.
 *
 * Share count comes from the original ask so a slippage-adjusted limit never
 * commits more than `wholeShares x bestAsk` USDC. If the limit cannot be
 * sized, or sizing pushes it below the original ask, fall back to whole
 * shares at the original ask (integer x cent price is always cent-exact).
 */
export function computeEntryOrder(
  dollarAmount: number,
  bestAsk: number,
  slippageCents: number,
): EntryOrder {
  const originalAsk = truncateCents(bestAsk);
  if (originalAsk.lte(0)) {
    return { size: 0, price: 0, wholeShares: 0, usedFallback: true };
  }

  let wholeShares = new Decimal(dollarAmount)
    .dividedBy(originalAsk)
    .toDecimalPlaces(0, Decimal.ROUND_DOWN);
  if (wholeShares.lt(1)) {
    wholeShares = new Decimal(1);
  }

  let limit = new Decimal(bestAsk);
  if (slippageCents > 0) {
    limit = Decimal.min(
      limit.plus(new Decimal(slippageCents).dividedBy(100)),
      PRICE_BOUNDS.MAX_BUY_PRICE,
    );
  }
  const limitPrice = truncateCents(limit);

  const targetUsdc = wholeShares.times(originalAsk);
  const cappedSize = targetUsdc.dividedBy(limitPrice).toDecimalPlaces(2, Decimal.ROUND_DOWN);

  const cleaned = cleanOrderAmounts(cappedSize.toNumber(), limitPrice.toNumber());
  if (cleaned.size <= 0 || cleaned.price < originalAsk.toNumber()) {
    return {
      size: wholeShares.toNumber(),
      price: originalAsk.toNumber(),
      wholeShares: wholeShares.toNumber(),
      usedFallback: true,
    };
  }

  return { ...cleaned, wholeShares: wholeShares.toNumber(), usedFallback: false };
}

/**
 * remaining - filled, computed exactly and floored at zero
 */
export function subtractShares(remaining: number, filled: number): number {
  const result = new Decimal(remaining).minus(filled);
  return result.lte(0) ? 0 : result.toNumber();
}

/**
 * Round a price to the nearest cent
 */
export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}
