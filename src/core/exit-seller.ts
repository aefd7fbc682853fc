/**
 * Exit Seller
 *
 * Sells a position's shares with bounded retry:
 *
 * - Phase 1 (fast): up to 20 fill-and-kill attempts, gives up after 5
 *   consecutive failures, retries immediately after a partial fill and waits
 *   300ms after a failure.
 * - Phase 2 (persistent): only when the remainder is worth at least $0.05 at
 *   the current bid. Up to 15 attempts, 10 consecutive failures, 1s delay.
 * - Dust fallback: whatever is left is posted as a GTC sell at the best bid
 *   and left on the book.
 *
 * The best bid is re-read from the order book before every attempt. An
 * attempt fails when there is no bid, the remainder cannot be sized, the
 * order is rejected or nothing fills. Both phases are bounded, so `sell()`
 * always returns.
 */

import type { FillResolver } from "../clob/fill-resolver";
import type { OrderClient } from "../clob/order-client";
import { EXIT_RETRY } from "../lib/constants";
import { cleanOrderAmounts, subtractShares } from "../lib/order-sizing";
import type { QuoteSource } from "../lib/quote-source";
import { sleep as defaultSleep, type SleepFn } from "../lib/sleep";
import { createNullLogger, type Logger } from "../utils/logger.util";
import type { ExitFill } from "./types";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ExitPhase {
  maxAttempts: number;
  maxConsecutiveFailures: number;
  delayOnFailMs: number;
}

export interface ExitSellerOptions {
  phase1?: ExitPhase;
  phase2?: ExitPhase;
  dustThresholdUsd?: number;
  sleep?: SleepFn;
  logger?: Logger;
}

export interface RestingOrder {
  orderId?: string;
  shares: number;
  price: number;
}

export interface ExitSellResult {
  fills: ExitFill[];
  totalFilled: number;
  /** Shares not sold by fill-and-kill (possibly resting on the book) */
  remaining: number;
  attempts: number;
  phase2Ran: boolean;
  restingOrder?: RestingOrder;
}

interface SellProgress {
  remaining: number;
  totalFilled: number;
  fills: ExitFill[];
  attempts: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// EXIT SELLER
// ═══════════════════════════════════════════════════════════════════════════

export class ExitSeller {
  private readonly phase1: ExitPhase;
  private readonly phase2: ExitPhase;
  private readonly dustThresholdUsd: number;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  constructor(
    private readonly client: OrderClient,
    private readonly quotes: QuoteSource,
    private readonly fills: FillResolver,
    options?: ExitSellerOptions,
  ) {
    this.phase1 = options?.phase1 ?? EXIT_RETRY.PHASE_1;
    this.phase2 = options?.phase2 ?? EXIT_RETRY.PHASE_2;
    this.dustThresholdUsd = options?.dustThresholdUsd ?? EXIT_RETRY.DUST_THRESHOLD_USD;
    this.sleep = options?.sleep ?? defaultSleep;
    this.logger = options?.logger ?? createNullLogger();
  }

  /**
   * Sell `shares` of `tokenId`. `label` only shows up in log lines.
   */
  async sell(tokenId: string, shares: number, label: string): Promise<ExitSellResult> {
    const progress: SellProgress = {
      remaining: shares,
      totalFilled: 0,
      fills: [],
      attempts: 0,
    };

    await this.sellLoop(tokenId, progress, this.phase1, label);

    let phase2Ran = false;
    let restingOrder: RestingOrder | undefined;

    if (progress.remaining > EXIT_RETRY.MIN_REMAINING_SHARES) {
      let bestBid = (await this.quotes.fetchQuote(tokenId)).bestBid ?? 0;
      const remainingValue = progress.remaining * bestBid;

      if (remainingValue >= this.dustThresholdUsd) {
        this.logger.info(
          `[Exit] ${progress.remaining.toFixed(2)} ${label} shares left (~$${remainingValue.toFixed(2)}), persistent retry`,
        );
        phase2Ran = true;
        await this.sellLoop(tokenId, progress, this.phase2, label);
        if (progress.remaining > EXIT_RETRY.MIN_REMAINING_SHARES) {
          bestBid = (await this.quotes.fetchQuote(tokenId)).bestBid ?? 0;
        }
      }

      if (progress.remaining > EXIT_RETRY.MIN_REMAINING_SHARES) {
        if (bestBid > 0) {
          restingOrder = await this.placeDustOrder(tokenId, progress.remaining, bestBid, label);
        } else {
          this.logger.warn(
            `[Exit] No bid for ${progress.remaining.toFixed(2)} ${label} shares, leaving them unsold`,
          );
        }
      }
    }

    return {
      fills: progress.fills,
      totalFilled: progress.totalFilled,
      remaining: progress.remaining,
      attempts: progress.attempts,
      phase2Ran,
      restingOrder,
    };
  }

  private async sellLoop(
    tokenId: string,
    progress: SellProgress,
    phase: ExitPhase,
    label: string,
  ): Promise<void> {
    let attempt = 0;
    let consecutiveFailures = 0;

    while (
      progress.remaining > EXIT_RETRY.MIN_REMAINING_SHARES &&
      attempt < phase.maxAttempts &&
      consecutiveFailures < phase.maxConsecutiveFailures
    ) {
      attempt++;
      progress.attempts++;

      const filled = await this.attemptSell(tokenId, progress.remaining);
      if (filled === null) {
        consecutiveFailures++;
        await this.sleep(phase.delayOnFailMs);
        continue;
      }

      consecutiveFailures = 0;
      progress.totalFilled += filled.shares;
      progress.fills.push(filled);
      progress.remaining = subtractShares(progress.remaining, filled.shares);

      this.logger.info(
        `[Exit] Sold ${filled.shares.toFixed(2)} shares ${label} at $${filled.price.toFixed(2)}`,
      );
      if (progress.remaining > EXIT_RETRY.MIN_REMAINING_SHARES) {
        this.logger.warn(
          `[Exit] ${progress.remaining.toFixed(2)} shares unfilled, retrying Sell ${label} order...`,
        );
      }
    }
  }

  /**
   * One fill-and-kill SELL at the current best bid. Null on any failure.
   */
  private async attemptSell(tokenId: string, remaining: number): Promise<ExitFill | null> {
    const { bestBid } = await this.quotes.fetchQuote(tokenId);
    if (bestBid === null || bestBid <= 0) {
      this.logger.debug(`[Exit] No bid for ${tokenId.slice(0, 12)}...`);
      return null;
    }

    const order = cleanOrderAmounts(remaining, bestBid);
    if (order.size <= 0) {
      this.logger.debug(
        `[Exit] Calculated size is zero for ${remaining.toFixed(2)} shares at $${bestBid.toFixed(2)}`,
      );
      return null;
    }

    const response = await this.client.placeFillAndKill(tokenId, "SELL", order.price, order.size);
    const fill = await this.fills.resolve(response, {
      tokenId,
      side: "SELL",
      requestedSize: order.size,
      submittedPrice: order.price,
    });

    if (!fill.success || fill.filledShares <= 0) {
      if (fill.error) {
        this.logger.debug(`[Exit] Sell rejected: ${fill.error}`);
      }
      return null;
    }
    return { shares: fill.filledShares, price: fill.fillPrice };
  }

  private async placeDustOrder(
    tokenId: string,
    remaining: number,
    bestBid: number,
    label: string,
  ): Promise<RestingOrder | undefined> {
    const order = cleanOrderAmounts(remaining, bestBid);
    if (order.size <= 0) {
      this.logger.warn(
        `[Exit] Could not place GTC for ${remaining.toFixed(2)} dust shares: Calculated size is zero`,
      );
      return undefined;
    }

    const response = await this.client.placeRestingOrder(tokenId, "SELL", order.price, order.size);
    if (!response.success) {
      this.logger.warn(
        `[Exit] Could not place GTC for ${remaining.toFixed(2)} dust shares: ${response.error ?? "unknown"}`,
      );
      return undefined;
    }

    this.logger.warn(
      `[Exit] Placed GTC sell for ${order.size.toFixed(2)} shares ${label} at $${order.price.toFixed(2)} (~$${(order.size * order.price).toFixed(2)} dust)`,
    );
    return { orderId: response.orderId, shares: order.size, price: order.price };
  }
}
