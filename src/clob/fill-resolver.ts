/**
 * Fill resolution for fill-and-kill orders
 *
 * A matched order does not always carry its fill in the immediate response.
 * Sources are tried in order:
 *   1. direct filledShares/fillPrice, or takingAmount/makingAmount
 *   2. order status polls (sizeMatched, averagePrice)
 *   3. the account's recent trades (last poll only)
 *   4. a successful order with nothing parsed is assumed fully filled at the
 *      submitted price
 */

import { FILL_POLL } from "../lib/constants";
import { roundToCents } from "../lib/order-sizing";
import { sleep as defaultSleep, type SleepFn } from "../lib/sleep";
import type { Logger } from "../utils/logger.util";
import type {
  AccountTrade,
  FillAndKillResponse,
  OrderClient,
  OrderSide,
} from "./order-client";

export interface FillRequest {
  tokenId: string;
  side: OrderSide;
  requestedSize: number;
  submittedPrice: number;
}

export interface ResolvedFill {
  success: boolean;
  orderId?: string;
  filledShares: number;
  fillPrice: number;
  error?: string;
}

export interface FillResolverOptions {
  pollAttempts?: number;
  pollIntervalMs?: number;
  tradeLookback?: number;
  sleep?: SleepFn;
  logger?: Logger;
}

export class FillResolver {
  private readonly pollAttempts: number;
  private readonly pollIntervalMs: number;
  private readonly tradeLookback: number;
  private readonly sleep: SleepFn;
  private readonly logger?: Logger;

  constructor(
    private readonly client: OrderClient,
    options?: FillResolverOptions,
  ) {
    this.pollAttempts = options?.pollAttempts ?? FILL_POLL.ATTEMPTS;
    this.pollIntervalMs = options?.pollIntervalMs ?? FILL_POLL.INTERVAL_MS;
    this.tradeLookback = options?.tradeLookback ?? FILL_POLL.TRADE_LOOKBACK;
    this.sleep = options?.sleep ?? defaultSleep;
    this.logger = options?.logger;
  }

  async resolve(
    response: FillAndKillResponse,
    request: FillRequest,
  ): Promise<ResolvedFill> {
    const success = response.success || response.status === "matched";
    const orderId = response.orderId;

    let { filled, price } = parseImmediateFill(response, request);

    if (filled === 0 && success && orderId) {
      for (let attempt = 0; attempt < this.pollAttempts; attempt++) {
        if (attempt > 0) {
          await this.sleep(this.pollIntervalMs);
        }

        const status = await this.client.getOrder(orderId);
        if (status.ok) {
          if (status.value.sizeMatched !== undefined) {
            filled = status.value.sizeMatched;
          }
          if (status.value.averagePrice !== undefined) {
            price = status.value.averagePrice;
          } else if (status.value.price !== undefined && filled > 0) {
            price = status.value.price;
          }
        } else {
          this.logger?.debug(`[Fill] Order status lookup failed for ${orderId}: ${status.error}`);
        }

        if (filled > 0) break;

        if (attempt === this.pollAttempts - 1) {
          const fromTrades = await this.fillFromTrades(orderId, request);
          if (fromTrades) {
            filled = fromTrades.filled;
            price = fromTrades.price;
          }
        }
      }
    }

    if (filled === 0 && success) {
      this.logger?.debug(
        `[Fill] No fill data for ${orderId ?? "order"}, assuming ${request.requestedSize} @ ${request.submittedPrice}`,
      );
      filled = request.requestedSize;
    }

    return {
      success,
      orderId,
      filledShares: filled,
      fillPrice: price,
      error: response.error,
    };
  }

  /**
   * Match the order against recent account trades. Trades whose taker order
   * id contains ours are summed; failing that, the most recent trade on the
   * same token and side is taken.
   */
  private async fillFromTrades(
    orderId: string,
    request: FillRequest,
  ): Promise<{ filled: number; price: number } | null> {
    const trades = await this.client.getRecentTrades(this.tradeLookback);
    if (!trades.ok) {
      this.logger?.debug(`[Fill] Trade history lookup failed: ${trades.error}`);
      return null;
    }
    return matchTrades(trades.value, orderId, request);
  }
}

function parseImmediateFill(
  response: FillAndKillResponse,
  request: FillRequest,
): { filled: number; price: number } {
  if (response.filledShares !== undefined && response.filledShares > 0) {
    return {
      filled: response.filledShares,
      price: response.fillPrice ?? request.submittedPrice,
    };
  }

  const taking = response.takingAmount;
  const making = response.makingAmount;
  if (taking !== undefined && making !== undefined && taking > 0 && making > 0) {
    return request.side === "BUY"
      ? { filled: taking, price: roundToCents(making / taking) }
      : { filled: making, price: roundToCents(taking / making) };
  }

  return { filled: 0, price: request.submittedPrice };
}

export function matchTrades(
  trades: AccountTrade[],
  orderId: string,
  request: Pick<FillRequest, "tokenId" | "side">,
): { filled: number; price: number } | null {
  let totalFilled = 0;
  let totalValue = 0;

  for (const trade of trades) {
    if (orderId && trade.takerOrderId.includes(orderId)) {
      totalFilled += trade.size;
      totalValue += trade.size * trade.price;
    } else if (trade.assetId === request.tokenId && trade.side === request.side) {
      totalFilled += trade.size;
      totalValue += trade.size * trade.price;
      break;
    }
  }

  if (totalFilled > 0) {
    return { filled: totalFilled, price: totalValue / totalFilled };
  }
  return null;
}
