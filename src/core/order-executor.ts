/**
 * Order Executor
 *
 * Entry orders: fill-and-kill BUY at the best ask plus slippage, sized so
 * the notional is cent-exact. A confirmed fill becomes a Position. Every
 * failure comes back as an OrderResult with success=false; nothing here
 * throws to the caller.
 *
 * Exits are delegated to the PositionManager.
 */

import type { FillResolver } from "../clob/fill-resolver";
import type { OrderClient } from "../clob/order-client";
import { toErrorMessage } from "../lib/error-handling";
import { computeEntryOrder } from "../lib/order-sizing";
import type { PriceCache } from "../lib/price-cache";
import type { QuoteSource } from "../lib/quote-source";
import { nullEventSink, type EventSink } from "../infra/persistence/event-log";
import { clockStamp, formatPnl, formatPrice, formatSignedPct } from "../infra/logging";
import { createNullLogger, type Logger } from "../utils/logger.util";
import type { PositionManager } from "./position-manager";
import {
  describeExitReason,
  positionPnl,
  positionPnlPct,
  type Direction,
  type ExitReason,
  type OrderResult,
  type Position,
} from "./types";

// Fill shortfall beyond this many shares marks an entry as partial
const PARTIAL_FILL_TOLERANCE = 0.01;

export interface OrderExecutorConfig {
  positionSizeUsd: number;
  slippageCents: number;
  upTokenId: string;
  downTokenId: string;
}

export interface OrderExecutorDeps {
  client: OrderClient;
  quotes: QuoteSource;
  fills: FillResolver;
  positions: PositionManager;
  priceCache?: PriceCache | null;
  events?: EventSink;
  logger?: Logger;
}

export class OrderExecutor {
  private readonly logger: Logger;
  private readonly events: EventSink;

  constructor(
    private readonly config: OrderExecutorConfig,
    private readonly deps: OrderExecutorDeps,
  ) {
    this.logger = deps.logger ?? createNullLogger();
    this.events = deps.events ?? nullEventSink;
  }

  tokenFor(direction: Direction): string {
    return direction === "UP" ? this.config.upTokenId : this.config.downTokenId;
  }

  /**
   * Buy `dollarAmount` (default: configured position size) of the token for
   * `direction`
   */
  async executeEntry(direction: Direction, dollarAmount?: number): Promise<OrderResult> {
    const amount = dollarAmount ?? this.config.positionSizeUsd;
    const tokenId = this.tokenFor(direction);
    const spread = this.deps.priceCache?.spreadSnapshot(tokenId) ?? null;

    let result: OrderResult;
    try {
      result = await this.placeEntry(direction, tokenId, amount);
    } catch (err) {
      result = failure(direction, amount, toErrorMessage(err));
    }

    if (!result.success) {
      this.logger.warn(`[Executor] ${direction} entry failed: ${result.error ?? "unknown"}`);
    }

    this.events.log({
      type: "entry",
      direction,
      tokenId,
      success: result.success,
      positionId: result.position?.id,
      requestedAmount: amount,
      filledShares: result.filledShares,
      fillPrice: result.fillPrice,
      partialFill: result.partialFill,
      error: result.error,
      polymarketSpread: spread,
    });

    return result;
  }

  /**
   * Manual exit. True when an exit was initiated, not when it completed.
   */
  executeExit(positionId: string): boolean {
    return this.deps.positions.manualExit(positionId);
  }

  private async placeEntry(direction: Direction, tokenId: string, amount: number): Promise<OrderResult> {
    const { bestBid, bestAsk } = await this.deps.quotes.getQuote(tokenId);
    if (bestAsk === null || bestAsk <= 0) {
      return failure(direction, amount, "No asks available in orderbook");
    }

    const order = computeEntryOrder(amount, bestAsk, this.config.slippageCents);
    if (order.size <= 0) {
      return failure(direction, amount, "Calculated size is zero");
    }

    this.logger.debug(
      `[Executor] BUY ${direction} ${order.size} @ ${order.price} (ask ${bestAsk}${order.usedFallback ? ", fallback sizing" : ""})`,
    );

    const response = await this.deps.client.placeFillAndKill(tokenId, "BUY", order.price, order.size);
    const fill = await this.deps.fills.resolve(response, {
      tokenId,
      side: "BUY",
      requestedSize: order.size,
      submittedPrice: order.price,
    });

    if (!fill.success) {
      return failure(direction, amount, fill.error ?? "Unknown error");
    }
    if (fill.filledShares <= 0) {
      return failure(direction, amount, "Order submitted but no fill received");
    }

    const position = this.deps.positions.addPosition(
      direction,
      tokenId,
      fill.fillPrice,
      fill.filledShares,
      bestBid,
    );

    return {
      success: true,
      direction,
      requestedAmount: amount,
      filledShares: fill.filledShares,
      fillPrice: fill.fillPrice,
      position,
      partialFill: fill.filledShares < order.size - PARTIAL_FILL_TOLERANCE,
    };
  }
}

function failure(direction: Direction, amount: number, error: string): OrderResult {
  return {
    success: false,
    direction,
    requestedAmount: amount,
    filledShares: 0,
    fillPrice: 0,
    error,
    partialFill: false,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// Display
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Entry summary lines for the terminal
 */
export function formatEntryResult(result: OrderResult, at: Date = new Date()): string {
  const stamp = `[${clockStamp(at)}]`;

  if (!result.success) {
    return `${stamp} Order failed: ${result.error ?? "unknown"}`;
  }

  const lines = [
    `${stamp} Bought ${result.filledShares.toFixed(2)} shares ${result.direction} at ${formatPrice(result.fillPrice)}`,
  ];
  if (result.position) {
    lines.push(
      `${stamp} TP: ${formatPrice(result.position.takeProfitPrice)} | SL: ${formatPrice(result.position.stopLossPrice)}`,
    );
  }
  if (result.partialFill) {
    lines.push(`${stamp}   (Partial fill - rest cancelled)`);
  }
  return lines.join("\n");
}

/**
 * Exit P&L line for the terminal. Individual sells are logged by the exit loop.
 */
export function formatExitResult(position: Position, reason: ExitReason, at: Date = new Date()): string {
  const stamp = `[${clockStamp(at)}]`;

  if (!position.exitPrice) {
    return `${stamp} Position ${position.id} closed (no fill data)`;
  }

  const pnl = positionPnl(position, position.exitPrice);
  const pct = positionPnlPct(position, position.exitPrice);
  return `${stamp} ${describeExitReason(reason)} | P&L: ${formatPnl(pnl)} (${formatSignedPct(pct)})`;
}
