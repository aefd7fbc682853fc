/**
 * Position Manager
 *
 * Owns every position the bot opens and runs the exit state machine:
 *
 *   OPEN -> CLOSING -> CLOSED
 *
 * `checkExitConditions` runs on each price tick and may start an exit.
 * Starting an exit is a synchronous compare-and-set of OPEN -> CLOSING, so a
 * tick and a manual exit racing on the same position start at most one
 * sell loop; the loser sees CLOSING and returns. The sell loop itself is a
 * tracked promise and never runs on the tick path.
 *
 * Exit completion is reported only through `onExitComplete`.
 */

import { randomUUID } from "crypto";
import { createNullLogger, type Logger } from "../utils/logger.util";
import { toError } from "../lib/error-handling";
import { roundToCents } from "../lib/order-sizing";
import type { PriceCache } from "../lib/price-cache";
import type { QuoteSource } from "../lib/quote-source";
import { nullEventSink, type EventSink } from "../infra/persistence/event-log";
import { formatPrice, formatSignedPct } from "../infra/logging";
import type { ExitSeller } from "./exit-seller";
import {
  describeExitReason,
  positionPnl,
  positionPnlPct,
  realizedPnl,
  type Direction,
  type ExitReason,
  type Position,
} from "./types";

// ═══════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════

const PRICE_TICK = 0.01;

export interface PositionManagerConfig {
  /** Fraction above entry price, e.g. 0.05 */
  takeProfitPct: number;
  /** Fraction below the stop-loss reference, e.g. 0.10 */
  stopLossPct: number;
  /** Age after which any exit at entry + 1 tick is taken */
  stalePositionSec: number;
}

export interface PositionManagerDeps {
  exitSeller: ExitSeller;
  quotes: QuoteSource;
  priceCache?: PriceCache | null;
  events?: EventSink;
  logger?: Logger;
  onExitComplete?: (position: Position, reason: ExitReason) => void;
  now?: () => number;
  idFactory?: () => string;
}

export interface PositionStats {
  realizedPnl: number;
  unrealizedPnl: number;
  wins: number;
  losses: number;
  breakeven: number;
  /** Percent of decided trades (wins + losses) that won, null before any */
  winRate: number | null;
  openPositions: number;
  closedPositions: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// Position Manager Class
// ═══════════════════════════════════════════════════════════════════════════

export class PositionManager {
  private readonly positions = new Map<string, Position>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: Logger;
  private readonly events: EventSink;
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private onExitComplete?: (position: Position, reason: ExitReason) => void;

  constructor(
    private readonly config: PositionManagerConfig,
    private readonly deps: PositionManagerDeps,
  ) {
    this.logger = deps.logger ?? createNullLogger();
    this.events = deps.events ?? nullEventSink;
    this.now = deps.now ?? Date.now;
    this.idFactory = deps.idFactory ?? (() => randomUUID().slice(0, 8));
    this.onExitComplete = deps.onExitComplete;
  }

  /**
   * Register the exit completion callback (replaces any previous one)
   */
  setExitCompleteHandler(handler: (position: Position, reason: ExitReason) => void): void {
    this.onExitComplete = handler;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Positions
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Track a filled entry.
   *
   * Take profit is measured from the entry (fill) price; stop loss from the
   * bid at entry when one is known, else from the entry price. Both are
   * rounded to the cent and kept at least one tick away from their reference.
   */
  addPosition(
    direction: Direction,
    tokenId: string,
    entryPrice: number,
    shares: number,
    entryBid?: number | null,
  ): Position {
    let takeProfitPrice = roundToCents(entryPrice * (1 + this.config.takeProfitPct));

    const stopLossReference =
      entryBid !== undefined && entryBid !== null && entryBid > 0 ? entryBid : entryPrice;
    let stopLossPrice = roundToCents(stopLossReference * (1 - this.config.stopLossPct));

    if (takeProfitPrice <= entryPrice) {
      takeProfitPrice = roundToCents(entryPrice + PRICE_TICK);
    }
    if (stopLossPrice >= stopLossReference) {
      stopLossPrice = roundToCents(stopLossReference - PRICE_TICK);
    }

    const position: Position = {
      id: this.idFactory(),
      direction,
      tokenId,
      entryPrice,
      shares,
      entryTime: this.now(),
      takeProfitPrice,
      stopLossPrice,
      status: "OPEN",
      isStale: false,
    };

    this.positions.set(position.id, position);
    return position;
  }

  getPosition(positionId: string): Position | undefined {
    return this.positions.get(positionId);
  }

  listOpenPositions(): Position[] {
    return [...this.positions.values()].filter((p) => p.status === "OPEN");
  }

  listPositions(): Position[] {
    return [...this.positions.values()];
  }

  hasOpenPosition(tokenId: string): boolean {
    return this.listOpenPositions().some((p) => p.tokenId === tokenId);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Exit Triggers
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Evaluate every OPEN position on `tokenId` against the current bid:
   * take profit, stop loss, stale arming, then stale breakeven.
   */
  checkExitConditions(tokenId: string, currentBid: number | null): void {
    if (currentBid === null || !Number.isFinite(currentBid)) return;

    const now = this.now();

    for (const position of this.positions.values()) {
      if (position.tokenId !== tokenId || position.status !== "OPEN") continue;

      if (position.peakPriceSinceEntry === undefined || currentBid > position.peakPriceSinceEntry) {
        position.peakPriceSinceEntry = currentBid;
      }

      if (currentBid >= position.takeProfitPrice) {
        this.beginExit(position, "TAKE_PROFIT", currentBid);
        continue;
      }

      if (currentBid <= position.stopLossPrice) {
        this.beginExit(position, "STOP_LOSS", currentBid);
        continue;
      }

      const ageSec = (now - position.entryTime) / 1000;
      if (!position.isStale && ageSec >= this.config.stalePositionSec) {
        position.isStale = true;
        position.staleSince = now;
        this.logger.debug(
          `[Position] ${position.id} ${position.direction} is stale after ${ageSec.toFixed(1)}s`,
        );
      }

      // Entry was paid at the ask; selling at the bid needs one tick above
      // entry to come out even
      if (position.isStale && currentBid >= roundToCents(position.entryPrice + PRICE_TICK)) {
        this.beginExit(position, "STALE_BREAKEVEN", currentBid);
      }
    }
  }

  /**
   * Start a MANUAL exit. Returns whether an exit was initiated; completion is
   * reported through the exit complete handler.
   */
  manualExit(positionId: string): boolean {
    const position = this.positions.get(positionId);
    if (!position) return false;
    return this.beginExit(position, "MANUAL");
  }

  /**
   * Resolves once every exit started so far has finished
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /**
   * OPEN -> CLOSING compare-and-set, then launch the sell loop.
   * Synchronous up to the launch.
   */
  private beginExit(position: Position, reason: ExitReason, triggerBid?: number): boolean {
    if (position.status !== "OPEN") {
      return false;
    }
    position.status = "CLOSING";

    const task: Promise<void> = this.runExit(position, reason, triggerBid)
      .catch((err: unknown) => {
        this.logger.error(`[Exit] Exit for position ${position.id} failed`, toError(err));
        this.abandonExit(position, reason);
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
    return true;
  }

  /**
   * A sell loop that threw leaves the position CLOSED without an exit price,
   * so it stops counting as open and is never retried.
   */
  private abandonExit(position: Position, reason: ExitReason): void {
    if (Object.isFrozen(position)) return;
    position.status = "CLOSED";
    position.exitTime = this.now();
    position.exitReason = reason;
    Object.freeze(position);
  }

  private async runExit(position: Position, reason: ExitReason, triggerBid?: number): Promise<void> {
    const spreadAtTrigger = this.deps.priceCache?.spreadSnapshot(position.tokenId) ?? null;

    const triggerNote = triggerBid !== undefined ? ` (bid ${formatPrice(triggerBid)})` : "";
    this.logger.info(`[Exit] ${describeExitReason(reason)} triggered${triggerNote}`);
    this.logger.info(`[Exit] Placing Sell ${position.direction} order...`);

    const result = await this.deps.exitSeller.sell(position.tokenId, position.shares, position.direction);

    if (result.totalFilled > 0) {
      const totalValue = result.fills.reduce((sum, f) => sum + f.shares * f.price, 0);
      position.exitPrice = totalValue / result.totalFilled;
      position.shares = result.totalFilled;
    } else {
      position.exitPrice = (await this.deps.quotes.fetchQuote(position.tokenId)).bestBid ?? 0;
    }

    position.status = "CLOSED";
    position.exitTime = this.now();
    position.exitReason = reason;
    Object.freeze(position);

    const exitPrice = position.exitPrice;
    this.events.log({
      type: "exit",
      positionId: position.id,
      direction: position.direction,
      tokenId: position.tokenId,
      reason,
      entryPrice: position.entryPrice,
      exitPrice,
      shares: position.shares,
      pnlDollars: positionPnl(position, exitPrice),
      pnlPct: positionPnlPct(position, exitPrice),
      fills: result.fills,
      triggerBid,
      polymarketSpreadAtTrigger: spreadAtTrigger,
      polymarketSpreadAtFill: this.deps.priceCache?.spreadSnapshot(position.tokenId) ?? null,
    });

    if (this.onExitComplete) {
      try {
        this.onExitComplete(position, reason);
      } catch (err) {
        this.logger.error("[Exit] Exit complete handler threw", toError(err));
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Reporting
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Realized P&L over closed positions
   */
  getTotalPnl(): number {
    let total = 0;
    for (const position of this.positions.values()) {
      total += realizedPnl(position);
    }
    return total;
  }

  /**
   * Realized and unrealized P&L plus win/loss counts. `currentBid` supplies
   * the mark for open positions; positions without a mark add nothing.
   */
  getStats(currentBid: (tokenId: string) => number | null = () => null): PositionStats {
    let wins = 0;
    let losses = 0;
    let breakeven = 0;
    let unrealized = 0;
    let open = 0;
    let closed = 0;

    for (const position of this.positions.values()) {
      if (position.status === "CLOSED") {
        closed++;
        const cents = Math.round(realizedPnl(position) * 100);
        if (cents > 0) wins++;
        else if (cents < 0) losses++;
        else breakeven++;
        continue;
      }
      if (position.status === "OPEN") {
        open++;
        const bid = currentBid(position.tokenId);
        if (bid !== null) unrealized += positionPnl(position, bid);
      }
    }

    const decided = wins + losses;
    return {
      realizedPnl: this.getTotalPnl(),
      unrealizedPnl: unrealized,
      wins,
      losses,
      breakeven,
      winRate: decided > 0 ? (wins / decided) * 100 : null,
      openPositions: open,
      closedPositions: closed,
    };
  }

  /**
   * "UP 9.00 @ $0.52 -> $0.55 (+5.8%)", or "(price unavailable)" without a bid
   */
  getPositionSummary(position: Position, currentBid: number | null): string {
    const head = `${position.direction} ${position.shares.toFixed(2)} @ ${formatPrice(position.entryPrice)}`;
    if (currentBid === null || currentBid <= 0) {
      return `${head} (price unavailable)`;
    }
    return `${head} -> ${formatPrice(currentBid)} (${formatSignedPct(positionPnlPct(position, currentBid))})`;
  }
}
