/**
 * Signal Controller
 *
 * Gate between the volatility detector and the executor. A signal becomes an
 * entry only if auto-trading is on, no position is open on the target token
 * and the spread is within `maxSpreadCents`. Manual entries bypass the gate.
 */

import type { PriceCache } from "../lib/price-cache";
import { spreadCents } from "../lib/price-cache";
import type { QuoteSource } from "../lib/quote-source";
import { createNullLogger, type Logger } from "../utils/logger.util";
import type { OrderExecutor } from "./order-executor";
import type { PositionManager } from "./position-manager";
import type { Direction, OrderResult, SignalOutcome } from "./types";

export interface SignalControllerConfig {
  maxSpreadCents: number;
}

export interface SignalControllerDeps {
  executor: OrderExecutor;
  positions: PositionManager;
  quotes: QuoteSource;
  /** Without a cache the spread is checked against a live order book */
  priceCache?: PriceCache | null;
  logger?: Logger;
}

export interface SignalDecision {
  outcome: SignalOutcome;
  /** Present only when the gate passed and an entry was attempted */
  result?: OrderResult;
}

export class SignalController {
  private autoEnabled = true;
  private readonly logger: Logger;

  constructor(
    private readonly config: SignalControllerConfig,
    private readonly deps: SignalControllerDeps,
  ) {
    this.logger = deps.logger ?? createNullLogger();
  }

  /**
   * Run the gate and, if it passes, the entry. True only when the entry
   * succeeded.
   */
  async handleSignal(direction: Direction): Promise<boolean> {
    const decision = await this.processSignal(direction);
    return decision.result?.success ?? false;
  }

  /**
   * `onOutcome` sees the gate result before any entry is placed
   */
  async processSignal(
    direction: Direction,
    onOutcome?: (outcome: SignalOutcome) => void,
  ): Promise<SignalDecision> {
    const outcome = await this.evaluate(direction);
    onOutcome?.(outcome);
    if (outcome !== "executed") {
      this.logger.info(`[Signal] ${direction} skipped: ${describeOutcome(outcome)}`);
      return { outcome };
    }
    const result = await this.deps.executor.executeEntry(direction);
    return { outcome, result };
  }

  /**
   * Gate checks only, in order: enabled, no open position, spread
   */
  async evaluate(direction: Direction): Promise<SignalOutcome> {
    if (!this.autoEnabled) {
      return "skipped_disabled";
    }

    const tokenId = this.deps.executor.tokenFor(direction);
    if (this.deps.positions.hasOpenPosition(tokenId)) {
      return "skipped_position_open";
    }

    if (!(await this.checkSpread(tokenId))) {
      return "skipped_spread_wide";
    }

    return "executed";
  }

  async checkSpread(tokenId: string): Promise<boolean> {
    if (this.deps.priceCache) {
      return this.deps.priceCache.isSpreadAcceptable(tokenId, this.config.maxSpreadCents);
    }

    const { bestBid, bestAsk } = await this.deps.quotes.fetchQuote(tokenId);
    if (bestBid === null || bestAsk === null || bestBid <= 0) {
      return false;
    }
    return spreadCents(bestBid, bestAsk) <= this.config.maxSpreadCents;
  }

  enableAuto(): void {
    this.autoEnabled = true;
  }

  disableAuto(): void {
    this.autoEnabled = false;
  }

  get isEnabled(): boolean {
    return this.autoEnabled;
  }
}

export function describeOutcome(outcome: SignalOutcome): string {
  switch (outcome) {
    case "executed":
      return "executed";
    case "skipped_disabled":
      return "auto-signals disabled";
    case "skipped_position_open":
      return "position already open";
    case "skipped_spread_wide":
      return "spread too wide";
    default: {
      const unreachable: never = outcome;
      return unreachable;
    }
  }
}
