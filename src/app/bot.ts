/**
 * TradingBot - composes the feeds, the execution core and the terminal output
 *
 * Data flow:
 *   Coinbase matches -> CoinbaseFeed -> signal queue -> SignalController -> OrderExecutor
 *   CLOB market channel -> MarketDataStream -> PriceCache + PositionManager exit checks
 *
 * Everything the bot prints goes through `print`; colors are applied here,
 * the core formatters return plain text.
 */

import chalk from "chalk";
import type { FillResolverOptions } from "../clob/fill-resolver";
import { FillResolver } from "../clob/fill-resolver";
import type { OrderClient } from "../clob/order-client";
import type { MarketMap, TradingConfig } from "../config/loadConfig";
import { ExitSeller, type ExitSellerOptions } from "../core/exit-seller";
import { OrderExecutor, formatEntryResult, formatExitResult } from "../core/order-executor";
import { PositionManager } from "../core/position-manager";
import { SignalController, describeOutcome } from "../core/signal-controller";
import type { Direction, ExitReason, OrderResult, Position, SignalOutcome } from "../core/types";
import { clockStamp, formatPnl, formatPrice } from "../infra/logging";
import { nullEventSink, type EventSink } from "../infra/persistence/event-log";
import { CoinbaseFeed, type VolatilitySignal } from "../lib/coinbase-feed";
import { toError } from "../lib/error-handling";
import { PriceCache } from "../lib/price-cache";
import { QuoteSource } from "../lib/quote-source";
import { MarketDataStream } from "../lib/ws-market-client";
import { createNullLogger, type Logger } from "../utils/logger.util";

export interface TradingBotOptions {
  config: TradingConfig;
  market: MarketMap;
  client: OrderClient;
  events?: EventSink;
  logger?: Logger;
  print?: (line: string) => void;
  /** Overrides for tests: endpoints, retry timing */
  coinbaseUrl?: string;
  marketWsUrl?: string;
  exitSeller?: Omit<ExitSellerOptions, "logger">;
  fillResolver?: Omit<FillResolverOptions, "logger">;
}

export class TradingBot {
  readonly priceCache: PriceCache;
  readonly quotes: QuoteSource;
  readonly positions: PositionManager;
  readonly executor: OrderExecutor;
  readonly controller: SignalController;
  readonly stream: MarketDataStream;
  readonly feed: CoinbaseFeed;

  private readonly config: TradingConfig;
  private readonly market: MarketMap;
  private readonly client: OrderClient;
  private readonly events: EventSink;
  private readonly logger: Logger;
  private readonly print: (line: string) => void;

  private started = false;
  private stopped: Promise<void> | null = null;

  constructor(options: TradingBotOptions) {
    this.config = options.config;
    this.market = options.market;
    this.client = options.client;
    this.events = options.events ?? nullEventSink;
    this.logger = options.logger ?? createNullLogger();
    this.print = options.print ?? ((line: string) => console.log(line));

    const { config, market, client } = options;

    this.priceCache = new PriceCache({ staleMs: config.priceCacheStaleMs });
    this.quotes = new QuoteSource(client, this.priceCache, this.logger);
    const fills = new FillResolver(client, { ...options.fillResolver, logger: this.logger });
    const exitSeller = new ExitSeller(client, this.quotes, fills, {
      ...options.exitSeller,
      logger: this.logger,
    });

    this.positions = new PositionManager(
      {
        takeProfitPct: config.takeProfitPct,
        stopLossPct: config.stopLossPct,
        stalePositionSec: config.stalePositionSec,
      },
      {
        exitSeller,
        quotes: this.quotes,
        priceCache: this.priceCache,
        events: this.events,
        logger: this.logger,
        onExitComplete: (position, reason) => this.onExitComplete(position, reason),
      },
    );

    this.executor = new OrderExecutor(
      {
        positionSizeUsd: config.positionSizeUsd,
        slippageCents: config.slippageCents,
        upTokenId: market.upTokenId,
        downTokenId: market.downTokenId,
      },
      {
        client,
        quotes: this.quotes,
        fills,
        positions: this.positions,
        priceCache: this.priceCache,
        events: this.events,
        logger: this.logger,
      },
    );

    this.controller = new SignalController(
      { maxSpreadCents: config.maxSpreadCents },
      {
        executor: this.executor,
        positions: this.positions,
        quotes: this.quotes,
        priceCache: this.priceCache,
        logger: this.logger,
      },
    );

    this.stream = new MarketDataStream({
      tokenIds: [market.upTokenId, market.downTokenId],
      priceCache: this.priceCache,
      url: options.marketWsUrl,
      logger: this.logger,
      onPriceUpdate: (tokenId, bestBid) => this.positions.checkExitConditions(tokenId, bestBid),
      onConnect: () => this.notice(chalk.green, "WebSocket connected"),
      onDisconnect: () => this.notice(chalk.yellow, "WebSocket disconnected, reconnecting..."),
    });

    this.feed = new CoinbaseFeed({
      windowMs: config.volatilityWindowMs,
      threshold: config.triggerThreshold,
      cooldownMs: config.signalCooldownMs,
      url: options.coinbaseUrl,
      logger: this.logger,
      onSignal: (signal) => this.onSignal(signal),
      onConnect: () => this.notice(chalk.green, "Coinbase feed connected"),
      onDisconnect: () => this.notice(chalk.yellow, "Coinbase feed disconnected, reconnecting..."),
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Lifecycle
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Open the CLOB connection and read both books once, so the first order
   * does not wait on connection setup.
   */
  async warmUp(): Promise<void> {
    await this.client.warmUp();
    for (const tokenId of [this.market.upTokenId, this.market.downTokenId]) {
      const { bestBid, bestAsk } = await this.quotes.fetchQuote(tokenId);
      this.logger.debug(
        `[Bot] Book ${tokenId.slice(0, 12)}...: bid ${bestBid ?? "none"} / ask ${bestAsk ?? "none"}`,
      );
    }
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    await this.warmUp();
    if (this.stopped) return;

    this.events.log({
      type: "session_start",
      config: { ...this.config },
      market: {
        eventTitle: this.market.eventTitle,
        upTokenId: this.market.upTokenId,
        downTokenId: this.market.downTokenId,
      },
    });

    this.stream.connect();
    this.feed.connect();

    this.notice(
      chalk.cyan,
      "Bot ready. Keys: 'u'=UP, 'd'=DOWN, 'k'=kill switch, 'x'=exit, 's'=status, 'q'=quit",
    );
  }

  /**
   * Close both feeds, let running exits finish, write session_end.
   * Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopped) {
      this.stopped = this.shutdown();
    }
    return this.stopped;
  }

  private async shutdown(): Promise<void> {
    this.print(chalk.yellow(`\n[${clockStamp()}] Shutting down...`));

    this.stream.disconnect();
    await this.feed.stop();
    await this.positions.whenIdle();

    const stats = this.positions.getStats();
    this.events.log({
      type: "session_end",
      realizedPnl: stats.realizedPnl,
      wins: stats.wins,
      losses: stats.losses,
      breakeven: stats.breakeven,
      openPositions: stats.openPositions,
    });
    await this.events.close();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Controls
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Manual entry; bypasses the signal gate
   */
  async enterManual(direction: Direction): Promise<OrderResult> {
    this.print(`[${clockStamp()}] Placing Buy ${direction} order...`);
    const result = await this.executor.executeEntry(direction);
    this.printEntry(result);
    return result;
  }

  /**
   * Kill switch: flips auto-trading and pauses/resumes the detector with it
   */
  toggleAutoSignals(): boolean {
    if (this.controller.isEnabled) {
      this.controller.disableAuto();
      this.feed.pause();
      this.notice(chalk.yellow, "Auto-signals PAUSED (manual u/d still works)");
      return false;
    }
    this.controller.enableAuto();
    this.feed.resume();
    this.notice(chalk.green, "Auto-signals RESUMED");
    return true;
  }

  /**
   * Print the numbered exit menu and return the positions it lists
   */
  showExitMenu(): Position[] {
    const positions = this.positions.listOpenPositions();
    if (positions.length === 0) {
      this.print(chalk.yellow("No open positions to exit"));
      return positions;
    }

    this.print(`\n[${clockStamp()}] --- Open Positions ---`);
    positions.forEach((position, i) => {
      const bid = this.priceCache.getBestBid(position.tokenId);
      this.print(`  ${i + 1}. [${position.id}] ${this.positions.getPositionSummary(position, bid)}`);
    });
    this.print("  0. Cancel");
    this.print("Enter position number to exit:");
    return positions;
  }

  exitPosition(positionId: string): boolean {
    this.print(`Closing position ${positionId}...`);
    const initiated = this.executor.executeExit(positionId);
    if (!initiated) {
      this.print(chalk.red("Failed to initiate exit"));
    }
    return initiated;
  }

  async showStatus(): Promise<void> {
    for (const line of await this.statusLines()) {
      this.print(line);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Reporting
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Status screen. Marks come from the cache first, then the order book.
   */
  async statusLines(at: Date = new Date()): Promise<string[]> {
    const open = this.positions.listOpenPositions();
    const bids = new Map<string, number | null>();
    for (const tokenId of [this.market.upTokenId, this.market.downTokenId]) {
      bids.set(tokenId, await this.quotes.getBestBid(tokenId));
    }
    const bidFor = (tokenId: string): number | null => bids.get(tokenId) ?? null;

    const stats = this.positions.getStats(bidFor);
    const lines = [`\n[${clockStamp(at)}] --- Status ---`, `  Open positions: ${open.length}`];

    for (const position of open) {
      lines.push(`    [${position.id}] ${this.positions.getPositionSummary(position, bidFor(position.tokenId))}`);
    }
    if (open.length > 0) {
      lines.push(pnlColor(stats.unrealizedPnl)(`  Unrealized P&L: ${formatPnl(stats.unrealizedPnl)}`));
    }
    if (stats.realizedPnl !== 0) {
      lines.push(pnlColor(stats.realizedPnl)(`  Realized P&L: ${formatPnl(stats.realizedPnl)}`));
    }
    if (stats.closedPositions > 0) {
      lines.push(
        `  Trades: ${stats.closedPositions}  |  W: ${stats.wins}  L: ${stats.losses}  BE: ${stats.breakeven}`,
      );
      if (stats.winRate !== null) {
        const color = stats.winRate >= 50 ? chalk.green : chalk.red;
        lines.push(color(`  Win rate: ${stats.winRate.toFixed(1)}%`));
      }
    }

    const priceLabel = (tokenId: string): string => {
      const bid = bidFor(tokenId);
      if (bid === null) return "N/A";
      // A stale cache means the bid came from the REST book
      return this.priceCache.isStale(tokenId) ? `${formatPrice(bid)} (book)` : formatPrice(bid);
    };
    lines.push(`  UP price:   ${priceLabel(this.market.upTokenId)}`);
    lines.push(`  DOWN price: ${priceLabel(this.market.downTokenId)}`);

    const stream = this.stream.getMetrics();
    const streamColor = stream.state === "CONNECTED" ? chalk.green : chalk.yellow;
    lines.push(
      streamColor(
        `  Market feed: ${stream.state} | ${stream.messagesReceived} msgs | ${stream.disconnectCount} disconnects`,
      ),
    );

    const connected = this.feed.isConnected;
    const auto = this.controller.isEnabled;
    const feedColor = connected && auto ? chalk.green : chalk.yellow;
    lines.push(
      feedColor(
        `  Coinbase: ${connected ? "connected" : "disconnected"} | Auto-signals: ${auto ? "active" : "PAUSED"}`,
      ),
    );
    return lines;
  }

  sessionSummary(): string[] {
    const realized = this.positions.getTotalPnl();
    const lines = ["\n--- Session Summary ---", pnlColor(realized)(`Total P&L: ${formatPnl(realized)}`)];
    const open = this.positions.listOpenPositions().length;
    if (open > 0) {
      lines.push(chalk.yellow(`Warning: ${open} position(s) still open!`));
    }
    return lines;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Callbacks
  // ═══════════════════════════════════════════════════════════════════════════

  async onSignal(signal: VolatilitySignal): Promise<void> {
    const { direction } = signal;
    this.notice(chalk.magenta, `AUTO-SIGNAL: ${direction}`);

    const tokenId = this.executor.tokenFor(direction);
    const spread = this.priceCache.spreadSnapshot(tokenId);

    const decision = await this.controller.processSignal(direction, (outcome: SignalOutcome) => {
      if (outcome !== "executed") {
        this.notice(chalk.yellow, `Skipped: ${describeOutcome(outcome)}`);
      }
      this.events.log({
        type: "signal",
        direction,
        outcome,
        pctChange: signal.pctChange,
        threshold: this.config.triggerThreshold,
        windowTicks: signal.windowTicks,
        signalTimeMs: signal.signalTimeMs,
        polymarketSpread: spread,
      });
    });

    if (decision.result) {
      this.printEntry(decision.result);
    }
  }

  private onExitComplete(position: Position, reason: ExitReason): void {
    const line = formatExitResult(position, reason);
    const pnl = position.exitPrice ? position.exitPrice - position.entryPrice : 0;
    this.print(pnlColor(pnl)(line));
  }

  private printEntry(result: OrderResult): void {
    const text = formatEntryResult(result);
    this.print(result.success ? chalk.green(text) : chalk.red(text));
  }

  private notice(color: (text: string) => string, message: string): void {
    this.print(color(`[${clockStamp()}] ${message}`));
  }

  /**
   * Fire-and-forget wrapper for key handlers
   */
  run(task: () => Promise<unknown>, label: string): void {
    task().catch((err: unknown) => {
      this.logger.error(`[Bot] ${label} failed`, toError(err));
    });
  }
}

function pnlColor(value: number): (text: string) => string {
  return value >= 0 ? chalk.green : chalk.red;
}
