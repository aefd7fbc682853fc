/**
 * Session event log
 *
 * One JSON object per line under data/<YYYY-MM-DD>/run-<timestamp>.jsonl.
 * `log()` never blocks the caller: lines are appended through a single
 * promise chain, so they land in call order. `close()` waits for the chain.
 */

import { promises as fs } from "fs";
import path from "path";
import type { Direction, ExitFill, ExitReason, SignalOutcome } from "../../core/types";
import type { Tick } from "../../lib/rolling-window";
import type { SpreadSnapshot } from "../../lib/price-cache";
import type { Logger } from "../../utils/logger.util";
import { toErrorMessage } from "../../lib/error-handling";

export interface SessionStartEvent {
  type: "session_start";
  config: Record<string, number>;
  market: { eventTitle: string; upTokenId: string; downTokenId: string };
}

export interface SignalEvent {
  type: "signal";
  direction: Direction;
  outcome: SignalOutcome;
  pctChange: number | null;
  threshold: number;
  windowTicks: Tick[];
  signalTimeMs: number | null;
  polymarketSpread: SpreadSnapshot | null;
}

export interface EntryEvent {
  type: "entry";
  direction: Direction;
  tokenId: string;
  success: boolean;
  positionId?: string;
  requestedAmount: number;
  filledShares: number;
  fillPrice: number;
  partialFill: boolean;
  error?: string;
  polymarketSpread: SpreadSnapshot | null;
}

export interface ExitEvent {
  type: "exit";
  positionId: string;
  direction: Direction;
  tokenId: string;
  reason: ExitReason;
  entryPrice: number;
  exitPrice: number;
  shares: number;
  pnlDollars: number;
  pnlPct: number;
  fills: ExitFill[];
  triggerBid?: number;
  polymarketSpreadAtTrigger: SpreadSnapshot | null;
  polymarketSpreadAtFill: SpreadSnapshot | null;
}

export interface SessionEndEvent {
  type: "session_end";
  realizedPnl: number;
  wins: number;
  losses: number;
  breakeven: number;
  openPositions: number;
}

export type TradingEvent =
  | SessionStartEvent
  | SignalEvent
  | EntryEvent
  | ExitEvent
  | SessionEndEvent;

export interface EventSink {
  log(event: TradingEvent): void;
  close(): Promise<void>;
}

/** Sink that drops everything */
export const nullEventSink: EventSink = {
  log: () => {},
  close: async () => {},
};

/**
 * data/<date>/run-<date>T<HH-MM-SS>.jsonl for a given start time (UTC)
 */
export function sessionLogPath(rootDir: string, startedAt: Date = new Date()): string {
  const iso = startedAt.toISOString();
  const date = iso.slice(0, 10);
  const time = iso.slice(11, 19).replace(/:/g, "-");
  return path.join(rootDir, "data", date, `run-${date}T${time}.jsonl`);
}

export class JsonlEventLogger implements EventSink {
  private chain: Promise<void> = Promise.resolve();
  private closed = false;
  private dirReady = false;

  constructor(
    readonly filePath: string,
    private readonly logger?: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  log(event: TradingEvent): void {
    if (this.closed) return;
    const line = `${JSON.stringify({ ...event, ts: this.now().toISOString() })}\n`;
    this.chain = this.chain.then(() => this.append(line));
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.chain;
  }

  private async append(line: string): Promise<void> {
    try {
      if (!this.dirReady) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      await fs.appendFile(this.filePath, line, { encoding: "utf8" });
    } catch (err) {
      this.logger?.warn(`[EventLog] Write to ${this.filePath} failed: ${toErrorMessage(err)}`);
    }
  }
}
