/**
 * CoinbaseFeed - BTC-USD volatility signals from the Coinbase matches channel
 *
 * Every match tick goes into a RollingWindow. When the window's move from
 * oldest to newest price reaches `threshold` (fractional, 0.00015 = 0.015%)
 * and at least `cooldownMs` of exchange time has passed since the last
 * signal, an UP or DOWN signal is queued.
 *
 * Signals are delivered by a single consumer draining an unbounded queue, so
 * a slow or failing handler never holds up tick ingestion. Handler errors
 * are logged and the consumer keeps going.
 *
 * The window and the cooldown reset on every connect and disconnect.
 * Reconnects use a fixed delay until stop() is called.
 */

import WebSocket from "ws";
import { AsyncQueue } from "./async-queue";
import { COINBASE_WS } from "./constants";
import { isRecord, readNumber, toError, toErrorMessage } from "./error-handling";
import { RollingWindow, type Tick } from "./rolling-window";
import type { Direction } from "../core/types";
import { createNullLogger, type Logger } from "../utils/logger.util";

// ============================================================================
// Types
// ============================================================================

export interface VolatilitySignal {
  direction: Direction;
  /** Fractional change across the window when the signal fired */
  pctChange: number;
  /** Window contents at signal time, oldest first */
  windowTicks: Tick[];
  /** Exchange time of the tick that fired the signal */
  signalTimeMs: number;
}

export type SignalHandler = (signal: VolatilitySignal) => void | Promise<void>;

export interface CoinbaseFeedOptions {
  windowMs: number;
  threshold: number;
  cooldownMs: number;
  onSignal: SignalHandler;
  onConnect?: () => void;
  onDisconnect?: () => void;
  url?: string;
  productId?: string;
  reconnectDelayMs?: number;
  logger?: Logger;
}

interface SubscribeMessage {
  type: "subscribe";
  product_ids: string[];
  channels: string[];
}

// ============================================================================
// Timestamp parsing
// ============================================================================

const ISO_UTC = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?Z$/;

/**
 * Parse an ISO-8601 UTC timestamp ("2024-01-15T12:30:45.123456Z") to epoch
 * ms. Fractional seconds beyond microseconds are truncated. Null if the
 * string is not a valid UTC timestamp.
 */
export function parseExchangeTime(value: string): number | null {
  const match = ISO_UTC.exec(value);
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction] = match;
  const y = Number(year);
  const mo = Number(month) - 1;
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);

  const wholeMs = Date.UTC(y, mo, d, h, mi, s);
  const check = new Date(wholeMs);
  if (
    check.getUTCFullYear() !== y ||
    check.getUTCMonth() !== mo ||
    check.getUTCDate() !== d ||
    check.getUTCHours() !== h ||
    check.getUTCMinutes() !== mi ||
    check.getUTCSeconds() !== s
  ) {
    return null;
  }

  const micros = fraction ? Number(fraction.slice(0, 6).padEnd(6, "0")) : 0;
  return wholeMs + micros / 1000;
}

// ============================================================================
// CoinbaseFeed Implementation
// ============================================================================

export class CoinbaseFeed {
  readonly window: RollingWindow;

  private ws: WebSocket | null = null;
  private running = false;
  private paused = false;
  private reconnectTimer: NodeJS.Timeout | null = null;

  private lastSignalTime = 0;
  private lastSignal: VolatilitySignal | null = null;
  private ticksReceived = 0;

  private signals = new AsyncQueue<VolatilitySignal>();
  private consumer: Promise<void>;

  private readonly threshold: number;
  private readonly cooldownMs: number;
  private readonly url: string;
  private readonly productId: string;
  private readonly reconnectDelayMs: number;
  private readonly logger: Logger;

  private readonly onSignal: SignalHandler;
  private readonly onConnectCb?: () => void;
  private readonly onDisconnectCb?: () => void;

  constructor(options: CoinbaseFeedOptions) {
    this.window = new RollingWindow(options.windowMs);
    this.threshold = options.threshold;
    this.cooldownMs = options.cooldownMs;
    this.onSignal = options.onSignal;
    this.onConnectCb = options.onConnect;
    this.onDisconnectCb = options.onDisconnect;
    this.url = options.url ?? COINBASE_WS.URL;
    this.productId = options.productId ?? COINBASE_WS.PRODUCT_ID;
    this.reconnectDelayMs = options.reconnectDelayMs ?? COINBASE_WS.RECONNECT_DELAY_MS;
    this.logger = options.logger ?? createNullLogger();

    this.consumer = this.consumeSignals();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Public API
  // ═══════════════════════════════════════════════════════════════════════════

  connect(): void {
    if (this.running) return;
    this.running = true;

    if (this.signals.isClosed) {
      this.signals = new AsyncQueue<VolatilitySignal>();
      this.consumer = this.consumeSignals();
    }

    this.openSocket();
  }

  /**
   * Close the socket, stop reconnecting and wait for queued signals to drain
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.on("error", (err: Error) => {
        this.logger.debug(`[Coinbase] Error while closing: ${err.message}`);
      });
      this.ws.close(1000, "Client disconnect");
      this.ws = null;
    }
    this.signals.close();
    await this.consumer;
  }

  /** Keep ingesting ticks but emit no signals */
  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  /** Snapshot taken when the last signal fired */
  get lastSignalData(): VolatilitySignal | null {
    return this.lastSignal;
  }

  get tickCount(): number {
    return this.ticksReceived;
  }

  /**
   * Feed one raw WebSocket message. Anything that is not a well-formed match
   * is ignored.
   */
  handleMessage(raw: string): void {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      return;
    }
    if (!isRecord(message) || message.type !== "match") return;

    const price = readNumber(message.price);
    const time = typeof message.time === "string" ? parseExchangeTime(message.time) : null;
    if (price === undefined || price <= 0 || time === null) return;

    this.ticksReceived++;
    this.window.add(time, price);
    this.checkSignal(time);
  }

  /**
   * Drop window contents and cooldown (stale across sessions)
   */
  reset(): void {
    this.window.clear();
    this.lastSignalTime = 0;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private - Signal detection
  // ═══════════════════════════════════════════════════════════════════════════

  private checkSignal(timeMs: number): void {
    if (this.paused) return;

    const pctChange = this.window.pctChange();
    if (pctChange === null) return;
    if (Math.abs(pctChange) < this.threshold) return;
    if (timeMs - this.lastSignalTime < this.cooldownMs) return;

    this.lastSignalTime = timeMs;
    const signal: VolatilitySignal = {
      direction: pctChange > 0 ? "UP" : "DOWN",
      pctChange,
      windowTicks: this.window.snapshot(),
      signalTimeMs: timeMs,
    };
    this.lastSignal = signal;
    this.signals.push(signal);
  }

  private async consumeSignals(): Promise<void> {
    for await (const signal of this.signals) {
      try {
        await this.onSignal(signal);
      } catch (err) {
        this.logger.error(`[Coinbase] Signal handler failed for ${signal.direction}`, toError(err));
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private - Connection
  // ═══════════════════════════════════════════════════════════════════════════

  private openSocket(): void {
    this.logger.debug(`[Coinbase] Connecting to ${this.url}...`);

    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on("open", () => {
      this.reset();
      const subscribe: SubscribeMessage = {
        type: "subscribe",
        product_ids: [this.productId],
        channels: ["matches"],
      };
      ws.send(JSON.stringify(subscribe));
      this.logger.info(`[Coinbase] Connected, subscribed to ${this.productId} matches`);
      this.onConnectCb?.();
    });

    ws.on("message", (data: WebSocket.RawData) => {
      this.handleMessage(data.toString());
    });

    ws.on("error", (err: Error) => {
      this.logger.warn(`[Coinbase] WebSocket error: ${toErrorMessage(err)}`);
    });

    ws.on("close", (code: number) => {
      this.ws = null;
      this.reset();
      this.logger.warn(`[Coinbase] Connection closed (code=${code})`);
      this.onDisconnectCb?.();
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) return;

    this.logger.info(`[Coinbase] Reconnecting in ${this.reconnectDelayMs}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.running) {
        this.openSocket();
      }
    }, this.reconnectDelayMs);
  }
}
