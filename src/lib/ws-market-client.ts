/**
 * MarketDataStream - CLOB WebSocket client for live best bid/ask
 *
 * Connects to Polymarket's market channel for a fixed set of token ids and
 * keeps the PriceCache current.
 *
 * Message shapes handled:
 * - batches (JSON arrays) and single objects
 * - "price_change" events carrying best_bid/best_ask per asset
 * - book snapshots ({book: {bids, asks}} or top-level bids/asks), with the
 *   best price taken from the array ends since sort order varies
 * - single price updates with a BUY (bid) or SELL (ask) side
 *
 * Features:
 * - Keepalive via "PING" text messages (not WebSocket ping frames)
 * - Fixed-delay reconnect until disconnect() is called
 * - Subscribes to every token on each (re)connect
 *
 * Official endpoint: wss://ws-subscriptions-clob.polymarket.com/ws/market
 * Market Channel: Subscribe via payload {"type":"market","assets_ids":[...]}
 */

import WebSocket from "ws";
import { POLYMARKET_WS, getMarketWsUrl } from "./constants";
import { isRecord, readNumber, readString, toError, toErrorMessage } from "./error-handling";
import { bestAskFromLevels, bestBidFromLevels, parseRawLevels } from "./orderbook-utils";
import type { PriceCache } from "./price-cache";
import { createNullLogger, type Logger } from "../utils/logger.util";

// ============================================================================
// Types
// ============================================================================

/** WebSocket connection state */
export type WsConnectionState =
  | "DISCONNECTED"
  | "CONNECTING"
  | "CONNECTED"
  | "RECONNECTING";

export type PriceUpdateHandler = (
  tokenId: string,
  bestBid: number | null,
  bestAsk: number | null,
) => void;

export interface MarketDataStreamOptions {
  tokenIds: string[];
  onPriceUpdate: PriceUpdateHandler;
  priceCache?: PriceCache | null;
  url?: string;
  reconnectDelayMs?: number;
  pingIntervalMs?: number;
  onConnect?: () => void;
  onDisconnect?: (code: number, reason: string) => void;
  logger?: Logger;
}

/**
 * Market channel subscription, sent once per connection:
 *   {"assets_ids": [...], "type": "market"}
 */
interface SubscribeMessage {
  type: "market";
  assets_ids: string[];
}

interface TopOfBook {
  bid: number | null;
  ask: number | null;
}

// ============================================================================
// MarketDataStream Implementation
// ============================================================================

export class MarketDataStream {
  private ws: WebSocket | null = null;
  private state: WsConnectionState = "DISCONNECTED";
  private running = false;

  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;

  // Current top of book per subscribed token
  private readonly prices = new Map<string, TopOfBook>();

  // Metrics
  private messagesReceived = 0;
  private lastMessageAt = 0;
  private disconnectCount = 0;

  private readonly url: string;
  private readonly reconnectDelayMs: number;
  private readonly pingIntervalMs: number;
  private readonly priceCache: PriceCache | null;
  private readonly logger: Logger;

  private readonly onPriceUpdateCb: PriceUpdateHandler;
  private readonly onConnectCb?: () => void;
  private readonly onDisconnectCb?: (code: number, reason: string) => void;

  constructor(options: MarketDataStreamOptions) {
    this.url = options.url ?? getMarketWsUrl();
    this.reconnectDelayMs = options.reconnectDelayMs ?? POLYMARKET_WS.RECONNECT_DELAY_MS;
    this.pingIntervalMs = options.pingIntervalMs ?? POLYMARKET_WS.PING_INTERVAL_MS;
    this.priceCache = options.priceCache ?? null;
    this.logger = options.logger ?? createNullLogger();
    this.onPriceUpdateCb = options.onPriceUpdate;
    this.onConnectCb = options.onConnect;
    this.onDisconnectCb = options.onDisconnect;

    for (const tokenId of options.tokenIds) {
      this.prices.set(tokenId, { bid: null, ask: null });
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Public API - Connection Management
  // ═══════════════════════════════════════════════════════════════════════════

  connect(): void {
    if (this.running) {
      this.logger.debug(`[WS-Market] Already ${this.state}, skipping connect`);
      return;
    }
    this.running = true;
    this.openSocket();
  }

  /**
   * Disconnect and stop reconnecting
   */
  disconnect(): void {
    this.running = false;
    this.clearTimers();
    this.state = "DISCONNECTED";

    if (this.ws) {
      // Remove listeners first so close does not schedule a reconnect
      this.ws.removeAllListeners();
      this.ws.on("error", (err: Error) => {
        this.logger.debug(`[WS-Market] Error while closing: ${err.message}`);
      });
      this.ws.close(1000, "Client disconnect");
      this.ws = null;
    }
    this.logger.info("[WS-Market] Disconnected");
  }

  getState(): WsConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === "CONNECTED";
  }

  getSubscriptions(): string[] {
    return [...this.prices.keys()];
  }

  getMetrics(): {
    state: WsConnectionState;
    messagesReceived: number;
    lastMessageAgeMs: number;
    disconnectCount: number;
  } {
    return {
      state: this.state,
      messagesReceived: this.messagesReceived,
      lastMessageAgeMs: this.lastMessageAt > 0 ? Date.now() - this.lastMessageAt : 0,
      disconnectCount: this.disconnectCount,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Message handling
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Process one raw text frame from the market channel
   */
  handleMessage(raw: string): void {
    this.messagesReceived++;
    this.lastMessageAt = Date.now();

    if (raw === "PONG") return;

    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      this.logger.debug(`[WS-Market] Ignoring non-JSON frame: ${raw.slice(0, 40)}`);
      return;
    }

    if (Array.isArray(message)) {
      for (const update of message) {
        this.processUpdate(update);
      }
    } else {
      this.processUpdate(message);
    }
  }

  private processUpdate(update: unknown): void {
    if (!isRecord(update)) return;

    if (update.event_type === "price_change") {
      this.processPriceChanges(update.price_changes);
      return;
    }

    const assetId =
      readString(update.asset_id) ?? readString(update.market) ?? readString(update.token_id);
    if (!assetId || !this.prices.has(assetId)) return;

    let bestBid: number | null = null;
    let bestAsk: number | null = null;

    const book = update.book;
    if (isRecord(book)) {
      bestBid = bestBidFromLevels(parseRawLevels(book.bids));
      bestAsk = bestAskFromLevels(parseRawLevels(book.asks));
    } else if ("bids" in update && "asks" in update) {
      bestBid = bestBidFromLevels(parseRawLevels(update.bids));
      bestAsk = bestAskFromLevels(parseRawLevels(update.asks));
    } else if ("price" in update) {
      const price = readNumber(update.price) ?? null;
      const side = typeof update.side === "string" ? update.side.toUpperCase() : "";
      if (side === "BUY") bestBid = price;
      else if (side === "SELL") bestAsk = price;
    }

    this.applyPrices(assetId, bestBid, bestAsk);
  }

  private processPriceChanges(changes: unknown): void {
    if (!Array.isArray(changes)) return;

    for (const change of changes) {
      if (!isRecord(change)) continue;
      const assetId = readString(change.asset_id);
      if (!assetId || !this.prices.has(assetId)) continue;

      this.applyPrices(
        assetId,
        readNumber(change.best_bid) ?? null,
        readNumber(change.best_ask) ?? null,
      );
    }
  }

  /**
   * Record positive prices, write through the cache and notify
   */
  private applyPrices(tokenId: string, bestBid: number | null, bestAsk: number | null): void {
    const current = this.prices.get(tokenId);
    if (!current) return;

    let updated = false;
    if (bestBid !== null && bestBid > 0) {
      current.bid = bestBid;
      updated = true;
    }
    if (bestAsk !== null && bestAsk > 0) {
      current.ask = bestAsk;
      updated = true;
    }
    if (!updated) return;

    this.priceCache?.update(tokenId, current.bid, current.ask);
    try {
      this.onPriceUpdateCb(tokenId, current.bid, current.ask);
    } catch (err) {
      this.logger.error("[WS-Market] Price update handler failed", toError(err));
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Private - Connection
  // ═══════════════════════════════════════════════════════════════════════════

  private openSocket(): void {
    this.state = this.disconnectCount > 0 ? "RECONNECTING" : "CONNECTING";
    this.logger.info(`[WS-Market] ${this.state} to ${this.url}...`);

    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on("open", () => {
      this.state = "CONNECTED";
      this.logger.info(`[WS-Market] Connected to ${this.url}`);
      this.sendSubscribe(ws);
      this.startPing(ws);
      this.onConnectCb?.();
    });

    ws.on("message", (data: WebSocket.RawData) => {
      this.handleMessage(data.toString());
    });

    ws.on("error", (err: Error) => {
      this.logger.warn(`[WS-Market] WebSocket error connecting to ${this.url}: ${toErrorMessage(err)}`);
    });

    ws.on("close", (code: number, reason: Buffer) => {
      const reasonStr = reason.toString() || "No reason provided";
      this.disconnectCount++;
      this.ws = null;
      this.clearTimers();
      this.logger.warn(
        `[WS-Market] Connection closed: code=${code}, reason="${reasonStr}", disconnectCount=${this.disconnectCount}`,
      );
      this.onDisconnectCb?.(code, reasonStr);
      this.scheduleReconnect();
    });
  }

  private sendSubscribe(ws: WebSocket): void {
    const message: SubscribeMessage = {
      type: "market",
      assets_ids: this.getSubscriptions(),
    };
    ws.send(JSON.stringify(message));
    this.logger.debug(`[WS-Market] Subscribing to ${message.assets_ids.length} tokens`);
  }

  /**
   * Send "PING" text messages at interval. The server answers "PONG".
   */
  private startPing(ws: WebSocket): void {
    this.clearPing();
    this.pingTimer = setInterval(() => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send("PING");
      }
    }, this.pingIntervalMs);
  }

  private clearPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private scheduleReconnect(): void {
    if (!this.running) {
      this.state = "DISCONNECTED";
      return;
    }
    if (this.reconnectTimer) return;

    this.state = "RECONNECTING";
    this.logger.info(`[WS-Market] Reconnecting in ${this.reconnectDelayMs}ms`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.running) {
        this.openSocket();
      }
    }, this.reconnectDelayMs);
  }

  private clearTimers(): void {
    this.clearPing();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
