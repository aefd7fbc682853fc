/**
 * Polymarket order client
 *
 * OrderClient over @polymarket/clob-client. Orders are signed with an
 * ethers wallet; API credentials come from the environment or are derived
 * with createOrDeriveApiKey(). Exchange responses are read as untyped JSON
 * and normalized here; every exception becomes a failed result.
 */

import { JsonRpcProvider, Wallet } from "ethers";
import { ClobClient, Chain, OrderType, Side } from "@polymarket/clob-client";
import type { ApiKeyCreds, UserOrder } from "@polymarket/clob-client";
import { POLYMARKET_API } from "../lib/constants";
import { isRecord, readNumber, readString, toError, toErrorMessage } from "../lib/error-handling";
import type { RawOrderbookLevel } from "../lib/orderbook-utils";
import { asClobSigner } from "../utils/clob-signer.util";
import type { Logger } from "../utils/logger.util";
import { ExchangeUnavailableError } from "../errors/app.errors";
import {
  fail,
  ok,
  type AccountTrade,
  type ClientResult,
  type FillAndKillResponse,
  type OpenOrderSummary,
  type OrderClient,
  type OrderSide,
  type OrderStatus,
  type RawOrderBook,
  type RestingOrderResponse,
} from "./order-client";

export interface PolymarketClientInput {
  privateKey: string;
  rpcUrl: string;
  host?: string;
  apiKey?: string;
  apiSecret?: string;
  apiPassphrase?: string;
  signatureType?: number; // 0=EOA, 1=Proxy, 2=GnosisSafe
  funderAddress?: string;
  logger?: Logger;
}

/**
 * Build a trading-ready CLOB client. Throws ExchangeUnavailableError when credentials
 * can neither be read nor derived.
 */
export async function createPolymarketOrderClient(
  input: PolymarketClientInput,
): Promise<PolymarketOrderClient> {
  const host = input.host ?? POLYMARKET_API.CLOB;
  const pk = input.privateKey.startsWith("0x") ? input.privateKey : `0x${input.privateKey}`;
  const wallet = new Wallet(pk, new JsonRpcProvider(input.rpcUrl));
  const signer = asClobSigner(wallet);

  input.logger?.info(
    `[CLOB] Wallet: ${wallet.address.slice(0, 10)}...${wallet.address.slice(-6)}`,
  );

  let creds: ApiKeyCreds | undefined;
  if (input.apiKey && input.apiSecret && input.apiPassphrase) {
    creds = { key: input.apiKey, secret: input.apiSecret, passphrase: input.apiPassphrase };
    input.logger?.info("[CLOB] Using provided API credentials");
  } else {
    input.logger?.info("[CLOB] Deriving API credentials...");
    try {
      const bootstrap = new ClobClient(
        host,
        Chain.POLYGON,
        signer,
        undefined,
        input.signatureType,
        input.funderAddress,
      );
      creds = await bootstrap.createOrDeriveApiKey();
    } catch (err) {
      throw new ExchangeUnavailableError(`Credential derivation failed: ${toErrorMessage(err)}`, host, {
        cause: toError(err),
      });
    }
    if (!creds?.key) {
      throw new ExchangeUnavailableError("Credential derivation returned no API key", host);
    }
    input.logger?.info(`[CLOB] Credentials derived (key: ...${creds.key.slice(-6)})`);
  }

  const client = new ClobClient(
    host,
    Chain.POLYGON,
    signer,
    creds,
    input.signatureType,
    input.funderAddress,
  );
  return new PolymarketOrderClient(client, input.logger);
}

/**
 * The ClobClient calls the adapter makes. Responses are read as untyped JSON.
 */
export interface ClobApi {
  getServerTime(): Promise<unknown>;
  getOrderBook(tokenId: string): Promise<unknown>;
  createOrder(order: UserOrder): ReturnType<ClobClient["createOrder"]>;
  postOrder(order: Awaited<ReturnType<ClobClient["createOrder"]>>, orderType: OrderType): Promise<unknown>;
  cancelOrder(payload: { orderID: string }): Promise<unknown>;
  cancelAll(): Promise<unknown>;
  getOpenOrders(): Promise<unknown>;
  getOrder(orderId: string): Promise<unknown>;
  getTrades(): Promise<unknown>;
}

export class PolymarketOrderClient implements OrderClient {
  constructor(
    private readonly client: ClobApi,
    private readonly logger?: Logger,
  ) {}

  /**
   * One round trip to the CLOB so the first order does not pay for the
   * TLS handshake. A failure is logged and otherwise ignored.
   */
  async warmUp(): Promise<void> {
    const startedAt = Date.now();
    try {
      await this.client.getServerTime();
      this.logger?.info(`[CLOB] Connection warm (${Date.now() - startedAt}ms)`);
    } catch (err) {
      this.logger?.warn(`[CLOB] Warm-up failed: ${toErrorMessage(err)}`);
    }
  }

  async getOrderBook(tokenId: string): Promise<ClientResult<RawOrderBook>> {
    try {
      const raw: unknown = await this.client.getOrderBook(tokenId);
      if (!isRecord(raw)) {
        return fail("Unexpected order book response");
      }
      return ok({ bids: normalizeLevels(raw.bids), asks: normalizeLevels(raw.asks) });
    } catch (err) {
      return fail(toErrorMessage(err));
    }
  }

  async placeFillAndKill(
    tokenId: string,
    side: OrderSide,
    price: number,
    size: number,
  ): Promise<FillAndKillResponse> {
    try {
      const signed = await this.client.createOrder({
        tokenID: tokenId,
        price,
        size,
        side: toClobSide(side),
      });
      const raw: unknown = await this.client.postOrder(signed, OrderType.FAK);
      return normalizeFillAndKill(raw);
    } catch (err) {
      this.logger?.debug(`[CLOB] FAK ${side} ${size} @ ${price} threw: ${toErrorMessage(err)}`);
      return { success: false, error: toErrorMessage(err) };
    }
  }

  async placeRestingOrder(
    tokenId: string,
    side: OrderSide,
    price: number,
    size: number,
  ): Promise<RestingOrderResponse> {
    try {
      const signed = await this.client.createOrder({
        tokenID: tokenId,
        price,
        size,
        side: toClobSide(side),
      });
      const raw: unknown = await this.client.postOrder(signed, OrderType.GTC);
      const parsed = normalizeFillAndKill(raw);
      return { success: parsed.success, orderId: parsed.orderId, error: parsed.error };
    } catch (err) {
      return { success: false, error: toErrorMessage(err) };
    }
  }

  async cancel(orderId: string): Promise<ClientResult<void>> {
    try {
      await this.client.cancelOrder({ orderID: orderId });
      return ok(undefined);
    } catch (err) {
      return fail(toErrorMessage(err));
    }
  }

  async cancelAll(): Promise<ClientResult<void>> {
    try {
      await this.client.cancelAll();
      return ok(undefined);
    } catch (err) {
      return fail(toErrorMessage(err));
    }
  }

  async getOpenOrders(): Promise<ClientResult<OpenOrderSummary[]>> {
    try {
      const raw: unknown = await this.client.getOpenOrders();
      const list = Array.isArray(raw) ? raw : isRecord(raw) && Array.isArray(raw.data) ? raw.data : [];
      const orders: OpenOrderSummary[] = [];
      for (const item of list) {
        const order = normalizeOpenOrder(item);
        if (order) orders.push(order);
      }
      return ok(orders);
    } catch (err) {
      return fail(toErrorMessage(err));
    }
  }

  async getOrder(orderId: string): Promise<ClientResult<OrderStatus>> {
    try {
      const raw: unknown = await this.client.getOrder(orderId);
      if (!isRecord(raw)) {
        return fail("Order not found");
      }
      return ok(normalizeOrderStatus(raw));
    } catch (err) {
      return fail(toErrorMessage(err));
    }
  }

  async getRecentTrades(limit: number): Promise<ClientResult<AccountTrade[]>> {
    try {
      const raw: unknown = await this.client.getTrades();
      if (!Array.isArray(raw)) {
        return ok([]);
      }
      const trades: AccountTrade[] = [];
      for (const item of raw.slice(0, limit)) {
        const trade = normalizeTrade(item);
        if (trade) trades.push(trade);
      }
      return ok(trades);
    } catch (err) {
      return fail(toErrorMessage(err));
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Response normalization
// ═══════════════════════════════════════════════════════════════════════════

function toClobSide(side: OrderSide): Side {
  return side === "BUY" ? Side.BUY : Side.SELL;
}

function readSide(value: unknown): OrderSide | undefined {
  if (typeof value !== "string") return undefined;
  const upper = value.toUpperCase();
  return upper === "BUY" || upper === "SELL" ? upper : undefined;
}

export function normalizeLevels(levels: unknown): RawOrderbookLevel[] {
  if (!Array.isArray(levels)) return [];
  const out: RawOrderbookLevel[] = [];
  for (const level of levels) {
    if (!isRecord(level)) continue;
    const price = level.price;
    const size = level.size;
    if ((typeof price === "string" || typeof price === "number") && (typeof size === "string" || typeof size === "number")) {
      out.push({ price: String(price), size: String(size) });
    }
  }
  return out;
}

/**
 * postOrder response -> FillAndKillResponse. Accepts orderID/order_id and
 * errorMsg/error spellings; a "matched" status counts as success.
 */
export function normalizeFillAndKill(raw: unknown): FillAndKillResponse {
  if (!isRecord(raw)) {
    return { success: false, error: typeof raw === "string" ? raw : "Unexpected order response" };
  }

  const status = readString(raw.status);
  const errorMsg = readString(raw.errorMsg) ?? readString(raw.error);
  const success = raw.success === true || status === "matched";

  return {
    success,
    orderId: readString(raw.orderID) ?? readString(raw.order_id),
    status,
    takingAmount: readNumber(raw.takingAmount),
    makingAmount: readNumber(raw.makingAmount),
    error: errorMsg,
  };
}

export function normalizeOrderStatus(raw: Record<string, unknown>): OrderStatus {
  return {
    sizeMatched:
      readNumber(raw.size_matched) ?? readNumber(raw.sizeMatched) ?? readNumber(raw.matched_amount),
    averagePrice: readNumber(raw.average_price),
    price: readNumber(raw.price),
    status: readString(raw.status),
  };
}

function normalizeOpenOrder(raw: unknown): OpenOrderSummary | null {
  if (!isRecord(raw)) return null;
  const orderId = readString(raw.id);
  const tokenId = readString(raw.asset_id);
  const side = readSide(raw.side);
  const price = readNumber(raw.price);
  if (!orderId || !tokenId || !side || price === undefined) return null;
  return {
    orderId,
    tokenId,
    side,
    price,
    originalSize: readNumber(raw.original_size) ?? 0,
    sizeMatched: readNumber(raw.size_matched) ?? 0,
  };
}

export function normalizeTrade(raw: unknown): AccountTrade | null {
  if (!isRecord(raw)) return null;
  const side = readSide(raw.side);
  const size = readNumber(raw.size);
  const price = readNumber(raw.price);
  if (!side || size === undefined || price === undefined) return null;
  return {
    takerOrderId: readString(raw.taker_order_id) ?? "",
    assetId: readString(raw.asset_id) ?? "",
    side,
    size,
    price,
  };
}
