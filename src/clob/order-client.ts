/**
 * Order client contract
 *
 * The trading core talks to the exchange only through this interface.
 * Implementations catch every exception at the boundary: queries answer with
 * a ClientResult, order placement with a response whose `success` is false
 * and whose `error` carries the message.
 */

import type { RawOrderbookLevel } from "../lib/orderbook-utils";

export type OrderSide = "BUY" | "SELL";

export type ClientResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export interface RawOrderBook {
  bids: RawOrderbookLevel[];
  asks: RawOrderbookLevel[];
}

/**
 * Response of a fill-and-kill order. Fill data may arrive as direct fields
 * or as taking/making amounts; either may be missing.
 */
export interface FillAndKillResponse {
  success: boolean;
  orderId?: string;
  status?: string;
  /** BUY: shares received. SELL: USDC received */
  takingAmount?: number;
  /** BUY: USDC spent. SELL: shares sold */
  makingAmount?: number;
  filledShares?: number;
  fillPrice?: number;
  error?: string;
}

export interface RestingOrderResponse {
  success: boolean;
  orderId?: string;
  error?: string;
}

export interface OpenOrderSummary {
  orderId: string;
  tokenId: string;
  side: OrderSide;
  price: number;
  originalSize: number;
  sizeMatched: number;
}

export interface OrderStatus {
  sizeMatched?: number;
  averagePrice?: number;
  price?: number;
  status?: string;
}

export interface AccountTrade {
  takerOrderId: string;
  assetId: string;
  side: OrderSide;
  size: number;
  price: number;
}

export interface OrderClient {
  /** Open the exchange connection before the first order needs it. Never throws. */
  warmUp(): Promise<void>;
  getOrderBook(tokenId: string): Promise<ClientResult<RawOrderBook>>;
  placeFillAndKill(
    tokenId: string,
    side: OrderSide,
    price: number,
    size: number,
  ): Promise<FillAndKillResponse>;
  placeRestingOrder(
    tokenId: string,
    side: OrderSide,
    price: number,
    size: number,
  ): Promise<RestingOrderResponse>;
  cancel(orderId: string): Promise<ClientResult<void>>;
  cancelAll(): Promise<ClientResult<void>>;
  getOpenOrders(): Promise<ClientResult<OpenOrderSummary[]>>;
  getOrder(orderId: string): Promise<ClientResult<OrderStatus>>;
  getRecentTrades(limit: number): Promise<ClientResult<AccountTrade[]>>;
}

export function ok<T>(value: T): ClientResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: string): ClientResult<T> {
  return { ok: false, error };
}
