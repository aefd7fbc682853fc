/**
 * Constants - endpoints, feed timing and exit policy
 */

// Helper to read string env vars
const envStr = (key: string, defaultValue: string): string => {
  const value = process.env[key];
  return value === undefined || value === "" ? defaultValue : value;
};

// API Endpoints
export const POLYMARKET_API = {
  CLOB: envStr("CLOB_HOST", "https://clob.polymarket.com"),
  GAMMA: "https://gamma-api.polymarket.com",
} as const;

// Polymarket CLOB market channel
export const POLYMARKET_WS = {
  // Per Polymarket docs the URL path selects the channel (market vs user)
  HOST: envStr("POLY_WS_HOST", "wss://ws-subscriptions-clob.polymarket.com"),

  // Fixed reconnect delay after a disconnect
  RECONNECT_DELAY_MS: 1000,

  // Keepalive ping interval (send "PING" text message)
  PING_INTERVAL_MS: 10000,
} as const;

// Coinbase Exchange public feed (reference price)
export const COINBASE_WS = {
  URL: envStr("COINBASE_WS_URL", "wss://ws-feed.exchange.coinbase.com"),
  PRODUCT_ID: envStr("COINBASE_PRODUCT_ID", "BTC-USD"),
  RECONNECT_DELAY_MS: 1000,
} as const;

/**
 * Get the market channel WebSocket URL
 */
export function getMarketWsUrl(): string {
  return `${POLYMARKET_WS.HOST}/ws/market`;
}

// Order pricing bounds (0-1 scale)
export const PRICE_BOUNDS = {
  TICK: 0.01,
  MAX_BUY_PRICE: 0.99,
} as const;

/**
 * Exit retry phases. Phase 1 retries fast, phase 2 only runs when the
 * remainder is worth more than DUST_THRESHOLD_USD at the current bid.
 */
export const EXIT_RETRY = {
  PHASE_1: { maxAttempts: 20, maxConsecutiveFailures: 5, delayOnFailMs: 300 },
  PHASE_2: { maxAttempts: 15, maxConsecutiveFailures: 10, delayOnFailMs: 1000 },
  DUST_THRESHOLD_USD: 0.05,
  // Shares at or below this are treated as fully sold
  MIN_REMAINING_SHARES: 0.01,
} as const;

// Fill lookup after a matched order reports no amounts
export const FILL_POLL = {
  ATTEMPTS: 2,
  INTERVAL_MS: 250,
  TRADE_LOOKBACK: 20,
} as const;
