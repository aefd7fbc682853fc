/**
 * Trading parameters and the market map
 *
 * Parameters come from the environment (dotenv loads .env at start-up).
 * POSITION_SIZE_USD, TAKE_PROFIT_PCT and STOP_LOSS_PCT are required;
 * everything else has a default. Percentages are fractions: 0.05 is 5%.
 *
 * market_map.json holds the UP/DOWN token ids of the current hourly market;
 * UP_TOKEN_ID/DOWN_TOKEN_ID in the environment override it.
 */

import { promises as fs } from "fs";
import path from "path";
import { ConfigurationError } from "../errors/app.errors";
import { formatFractionPct } from "../infra/logging";
import { isRecord, toError, toErrorMessage } from "../lib/error-handling";
import { readVar, type EnvSource } from "./env";

export type TradingConfig = {
  positionSizeUsd: number;
  takeProfitPct: number;
  stopLossPct: number;
  triggerThreshold: number;
  signalCooldownMs: number;
  volatilityWindowMs: number;
  maxSpreadCents: number;
  stalePositionSec: number;
  priceCacheStaleMs: number;
  slippageCents: number;
};

export type MarketMap = {
  upTokenId: string;
  downTokenId: string;
  eventTitle: string;
  slug?: string;
};

export const TRADING_DEFAULTS = {
  triggerThreshold: 0.00015,
  signalCooldownMs: 2000,
  volatilityWindowMs: 500,
  maxSpreadCents: 1,
  stalePositionSec: 5,
  priceCacheStaleMs: 5000,
  slippageCents: 2,
} as const;

export const DEFAULT_MARKET_MAP_PATH = "market_map.json";

type Bounds = { min?: number; max?: number; exclusiveMin?: boolean };

const parseNumber = (key: string, raw: string, bounds: Bounds): number => {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`, { variable: key });
  }
  if (bounds.min !== undefined) {
    const tooSmall = bounds.exclusiveMin ? parsed <= bounds.min : parsed < bounds.min;
    if (tooSmall) {
      const op = bounds.exclusiveMin ? ">" : ">=";
      throw new ConfigurationError(`${key} must be ${op} ${bounds.min}, got ${parsed}`, { variable: key });
    }
  }
  if (bounds.max !== undefined && parsed >= bounds.max) {
    throw new ConfigurationError(`${key} must be < ${bounds.max}, got ${parsed}`, { variable: key });
  }
  return parsed;
};

const POSITIVE: Bounds = { min: 0, exclusiveMin: true };
const NON_NEGATIVE: Bounds = { min: 0 };
const FRACTION: Bounds = { min: 0, max: 1, exclusiveMin: true };

export function loadTradingConfig(source: EnvSource = process.env): TradingConfig {
  const requiredNumber = (key: string, bounds: Bounds): number => {
    const raw = readVar(source, key);
    if (raw === undefined) {
      throw new ConfigurationError(`Missing required env var: ${key}`, { variable: key });
    }
    return parseNumber(key, raw, bounds);
  };

  const optionalNumber = (key: string, fallback: number, bounds: Bounds): number => {
    const raw = readVar(source, key);
    return raw === undefined ? fallback : parseNumber(key, raw, bounds);
  };

  return {
    positionSizeUsd: requiredNumber("POSITION_SIZE_USD", POSITIVE),
    takeProfitPct: requiredNumber("TAKE_PROFIT_PCT", POSITIVE),
    stopLossPct: requiredNumber("STOP_LOSS_PCT", FRACTION),
    triggerThreshold: optionalNumber("TRIGGER_THRESHOLD", TRADING_DEFAULTS.triggerThreshold, POSITIVE),
    signalCooldownMs: optionalNumber("SIGNAL_COOLDOWN_MS", TRADING_DEFAULTS.signalCooldownMs, NON_NEGATIVE),
    volatilityWindowMs: optionalNumber("VOLATILITY_WINDOW_MS", TRADING_DEFAULTS.volatilityWindowMs, POSITIVE),
    maxSpreadCents: optionalNumber("MAX_SPREAD_CENTS", TRADING_DEFAULTS.maxSpreadCents, NON_NEGATIVE),
    stalePositionSec: optionalNumber("STALE_POSITION_SEC", TRADING_DEFAULTS.stalePositionSec, NON_NEGATIVE),
    priceCacheStaleMs: optionalNumber("PRICE_CACHE_STALE_MS", TRADING_DEFAULTS.priceCacheStaleMs, POSITIVE),
    slippageCents: optionalNumber("SLIPPAGE_CENTS", TRADING_DEFAULTS.slippageCents, NON_NEGATIVE),
  };
}

/**
 * Startup banner lines for the effective trading parameters
 */
export function describeTradingConfig(config: TradingConfig): string[] {
  return [
    `Position size: $${config.positionSizeUsd.toFixed(2)}`,
    `Take profit: ${(config.takeProfitPct * 100).toFixed(1)}% | Stop loss: ${(config.stopLossPct * 100).toFixed(1)}%`,
    `Trigger threshold: ${formatFractionPct(config.triggerThreshold)}`,
    `Signal cooldown: ${config.signalCooldownMs}ms | Volatility window: ${config.volatilityWindowMs}ms`,
    `Max spread: ${config.maxSpreadCents}c | Slippage: ${config.slippageCents}c`,
    `Stale position: ${config.stalePositionSec}s | Price cache stale: ${config.priceCacheStaleMs}ms`,
  ];
}

// ═══════════════════════════════════════════════════════════════════════════
// Market map
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Validate the parsed contents of market_map.json
 */
export function parseMarketMap(raw: unknown, origin = DEFAULT_MARKET_MAP_PATH): MarketMap {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${origin} must contain a JSON object`);
  }
  const field = (name: string): string => {
    const value = raw[name];
    if (typeof value !== "string" || value === "") {
      throw new ConfigurationError(`Missing required field in ${origin}: ${name}`, { variable: name });
    }
    return value;
  };
  return {
    upTokenId: field("up_token_id"),
    downTokenId: field("down_token_id"),
    eventTitle: field("event_title"),
    slug: typeof raw.slug === "string" ? raw.slug : undefined,
  };
}

/**
 * Load market_map.json; UP_TOKEN_ID/DOWN_TOKEN_ID override its token ids.
 * With both overrides set the file is optional.
 */
export async function loadMarketMap(
  filePath: string = DEFAULT_MARKET_MAP_PATH,
  source: EnvSource = process.env,
): Promise<MarketMap> {
  const upOverride = readVar(source, "UP_TOKEN_ID");
  const downOverride = readVar(source, "DOWN_TOKEN_ID");

  let contents: string | undefined;
  try {
    contents = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (upOverride && downOverride) {
      return {
        upTokenId: upOverride,
        downTokenId: downOverride,
        eventTitle: readVar(source, "EVENT_TITLE") ?? "(from environment)",
      };
    }
    throw new ConfigurationError(
      `Market map not found: ${path.resolve(filePath)}. Run the market mapper first (npm run map-market).`,
      { cause: toError(err) },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (err) {
    throw new ConfigurationError(`${filePath} is not valid JSON: ${toErrorMessage(err)}`, {
      cause: toError(err),
    });
  }

  const map = parseMarketMap(parsed, filePath);
  return {
    ...map,
    upTokenId: upOverride ?? map.upTokenId,
    downTokenId: downOverride ?? map.downTokenId,
  };
}

export async function saveMarketMap(filePath: string, map: MarketMap): Promise<void> {
  const json = {
    up_token_id: map.upTokenId,
    down_token_id: map.downTokenId,
    event_title: map.eventTitle,
    ...(map.slug ? { slug: map.slug } : {}),
  };
  await fs.writeFile(filePath, `${JSON.stringify(json, null, 2)}\n`, "utf8");
}
