#!/usr/bin/env node
/**
 * Market Mapper CLI Command
 *
 * Finds the current hourly "Bitcoin Up or Down" event on Polymarket and
 * writes its UP/DOWN token ids to market_map.json.
 *
 * Usage:
 *   npm run map-market
 */

import "dotenv/config";
import axios from "axios";
import chalk from "chalk";
import { DEFAULT_MARKET_MAP_PATH, saveMarketMap, type MarketMap } from "../config/loadConfig";
import { isRecord, readString, toErrorMessage } from "../lib/error-handling";
import { POLYMARKET_API } from "../lib/constants";

const EASTERN = "America/New_York";

const MONTHS = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

export interface EasternHour {
  month: number; // 1-12
  day: number;
  hour: number; // 0-23
}

/**
 * Wall-clock month/day/hour in US Eastern time
 */
export function toEasternHour(date: Date): EasternHour {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone: EASTERN,
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    hourCycle: "h23",
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = parts.find((p) => p.type === type)?.value;
    return value === undefined ? NaN : Number(value);
  };
  return { month: part("month"), day: part("day"), hour: part("hour") };
}

/**
 * "bitcoin-up-or-down-january-20-5pm-et"
 */
export function hourlySlug({ month, day, hour }: EasternHour): string {
  let hourText: string;
  if (hour === 0) hourText = "12am";
  else if (hour < 12) hourText = `${hour}am`;
  else if (hour === 12) hourText = "12pm";
  else hourText = `${hour - 12}pm`;

  return `bitcoin-up-or-down-${MONTHS[month - 1]}-${day}-${hourText}-et`;
}

/**
 * Pull the market map out of a Gamma event. The first CLOB token is UP,
 * the second DOWN. clobTokenIds may be a JSON-encoded string.
 */
export function extractMarketMap(event: unknown): MarketMap | null {
  if (!isRecord(event) || !Array.isArray(event.markets) || event.markets.length === 0) {
    return null;
  }
  const market: unknown = event.markets[0];
  if (!isRecord(market)) return null;

  let tokenIds: unknown = market.clobTokenIds;
  if (typeof tokenIds === "string") {
    try {
      tokenIds = JSON.parse(tokenIds);
    } catch {
      return null;
    }
  }
  if (!Array.isArray(tokenIds) || tokenIds.length < 2) return null;

  const upTokenId = readString(tokenIds[0]);
  const downTokenId = readString(tokenIds[1]);
  if (!upTokenId || !downTokenId) return null;

  return {
    upTokenId,
    downTokenId,
    eventTitle: readString(market.question) ?? readString(event.title) ?? "",
    slug: readString(event.slug),
  };
}

export async function fetchEventBySlug(slug: string): Promise<unknown> {
  const response = await axios.get<unknown>(`${POLYMARKET_API.GAMMA}/events`, {
    params: { slug },
    timeout: 30000,
    headers: { Accept: "application/json" },
  });
  const events = response.data;
  return Array.isArray(events) && events.length > 0 ? events[0] : null;
}

async function main(): Promise<void> {
  console.log(chalk.cyan("=".repeat(50)));
  console.log(chalk.cyan("POLYMARKET MARKET MAPPER"));
  console.log(chalk.cyan("=".repeat(50)));

  const slug = hourlySlug(toEasternHour(new Date()));
  console.log(`\nFetching: ${slug}...`);

  let event: unknown;
  try {
    event = await fetchEventBySlug(slug);
  } catch (err) {
    console.error(chalk.red(`  Error fetching ${slug}: ${toErrorMessage(err)}`));
    process.exit(1);
  }
  if (!event) {
    console.error(chalk.red("Not found!"));
    process.exit(1);
  }

  const map = extractMarketMap(event);
  if (!map) {
    console.error(chalk.red("No market data!"));
    process.exit(1);
  }

  console.log(chalk.green("Found!"));
  console.log(`  Title: ${map.eventTitle}`);

  await saveMarketMap(DEFAULT_MARKET_MAP_PATH, { ...map, slug: map.slug ?? slug });
  console.log(chalk.green(`\nMarket map saved to ${DEFAULT_MARKET_MAP_PATH}`));
  console.log(`  UP token:   ${map.upTokenId.slice(0, 20)}...`);
  console.log(`  DOWN token: ${map.downTokenId.slice(0, 20)}...`);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(chalk.red(`Market mapper failed: ${toErrorMessage(err)}`));
    process.exit(1);
  });
}
