/**
 * Logging Infrastructure
 *
 * Re-exports the console logger and provides the display formatters used by
 * entry/exit summaries and the status screen.
 */

export {
  type Logger,
  type LogLevel,
  ConsoleLogger,
  createNullLogger,
  clockStamp,
} from "../../utils/logger.util";

/**
 * Format a price on the 0-1 scale as dollars ($0.52)
 */
export function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`;
}

/**
 * Format P&L with explicit sign: +$1.25 / -$0.40
 */
export function formatPnl(pnl: number): string {
  const sign = pnl >= 0 ? "+" : "-";
  return `${sign}$${Math.abs(pnl).toFixed(2)}`;
}

/**
 * Format a percentage that is already scaled to 0-100 with one decimal and sign
 */
export function formatSignedPct(pct: number): string {
  const sign = pct >= 0 ? "+" : "";
  return `${sign}${pct.toFixed(1)}%`;
}

/**
 * Format a fractional threshold (0.00015) as a percentage string (0.015%)
 */
export function formatFractionPct(fraction: number, digits = 3): string {
  return `${(fraction * 100).toFixed(digits)}%`;
}
