/**
 * Trading core types shared by the executor, the position manager and the
 * signal gate.
 */

/** Which outcome token a signal maps to */
export type Direction = "UP" | "DOWN";

/** Position lifecycle: OPEN -> CLOSING -> CLOSED (terminal) */
export type PositionStatus = "OPEN" | "CLOSING" | "CLOSED";

export type ExitReason =
  | "TAKE_PROFIT"
  | "STOP_LOSS"
  | "STALE_BREAKEVEN"
  | "MANUAL";

export interface Position {
  id: string;
  direction: Direction;
  tokenId: string;
  /** Price paid per share (fill price of the entry order) */
  entryPrice: number;
  shares: number;
  /** Unix ms */
  entryTime: number;
  takeProfitPrice: number;
  stopLossPrice: number;
  status: PositionStatus;
  exitPrice?: number;
  exitTime?: number;
  exitReason?: ExitReason;
  /** Highest bid observed while the position was open */
  peakPriceSinceEntry?: number;
  /** Set once the position outlives stalePositionSec without taking profit */
  isStale: boolean;
  staleSince?: number;
}

export interface OrderResult {
  success: boolean;
  direction: Direction;
  /** Requested USD amount */
  requestedAmount: number;
  filledShares: number;
  fillPrice: number;
  position?: Position;
  error?: string;
  partialFill: boolean;
}

/** What the signal gate did with a volatility signal */
export type SignalOutcome =
  | "executed"
  | "skipped_disabled"
  | "skipped_position_open"
  | "skipped_spread_wide";

/** One executed piece of an exit */
export interface ExitFill {
  shares: number;
  price: number;
}

/**
 * Human label for an exit reason
 */
export function describeExitReason(reason: ExitReason): string {
  switch (reason) {
    case "TAKE_PROFIT":
      return "Take profit";
    case "STOP_LOSS":
      return "Stop loss";
    case "STALE_BREAKEVEN":
      return "Stale breakeven";
    case "MANUAL":
      return "Manual exit";
    default: {
      const unreachable: never = reason;
      return unreachable;
    }
  }
}

/** Unrealized P&L in USD at a given bid */
export function positionPnl(position: Position, currentPrice: number): number {
  return (currentPrice - position.entryPrice) * position.shares;
}

/** Unrealized P&L in percent (0-100 scale) at a given bid */
export function positionPnlPct(position: Position, currentPrice: number): number {
  if (position.entryPrice <= 0) return 0;
  return ((currentPrice - position.entryPrice) / position.entryPrice) * 100;
}

/** Realized P&L for a closed position, 0 if no exit price was recorded */
export function realizedPnl(position: Position): number {
  if (position.status !== "CLOSED" || position.exitPrice === undefined) {
    return 0;
  }
  return (position.exitPrice - position.entryPrice) * position.shares;
}
