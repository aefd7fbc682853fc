/**
 * Error handling helpers for the exchange boundary.
 *
 * Exchange and network failures never cross into the trading core as
 * exceptions; adapters catch them and report a message through a result
 * object. These helpers produce that message and narrow untyped payloads.
 */

/**
 * Safely convert an unknown error to a string. Never throws.
 */
export function toErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";

  if (typeof error === "string") {
    return error;
  }

  if (error instanceof Error) {
    return error.message;
  }

  try {
    return JSON.stringify(error);
  } catch {
    // Circular reference or other JSON.stringify failure
    return String(error);
  }
}

/**
 * Wrap an unknown thrown value into an Error instance (for Logger.error)
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(toErrorMessage(error));
}

/**
 * Narrow an unknown JSON value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a numeric field that the exchange may send as a number or a string.
 * Returns undefined for missing or non-finite values.
 */
export function readNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Read a non-empty string field
 */
export function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
