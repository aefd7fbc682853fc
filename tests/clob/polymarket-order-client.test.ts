import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  PolymarketOrderClient,
  normalizeFillAndKill,
  normalizeLevels,
  normalizeOrderStatus,
  normalizeTrade,
} from "../../src/clob/polymarket-order-client";
import type { ClobApi } from "../../src/clob/polymarket-order-client";
import { createCapturingLogger } from "../helpers/fake-order-client";

describe("normalizeFillAndKill", () => {
  it("reads a matched response", () => {
    assert.deepEqual(
      normalizeFillAndKill({
        success: true,
        orderID: "0xabc",
        status: "matched",
        takingAmount: "8.5",
        makingAmount: "4.505",
      }),
      {
        success: true,
        orderId: "0xabc",
        status: "matched",
        takingAmount: 8.5,
        makingAmount: 4.505,
        error: undefined,
      },
    );
  });

  it("treats a matched status as success and accepts snake_case ids", () => {
    const parsed = normalizeFillAndKill({ status: "matched", order_id: "o-2" });
    assert.equal(parsed.success, true);
    assert.equal(parsed.orderId, "o-2");
  });

  it("carries the exchange error message", () => {
    const parsed = normalizeFillAndKill({ success: false, errorMsg: "no orders found to match" });
    assert.equal(parsed.success, false);
    assert.equal(parsed.error, "no orders found to match");
  });

  it("turns a bare string into a failure", () => {
    assert.deepEqual(normalizeFillAndKill("Bad Request"), { success: false, error: "Bad Request" });
  });
});

describe("normalizeOrderStatus", () => {
  it("reads snake_case fields", () => {
    assert.deepEqual(normalizeOrderStatus({ size_matched: "3", average_price: "0.52", status: "MATCHED" }), {
      sizeMatched: 3,
      averagePrice: 0.52,
      price: undefined,
      status: "MATCHED",
    });
  });

  it("falls back through the matched-size spellings", () => {
    assert.equal(normalizeOrderStatus({ matched_amount: 2 }).sizeMatched, 2);
  });
});

describe("normalizeTrade", () => {
  it("reads a trade", () => {
    assert.deepEqual(
      normalizeTrade({ taker_order_id: "o1", asset_id: "up", side: "buy", size: "4", price: "0.5" }),
      { takerOrderId: "o1", assetId: "up", side: "BUY", size: 4, price: 0.5 },
    );
  });

  it("rejects a trade without a side", () => {
    assert.equal(normalizeTrade({ size: "4", price: "0.5" }), null);
  });
});

describe("normalizeLevels", () => {
  it("stringifies numeric levels and skips junk", () => {
    assert.deepEqual(normalizeLevels([{ price: 0.5, size: 10 }, { price: "0.49" }, 7]), [
      { price: "0.5", size: "10" },
    ]);
  });
});

function stubClob(overrides: Partial<ClobApi> = {}): ClobApi {
  const unexpected = (): Promise<never> => Promise.reject(new Error("unexpected call"));
  return {
    getServerTime: unexpected,
    getOrderBook: unexpected,
    createOrder: unexpected,
    postOrder: unexpected,
    cancelOrder: unexpected,
    cancelAll: unexpected,
    getOpenOrders: unexpected,
    getOrder: unexpected,
    getTrades: unexpected,
    ...overrides,
  };
}

describe("PolymarketOrderClient", () => {
  it("cancels a single order by id", async () => {
    const payloads: Array<{ orderID: string }> = [];
    const client = new PolymarketOrderClient(
      stubClob({
        cancelOrder: async (payload) => {
          payloads.push(payload);
          return { canceled: [payload.orderID] };
        },
      }),
    );

    assert.deepEqual(await client.cancel("0xresting"), { ok: true, value: undefined });
    assert.deepEqual(payloads, [{ orderID: "0xresting" }]);
  });

  it("reports a rejected cancel as a failed result", async () => {
    const client = new PolymarketOrderClient(
      stubClob({ cancelOrder: () => Promise.reject(new Error("order not found")) }),
    );

    assert.deepEqual(await client.cancel("0xgone"), { ok: false, error: "order not found" });
  });

  it("cancels everything", async () => {
    let calls = 0;
    const client = new PolymarketOrderClient(
      stubClob({
        cancelAll: async () => {
          calls++;
          return { canceled: [] };
        },
      }),
    );

    assert.deepEqual(await client.cancelAll(), { ok: true, value: undefined });
    assert.equal(calls, 1);
  });

  it("reads open orders from a data envelope and skips malformed rows", async () => {
    const client = new PolymarketOrderClient(
      stubClob({
        getOpenOrders: async () => ({
          data: [
            {
              id: "0x1",
              asset_id: "up-token",
              side: "sell",
              price: "0.55",
              original_size: "10",
              size_matched: "2.5",
            },
            { id: "0x2", asset_id: "up-token", side: "HOLD", price: "0.4" },
            "junk",
          ],
        }),
      }),
    );

    assert.deepEqual(await client.getOpenOrders(), {
      ok: true,
      value: [
        {
          orderId: "0x1",
          tokenId: "up-token",
          side: "SELL",
          price: 0.55,
          originalSize: 10,
          sizeMatched: 2.5,
        },
      ],
    });
  });

  it("reads open orders from a bare array", async () => {
    const client = new PolymarketOrderClient(
      stubClob({
        getOpenOrders: async () => [{ id: "0x3", asset_id: "down-token", side: "BUY", price: 0.45 }],
      }),
    );

    assert.deepEqual(await client.getOpenOrders(), {
      ok: true,
      value: [
        { orderId: "0x3", tokenId: "down-token", side: "BUY", price: 0.45, originalSize: 0, sizeMatched: 0 },
      ],
    });
  });

  it("turns a failed open order lookup into a failed result", async () => {
    const client = new PolymarketOrderClient(
      stubClob({ getOpenOrders: () => Promise.reject(new Error("401 Unauthorized")) }),
    );

    assert.deepEqual(await client.getOpenOrders(), { ok: false, error: "401 Unauthorized" });
  });

  it("answers a signing failure with an unsuccessful order response", async () => {
    const client = new PolymarketOrderClient(
      stubClob({ createOrder: () => Promise.reject(new Error("invalid tick size")) }),
    );

    assert.deepEqual(await client.placeFillAndKill("up-token", "BUY", 0.55, 10), {
      success: false,
      error: "invalid tick size",
    });
  });

  it("warms up with a server time request", async () => {
    let calls = 0;
    const logger = createCapturingLogger();
    const client = new PolymarketOrderClient(
      stubClob({
        getServerTime: async () => {
          calls++;
          return 1_700_000_000;
        },
      }),
      logger,
    );

    await client.warmUp();

    assert.equal(calls, 1);
    assert.equal(logger.lines.length, 1);
    assert.equal(logger.lines[0].level, "info");
    assert.ok(logger.lines[0].msg.startsWith("[CLOB] Connection warm ("));
  });

  it("logs a failed warm-up without throwing", async () => {
    const logger = createCapturingLogger();
    const client = new PolymarketOrderClient(
      stubClob({ getServerTime: () => Promise.reject(new Error("ECONNRESET")) }),
      logger,
    );

    await client.warmUp();

    assert.deepEqual(logger.lines, [{ level: "warn", msg: "[CLOB] Warm-up failed: ECONNRESET" }]);
  });
});
