import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { FillResolver, matchTrades, type FillRequest } from "../../src/clob/fill-resolver";
import type { AccountTrade } from "../../src/clob/order-client";
import { FakeOrderClient, recordingSleep } from "../helpers/fake-order-client";

const BUY: FillRequest = { tokenId: "up", side: "BUY", requestedSize: 8.5, submittedPrice: 0.54 };
const SELL: FillRequest = { tokenId: "up", side: "SELL", requestedSize: 8, submittedPrice: 0.55 };

function trade(overrides: Partial<AccountTrade>): AccountTrade {
  return { takerOrderId: "", assetId: "up", side: "BUY", size: 1, price: 0.5, ...overrides };
}

describe("FillResolver", () => {
  it("uses direct fill fields when present", async () => {
    const resolver = new FillResolver(new FakeOrderClient());
    const fill = await resolver.resolve({ success: true, filledShares: 5, fillPrice: 0.53 }, BUY);
    assert.deepEqual(fill, {
      success: true,
      orderId: undefined,
      filledShares: 5,
      fillPrice: 0.53,
      error: undefined,
    });
  });

  it("reads a BUY from taking (shares) and making (USDC)", async () => {
    const resolver = new FillResolver(new FakeOrderClient());
    const fill = await resolver.resolve({ success: true, takingAmount: 8.5, makingAmount: 4.505 }, BUY);
    assert.equal(fill.filledShares, 8.5);
    assert.equal(fill.fillPrice, 0.53);
  });

  it("reads a SELL from making (shares) and taking (USDC)", async () => {
    const resolver = new FillResolver(new FakeOrderClient());
    const fill = await resolver.resolve({ success: true, takingAmount: 4.4, makingAmount: 8 }, SELL);
    assert.equal(fill.filledShares, 8);
    assert.equal(fill.fillPrice, 0.55);
  });

  it("polls the order when the response carries no amounts", async () => {
    const client = new FakeOrderClient();
    client.setOrderStatus("o1", { sizeMatched: 3, averagePrice: 0.52 });
    const { sleep, delays } = recordingSleep();
    const resolver = new FillResolver(client, { sleep });

    const fill = await resolver.resolve({ success: false, status: "matched", orderId: "o1" }, BUY);
    assert.equal(fill.success, true);
    assert.equal(fill.filledShares, 3);
    assert.equal(fill.fillPrice, 0.52);
    assert.deepEqual(delays, []);
  });

  it("falls back to trade history on the last poll", async () => {
    const client = new FakeOrderClient();
    client.setTrades([
      trade({ takerOrderId: "x-o1", size: 2, price: 0.5 }),
      trade({ takerOrderId: "o1", size: 1, price: 0.53 }),
    ]);
    const { sleep, delays } = recordingSleep();
    const resolver = new FillResolver(client, { sleep, pollAttempts: 2, pollIntervalMs: 100 });

    const fill = await resolver.resolve({ success: true, orderId: "o1" }, BUY);
    assert.equal(fill.filledShares, 3);
    assert.ok(Math.abs(fill.fillPrice - 0.51) < 1e-9);
    assert.deepEqual(delays, [100]);
  });

  it("assumes a full fill when a successful order leaves no trace", async () => {
    const resolver = new FillResolver(new FakeOrderClient(), { sleep: recordingSleep().sleep });
    const fill = await resolver.resolve({ success: true, orderId: "ghost" }, BUY);
    assert.equal(fill.filledShares, 8.5);
    assert.equal(fill.fillPrice, 0.54);
  });

  it("passes a rejection through with no fill", async () => {
    const resolver = new FillResolver(new FakeOrderClient());
    const fill = await resolver.resolve({ success: false, error: "not enough balance" }, BUY);
    assert.deepEqual(fill, {
      success: false,
      orderId: undefined,
      filledShares: 0,
      fillPrice: 0.54,
      error: "not enough balance",
    });
  });
});

describe("matchTrades", () => {
  it("sums every trade of the order", () => {
    const result = matchTrades(
      [trade({ takerOrderId: "o1", size: 4, price: 0.5 }), trade({ takerOrderId: "o1", size: 4, price: 0.6 })],
      "o1",
      { tokenId: "up", side: "BUY" },
    );
    assert.ok(result);
    assert.equal(result.filled, 8);
    assert.ok(Math.abs(result.price - 0.55) < 1e-9);
  });

  it("takes only the latest same-side trade when the id is unknown", () => {
    const result = matchTrades(
      [
        trade({ takerOrderId: "other", assetId: "down", size: 9 }),
        trade({ takerOrderId: "other", size: 2, price: 0.48 }),
        trade({ takerOrderId: "older", size: 7, price: 0.4 }),
      ],
      "o1",
      { tokenId: "up", side: "BUY" },
    );
    assert.deepEqual(result, { filled: 2, price: 0.48 });
  });

  it("returns null when nothing matches", () => {
    assert.equal(matchTrades([trade({ side: "SELL" })], "o1", { tokenId: "up", side: "BUY" }), null);
  });
});
