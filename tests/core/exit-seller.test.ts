import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { FillResolver } from "../../src/clob/fill-resolver";
import { ExitSeller } from "../../src/core/exit-seller";
import { QuoteSource } from "../../src/lib/quote-source";
import {
  FakeOrderClient,
  fullFill,
  matchedFill,
  recordingSleep,
  toBook,
} from "../helpers/fake-order-client";

const PHASE_1 = { maxAttempts: 3, maxConsecutiveFailures: 2, delayOnFailMs: 10 };
const PHASE_2 = { maxAttempts: 2, maxConsecutiveFailures: 2, delayOnFailMs: 20 };

function setup(): { client: FakeOrderClient; seller: ExitSeller; delays: number[] } {
  const client = new FakeOrderClient();
  const quotes = new QuoteSource(client);
  const fills = new FillResolver(client, { sleep: recordingSleep().sleep });
  const { sleep, delays } = recordingSleep();
  const seller = new ExitSeller(client, quotes, fills, { phase1: PHASE_1, phase2: PHASE_2, sleep });
  return { client, seller, delays };
}

describe("ExitSeller", () => {
  it("sells everything in one fill", async () => {
    const { client, seller } = setup();
    client.setBook("up", [[0.55, 100]], [[0.56, 100]]);
    client.queueFills("SELL", fullFill());

    const result = await seller.sell("up", 9, "UP");

    assert.deepEqual(result, {
      fills: [{ shares: 9, price: 0.55 }],
      totalFilled: 9,
      remaining: 0,
      attempts: 1,
      phase2Ran: false,
      restingOrder: undefined,
    });
  });

  it("retries the unfilled remainder at a freshly read bid", async () => {
    const { client, seller } = setup();
    client.queueBooks("up", [toBook([[0.55, 5]], [[0.56, 5]]), toBook([[0.54, 50]], [[0.56, 5]])]);
    client.queueFills("SELL", { success: true, filledShares: 5, fillPrice: 0.55 }, fullFill());

    const result = await seller.sell("up", 9, "UP");

    assert.deepEqual(
      client.ordersFor("SELL").map((o) => [o.size, o.price]),
      [
        [9, 0.55],
        [4, 0.54],
      ],
    );
    assert.deepEqual(result.fills, [
      { shares: 5, price: 0.55 },
      { shares: 4, price: 0.54 },
    ]);
    assert.equal(result.remaining, 0);
    assert.equal(result.attempts, 2);
  });

  it("treats a remainder of one hundredth of a share as sold", async () => {
    const { client, seller } = setup();
    client.setBook("up", [[0.55, 100]], [[0.56, 100]]);
    client.queueFills("SELL", { success: true, filledShares: 9, fillPrice: 0.55 });

    const result = await seller.sell("up", 9.01, "UP");

    assert.equal(result.remaining, 0.01);
    assert.equal(result.attempts, 1);
    assert.equal(result.phase2Ran, false);
    assert.equal(client.ordersFor("SELL", "GTC").length, 0);
  });

  it("runs the persistent phase, then rests the remainder on the book", async () => {
    const { client, seller, delays } = setup();
    client.setBook("up", [[0.5, 100]], [[0.51, 100]]);

    const result = await seller.sell("up", 9, "UP");

    assert.equal(result.attempts, 4);
    assert.equal(result.phase2Ran, true);
    assert.deepEqual(delays, [10, 10, 20, 20]);
    assert.deepEqual(result.restingOrder, { orderId: "resting-1", shares: 9, price: 0.5 });
    assert.deepEqual(
      client.ordersFor("SELL", "GTC").map((o) => [o.size, o.price]),
      [[9, 0.5]],
    );
  });

  it("skips the persistent phase for dust", async () => {
    const { client, seller, delays } = setup();
    client.setBook("up", [[0.5, 100]], [[0.51, 100]]);

    const result = await seller.sell("up", 0.06, "UP");

    assert.equal(result.phase2Ran, false);
    assert.deepEqual(delays, [10, 10]);
    assert.deepEqual(result.restingOrder, { orderId: "resting-1", shares: 0.06, price: 0.5 });
  });

  it("places nothing resting without a bid", async () => {
    const { client, seller } = setup();

    const result = await seller.sell("up", 9, "UP");

    assert.equal(result.phase2Ran, false);
    assert.equal(result.restingOrder, undefined);
    assert.equal(client.placed.length, 0);
  });

  it("reports a rejected resting order as none", async () => {
    const { client, seller } = setup();
    client.setBook("up", [[0.5, 100]], [[0.51, 100]]);
    client.restingResponse = { success: false, error: "market closed" };

    const result = await seller.sell("up", 9, "UP");

    assert.equal(result.restingOrder, undefined);
    assert.equal(result.remaining, 9);
  });

  it("reads a SELL fill from the exchange's taking and making amounts", async () => {
    const { client, seller } = setup();
    client.setBook("up", [[0.55, 100]], [[0.56, 100]]);
    client.queueFills("SELL", matchedFill("sell-1"));

    const result = await seller.sell("up", 9, "UP");

    assert.deepEqual(result.fills, [{ shares: 9, price: 0.55 }]);
    assert.equal(result.remaining, 0);
  });
});

describe("ExitSeller with default retry limits", () => {
  function setupDefaults(): { client: FakeOrderClient; seller: ExitSeller; delays: number[] } {
    const client = new FakeOrderClient();
    const quotes = new QuoteSource(client);
    const fills = new FillResolver(client, { sleep: recordingSleep().sleep });
    const { sleep, delays } = recordingSleep();
    return { client, seller: new ExitSeller(client, quotes, fills, { sleep }), delays };
  }

  it("gives up after five failures in the fast phase and ten in the persistent phase", async () => {
    const { client, seller, delays } = setupDefaults();
    client.setBook("up", [[0.5, 100]], [[0.51, 100]]);

    const result = await seller.sell("up", 9, "UP");

    assert.equal(result.attempts, 15);
    assert.equal(result.phase2Ran, true);
    assert.deepEqual(delays, [...Array<number>(5).fill(300), ...Array<number>(10).fill(1000)]);
    assert.equal(client.ordersFor("SELL").length, 15);
    assert.deepEqual(
      client.ordersFor("SELL", "GTC").map((o) => [o.size, o.price]),
      [[9, 0.5]],
    );
  });

  it("treats a remainder worth under five cents as dust", async () => {
    const { client, seller, delays } = setupDefaults();
    client.setBook("up", [[0.01, 100]], [[0.02, 100]]);

    const result = await seller.sell("up", 4, "UP");

    assert.equal(result.attempts, 5);
    assert.equal(result.phase2Ran, false);
    assert.deepEqual(delays, Array<number>(5).fill(300));
    assert.deepEqual(result.restingOrder, { orderId: "resting-1", shares: 4, price: 0.01 });
  });
});
