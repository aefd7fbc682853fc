import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  bestAskFromLevels,
  bestBidFromLevels,
  extractBestPrices,
  parseRawLevels,
} from "../../src/lib/orderbook-utils";

describe("parseRawLevels", () => {
  it("parses string and numeric levels in order", () => {
    assert.deepEqual(
      parseRawLevels([
        { price: "0.50", size: "10" },
        { price: 0.51, size: 5 },
      ]),
      [
        { price: 0.5, size: 10 },
        { price: 0.51, size: 5 },
      ],
    );
  });

  it("drops malformed and empty levels", () => {
    assert.deepEqual(
      parseRawLevels([
        { price: "abc", size: "10" },
        { price: "0.5", size: "0" },
        null,
        "0.5",
        { price: "0.49" },
        { price: "0.48", size: "3" },
      ]),
      [{ price: 0.48, size: 3 }],
    );
  });

  it("returns nothing for non-arrays", () => {
    assert.deepEqual(parseRawLevels(undefined), []);
    assert.deepEqual(parseRawLevels({ price: "0.5" }), []);
  });
});

describe("best price extraction", () => {
  const ascending = [
    { price: 0.48, size: 1 },
    { price: 0.49, size: 1 },
    { price: 0.5, size: 1 },
  ];
  const descending = [...ascending].reverse();

  it("finds the best bid in either order", () => {
    assert.equal(bestBidFromLevels(ascending), 0.5);
    assert.equal(bestBidFromLevels(descending), 0.5);
  });

  it("finds the best ask in either order", () => {
    assert.equal(bestAskFromLevels(ascending), 0.48);
    assert.equal(bestAskFromLevels(descending), 0.48);
  });

  it("returns null for an empty side", () => {
    assert.equal(bestBidFromLevels([]), null);
    assert.equal(bestAskFromLevels([]), null);
  });

  it("reads a REST book (bids ascending, asks descending)", () => {
    assert.deepEqual(
      extractBestPrices({
        bids: [
          { price: "0.01", size: "100" },
          { price: "0.51", size: "20" },
        ],
        asks: [
          { price: "0.99", size: "100" },
          { price: "0.53", size: "20" },
        ],
      }),
      { bestBid: 0.51, bestAsk: 0.53 },
    );
  });

  it("handles a missing side", () => {
    assert.deepEqual(extractBestPrices({ bids: [{ price: "0.4", size: "1" }] }), {
      bestBid: 0.4,
      bestAsk: null,
    });
  });
});
