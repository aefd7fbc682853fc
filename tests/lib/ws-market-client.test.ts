/**
 * MarketDataStream Tests
 *
 * Frames are fed straight into handleMessage; nothing connects.
 */

import assert from "node:assert";
import { describe, it, beforeEach } from "node:test";

import { MarketDataStream } from "../../src/lib/ws-market-client";
import { PriceCache } from "../../src/lib/price-cache";
import { createCapturingLogger } from "../helpers/fake-order-client";

interface Update {
  tokenId: string;
  bestBid: number | null;
  bestAsk: number | null;
}

describe("MarketDataStream", () => {
  let stream: MarketDataStream;
  let cache: PriceCache;
  let updates: Update[];

  beforeEach(() => {
    cache = new PriceCache();
    updates = [];
    stream = new MarketDataStream({
      tokenIds: ["up-token", "down-token"],
      priceCache: cache,
      url: "wss://test.example.com/ws/market",
      onPriceUpdate: (tokenId, bestBid, bestAsk) => updates.push({ tokenId, bestBid, bestAsk }),
    });
  });

  describe("Initial state", () => {
    it("should start DISCONNECTED with every token subscribed", () => {
      assert.strictEqual(stream.getState(), "DISCONNECTED");
      assert.strictEqual(stream.isConnected(), false);
      assert.deepStrictEqual(stream.getSubscriptions(), ["up-token", "down-token"]);
      assert.deepStrictEqual(stream.getMetrics(), {
        state: "DISCONNECTED",
        messagesReceived: 0,
        lastMessageAgeMs: 0,
        disconnectCount: 0,
      });
    });
  });

  describe("price_change events", () => {
    it("should apply best bid/ask per asset", () => {
      stream.handleMessage(
        JSON.stringify({
          event_type: "price_change",
          price_changes: [
            { asset_id: "up-token", best_bid: "0.51", best_ask: "0.52" },
            { asset_id: "other-token", best_bid: "0.10", best_ask: "0.11" },
          ],
        }),
      );

      assert.deepStrictEqual(updates, [{ tokenId: "up-token", bestBid: 0.51, bestAsk: 0.52 }]);
      assert.strictEqual(cache.getBestBid("up-token"), 0.51);
      assert.strictEqual(cache.getBestAsk("up-token"), 0.52);
    });
  });

  describe("book snapshots", () => {
    it("should take best prices from either end of top-level arrays", () => {
      stream.handleMessage(
        JSON.stringify({
          event_type: "book",
          asset_id: "down-token",
          bids: [
            { price: "0.46", size: "10" },
            { price: "0.48", size: "5" },
          ],
          asks: [
            { price: "0.49", size: "5" },
            { price: "0.60", size: "10" },
          ],
        }),
      );

      assert.deepStrictEqual(updates, [{ tokenId: "down-token", bestBid: 0.48, bestAsk: 0.49 }]);
    });

    it("should read a nested book object", () => {
      stream.handleMessage(
        JSON.stringify({
          market: "up-token",
          book: { bids: [{ price: "0.30", size: "1" }], asks: [{ price: "0.31", size: "1" }] },
        }),
      );

      assert.deepStrictEqual(updates, [{ tokenId: "up-token", bestBid: 0.3, bestAsk: 0.31 }]);
      assert.strictEqual(cache.getBestBid("up-token"), 0.3);
      assert.strictEqual(cache.getBestAsk("up-token"), 0.31);
    });
  });

  describe("single price updates", () => {
    it("should map BUY to the bid and SELL to the ask, keeping the other side", () => {
      stream.handleMessage(JSON.stringify({ asset_id: "up-token", price: "0.50", side: "BUY" }));
      stream.handleMessage(JSON.stringify({ asset_id: "up-token", price: "0.52", side: "sell" }));

      assert.deepStrictEqual(updates, [
        { tokenId: "up-token", bestBid: 0.5, bestAsk: null },
        { tokenId: "up-token", bestBid: 0.5, bestAsk: 0.52 },
      ]);
    });
  });

  describe("batches and noise", () => {
    it("should process every update in an array frame", () => {
      stream.handleMessage(
        JSON.stringify([
          { asset_id: "up-token", price: "0.50", side: "BUY" },
          { asset_id: "down-token", price: "0.49", side: "BUY" },
        ]),
      );

      assert.strictEqual(updates.length, 2);
      assert.strictEqual(cache.getBestBid("down-token"), 0.49);
    });

    it("should ignore PONG, non-JSON and unknown assets", () => {
      stream.handleMessage("PONG");
      stream.handleMessage("{not json");
      stream.handleMessage(JSON.stringify({ asset_id: "stranger", price: "0.5", side: "BUY" }));

      assert.strictEqual(updates.length, 0);
      assert.strictEqual(stream.getMetrics().messagesReceived, 3);
    });

    it("should not notify when no positive price arrives", () => {
      stream.handleMessage(
        JSON.stringify({
          event_type: "price_change",
          price_changes: [{ asset_id: "up-token", best_bid: "0", best_ask: "" }],
        }),
      );

      assert.strictEqual(updates.length, 0);
      assert.strictEqual(cache.get("up-token"), null);
    });
  });

  describe("price update handler", () => {
    it("should keep the cache current and log when the handler throws", () => {
      const logger = createCapturingLogger();
      const throwing = new MarketDataStream({
        tokenIds: ["up-token"],
        priceCache: cache,
        url: "wss://test.example.com/ws/market",
        logger,
        onPriceUpdate: () => {
          throw new Error("exit check failed");
        },
      });

      throwing.handleMessage(JSON.stringify({ asset_id: "up-token", price: "0.50", side: "BUY" }));
      throwing.handleMessage(JSON.stringify({ asset_id: "up-token", price: "0.52", side: "SELL" }));

      assert.strictEqual(cache.getBestBid("up-token"), 0.5);
      assert.strictEqual(cache.getBestAsk("up-token"), 0.52);
      assert.deepStrictEqual(
        logger.lines.filter((l) => l.level === "error").map((l) => l.msg),
        ["[WS-Market] Price update handler failed", "[WS-Market] Price update handler failed"],
      );
    });
  });

  describe("disconnect", () => {
    it("should be safe without a socket", () => {
      stream.disconnect();
      assert.strictEqual(stream.getState(), "DISCONNECTED");
    });
  });
});
