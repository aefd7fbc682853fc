import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { PriceCache } from "../../src/lib/price-cache";
import { QuoteSource } from "../../src/lib/quote-source";
import { FakeOrderClient, createCapturingLogger } from "../helpers/fake-order-client";

describe("QuoteSource", () => {
  it("serves fresh cache entries without touching the book", async () => {
    const client = new FakeOrderClient();
    const cache = new PriceCache();
    cache.update("up", 0.52, 0.53);
    const quotes = new QuoteSource(client, cache);

    assert.deepEqual(await quotes.getQuote("up"), { bestBid: 0.52, bestAsk: 0.53 });
    assert.equal(await quotes.getBestBid("up"), 0.52);
    assert.equal(await quotes.getBestAsk("up"), 0.53);
    assert.deepEqual(client.bookRequests, []);
  });

  it("falls back to the book when the cache is empty", async () => {
    const client = new FakeOrderClient();
    client.setBook("up", [[0.4, 10], [0.45, 5]], [[0.6, 10], [0.47, 5]]);
    const quotes = new QuoteSource(client, new PriceCache());

    assert.deepEqual(await quotes.getQuote("up"), { bestBid: 0.45, bestAsk: 0.47 });
    assert.deepEqual(client.bookRequests, ["up"]);
  });

  it("fills only the missing side from the book", async () => {
    const client = new FakeOrderClient();
    client.setBook("up", [[0.3, 1]], [[0.7, 1]]);
    const cache = new PriceCache();
    cache.update("up", 0.5);
    const quotes = new QuoteSource(client, cache);

    assert.deepEqual(await quotes.getQuote("up"), { bestBid: 0.5, bestAsk: 0.7 });
  });

  it("works without a cache", async () => {
    const client = new FakeOrderClient();
    client.setBook("down", [[0.2, 1]], [[0.25, 1]]);
    const quotes = new QuoteSource(client);

    assert.equal(await quotes.getBestBid("down"), 0.2);
  });

  it("fetchQuote always reads the book", async () => {
    const client = new FakeOrderClient();
    client.setBook("up", [[0.48, 1]], [[0.49, 1]]);
    const cache = new PriceCache();
    cache.update("up", 0.52, 0.53);
    const quotes = new QuoteSource(client, cache);

    assert.deepEqual(await quotes.fetchQuote("up"), { bestBid: 0.48, bestAsk: 0.49 });
  });

  it("reads a failed lookup as an empty book and warns", async () => {
    const client = new FakeOrderClient();
    client.failBook("up", new Error("timeout"));
    const logger = createCapturingLogger();
    const quotes = new QuoteSource(client, null, logger);

    assert.deepEqual(await quotes.fetchQuote("up"), { bestBid: null, bestAsk: null });
    assert.equal(logger.lines.length, 1);
    assert.equal(logger.lines[0].level, "warn");
    assert.match(logger.lines[0].msg, /timeout/);
  });
});
