/**
 * Tests for error handling utilities
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import {
  isRecord,
  readNumber,
  readString,
  toError,
  toErrorMessage,
} from "../../src/lib/error-handling";

describe("Error Handling Utilities", () => {
  describe("toErrorMessage", () => {
    it("should use the message of an Error", () => {
      assert.strictEqual(toErrorMessage(new Error("socket hang up")), "socket hang up");
    });

    it("should pass strings through", () => {
      assert.strictEqual(toErrorMessage("not enough balance"), "not enough balance");
    });

    it("should serialize plain objects", () => {
      assert.strictEqual(toErrorMessage({ status: 400 }), '{"status":400}');
    });

    it("should fall back for nullish values", () => {
      assert.strictEqual(toErrorMessage(undefined), "Unknown error");
      assert.strictEqual(toErrorMessage(null), "Unknown error");
    });

    it("should not throw on circular objects", () => {
      const circular: Record<string, unknown> = {};
      circular.self = circular;
      assert.strictEqual(toErrorMessage(circular), "[object Object]");
    });
  });

  describe("toError", () => {
    it("should keep Error instances", () => {
      const err = new Error("boom");
      assert.strictEqual(toError(err), err);
    });

    it("should wrap other values", () => {
      assert.strictEqual(toError("boom").message, "boom");
    });
  });

  describe("payload readers", () => {
    it("should read numbers sent as strings", () => {
      assert.strictEqual(readNumber("0.52"), 0.52);
      assert.strictEqual(readNumber(7), 7);
      assert.strictEqual(readNumber(""), undefined);
      assert.strictEqual(readNumber("abc"), undefined);
      assert.strictEqual(readNumber(Number.NaN), undefined);
    });

    it("should read non-empty strings only", () => {
      assert.strictEqual(readString("abc"), "abc");
      assert.strictEqual(readString(""), undefined);
      assert.strictEqual(readString(5), undefined);
    });

    it("should treat only plain objects as records", () => {
      assert.strictEqual(isRecord({}), true);
      assert.strictEqual(isRecord([]), false);
      assert.strictEqual(isRecord(null), false);
    });
  });
});
