import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { loadEnv, readVar } from "../../src/config/env";
import { ConfigurationError } from "../../src/errors/app.errors";
import { POLYMARKET_API } from "../../src/lib/constants";

const PRIVATE_KEY = "test-private-key";
const FUNDER = "0x0000000000000000000000000000000000000001";

describe("readVar", () => {
  it("reads the lower-case spelling and trims", () => {
    assert.equal(readVar({ rpc_url: "  http://localhost:8545 " }, "RPC_URL"), "http://localhost:8545");
  });

  it("treats blank as unset", () => {
    assert.equal(readVar({ RPC_URL: "   " }, "RPC_URL"), undefined);
  });
});

describe("loadEnv", () => {
  it("applies defaults for an EOA wallet", () => {
    const env = loadEnv({ PRIVATE_KEY, SIGNATURE_TYPE: "0" });

    assert.deepEqual(env, {
      privateKey: PRIVATE_KEY,
      rpcUrl: "https://polygon-rpc.com",
      clobHost: POLYMARKET_API.CLOB,
      funderAddress: undefined,
      signatureType: 0,
      polymarketApiKey: undefined,
      polymarketApiSecret: undefined,
      polymarketApiPassphrase: undefined,
    });
  });

  it("defaults to the Safe signature type, which needs a funder", () => {
    assert.throws(
      () => loadEnv({ PRIVATE_KEY }),
      (err: unknown) => err instanceof ConfigurationError && err.variable === "FUNDER_ADDRESS",
    );
    assert.equal(loadEnv({ PRIVATE_KEY, FUNDER_ADDRESS: FUNDER }).signatureType, 2);
  });

  it("rejects an unknown signature type", () => {
    assert.throws(
      () => loadEnv({ PRIVATE_KEY, SIGNATURE_TYPE: "3", FUNDER_ADDRESS: FUNDER }),
      /SIGNATURE_TYPE must be 0 \(EOA\), 1 \(Proxy\) or 2 \(GnosisSafe\), got "3"/,
    );
  });

  it("requires a private key", () => {
    assert.throws(() => loadEnv({ SIGNATURE_TYPE: "0" }), /Missing required env var: PRIVATE_KEY/);
  });

  it("accepts the short passphrase name", () => {
    const env = loadEnv({
      PRIVATE_KEY,
      SIGNATURE_TYPE: "0",
      POLYMARKET_API_KEY: "test-key",
      POLYMARKET_API_SECRET: "test-secret",
      POLYMARKET_PASSPHRASE: "test-passphrase",
    });
    assert.equal(env.polymarketApiKey, "test-key");
    assert.equal(env.polymarketApiSecret, "test-secret");
    assert.equal(env.polymarketApiPassphrase, "test-passphrase");
  });
});
