import { ConfigurationError } from "../errors/app.errors";
import { POLYMARKET_API } from "../lib/constants";

export type EnvSource = Record<string, string | undefined>;

export type RuntimeEnv = {
  privateKey: string;
  rpcUrl: string;
  clobHost: string;
  funderAddress?: string;
  signatureType: number; // 0=EOA, 1=Proxy, 2=GnosisSafe
  polymarketApiKey?: string;
  polymarketApiSecret?: string;
  polymarketApiPassphrase?: string;
};

const DEFAULT_RPC_URL = "https://polygon-rpc.com";
const DEFAULT_SIGNATURE_TYPE = 2;
const SIGNATURE_TYPES = new Set([0, 1, 2]);

/**
 * Read a variable by its name or its lower-case spelling; blank counts as unset
 */
export const readVar = (source: EnvSource, key: string): string | undefined => {
  const value = source[key] ?? source[key.toLowerCase()];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

/**
 * Wallet and API credentials. Trading parameters live in loadConfig.ts.
 */
export function loadEnv(source: EnvSource = process.env): RuntimeEnv {
  const read = (key: string): string | undefined => readVar(source, key);

  const required = (name: string): string => {
    const v = read(name);
    if (!v) throw new ConfigurationError(`Missing required env var: ${name}`, { variable: name });
    return v;
  };

  const signatureTypeRaw = read("SIGNATURE_TYPE");
  const signatureType =
    signatureTypeRaw === undefined ? DEFAULT_SIGNATURE_TYPE : Number(signatureTypeRaw);
  if (!SIGNATURE_TYPES.has(signatureType)) {
    throw new ConfigurationError(
      `SIGNATURE_TYPE must be 0 (EOA), 1 (Proxy) or 2 (GnosisSafe), got "${signatureTypeRaw}"`,
      { variable: "SIGNATURE_TYPE" },
    );
  }

  const funderAddress = read("FUNDER_ADDRESS");
  if (signatureType !== 0 && !funderAddress) {
    throw new ConfigurationError(
      "FUNDER_ADDRESS is required for proxy and Safe signature types",
      { variable: "FUNDER_ADDRESS" },
    );
  }

  return {
    privateKey: required("PRIVATE_KEY"),
    rpcUrl: read("RPC_URL") ?? DEFAULT_RPC_URL,
    clobHost: read("CLOB_HOST") ?? POLYMARKET_API.CLOB,
    funderAddress,
    signatureType,
    polymarketApiKey: read("POLYMARKET_API_KEY"),
    polymarketApiSecret: read("POLYMARKET_API_SECRET"),
    polymarketApiPassphrase: read("POLYMARKET_API_PASSPHRASE") ?? read("POLYMARKET_PASSPHRASE"),
  };
}
