import type { Wallet as ClobWallet } from "@ethersproject/wallet";
import type { Wallet as AppWallet } from "ethers";

/**
 * The CLOB client is typed against ethers v5 signers; the app runs ethers v6.
 * v6 renamed `_signTypedData` to `signTypedData`, so the v5 name is added as
 * an alias before the wallet is handed over.
 */
export type ClobSigner = ClobWallet;

type TypedDataFn = AppWallet["signTypedData"];

type TypedDataSigner = AppWallet & {
  _signTypedData?: TypedDataFn;
};

const ensureTypedDataCompatibility = (wallet: AppWallet): AppWallet => {
  const typedSigner: TypedDataSigner = wallet;
  if (typeof typedSigner._signTypedData !== "function") {
    typedSigner._signTypedData = async (domain, types, value) =>
      wallet.signTypedData(domain, types, value);
  }
  return wallet;
};

export const asClobSigner = (wallet: AppWallet): ClobSigner =>
  ensureTypedDataCompatibility(wallet) as unknown as ClobSigner;
