import type { JsonRpcSigner as ClobJsonRpcSigner } from "@ethersproject/providers";
import type { Wallet as ClobWallet } from "@ethersproject/wallet";
import type { Wallet as AppWallet } from "ethers";

/**
 * @polymarket/clob-client is typed against the ethers v5 signer, which signs
 * EIP-712 payloads through `_signTypedData`. Our wallet is ethers v6.
 */
export type ClobSigner = ClobWallet | ClobJsonRpcSigner;

type TypedDataWallet = AppWallet & {
  _signTypedData?: AppWallet["signTypedData"];
};

/**
 * Map the v6 `signTypedData` onto the v5 `_signTypedData` name the client
 * calls, then hand the wallet over under the client's signer type.
 */
export const asClobSigner = (wallet: AppWallet): ClobSigner => {
  const typedWallet: TypedDataWallet = wallet;
  if (typeof typedWallet._signTypedData !== "function") {
    typedWallet._signTypedData = wallet.signTypedData.bind(wallet);
  }
  return typedWallet as unknown as ClobSigner;
};
