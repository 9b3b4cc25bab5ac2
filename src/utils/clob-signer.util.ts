import type { ClobClient } from "@polymarket/clob-client";
import type { TypedDataDomain, TypedDataField, Wallet } from "ethers";

export type ClobSigner = NonNullable<ConstructorParameters<typeof ClobClient>[2]>;

type LegacyTypedDataSigner = Wallet & {
  _signTypedData?: (
    domain: TypedDataDomain,
    types: Record<string, TypedDataField[]>,
    value: Record<string, unknown>,
  ) => Promise<string>;
};

const ensureTypedDataCompatibility = (signer: Wallet): Wallet => {
  const legacy: LegacyTypedDataSigner = signer;
  if (typeof legacy._signTypedData !== "function") {
    legacy._signTypedData = async (domain, types, value) =>
      signer.signTypedData(domain, types, value);
  }
  return signer;
};

/**
 * The CLOB client is typed against the ethers v5 signer surface; an ethers v6
 * wallet needs the old `_signTypedData` name before it can be handed over.
 */
export const asClobSigner = (signer: Wallet): ClobSigner =>
  ensureTypedDataCompatibility(signer) as unknown as ClobSigner;
