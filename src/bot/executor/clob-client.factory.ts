import { Wallet } from "ethers";
import { ClobClient, type ApiKeyCreds, type Chain } from "@polymarket/clob-client";
import { SignatureType } from "@polymarket/order-utils";
import type { BotConfig } from "../../config/bot-config";
import { ConfigurationError, TradeExecutionError } from "../../errors/app.errors";
import type { Logger } from "../../utils/logger.util";
import { asClobSigner } from "../../utils/clob-signer.util";
import { sanitizeErrorMessage } from "../../utils/sanitize-axios-error.util";

const toSignatureType = (value: 0 | 1 | 2): SignatureType => {
  if (value === 1) return SignatureType.POLY_PROXY;
  if (value === 2) return SignatureType.POLY_GNOSIS_SAFE;
  return SignatureType.EOA;
};

const hasCompleteCreds = (creds: Partial<ApiKeyCreds> | undefined): creds is ApiKeyCreds =>
  Boolean(creds?.key && creds.secret && creds.passphrase);

/**
 * Build an authenticated CLOB client. Configured API credentials are used
 * as-is; otherwise they are created or derived from the wallet.
 */
export async function createClobClient(
  poly: BotConfig["poly"],
  logger?: Logger,
): Promise<ClobClient> {
  if (!poly.privateKey) {
    throw new ConfigurationError("POLY_PRIVATE_KEY missing for live trading");
  }
  const pk = poly.privateKey.startsWith("0x") ? poly.privateKey : `0x${poly.privateKey}`;
  const wallet = new Wallet(pk);
  const signer = asClobSigner(wallet);
  const chain: Chain = poly.chainId;
  const signatureType = toSignatureType(poly.signatureType);

  logger?.info(
    `[CLOB] Wallet ${wallet.address.slice(0, 10)}...${wallet.address.slice(-6)} sigType=${poly.signatureType}${poly.funder ? ` funder=${poly.funder}` : ""}`,
  );

  const configured: Partial<ApiKeyCreds> = {
    key: poly.apiKey,
    secret: poly.apiSecret,
    passphrase: poly.apiPassphrase,
  };
  let creds: ApiKeyCreds;
  if (hasCompleteCreds(configured)) {
    logger?.info("[CLOB] Using configured API credentials");
    creds = configured;
  } else {
    const bootstrap = new ClobClient(poly.clobHost, chain, signer, undefined, signatureType, poly.funder);
    let derived: ApiKeyCreds | undefined;
    try {
      derived = await bootstrap.createOrDeriveApiKey();
    } catch (err) {
      throw new TradeExecutionError(`Failed to derive API credentials: ${sanitizeErrorMessage(err)}`);
    }
    if (!hasCompleteCreds(derived)) {
      throw new TradeExecutionError("Derived API credentials are incomplete");
    }
    logger?.info(`[CLOB] Credentials derived (key: ...${derived.key.slice(-6)})`);
    creds = derived;
  }

  return new ClobClient(poly.clobHost, chain, signer, creds, signatureType, poly.funder);
}
