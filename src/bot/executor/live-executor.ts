import axios from "axios";
import { AssetType, OrderType, Side } from "@polymarket/clob-client";
import { TimeoutError } from "../../errors/app.errors";
import type { Logger } from "../../utils/logger.util";
import { sanitizeErrorMessage } from "../../utils/sanitize-axios-error.util";
import { withTimeout } from "../../utils/timeout.util";
import { extractCloudflareRayId } from "../provider/feed.provider";
import type { ExecutionClient, OrderRequest, OrderResult, PreflightReport } from "../types";
import type { TokenResolver } from "./token-resolver";

/**
 * The slice of the CLOB client the bot calls. `ClobClient` satisfies it.
 */
export interface VenueClient {
  getOk(): Promise<unknown>;
  getServerTime(): Promise<unknown>;
  getBalanceAllowance(params: { asset_type: AssetType; token_id?: string }): Promise<unknown>;
  getMidpoint(tokenId: string): Promise<unknown>;
  createMarketOrder(args: { tokenID: string; amount: number; side: Side }): Promise<unknown>;
  postOrder(order: unknown, orderType: OrderType): Promise<unknown>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const describe = (value: unknown): string => {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

type VenueFailure = { error: string; blocked: boolean; rayId?: string };

export const DEFAULT_VENUE_TIMEOUT_MS = 15_000;

/**
 * A 403 or a Cloudflare challenge page from the venue, thrown or returned.
 */
export function classifyVenueFailure(err: unknown): VenueFailure {
  let status: number | undefined;
  let text: string;
  if (axios.isAxiosError(err)) {
    status = err.response?.status;
    text = describe(err.response?.data ?? "");
  } else if (err instanceof Error) {
    text = err.message;
  } else if (isRecord(err)) {
    status = typeof err.status === "number" ? err.status : undefined;
    text = describe(err.error ?? err.errorMsg ?? err);
  } else {
    text = String(err);
  }
  const rayId = extractCloudflareRayId(text);
  const blocked = status === 403 || (/cloudflare/i.test(text) && rayId !== undefined);
  const error = blocked
    ? `venue blocked request (HTTP ${status ?? "?"}${rayId ? ` ray=${rayId}` : ""})`
    : axios.isAxiosError(err) || err instanceof Error
      ? sanitizeErrorMessage(err)
      : text.slice(0, 500);
  return { error, blocked, rayId };
}

/**
 * Post-order responses carry failures in the body rather than throwing.
 */
function readPostResponse(response: unknown): { orderId?: string; failure?: VenueFailure } {
  if (!isRecord(response)) return {};
  const orderId =
    typeof response.orderID === "string" && response.orderID
      ? response.orderID
      : typeof response.orderId === "string" && response.orderId
        ? response.orderId
        : undefined;
  const rejected =
    response.success === false ||
    response.error !== undefined ||
    (typeof response.status === "number" && response.status >= 400);
  if (rejected) return { orderId, failure: classifyVenueFailure(response) };
  return { orderId };
}

/**
 * Real-money client: resolves the side's outcome token and sends a
 * fill-or-kill market buy for the stake.
 */
export class LiveExecutionClient implements ExecutionClient {
  readonly mode = "live" as const;
  private readonly connect: () => Promise<VenueClient>;
  private readonly tokens: TokenResolver;
  private readonly logger?: Logger;
  private readonly preflightConditionId?: string;
  private readonly timeoutMs: number;
  private venue?: Promise<VenueClient>;

  constructor(params: {
    connect: () => Promise<VenueClient>;
    tokens: TokenResolver;
    logger?: Logger;
    preflightConditionId?: string;
    /** Upper bound on each connect / sign+post / preflight call */
    timeoutMs?: number;
  }) {
    this.connect = params.connect;
    this.tokens = params.tokens;
    this.logger = params.logger;
    this.preflightConditionId = params.preflightConditionId;
    this.timeoutMs = params.timeoutMs ?? DEFAULT_VENUE_TIMEOUT_MS;
  }

  private getVenue(): Promise<VenueClient> {
    if (!this.venue) {
      this.venue = withTimeout(this.connect(), this.timeoutMs, "connect").catch((err: unknown) => {
        this.venue = undefined;
        throw err;
      });
    }
    return this.venue;
  }

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    const tokenId = await this.tokens.resolve({
      conditionId: request.conditionId,
      side: request.side,
      sideLabel: request.sideLabel,
    });
    if (!tokenId) {
      return { success: false, error: `token_id not found for condition ${request.conditionId}` };
    }

    try {
      const response = await withTimeout(
        this.submitOrder(tokenId, request.size),
        this.timeoutMs,
        `order ${request.identity}`,
      );
      const { orderId, failure } = readPostResponse(response);
      if (failure) {
        return { success: false, tokenId, ...failure };
      }
      this.logger?.info(
        `[Live] BUY ${request.identity} token=${tokenId} $${request.size.toFixed(2)} order=${orderId ?? "?"}`,
      );
      return { success: true, tokenId, externalOrderId: orderId };
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.logger?.warn(`[Live] ${err.message}; outcome unknown, not recorded`);
        return { success: false, tokenId, error: "timeout", blocked: false };
      }
      return { success: false, tokenId, ...classifyVenueFailure(err) };
    }
  }

  private async submitOrder(tokenId: string, amount: number): Promise<unknown> {
    const venue = await this.getVenue();
    const signed = await venue.createMarketOrder({ tokenID: tokenId, amount, side: Side.BUY });
    return venue.postOrder(signed, OrderType.FOK);
  }

  async preflight(): Promise<PreflightReport> {
    const checks: PreflightReport["checks"] = [];
    const run = async (name: string, fn: () => Promise<unknown>): Promise<unknown> => {
      try {
        const value = await withTimeout(fn(), this.timeoutMs, name);
        checks.push({ name, ok: true, detail: describe(value) });
        return value;
      } catch (err) {
        checks.push({ name, ok: false, detail: sanitizeErrorMessage(err) });
        return undefined;
      }
    };

    let venue: VenueClient;
    try {
      venue = await this.getVenue();
      checks.push({ name: "client", ok: true });
    } catch (err) {
      checks.push({ name: "client", ok: false, detail: sanitizeErrorMessage(err) });
      return { ok: false, mode: this.mode, checks };
    }

    await run("clob_ok", () => venue.getOk());
    await run("server_time", () => venue.getServerTime());
    await run("collateral_balance", () =>
      venue.getBalanceAllowance({ asset_type: AssetType.COLLATERAL }),
    );

    const conditionId = this.preflightConditionId;
    if (conditionId) {
      const tokenId = await this.tokens.resolve({ conditionId, side: "A" });
      if (!tokenId) {
        checks.push({ name: "token", ok: false, detail: `token_id not found for condition_id ${conditionId}` });
      } else {
        checks.push({ name: "token", ok: true, detail: tokenId });
        await run("midpoint", () => venue.getMidpoint(tokenId));
        await run("conditional_balance", () =>
          venue.getBalanceAllowance({ asset_type: AssetType.CONDITIONAL, token_id: tokenId }),
        );
      }
    }

    return { ok: checks.every((c) => c.ok), mode: this.mode, checks };
  }
}
