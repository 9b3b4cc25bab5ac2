import axios, { type AxiosInstance } from "axios";
import { BOT_USER_AGENT } from "../../constants/grades.constants";
import type { Logger } from "../../utils/logger.util";
import { sanitizeErrorMessage } from "../../utils/sanitize-axios-error.util";
import type { OutcomeSide } from "../types";

export type MarketToken = { outcome: string; tokenId: string };

export type TokenLookup = {
  conditionId: string;
  side: OutcomeSide;
  sideLabel?: string;
};

export interface TokenResolver {
  resolve: (lookup: TokenLookup) => Promise<string | undefined>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const firstString = (row: Record<string, unknown>, keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = row[key];
    if (typeof value === "string" && value) return value;
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
  }
  return undefined;
};

export const normalizeOutcome = (value: string): string =>
  value.trim().toLowerCase().split(/\s+/).filter(Boolean).join(" ");

export function mapTokens(rows: unknown): MarketToken[] {
  if (!Array.isArray(rows)) return [];
  const mapped: MarketToken[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const outcome = firstString(row, ["outcome", "name", "label", "outcome_name"]);
    const tokenId = firstString(row, ["token_id", "tokenId", "clobTokenId", "id"]);
    if (outcome && tokenId) mapped.push({ outcome, tokenId });
  }
  return mapped;
}

/**
 * Exact label match, then substring match, then position for a two-outcome
 * market (side A is the first token).
 */
export function pickToken(
  tokens: MarketToken[],
  side: OutcomeSide,
  sideLabel?: string,
): string | undefined {
  if (sideLabel) {
    const target = normalizeOutcome(sideLabel);
    const exact = tokens.find((t) => normalizeOutcome(t.outcome) === target);
    if (exact) return exact.tokenId;
    const partial = tokens.find((t) => normalizeOutcome(t.outcome).includes(target));
    if (partial) return partial.tokenId;
  }
  if (tokens.length === 2) {
    return side === "A" ? tokens[0].tokenId : tokens[1].tokenId;
  }
  return undefined;
}

export const DEFAULT_TOKEN_CACHE_LIMIT = 500;

/**
 * Looks up a market's outcome tokens on the CLOB, falling back to Gamma.
 * Non-empty token maps are cached per condition id, least recently used
 * evicted first once `cacheLimit` markets are held.
 */
export class VenueTokenResolver implements TokenResolver {
  private readonly clob: AxiosInstance;
  private readonly gamma: AxiosInstance;
  private readonly logger?: Logger;
  private readonly cache = new Map<string, MarketToken[]>();
  private readonly cacheLimit: number;

  constructor(params: {
    clobHost: string;
    gammaHost: string;
    timeoutMs: number;
    cacheLimit?: number;
    logger?: Logger;
    clobHttp?: AxiosInstance;
    gammaHttp?: AxiosInstance;
  }) {
    const headers = { "User-Agent": BOT_USER_AGENT, Accept: "application/json" };
    this.clob =
      params.clobHttp ?? axios.create({ baseURL: params.clobHost, timeout: params.timeoutMs, headers });
    this.gamma =
      params.gammaHttp ?? axios.create({ baseURL: params.gammaHost, timeout: params.timeoutMs, headers });
    this.logger = params.logger;
    this.cacheLimit = Math.max(1, params.cacheLimit ?? DEFAULT_TOKEN_CACHE_LIMIT);
  }

  async resolve(lookup: TokenLookup): Promise<string | undefined> {
    const tokens = await this.tokensFor(lookup.conditionId);
    if (!tokens.length) return undefined;
    return pickToken(tokens, lookup.side, lookup.sideLabel);
  }

  async tokensFor(conditionId: string): Promise<MarketToken[]> {
    const cached = this.cache.get(conditionId);
    if (cached) {
      this.cache.delete(conditionId);
      this.cache.set(conditionId, cached);
      return cached;
    }
    let tokens = await this.fetchClobTokens(conditionId);
    if (!tokens.length) tokens = await this.fetchGammaTokens(conditionId);
    if (tokens.length) this.remember(conditionId, tokens);
    return tokens;
  }

  cacheSize(): number {
    return this.cache.size;
  }

  private remember(conditionId: string, tokens: MarketToken[]): void {
    this.cache.set(conditionId, tokens);
    for (const key of this.cache.keys()) {
      if (this.cache.size <= this.cacheLimit) break;
      this.cache.delete(key);
    }
  }

  private async fetchClobTokens(conditionId: string): Promise<MarketToken[]> {
    try {
      const { data } = await this.clob.get<unknown>(`/markets/${encodeURIComponent(conditionId)}`);
      return isRecord(data) ? mapTokens(data.tokens) : [];
    } catch (err) {
      this.logger?.debug(`[Tokens] CLOB lookup failed for ${conditionId}: ${sanitizeErrorMessage(err)}`);
      return [];
    }
  }

  private async fetchGammaTokens(conditionId: string): Promise<MarketToken[]> {
    try {
      const { data } = await this.gamma.get<unknown>("/markets", {
        params: { condition_id: conditionId, active: "true", limit: "1" },
      });
      const markets = Array.isArray(data)
        ? data
        : isRecord(data) && Array.isArray(data.data)
          ? data.data
          : [];
      const market: unknown = markets[0];
      return isRecord(market) ? mapTokens(market.tokens) : [];
    } catch (err) {
      this.logger?.debug(`[Tokens] Gamma lookup failed for ${conditionId}: ${sanitizeErrorMessage(err)}`);
      return [];
    }
  }
}
