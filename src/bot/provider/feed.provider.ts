import axios, { type AxiosInstance } from "axios";
import { BOT_USER_AGENT } from "../../constants/grades.constants";
import {
  FeedBlockedError,
  FeedPayloadError,
  FeedTransportError,
  toError,
} from "../../errors/app.errors";
import { sanitizeErrorMessage } from "../../utils/sanitize-axios-error.util";
import type {
  FeedDebugSummary,
  FeedQuery,
  FeedResult,
  OpportunityFeed,
  PickReport,
} from "../types";
import { parseCandidate } from "./candidate";

export const CANDIDATES_PATH = "/api/bot/candidates";
export const PICKS_PATH = "/api/bot/picks";

const RAY_ID_PATTERNS = [
  /Cloudflare Ray ID:\s*<strong[^>]*>([^<]+)<\/strong>/i,
  /Cloudflare Ray ID:\s*([A-Za-z0-9]+)/i,
];

export function extractCloudflareRayId(text: string): string | undefined {
  for (const pattern of RAY_ID_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[1].trim();
  }
  return undefined;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const bodyText = (data: unknown): string => {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
};

/**
 * Map an HTTP failure onto the feed's error variants. A 403, or any response
 * that is a Cloudflare challenge page, is a block; everything else is transport.
 */
export function classifyFeedError(err: unknown, endpoint: string): Error {
  if (err instanceof FeedBlockedError || err instanceof FeedTransportError) return err;
  if (!axios.isAxiosError(err)) {
    return new FeedTransportError(sanitizeErrorMessage(err), endpoint, undefined, toError(err));
  }
  const status = err.response?.status;
  const text = bodyText(err.response?.data);
  const headerRay = err.response?.headers?.["cf-ray"];
  const rayId =
    extractCloudflareRayId(text) ?? (typeof headerRay === "string" ? headerRay : undefined);
  const looksLikeCloudflare = /cloudflare/i.test(text) && rayId !== undefined;
  if (status === 403 || looksLikeCloudflare) {
    return new FeedBlockedError(
      `Feed refused service (HTTP ${status ?? "?"}${rayId ? ` ray=${rayId}` : ""})`,
      endpoint,
      rayId,
      err,
    );
  }
  return new FeedTransportError(sanitizeErrorMessage(err), endpoint, status, err);
}

export function createFeedHttpClient(params: {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}): AxiosInstance {
  return axios.create({
    baseURL: params.baseUrl,
    timeout: params.timeoutMs,
    headers: {
      Authorization: `Bearer ${params.apiKey}`,
      "User-Agent": BOT_USER_AGENT,
      Accept: "application/json",
    },
  });
}

/**
 * Read-only client for the graded-candidate feed, plus the pick report the
 * feed accepts after each dispatch.
 */
export class HttpOpportunityFeed implements OpportunityFeed {
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(params: { http: AxiosInstance; now?: () => number }) {
    this.http = params.http;
    this.now = params.now ?? Date.now;
  }

  async fetch(query: FeedQuery): Promise<FeedResult> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(CANDIDATES_PATH, {
        params: {
          windowMinutes: String(query.windowMinutes),
          minGrade: query.minGrade,
          limit: String(query.limit),
          requireMicrostructure: query.requireMicrostructure ? "true" : "false",
          marketQualityThreshold: String(query.marketQualityThreshold),
          debug: "true",
        },
      });
      data = response.data;
    } catch (err) {
      throw classifyFeedError(err, CANDIDATES_PATH);
    }

    if (!isRecord(data)) {
      throw new FeedPayloadError(`Feed returned ${typeof data} instead of an object`);
    }
    const candidates = data.candidates ?? [];
    if (!Array.isArray(candidates)) {
      throw new FeedPayloadError("Feed field `candidates` is not an array");
    }

    const fetchedAt = this.now();
    const result: FeedResult = { opportunities: [], rejected: [] };
    candidates.forEach((raw: unknown, index: number) => {
      const parsed = parseCandidate(raw, fetchedAt);
      if (parsed.ok) result.opportunities.push(parsed.opportunity);
      else result.rejected.push({ index, reason: parsed.reason });
    });
    if (isRecord(data.debug)) {
      result.debug = toDebugSummary(data.debug);
    }
    return result;
  }

  async reportPick(pick: PickReport): Promise<void> {
    try {
      await this.http.post(PICKS_PATH, pick);
    } catch (err) {
      throw classifyFeedError(err, PICKS_PATH);
    }
  }
}

function toDebugSummary(debug: Record<string, unknown>): FeedDebugSummary {
  const num = (v: unknown): number | undefined => (typeof v === "number" ? v : undefined);
  const rec = (v: unknown): Record<string, unknown> | undefined => (isRecord(v) ? v : undefined);
  return {
    totalEntries: num(debug.totalEntries),
    upcomingEntries: num(debug.upcomingEntries),
    excluded: rec(debug.excluded),
    dedupDropped: num(debug.dedupDropped),
    dedupReasons: rec(debug.dedupReasons),
  };
}
