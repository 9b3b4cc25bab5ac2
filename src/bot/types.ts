export type OutcomeSide = "A" | "B";

export type Opportunity = {
  /** `<conditionId>:<side>` */
  identity: string;
  conditionId: string;
  side: OutcomeSide;
  grade: string;
  /** Price of the chosen side, 0..1 exclusive */
  price: number;
  /** Believed probability the chosen side wins */
  trueProb: number;
  /** Epoch ms when the underlying event starts/resolves */
  eventTime?: number;
  /** Epoch ms when the feed surfaced the signal */
  discoveredAt: number;
  marketTitle?: string;
  eventLabel?: string;
  sideLabel?: string;
  otherSideLabel?: string;
  signalScore?: number;
  edgeRating?: number;
  warnings?: string[];
};

export type FeedQuery = {
  windowMinutes: number;
  minGrade: string;
  limit: number;
  requireMicrostructure: boolean;
  marketQualityThreshold: number;
};

export type FeedDebugSummary = {
  totalEntries?: number;
  upcomingEntries?: number;
  excluded?: Record<string, unknown>;
  dedupDropped?: number;
  dedupReasons?: Record<string, unknown>;
};

export type FeedResult = {
  opportunities: Opportunity[];
  /** Records the feed sent that could not be turned into opportunities */
  rejected: Array<{ index: number; reason: string }>;
  debug?: FeedDebugSummary;
};

export type PickReport = {
  conditionId: string;
  marketTitle?: string;
  eventTime?: string;
  grade: string;
  signalScore?: number;
  edgeRating?: number;
  sharpSide: OutcomeSide;
  price: number;
};

export interface OpportunityFeed {
  fetch: (query: FeedQuery) => Promise<FeedResult>;
  reportPick?: (pick: PickReport) => Promise<void>;
}

export type ExecutionMode = "paper" | "live";

export type OrderRequest = {
  identity: string;
  conditionId: string;
  side: OutcomeSide;
  sideLabel?: string;
  otherSideLabel?: string;
  price: number;
  /** Collateral to spend, USD */
  size: number;
};

export type OrderResult = {
  success: boolean;
  externalOrderId?: string;
  tokenId?: string;
  error?: string;
  /** Venue refused service outright (403 / Cloudflare) */
  blocked?: boolean;
  rayId?: string;
};

export type PreflightReport = {
  ok: boolean;
  mode: ExecutionMode;
  checks: Array<{ name: string; ok: boolean; detail?: string }>;
};

export interface ExecutionClient {
  readonly mode: ExecutionMode;
  placeOrder: (request: OrderRequest) => Promise<OrderResult>;
  preflight: () => Promise<PreflightReport>;
}

export type SkipReason =
  | "below_min_grade"
  | "stale"
  | "outside_window"
  | "already_placed"
  | "low_roi"
  | "negative_edge"
  | "below_floor"
  | "invalid_price"
  | "invalid_amount"
  | "cycle_cap"
  | "persistence_error"
  | "stopping"
  | "error";

export type PipelineOutcome =
  | { kind: "dispatched"; identity: string; stake: number; orderId?: string }
  | { kind: "failed"; identity: string; stake: number; error: string; blocked: boolean }
  | { kind: "skipped"; identity: string; reason: SkipReason };

export type CycleSummary = {
  raw: number;
  dispatched: number;
  failed: number;
  skipped: Partial<Record<SkipReason, number>>;
  blocked: boolean;
};
