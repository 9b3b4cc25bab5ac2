import { meetsMinGrade, type Grade } from "../constants/grades.constants";
import { toError } from "../errors/app.errors";
import { logEvent, type Logger } from "../utils/logger.util";
import { sanitizeErrorMessage } from "../utils/sanitize-axios-error.util";
import type { DedupeLedger } from "./state/ledger";
import type {
  CycleSummary,
  ExecutionClient,
  Opportunity,
  OpportunityFeed,
  OrderResult,
  PipelineOutcome,
  SkipReason,
} from "./types";
import { Semaphore, mapWithConcurrency } from "./utils/limiter";
import { computeStake } from "./utils/staking";
import type { TimeGate } from "./utils/time-gate";
import type { TradeLog, TradeLogEntry } from "./utils/trade-log";

export type PipelineConfig = {
  minGrade: Grade;
  windowMinutes: number;
  maxBets: number;
  kellyFraction: number;
  minStake: number;
  maxStake: number;
  fixedStake: number;
  lowRoiThreshold: number;
  evalConcurrency: number;
  reportPicks: boolean;
};

export type PipelineDeps = {
  config: PipelineConfig;
  ledger: DedupeLedger;
  executor: ExecutionClient;
  tradeLog: TradeLog;
  timeGate: TimeGate;
  feed?: Pick<OpportunityFeed, "reportPick">;
  logger: Logger;
  now?: () => number;
};

type CycleContext = {
  dispatched: number;
  shouldStop: () => boolean;
};

/**
 * Filters, sizes and dispatches one batch of opportunities.
 *
 * The span from the ledger liveness check to the ledger commit holds a
 * single-permit semaphore, so an identity cannot pass the check twice.
 */
export class DecisionPipeline {
  private readonly config: PipelineConfig;
  private readonly ledger: DedupeLedger;
  private readonly executor: ExecutionClient;
  private readonly tradeLog: TradeLog;
  private readonly timeGate: TimeGate;
  private readonly feed?: Pick<OpportunityFeed, "reportPick">;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly ledgerLock = new Semaphore(1);

  constructor(deps: PipelineDeps) {
    this.config = deps.config;
    this.ledger = deps.ledger;
    this.executor = deps.executor;
    this.tradeLog = deps.tradeLog;
    this.timeGate = deps.timeGate;
    this.feed = deps.feed;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  async runCycle(
    opportunities: readonly Opportunity[],
    shouldStop: () => boolean = () => false,
  ): Promise<CycleSummary> {
    const ctx: CycleContext = { dispatched: 0, shouldStop };
    const outcomes = await mapWithConcurrency(opportunities, this.config.evalConcurrency, (opp) =>
      this.evaluateIsolated(opp, ctx),
    );

    const summary: CycleSummary = {
      raw: opportunities.length,
      dispatched: 0,
      failed: 0,
      skipped: {},
      blocked: false,
    };
    for (const outcome of outcomes) {
      if (outcome.kind === "dispatched") summary.dispatched += 1;
      else if (outcome.kind === "failed") {
        summary.failed += 1;
        if (outcome.blocked) summary.blocked = true;
      } else {
        summary.skipped[outcome.reason] = (summary.skipped[outcome.reason] ?? 0) + 1;
      }
    }
    return summary;
  }

  private async evaluateIsolated(opp: Opportunity, ctx: CycleContext): Promise<PipelineOutcome> {
    try {
      return await this.evaluate(opp, ctx);
    } catch (err) {
      this.logger.error(`[Pipeline] ${opp.identity} evaluation failed`, toError(err));
      return this.skip(opp, "error");
    }
  }

  private async evaluate(opp: Opportunity, ctx: CycleContext): Promise<PipelineOutcome> {
    if (ctx.shouldStop()) return this.skip(opp, "stopping");

    const now = this.now();
    if (!meetsMinGrade(opp.grade, this.config.minGrade)) {
      return this.skip(opp, "below_min_grade");
    }
    if (now - opp.discoveredAt > this.config.windowMinutes * 60_000) {
      return this.skip(opp, "stale");
    }
    if (!this.timeGate.isOpen(now)) {
      return this.skip(opp, "outside_window");
    }

    return this.ledgerLock.with(() => this.dispatchExclusive(opp, ctx));
  }

  private async dispatchExclusive(opp: Opportunity, ctx: CycleContext): Promise<PipelineOutcome> {
    if (ctx.shouldStop()) return this.skip(opp, "stopping");
    if (ctx.dispatched >= this.config.maxBets) return this.skip(opp, "cycle_cap");

    const now = this.now();
    if (this.ledger.isLive(opp.identity, now)) {
      return this.skip(opp, "already_placed");
    }

    const decision = computeStake({
      bankroll: this.ledger.getBankroll(),
      trueProb: opp.trueProb,
      price: opp.price,
      kellyFraction: this.config.kellyFraction,
      minStake: this.config.minStake,
      maxStake: this.config.maxStake,
      fixedStake: this.config.fixedStake,
      lowRoiThreshold: this.config.lowRoiThreshold,
    });
    if (decision.kind === "skip") {
      return this.skip(opp, decision.reason);
    }
    const stake = decision.amount;

    if (!(await this.ledger.ensureDurable())) {
      return this.skip(opp, "persistence_error");
    }

    let result: OrderResult;
    try {
      result = await this.executor.placeOrder({
        identity: opp.identity,
        conditionId: opp.conditionId,
        side: opp.side,
        sideLabel: opp.sideLabel,
        otherSideLabel: opp.otherSideLabel,
        price: opp.price,
        size: stake,
      });
    } catch (err) {
      result = { success: false, error: sanitizeErrorMessage(err) };
    }

    if (!result.success) {
      const error = result.error ?? "unknown execution failure";
      logEvent(
        this.logger,
        "dispatch_failed",
        { identity: opp.identity, stake, error, blocked: Boolean(result.blocked), rayId: result.rayId },
        "warn",
      );
      await this.record(
        this.baseEntry(opp, "dispatch", "failed", {
          stake,
          error,
          tokenId: result.tokenId,
          cloudflareRayId: result.rayId,
        }),
      );
      return { kind: "failed", identity: opp.identity, stake, error, blocked: Boolean(result.blocked) };
    }

    ctx.dispatched += 1;
    try {
      await this.ledger.commit(opp.identity, now, opp.eventTime, { debit: stake });
    } catch (err) {
      this.logger.error(`[Pipeline] ${opp.identity} dispatched but ledger write failed`, toError(err));
    }

    logEvent(this.logger, "dispatched", {
      identity: opp.identity,
      mode: this.executor.mode,
      stake,
      price: opp.price,
      grade: opp.grade,
      orderId: result.externalOrderId,
      bankroll: this.ledger.getBankroll(),
    });
    await this.record(
      this.baseEntry(opp, "dispatch", this.executor.mode === "live" ? "placed" : "simulated", {
        stake,
        orderId: result.externalOrderId,
        tokenId: result.tokenId,
      }),
    );
    await this.reportPick(opp);

    return { kind: "dispatched", identity: opp.identity, stake, orderId: result.externalOrderId };
  }

  private async skip(opp: Opportunity, reason: SkipReason): Promise<PipelineOutcome> {
    logEvent(this.logger, "skip", { identity: opp.identity, reason, grade: opp.grade }, "debug");
    await this.record(this.baseEntry(opp, "skip", "skipped", { reason }));
    return { kind: "skipped", identity: opp.identity, reason };
  }

  private baseEntry(
    opp: Opportunity,
    decision: TradeLogEntry["decision"],
    outcome: TradeLogEntry["outcome"],
    extra: Partial<TradeLogEntry>,
  ): TradeLogEntry {
    return {
      time: new Date(this.now()).toISOString(),
      identity: opp.identity,
      decision,
      outcome,
      price: opp.price,
      grade: opp.grade,
      mode: this.executor.mode,
      conditionId: opp.conditionId,
      side: opp.side,
      market: opp.marketTitle,
      signalScore: opp.signalScore,
      ...extra,
    };
  }

  private async record(entry: TradeLogEntry): Promise<void> {
    try {
      await this.tradeLog.append(entry);
    } catch (err) {
      this.logger.error(`[Pipeline] trade log append failed for ${entry.identity}`, toError(err));
    }
  }

  private async reportPick(opp: Opportunity): Promise<void> {
    if (!this.config.reportPicks || !this.feed?.reportPick) return;
    try {
      await this.feed.reportPick({
        conditionId: opp.conditionId,
        marketTitle: opp.marketTitle,
        eventTime: opp.eventTime !== undefined ? new Date(opp.eventTime).toISOString() : undefined,
        grade: opp.grade,
        signalScore: opp.signalScore,
        edgeRating: opp.edgeRating,
        sharpSide: opp.side,
        price: opp.price,
      });
    } catch (err) {
      this.logger.warn(`[Pipeline] failed to report pick ${opp.identity}: ${sanitizeErrorMessage(err)}`);
    }
  }
}
