import type { Grade } from "../constants/grades.constants";
import { FeedBlockedError, toError } from "../errors/app.errors";
import { logEvent, type Logger } from "../utils/logger.util";
import { sanitizeErrorMessage } from "../utils/sanitize-axios-error.util";
import type { DecisionPipeline } from "./pipeline";
import type { DedupeLedger } from "./state/ledger";
import type { CycleSummary, FeedResult, OpportunityFeed } from "./types";
import { applyJitter, calculateBackoff } from "./utils/backoff";
import type { RateGovernor } from "./utils/rate-governor";
import type { TimeGate } from "./utils/time-gate";

export type SchedulerState = "idle" | "polling" | "evaluating" | "sleeping" | "stopped";

export type StopReason = "requested" | "blocked" | "shutdown";

export type SchedulerConfig = {
  pollMs: number;
  jitterRatio: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  stopOnBlock: boolean;
  runWindowGatesPolling: boolean;
  windowMinutes: number;
  minGrade: Grade;
  maxBets: number;
  requireMicrostructure: boolean;
  marketQualityThreshold: number;
};

export type SchedulerStatus = {
  state: SchedulerState;
  running: boolean;
  cyclesRun: number;
  lastCycleAt?: string;
  lastSummary?: CycleSummary;
  consecutiveFailures: number;
  currentBackoffMs: number;
  callsLastHour: number;
  callLimit: number;
  runWindow: string;
  windowOpen: boolean;
  stopReason?: StopReason;
};

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const interruptibleSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Drives the poll loop: gate, budget, fetch, evaluate, sleep.
 *
 * Failures back off exponentially; success resets to the jittered poll
 * interval. A block from the feed or the venue stops the loop when
 * `stopOnBlock` is set.
 */
export class PollScheduler {
  private readonly config: SchedulerConfig;
  private readonly feed: OpportunityFeed;
  private readonly pipeline: DecisionPipeline;
  private readonly ledger: DedupeLedger;
  private readonly governor: RateGovernor;
  private readonly timeGate: TimeGate;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  private state: SchedulerState = "idle";
  private stopRequested = false;
  private stopReason?: StopReason;
  private sleepAbort?: AbortController;
  private loopPromise?: Promise<StopReason>;
  private cyclesRun = 0;
  private lastCycleAt?: number;
  private lastSummary?: CycleSummary;
  private consecutiveFailures = 0;
  private currentBackoffMs = 0;

  constructor(params: {
    config: SchedulerConfig;
    feed: OpportunityFeed;
    pipeline: DecisionPipeline;
    ledger: DedupeLedger;
    governor: RateGovernor;
    timeGate: TimeGate;
    logger: Logger;
    now?: () => number;
    sleep?: Sleep;
    random?: () => number;
  }) {
    this.config = params.config;
    this.feed = params.feed;
    this.pipeline = params.pipeline;
    this.ledger = params.ledger;
    this.governor = params.governor;
    this.timeGate = params.timeGate;
    this.logger = params.logger;
    this.now = params.now ?? Date.now;
    this.sleep = params.sleep ?? interruptibleSleep;
    this.random = params.random ?? Math.random;
  }

  /**
   * Run until stopped. Resolves with the reason; calling again while running
   * returns the same promise.
   */
  start(): Promise<StopReason> {
    if (this.loopPromise) return this.loopPromise;
    this.stopRequested = false;
    this.stopReason = undefined;
    this.state = "idle";
    this.logger.info(
      `[Scheduler] Started poll=${this.config.pollMs}ms window=${this.timeGate.describe()} budget=${this.governor.limit()}/h`,
    );
    this.loopPromise = this.loop().finally(() => {
      this.loopPromise = undefined;
    });
    return this.loopPromise;
  }

  stop(reason: StopReason = "requested"): void {
    if (!this.stopRequested) {
      this.stopRequested = true;
      this.stopReason = reason;
    }
    this.sleepAbort?.abort();
    if (!this.loopPromise) this.state = "stopped";
  }

  isRunning(): boolean {
    return this.loopPromise !== undefined;
  }

  async whenStopped(): Promise<void> {
    if (this.loopPromise) await this.loopPromise;
  }

  status(): SchedulerStatus {
    const now = this.now();
    return {
      state: this.state,
      running: this.isRunning(),
      cyclesRun: this.cyclesRun,
      lastCycleAt: this.lastCycleAt !== undefined ? new Date(this.lastCycleAt).toISOString() : undefined,
      lastSummary: this.lastSummary,
      consecutiveFailures: this.consecutiveFailures,
      currentBackoffMs: this.currentBackoffMs,
      callsLastHour: this.governor.count(now),
      callLimit: this.governor.limit(),
      runWindow: this.timeGate.describe(),
      windowOpen: this.timeGate.isOpen(now),
      stopReason: this.stopReason,
    };
  }

  private async loop(): Promise<StopReason> {
    while (!this.stopRequested) {
      let delayMs: number;
      try {
        delayMs = await this.runCycle();
      } catch (err) {
        this.logger.error("[Scheduler] Cycle failed", toError(err));
        delayMs = this.recordFailure();
      }
      if (this.stopRequested) break;
      this.state = "sleeping";
      const abort = new AbortController();
      this.sleepAbort = abort;
      await this.sleep(delayMs, abort.signal);
      this.sleepAbort = undefined;
      this.state = "idle";
    }
    this.state = "stopped";
    const reason = this.stopReason ?? "requested";
    this.logger.info(`[Scheduler] Stopped (${reason}) after ${this.cyclesRun} cycle(s)`);
    return reason;
  }

  /**
   * One pass of the loop. Returns how long to sleep before the next one.
   */
  async runCycle(): Promise<number> {
    const now = this.now();
    const pollDelay = applyJitter(this.config.pollMs, this.config.jitterRatio, this.random);

    if (this.config.runWindowGatesPolling && !this.timeGate.isOpen(now)) {
      logEvent(this.logger, "outside_run_window", { window: this.timeGate.describe(), sleepMs: pollDelay });
      return pollDelay;
    }

    if (!this.governor.tryAcquire(now)) {
      logEvent(
        this.logger,
        "rate_cap_reached",
        { limit: this.governor.limit(), sleepMs: pollDelay, nextSlotMs: this.governor.waitTime(now) },
        "warn",
      );
      return pollDelay;
    }

    this.state = "polling";
    let result: FeedResult;
    try {
      result = await this.feed.fetch({
        windowMinutes: this.config.windowMinutes,
        minGrade: this.config.minGrade,
        limit: this.config.maxBets * 3,
        requireMicrostructure: this.config.requireMicrostructure,
        marketQualityThreshold: this.config.marketQualityThreshold,
      });
    } catch (err) {
      if (err instanceof FeedBlockedError && this.config.stopOnBlock) {
        logEvent(this.logger, "feed_blocked", { endpoint: err.endpoint, rayId: err.rayId }, "warn");
        this.stop("blocked");
        return 0;
      }
      const delay = this.recordFailure();
      logEvent(
        this.logger,
        "feed_error",
        {
          error: sanitizeErrorMessage(err),
          consecutiveFailures: this.consecutiveFailures,
          backoffMs: delay,
        },
        "warn",
      );
      return delay;
    }

    this.consecutiveFailures = 0;
    this.currentBackoffMs = 0;
    this.state = "evaluating";

    if (result.opportunities.length === 0) {
      logEvent(this.logger, "no_candidates", {
        rejected: result.rejected.length,
        totalEntries: result.debug?.totalEntries,
        upcomingEntries: result.debug?.upcomingEntries,
        dedupDropped: result.debug?.dedupDropped,
        excluded: result.debug?.excluded,
      });
    } else if (result.rejected.length > 0) {
      logEvent(this.logger, "candidates_rejected", { count: result.rejected.length }, "debug");
    }

    this.ledger.prune(now);
    const summary = await this.pipeline.runCycle(result.opportunities, () => this.stopRequested);
    await this.ledger.ensureDurable();

    this.cyclesRun += 1;
    this.lastCycleAt = now;
    this.lastSummary = summary;
    logEvent(this.logger, "cycle", {
      raw: summary.raw,
      dispatched: summary.dispatched,
      failed: summary.failed,
      skipped: summary.skipped,
      ledger: this.ledger.size(),
      bankroll: this.ledger.getBankroll(),
    });

    if (summary.blocked && this.config.stopOnBlock) {
      logEvent(this.logger, "venue_blocked", { stopOnBlock: true }, "warn");
      this.stop("blocked");
      return 0;
    }
    return pollDelay;
  }

  private recordFailure(): number {
    this.consecutiveFailures += 1;
    this.currentBackoffMs = calculateBackoff(
      this.consecutiveFailures,
      this.config.backoffBaseMs,
      this.config.backoffMaxMs,
    );
    return this.currentBackoffMs;
  }
}
