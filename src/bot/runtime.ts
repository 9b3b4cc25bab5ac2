import type { BotConfig } from "../config/bot-config";
import { ControlServer, type BotController } from "../control/control-server";
import { toError } from "../errors/app.errors";
import type { LogBuffer, Logger } from "../utils/logger.util";
import { createClobClient } from "./executor/clob-client.factory";
import { LiveExecutionClient } from "./executor/live-executor";
import { SimulatedExecutionClient } from "./executor/simulated-executor";
import { VenueTokenResolver } from "./executor/token-resolver";
import { DecisionPipeline } from "./pipeline";
import { createFeedHttpClient, HttpOpportunityFeed } from "./provider/feed.provider";
import { PollScheduler, type SchedulerStatus, type StopReason } from "./scheduler";
import { DedupeLedger } from "./state/ledger";
import { JsonFileLedgerStore } from "./state/ledger-store";
import type { ExecutionClient, OpportunityFeed, PreflightReport } from "./types";
import { RateGovernor } from "./utils/rate-governor";
import { TimeGate } from "./utils/time-gate";
import { JsonlTradeLog, type TradeLog } from "./utils/trade-log";

export function createExecutionClient(config: BotConfig, logger: Logger): ExecutionClient {
  if (config.dryRun) return new SimulatedExecutionClient(logger);
  return new LiveExecutionClient({
    connect: () => createClobClient(config.poly, logger),
    tokens: new VenueTokenResolver({
      clobHost: config.poly.clobHost,
      gammaHost: config.poly.gammaHost,
      timeoutMs: config.httpTimeoutMs,
      logger,
    }),
    logger,
    preflightConditionId: config.preflightConditionId,
    timeoutMs: config.httpTimeoutMs,
  });
}

export function logPreflight(report: PreflightReport, logger: Logger): void {
  for (const check of report.checks) {
    const line = `[Preflight] ${check.ok ? "ok  " : "FAIL"} ${check.name}${check.detail ? `: ${check.detail}` : ""}`;
    if (check.ok) logger.info(line);
    else logger.warn(line);
  }
  logger.info(`[Preflight] mode=${report.mode} result=${report.ok ? "passed" : "failed"}`);
}

export type RuntimeStatus = {
  mode: ExecutionClient["mode"];
  startedAt: string;
  scheduler: SchedulerStatus;
  ledger: { entries: number; bankroll: number; path: string; dirty: boolean };
};

/**
 * Owns the scheduler, ledger and control server for one process, and decides
 * the exit code when the loop ends.
 */
export class BotRuntime implements BotController {
  readonly exited: Promise<number>;
  private readonly config: BotConfig;
  private readonly logger: Logger;
  private readonly executor: ExecutionClient;
  private readonly ledger: DedupeLedger;
  private readonly scheduler: PollScheduler;
  private readonly control?: ControlServer;
  private readonly now: () => number;
  private readonly startedAt: number;
  private resolveExit: (code: number) => void = () => undefined;
  private finishing = false;

  constructor(params: {
    config: BotConfig;
    logger: Logger;
    logs: LogBuffer;
    feed: OpportunityFeed;
    executor: ExecutionClient;
    ledger: DedupeLedger;
    tradeLog: TradeLog;
    now?: () => number;
  }) {
    const { config, logger, feed, executor, ledger } = params;
    this.config = config;
    this.logger = logger;
    this.executor = executor;
    this.ledger = ledger;
    this.now = params.now ?? Date.now;
    this.startedAt = this.now();
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });

    const timeGate = new TimeGate(config.runWindow);
    const pipeline = new DecisionPipeline({
      config: {
        minGrade: config.minGrade,
        windowMinutes: config.windowMinutes,
        maxBets: config.maxBets,
        kellyFraction: config.kellyFraction,
        minStake: config.minStake,
        maxStake: config.maxStake,
        fixedStake: config.fixedStake,
        lowRoiThreshold: config.lowRoiThreshold,
        evalConcurrency: config.evalConcurrency,
        reportPicks: config.reportPicks,
      },
      ledger,
      executor,
      tradeLog: params.tradeLog,
      timeGate,
      feed,
      logger,
      now: params.now,
    });
    this.scheduler = new PollScheduler({
      config: {
        pollMs: config.pollSeconds * 1000,
        jitterRatio: config.pollJitterRatio,
        backoffBaseMs: config.pollBackoffBaseSeconds * 1000,
        backoffMaxMs: config.pollBackoffMaxSeconds * 1000,
        stopOnBlock: config.stopOnBlock,
        runWindowGatesPolling: config.runWindowGatesPolling,
        windowMinutes: config.windowMinutes,
        minGrade: config.minGrade,
        maxBets: config.maxBets,
        requireMicrostructure: config.requireMicrostructure,
        marketQualityThreshold: config.marketQualityThreshold,
      },
      feed,
      pipeline,
      ledger,
      governor: new RateGovernor(config.maxCallsPerHour),
      timeGate,
      logger,
      now: params.now,
    });

    if (config.control.token) {
      this.control = new ControlServer({
        options: {
          token: config.control.token,
          bind: config.control.bind,
          port: config.control.port,
          logLinesDefault: config.control.logLinesDefault,
          logLinesMax: config.control.logLinesMax,
          envFile: config.control.envFile,
          envAllowlist: config.control.envAllowlist,
        },
        controller: this,
        logs: params.logs,
        logger,
      });
    } else {
      logger.info("[Control] CONTROL_TOKEN not set; control server disabled");
    }
  }

  async run(): Promise<number> {
    await this.ledger.load(this.now());
    if (this.control) await this.control.start();
    this.start();
    return this.exited;
  }

  status(): RuntimeStatus {
    return {
      mode: this.executor.mode,
      startedAt: new Date(this.startedAt).toISOString(),
      scheduler: this.scheduler.status(),
      ledger: {
        entries: this.ledger.size(),
        bankroll: this.ledger.getBankroll(),
        path: this.config.statePath,
        dirty: this.ledger.isDirty(),
      },
    };
  }

  start(): void {
    if (this.finishing || this.scheduler.isRunning()) return;
    this.scheduler.start().then(
      (reason) => this.onSchedulerStopped(reason),
      (err: unknown) => {
        this.logger.error("[Runtime] Scheduler crashed", toError(err));
        void this.finish(1);
      },
    );
  }

  stop(): void {
    this.scheduler.stop("requested");
  }

  async restart(): Promise<void> {
    this.scheduler.stop("requested");
    await this.scheduler.whenStopped();
    this.start();
  }

  preflight(): Promise<PreflightReport> {
    return this.executor.preflight();
  }

  /**
   * Signal-driven shutdown: let the in-flight dispatch finish, then exit 0.
   */
  async shutdown(): Promise<void> {
    this.logger.info("[Runtime] Shutdown requested");
    this.scheduler.stop("shutdown");
    await this.scheduler.whenStopped();
    await this.finish(0);
  }

  private onSchedulerStopped(reason: StopReason): void {
    if (reason === "blocked") {
      this.logger.error("[Runtime] Stopped on block signal");
      void this.finish(1);
    } else if (reason === "shutdown" || !this.control) {
      void this.finish(0);
    } else {
      this.logger.info("[Runtime] Scheduler idle; POST /start to resume");
    }
  }

  private async finish(code: number): Promise<void> {
    if (this.finishing) return;
    this.finishing = true;
    await this.ledger.ensureDurable();
    try {
      await this.control?.stop();
    } catch (err) {
      this.logger.warn(`[Runtime] Control server close failed: ${toError(err).message}`);
    }
    this.resolveExit(code);
  }
}

export function createBotRuntime(config: BotConfig, logger: Logger, logs: LogBuffer): BotRuntime {
  const feed = new HttpOpportunityFeed({
    http: createFeedHttpClient({
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      timeoutMs: config.httpTimeoutMs,
    }),
  });
  const ledger = new DedupeLedger({
    store: new JsonFileLedgerStore(config.statePath, logger),
    policy: {
      fallbackTtlMs: config.placedTtlSeconds * 1000,
      eventGraceMs: config.placedEventGraceSeconds * 1000,
    },
    initialBankroll: config.paperBankroll,
    logger,
  });
  logger.info(
    `[Runtime] mode=${config.dryRun ? "paper" : "live"} minGrade=${config.minGrade} poll=${config.pollSeconds}s maxBets=${config.maxBets} state=${config.statePath}`,
  );
  return new BotRuntime({
    config,
    logger,
    logs,
    feed,
    executor: createExecutionClient(config, logger),
    ledger,
    tradeLog: new JsonlTradeLog(config.tradeLogPath),
  });
}
