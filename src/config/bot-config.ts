import dotenv from "dotenv";
import { ConfigurationError } from "../errors/app.errors";
import { isGrade, type Grade } from "../constants/grades.constants";
import {
  isValidTimeZone,
  parseTimeOfDay,
  type RunWindow,
} from "../bot/utils/time-gate";

export type BotConfig = Readonly<{
  baseUrl: string;
  apiKey: string;
  minGrade: Grade;
  requireMicrostructure: boolean;
  marketQualityThreshold: number;
  windowMinutes: number;
  pollSeconds: number;
  maxBets: number;
  dryRun: boolean;
  statePath: string;
  tradeLogPath: string;
  lowRoiThreshold: number;
  stopOnBlock: boolean;
  pollJitterRatio: number;
  pollBackoffBaseSeconds: number;
  pollBackoffMaxSeconds: number;
  maxCallsPerHour: number;
  runWindow?: RunWindow;
  runWindowGatesPolling: boolean;
  placedTtlSeconds: number;
  placedEventGraceSeconds: number;
  paperBankroll: number;
  kellyFraction: number;
  maxStake: number;
  minStake: number;
  fixedStake: number;
  evalConcurrency: number;
  httpTimeoutMs: number;
  reportPicks: boolean;
  preflightOnly: boolean;
  preflightConditionId?: string;
  poly: Readonly<{
    privateKey?: string;
    apiKey?: string;
    apiSecret?: string;
    apiPassphrase?: string;
    funder?: string;
    signatureType: 0 | 1 | 2;
    chainId: number;
    clobHost: string;
    gammaHost: string;
  }>;
  control: Readonly<{
    token?: string;
    bind: string;
    port: number;
    logLinesDefault: number;
    logLinesMax: number;
    envFile?: string;
    envAllowlist: readonly string[];
  }>;
}>;

export type ConfigSource = Record<string, string | undefined>;

/**
 * Resolve every tunable into one frozen snapshot.
 *
 * Lookup order per key: `overrides`, then `env` (process.env by default, after
 * the dotenv file at BOT_ENV_PATH has been merged in without overwriting).
 */
export function loadBotConfig(
  overrides: ConfigSource = {},
  env: ConfigSource = process.env,
): BotConfig {
  const read = (key: string): string | undefined => {
    const val = overrides[key] ?? env[key];
    if (val === undefined) return undefined;
    const trimmed = val.trim();
    return trimmed === "" ? undefined : trimmed;
  };
  const readBool = (key: string, fallback: boolean): boolean => {
    const val = read(key);
    if (val === undefined) return fallback;
    const lowered = val.toLowerCase();
    if (["true", "1", "yes"].includes(lowered)) return true;
    if (["false", "0", "no"].includes(lowered)) return false;
    throw new ConfigurationError(`${key} must be true or false (got "${val}")`);
  };
  const readNumber = (
    key: string,
    fallback: number,
    bounds: { min?: number; max?: number; integer?: boolean } = {},
  ): number => {
    const val = read(key);
    const parsed = val === undefined ? fallback : Number(val);
    if (!Number.isFinite(parsed)) {
      throw new ConfigurationError(`${key} must be a number (got "${val}")`);
    }
    if (bounds.integer && !Number.isInteger(parsed)) {
      throw new ConfigurationError(`${key} must be an integer (got "${val}")`);
    }
    if (bounds.min !== undefined && parsed < bounds.min) {
      throw new ConfigurationError(`${key} must be >= ${bounds.min} (got ${parsed})`);
    }
    if (bounds.max !== undefined && parsed > bounds.max) {
      throw new ConfigurationError(`${key} must be <= ${bounds.max} (got ${parsed})`);
    }
    return parsed;
  };
  const required = (key: string): string => {
    const val = read(key);
    if (!val) throw new ConfigurationError(`Missing required env var: ${key}`);
    return val;
  };

  const minGradeRaw = (read("BOT_MIN_GRADE") ?? "A").toUpperCase();
  if (!isGrade(minGradeRaw)) {
    throw new ConfigurationError(`BOT_MIN_GRADE must be one of A+, A, B, C, D (got "${minGradeRaw}")`);
  }

  const dryRun = readBool("BOT_DRY_RUN", true);
  const signatureType = readNumber("POLY_SIGNATURE_TYPE", 0, { min: 0, max: 2, integer: true });
  const privateKey = read("POLY_PRIVATE_KEY");
  const funder = read("POLY_FUNDER");
  if (!dryRun && !privateKey) {
    throw new ConfigurationError("POLY_PRIVATE_KEY is required when BOT_DRY_RUN=false");
  }
  if (!dryRun && (signatureType === 1 || signatureType === 2) && !funder) {
    throw new ConfigurationError(`POLY_FUNDER is required for POLY_SIGNATURE_TYPE=${signatureType}`);
  }

  const minStake = readNumber("BOT_MIN_STAKE", 1, { min: 0 });
  const maxStake = readNumber("BOT_MAX_STAKE", 50, { min: 0 });
  if (minStake > maxStake) {
    throw new ConfigurationError(`BOT_MIN_STAKE (${minStake}) exceeds BOT_MAX_STAKE (${maxStake})`);
  }

  const backoffBase = readNumber("BOT_POLL_BACKOFF_BASE", 2, { min: 0 });
  const backoffMax = readNumber("BOT_POLL_BACKOFF_MAX", 120, { min: 0 });
  if (backoffMax < backoffBase) {
    throw new ConfigurationError(`BOT_POLL_BACKOFF_MAX (${backoffMax}) is below BOT_POLL_BACKOFF_BASE (${backoffBase})`);
  }

  const logLinesMax = readNumber("CONTROL_LOG_LINES_MAX", 1000, { min: 1, integer: true });

  const config: BotConfig = {
    baseUrl: required("BOT_BASE_URL").replace(/\/+$/, ""),
    apiKey: required("BOT_API_KEY"),
    minGrade: minGradeRaw,
    requireMicrostructure: readBool("BOT_REQUIRE_MICROSTRUCTURE", false),
    marketQualityThreshold: readNumber("BOT_MARKET_QUALITY_THRESHOLD", 0.72, { min: 0, max: 1 }),
    windowMinutes: readNumber("BOT_WINDOW_MINUTES", 5, { min: 1 }),
    pollSeconds: readNumber("BOT_POLL_SECONDS", 20, { min: 1 }),
    maxBets: readNumber("BOT_MAX_BETS", 5, { min: 1, integer: true }),
    dryRun,
    statePath: read("BOT_STATE_PATH") ?? "data/state.json",
    tradeLogPath: read("BOT_TRADE_LOG") ?? "data/trades.jsonl",
    lowRoiThreshold: readNumber("BOT_LOW_ROI_THRESHOLD", 0.72, { min: 0, max: 1 }),
    stopOnBlock: readBool("BOT_STOP_ON_403", true),
    pollJitterRatio: readNumber("BOT_POLL_JITTER", 0.2, { min: 0, max: 1 }),
    pollBackoffBaseSeconds: backoffBase,
    pollBackoffMaxSeconds: backoffMax,
    maxCallsPerHour: readNumber("BOT_MAX_CALLS_PER_HOUR", 120, { integer: true }),
    runWindow: readRunWindow(read),
    runWindowGatesPolling: readBool("BOT_RUN_WINDOW_GATES_POLLING", true),
    placedTtlSeconds: readNumber("BOT_PLACED_TTL_SECONDS", 21600, { min: 0 }),
    placedEventGraceSeconds: readNumber("BOT_PLACED_EVENT_GRACE_SECONDS", 1800, { min: 0 }),
    paperBankroll: readNumber("BOT_PAPER_BANKROLL", 1000, { min: 0 }),
    kellyFraction: readNumber("BOT_KELLY_FRACTION", 0.25, { min: 0, max: 1 }),
    maxStake,
    minStake,
    fixedStake: readNumber("BOT_FIXED_STAKE", 0, { min: 0 }),
    evalConcurrency: readNumber("BOT_EVAL_CONCURRENCY", 1, { min: 1, integer: true }),
    httpTimeoutMs: readNumber("BOT_HTTP_TIMEOUT_MS", 20000, { min: 1 }),
    reportPicks: readBool("BOT_REPORT_PICKS", true),
    preflightOnly: readBool("BOT_PREFLIGHT", false),
    preflightConditionId: read("BOT_PREFLIGHT_CONDITION_ID"),
    poly: Object.freeze({
      privateKey,
      apiKey: read("POLY_API_KEY"),
      apiSecret: read("POLY_API_SECRET"),
      apiPassphrase: read("POLY_API_PASSPHRASE"),
      funder,
      signatureType: toSignatureType(signatureType),
      chainId: readNumber("POLY_CHAIN_ID", 137, { min: 1, integer: true }),
      clobHost: (read("POLY_CLOB_HOST") ?? "https://clob.polymarket.com").replace(/\/+$/, ""),
      gammaHost: (read("POLY_GAMMA_HOST") ?? "https://gamma-api.polymarket.com").replace(/\/+$/, ""),
    }),
    control: Object.freeze({
      token: read("CONTROL_TOKEN"),
      bind: read("CONTROL_BIND") ?? "127.0.0.1",
      port: readNumber("CONTROL_PORT", 9102, { min: 0, max: 65535, integer: true }),
      logLinesDefault: Math.min(
        readNumber("CONTROL_LOG_LINES_DEFAULT", 200, { min: 1, integer: true }),
        logLinesMax,
      ),
      logLinesMax,
      envFile: read("CONTROL_ENV_FILE"),
      envAllowlist: Object.freeze(parseList(read("CONTROL_ENV_ALLOWLIST"))),
    }),
  };

  return Object.freeze(config);
}

/**
 * Merge the dotenv file into process.env (existing variables win), then load.
 */
export function loadBotConfigFromEnv(overrides: ConfigSource = {}): BotConfig {
  const envPath = overrides.BOT_ENV_PATH ?? process.env.BOT_ENV_PATH ?? ".env";
  dotenv.config({ path: envPath });
  return loadBotConfig(overrides);
}

function readRunWindow(read: (key: string) => string | undefined): RunWindow | undefined {
  const startRaw = read("BOT_RUN_WINDOW_START");
  const endRaw = read("BOT_RUN_WINDOW_END");
  if (!startRaw && !endRaw) return undefined;
  if (!startRaw || !endRaw) {
    throw new ConfigurationError("BOT_RUN_WINDOW_START and BOT_RUN_WINDOW_END must be set together");
  }
  const startMinutes = parseTimeOfDay(startRaw);
  const endMinutes = parseTimeOfDay(endRaw);
  if (startMinutes === undefined || endMinutes === undefined) {
    throw new ConfigurationError(`Run window must be HH:MM-HH:MM (got "${startRaw}"-"${endRaw}")`);
  }
  const timeZone = read("BOT_RUN_WINDOW_TZ") ?? "America/New_York";
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigurationError(`BOT_RUN_WINDOW_TZ is not a known time zone: ${timeZone}`);
  }
  return { startMinutes, endMinutes, timeZone };
}

function toSignatureType(value: number): 0 | 1 | 2 {
  if (value === 1 || value === 2) return value;
  return 0;
}

export function parseList(val: string | undefined): string[] {
  if (!val) return [];
  return val
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * `--poll-seconds=10` / `--bot_dry_run false` → `{ POLL_SECONDS: "10", BOT_DRY_RUN: "false" }`.
 * Dashes become underscores; bare flags read as "true".
 */
export function parseCliOverrides(argv: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const eq = arg.indexOf("=");
    const rawKey = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const key = rawKey.toUpperCase().replace(/-/g, "_");
    if (eq >= 0) {
      overrides[key] = arg.slice(eq + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      overrides[key] = next;
      i += 1;
    } else {
      overrides[key] = "true";
    }
  }
  return overrides;
}
