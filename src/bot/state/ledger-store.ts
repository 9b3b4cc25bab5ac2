import { promises as fs } from "fs";
import path from "path";
import { isMissingFileError, PersistenceError, toError } from "../../errors/app.errors";
import type { Logger } from "../../utils/logger.util";
import { opportunityIdentity } from "../provider/candidate";
import { parseEventTimeMs } from "../utils/event-time";

export type LedgerEntry = {
  identity: string;
  /** Epoch ms of the dispatch */
  actionTime: number;
  /** Epoch ms of the underlying event, when known */
  eventTime?: number;
  /** Epoch ms; the entry is live while now < expiresAt */
  expiresAt: number;
};

/**
 * Entries read from disk. `expiresAt` is absent for rows migrated from the
 * legacy layout; the ledger computes it from its own policy.
 */
export type StoredLedgerEntry = Omit<LedgerEntry, "expiresAt"> & {
  expiresAt?: number;
};

export type LedgerSnapshot = {
  entries: StoredLedgerEntry[];
  bankroll?: number;
};

export interface LedgerStore {
  load: (now: number) => Promise<LedgerSnapshot>;
  save: (snapshot: { entries: LedgerEntry[]; bankroll: number }) => Promise<void>;
  describe: () => string;
}

export type PersistedLedgerV1 = {
  version: 1;
  savedAt: string;
  bankroll: number;
  entries: Record<string, { actionTime: number; eventTime?: number; expiresAt: number }>;
};

type LegacyState = {
  placed?: unknown;
  placedMeta?: unknown;
  bankroll?: unknown;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const finiteOrUndefined = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

const SIDED_IDENTITY = /:[AB]$/;

/**
 * Legacy files keyed dedupe on the bare condition id; such a key blocks both sides.
 */
export const legacyIdentities = (key: string): string[] =>
  SIDED_IDENTITY.test(key) ? [key] : [opportunityIdentity(key, "A"), opportunityIdentity(key, "B")];

/**
 * Decode either the current layout or the legacy `{ placed, placedMeta }` layout
 * (placedAt in epoch seconds, eventTime in any feed format).
 */
export function decodeLedgerFile(raw: unknown, now: number): LedgerSnapshot {
  if (!isRecord(raw)) return { entries: [] };

  if (raw.version === 1 && isRecord(raw.entries)) {
    const entries: StoredLedgerEntry[] = [];
    for (const [identity, row] of Object.entries(raw.entries)) {
      if (!identity || !isRecord(row)) continue;
      const actionTime = finiteOrUndefined(row.actionTime) ?? now;
      entries.push({
        identity,
        actionTime,
        eventTime: finiteOrUndefined(row.eventTime),
        expiresAt: finiteOrUndefined(row.expiresAt),
      });
    }
    return { entries, bankroll: finiteOrUndefined(raw.bankroll) };
  }

  const legacy: LegacyState = raw;
  const entries: StoredLedgerEntry[] = [];
  if (isRecord(legacy.placedMeta)) {
    for (const [key, value] of Object.entries(legacy.placedMeta)) {
      if (!key) continue;
      const row = isRecord(value) ? value : {};
      const placedAtRaw = Number(row.placedAt);
      const actionTime = Number.isFinite(placedAtRaw) && placedAtRaw > 0 ? placedAtRaw * 1000 : now;
      const eventTime = parseEventTimeMs(row.eventTime);
      for (const identity of legacyIdentities(key)) {
        entries.push({ identity, actionTime, eventTime });
      }
    }
  } else if (Array.isArray(legacy.placed)) {
    for (const item of legacy.placed) {
      if (typeof item === "string" && item) {
        for (const identity of legacyIdentities(item)) {
          entries.push({ identity, actionTime: now });
        }
      }
    }
  }
  return { entries, bankroll: finiteOrUndefined(legacy.bankroll) };
}

/**
 * Ledger persisted as one JSON document, replaced atomically on every save.
 */
export class JsonFileLedgerStore implements LedgerStore {
  private readonly filePath: string;
  private readonly logger?: Logger;

  constructor(filePath: string, logger?: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  describe(): string {
    return this.filePath;
  }

  async load(now: number): Promise<LedgerSnapshot> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFileError(err)) {
        return { entries: [] };
      }
      throw new PersistenceError(`Unable to read ledger ${this.filePath}`, this.filePath, toError(err));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      this.logger?.warn(
        `[Ledger] ${this.filePath} is not valid JSON (${toError(err).message}); starting empty`,
      );
      return { entries: [] };
    }
    return decodeLedgerFile(parsed, now);
  }

  async save(snapshot: { entries: LedgerEntry[]; bankroll: number }): Promise<void> {
    const doc: PersistedLedgerV1 = {
      version: 1,
      savedAt: new Date().toISOString(),
      bankroll: snapshot.bankroll,
      entries: {},
    };
    for (const entry of [...snapshot.entries].sort((a, b) => a.identity.localeCompare(b.identity))) {
      doc.entries[entry.identity] = {
        actionTime: entry.actionTime,
        eventTime: entry.eventTime,
        expiresAt: entry.expiresAt,
      };
    }

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, `${JSON.stringify(doc, null, 2)}\n`, "utf8");
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      throw new PersistenceError(`Unable to write ledger ${this.filePath}`, this.filePath, toError(err));
    }
  }
}
