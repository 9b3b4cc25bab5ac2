import { PersistenceError, toError } from "../../errors/app.errors";
import type { Logger } from "../../utils/logger.util";
import type { LedgerEntry, LedgerStore } from "./ledger-store";

export type LedgerPolicy = {
  /** Lifetime of an entry when the event time is unknown (or already past) */
  fallbackTtlMs: number;
  /** How long after the event an entry stays live */
  eventGraceMs: number;
};

export function computeExpiry(
  actionTime: number,
  eventTime: number | undefined,
  policy: LedgerPolicy,
): number {
  const fallback = actionTime + policy.fallbackTtlMs;
  if (eventTime === undefined) return fallback;
  return Math.max(fallback, eventTime + policy.eventGraceMs);
}

/**
 * Persisted record of opportunity identities already acted upon.
 *
 * An identity with a live entry must not be dispatched again. Entries expire
 * per {@link computeExpiry} and are dropped lazily on read and by {@link prune}.
 * The paper bankroll travels in the same document so a dispatch and its debit
 * are written together.
 */
export class DedupeLedger {
  private readonly store: LedgerStore;
  private readonly policy: LedgerPolicy;
  private readonly logger?: Logger;
  private entries: Map<string, LedgerEntry> = new Map();
  private bankroll: number;
  private dirty = false;

  constructor(params: {
    store: LedgerStore;
    policy: LedgerPolicy;
    initialBankroll: number;
    logger?: Logger;
  }) {
    this.store = params.store;
    this.policy = params.policy;
    this.bankroll = params.initialBankroll;
    this.logger = params.logger;
  }

  async load(now: number): Promise<void> {
    const snapshot = await this.store.load(now);
    this.entries = new Map();
    for (const row of snapshot.entries) {
      this.entries.set(row.identity, {
        identity: row.identity,
        actionTime: row.actionTime,
        eventTime: row.eventTime,
        expiresAt: row.expiresAt ?? computeExpiry(row.actionTime, row.eventTime, this.policy),
      });
    }
    if (snapshot.bankroll !== undefined) {
      this.bankroll = snapshot.bankroll;
    }
    const removed = this.prune(now);
    this.logger?.info(
      `[Ledger] Loaded ${this.entries.size} live entr${this.entries.size === 1 ? "y" : "ies"} from ${this.store.describe()} (expired_dropped=${removed} bankroll=${this.bankroll.toFixed(2)})`,
    );
  }

  isLive(identity: string, now: number): boolean {
    const entry = this.entries.get(identity);
    if (!entry) return false;
    if (now < entry.expiresAt) return true;
    this.entries.delete(identity);
    this.dirty = true;
    return false;
  }

  getEntry(identity: string): LedgerEntry | undefined {
    return this.entries.get(identity);
  }

  /**
   * Record a dispatch and persist before returning. When the write fails the
   * entry is kept in memory, the ledger stays dirty and the error propagates.
   */
  async commit(
    identity: string,
    actionTime: number,
    eventTime?: number,
    options: { debit?: number } = {},
  ): Promise<LedgerEntry> {
    const entry: LedgerEntry = {
      identity,
      actionTime,
      eventTime,
      expiresAt: computeExpiry(actionTime, eventTime, this.policy),
    };
    this.entries.set(identity, entry);
    if (options.debit !== undefined && options.debit > 0) {
      this.bankroll = Math.round((this.bankroll - options.debit) * 100) / 100;
    }
    this.dirty = true;
    await this.flush();
    return entry;
  }

  prune(now: number): number {
    let removed = 0;
    for (const [identity, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(identity);
        removed += 1;
      }
    }
    if (removed > 0) this.dirty = true;
    return removed;
  }

  /**
   * Write pending changes. Throws {@link PersistenceError}.
   */
  async flush(): Promise<void> {
    if (!this.dirty) return;
    try {
      await this.store.save({ entries: [...this.entries.values()], bankroll: this.bankroll });
      this.dirty = false;
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Ledger save failed: ${toError(err).message}`, this.store.describe(), toError(err));
    }
  }

  /**
   * True when nothing is pending or the pending write just succeeded.
   */
  async ensureDurable(): Promise<boolean> {
    try {
      await this.flush();
      return true;
    } catch (err) {
      this.logger?.error("[Ledger] Store not writable", toError(err));
      return false;
    }
  }

  getBankroll(): number {
    return this.bankroll;
  }

  size(): number {
    return this.entries.size;
  }

  isDirty(): boolean {
    return this.dirty;
  }
}
