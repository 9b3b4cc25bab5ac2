import { promises as fs } from "fs";
import path from "path";
import { PersistenceError, toError } from "../../errors/app.errors";
import type { ExecutionMode } from "../types";

export type TradeLogDecision = "dispatch" | "skip";

export type TradeLogOutcome = "placed" | "simulated" | "failed" | "skipped";

export type TradeLogEntry = {
  time: string;
  identity: string;
  decision: TradeLogDecision;
  outcome: TradeLogOutcome;
  reason?: string;
  stake?: number;
  price?: number;
  grade?: string;
  mode: ExecutionMode;
  conditionId?: string;
  side?: string;
  market?: string;
  signalScore?: number;
  orderId?: string;
  tokenId?: string;
  error?: string;
  cloudflareRayId?: string;
};

export interface TradeLog {
  append: (entry: TradeLogEntry) => Promise<void>;
}

/**
 * Append-only JSONL sink, one line per terminal pipeline outcome.
 */
export class JsonlTradeLog implements TradeLog {
  private readonly path?: string;

  constructor(filePath?: string) {
    this.path = filePath || undefined;
  }

  async append(entry: TradeLogEntry): Promise<void> {
    if (!this.path) return;
    const line = `${JSON.stringify(entry)}\n`;
    try {
      await fs.mkdir(path.dirname(this.path), { recursive: true });
      await fs.appendFile(this.path, line, { encoding: "utf8" });
    } catch (err) {
      throw new PersistenceError(`Unable to append trade log ${this.path}`, this.path, toError(err));
    }
  }
}
