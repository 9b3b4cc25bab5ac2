import type { Logger } from "../../utils/logger.util";
import type { ExecutionClient, OrderRequest, OrderResult, PreflightReport } from "../types";

/**
 * Paper-trading client. Every order fills; ids are `paper-<n>` in call order.
 */
export class SimulatedExecutionClient implements ExecutionClient {
  readonly mode = "paper" as const;
  private readonly logger?: Logger;
  private seq = 0;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    this.seq += 1;
    const externalOrderId = `paper-${this.seq}`;
    this.logger?.info(
      `[Paper] BUY ${request.identity} $${request.size.toFixed(2)} @ ${request.price.toFixed(3)} -> ${externalOrderId}`,
    );
    return { success: true, externalOrderId };
  }

  async preflight(): Promise<PreflightReport> {
    return {
      ok: true,
      mode: this.mode,
      checks: [{ name: "mode", ok: true, detail: "dry run; no live trading checks required" }],
    };
  }
}
