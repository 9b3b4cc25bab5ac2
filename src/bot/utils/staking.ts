export type StakeSkipReason =
  | "low_roi"
  | "negative_edge"
  | "below_floor"
  | "invalid_price"
  | "invalid_amount";

export type StakeDecision =
  | { kind: "accept"; amount: number }
  | { kind: "skip"; reason: StakeSkipReason };

export type StakeParams = {
  bankroll: number;
  trueProb: number;
  price: number;
  kellyFraction: number;
  minStake: number;
  maxStake: number;
  fixedStake?: number;
  lowRoiThreshold: number;
};

/**
 * Full-Kelly fraction of bankroll for a binary outcome priced at `price` (0..1)
 * that wins with probability `trueProb`. Zero when there is no edge.
 */
export function kellyFraction(trueProb: number, price: number): number {
  if (!(price > 0 && price < 1)) return 0;
  const b = 1 / price - 1;
  const numerator = trueProb * b - (1 - trueProb);
  if (numerator <= 0 || b <= 0) return 0;
  return numerator / b;
}

const roundCents = (value: number): number => Math.round(value * 100) / 100;

export function computeStake(params: StakeParams): StakeDecision {
  const { price } = params;
  if (!Number.isFinite(price) || price <= 0 || price >= 1) {
    return { kind: "skip", reason: "invalid_price" };
  }
  if (price >= params.lowRoiThreshold) {
    return { kind: "skip", reason: "low_roi" };
  }

  let candidate: number;
  if (params.fixedStake !== undefined && params.fixedStake > 0) {
    candidate = params.fixedStake;
  } else {
    const full = kellyFraction(params.trueProb, price);
    if (full <= 0) {
      return { kind: "skip", reason: "negative_edge" };
    }
    candidate = params.bankroll * full * params.kellyFraction;
  }

  if (!Number.isFinite(candidate)) {
    return { kind: "skip", reason: "invalid_amount" };
  }

  const amount = Math.min(roundCents(candidate), params.maxStake);
  if (amount < params.minStake || amount <= 0) {
    return { kind: "skip", reason: "below_floor" };
  }
  return { kind: "accept", amount };
}
