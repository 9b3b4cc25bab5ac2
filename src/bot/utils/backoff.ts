/**
 * Delay after the Nth consecutive failure (N >= 1): base, base*2, base*4, ... capped at max.
 */
export function calculateBackoff(
  consecutiveFailures: number,
  baseMs: number,
  maxMs: number,
): number {
  if (consecutiveFailures <= 0 || baseMs <= 0) return 0;
  const exponent = Math.min(consecutiveFailures - 1, 30);
  return Math.min(baseMs * Math.pow(2, exponent), maxMs);
}

/**
 * Spread `baseMs` uniformly over base*(1 ± ratio), never below `floorMs`.
 * `random` returns [0, 1).
 */
export function applyJitter(
  baseMs: number,
  ratio: number,
  random: () => number = Math.random,
  floorMs = 1000,
): number {
  if (ratio <= 0) return baseMs;
  const delta = baseMs * ratio;
  const jittered = baseMs + (random() * 2 - 1) * delta;
  return Math.max(floorMs, Math.round(jittered));
}
