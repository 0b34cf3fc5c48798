/**
 * Binomial tail probabilities for expected success rates and for
 * calibrating the deletion acceptance threshold.
 *
 * @module statistics
 */

/**
 * Per-position error rate of the optimal single-qubit (Breidbart) attack on
 * a conjugate-basis encoding: sin²(π/8).
 */
export const BREIDBART_ERROR_RATE = Math.sin(Math.PI / 8) ** 2;

const logFactorials: number[] = [0];

function logFactorial(n: number): number {
  for (let i = logFactorials.length; i <= n; i++) {
    logFactorials.push((logFactorials[i - 1] ?? 0) + Math.log(i));
  }
  return logFactorials[n] ?? 0;
}

function assertProbability(p: number): void {
  if (!(p >= 0 && p <= 1)) {
    throw new RangeError(`Probability must lie in [0, 1], got ${p}`);
  }
}

/** P[X = x] for X ~ Binomial(trials, p). */
export function binomialPmf(x: number, trials: number, p: number): number {
  assertProbability(p);
  if (!Number.isInteger(x) || x < 0 || x > trials) return 0;
  if (p === 0) return x === 0 ? 1 : 0;
  if (p === 1) return x === trials ? 1 : 0;
  const logChoose = logFactorial(trials) - logFactorial(x) - logFactorial(trials - x);
  return Math.exp(logChoose + x * Math.log(p) + (trials - x) * Math.log1p(-p));
}

/** P[X ≤ x] for X ~ Binomial(trials, p). */
export function binomialCdf(x: number, trials: number, p: number): number {
  const upper = Math.min(Math.floor(x), trials);
  let total = 0;
  for (let i = 0; i <= upper; i++) total += binomialPmf(i, trials, p);
  return Math.min(1, total);
}
