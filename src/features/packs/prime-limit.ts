import type { RatioRef } from './schema';

/** Classifies a scale's harmonic complexity from its ratio references. */
export type PrimeLimitFn = (refs: readonly RatioRef[]) => number;

/**
 * Largest odd prime appearing in any reference, never below 2. A reference
 * with a monzo is read from its prime keys; otherwise p and q are factored.
 */
export const detectedPrimeLimit: PrimeLimitFn = (refs) => {
  let maxPrime = 2;
  for (const r of refs) {
    const primes = Object.keys(r.monzo).map(Number).filter((k) => k !== 2);
    if (Object.keys(r.monzo).length > 0) {
      maxPrime = Math.max(maxPrime, primes.length ? Math.max(...primes) : 2);
    } else {
      maxPrime = Math.max(maxPrime, maxOddPrimeFactor(r.p), maxOddPrimeFactor(r.q));
    }
  }
  return maxPrime;
};

export function maxOddPrimeFactor(n: number): number {
  let x = Math.abs(n);
  if (x <= 1) return 2;
  while (x % 2 === 0) x /= 2;
  if (x <= 1) return 2;
  let maxP = 2;
  for (let f = 3; f * f <= x; f += 2) {
    while (x % f === 0) {
      maxP = f;
      x /= f;
    }
  }
  if (x > 1) maxP = Math.max(maxP, x);
  return maxP;
}
