export interface ReducedPair {
  numerator: number;
  denominator: number;
  divisor: number;
}

/** Iterative Euclidean algorithm over non-negative safe integers. */
export function gcd(a: number, b: number): number {
  a = Math.abs(a);
  b = Math.abs(b);
  while (b !== 0) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

/**
 * Divide numerator and denominator by their gcd.
 * A zero numerator reduces to 0/1, since gcd(0, d) = d.
 */
export function reducePair(numerator: number, denominator: number): ReducedPair {
  if (denominator === 0) throw new Error('Denominator must be non-zero');
  const divisor = gcd(numerator, denominator);
  return {
    numerator: numerator / divisor,
    denominator: denominator / divisor,
    divisor,
  };
}
