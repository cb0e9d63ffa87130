/**
 * Fast-check arbitraries for the Peano stepper and derivation engine.
 *
 * Operand ranges stay small: derivations grow with the operands and the
 * property suites run every case through the full recorder.
 */

import fc from 'fast-check';
import { TERM_STYLES, formatTerm, type TermStyle } from '@peanotrace/core';

export interface FractionInput {
  numerator: number;
  denominator: number;
}

/** Operands for the stepper, which builds one step per unit */
export const stepperNatural = (max = 60): fc.Arbitrary<number> =>
  fc.integer({ min: 0, max });

/** Operands for derivations */
export const derivationNatural = (max = 20): fc.Arbitrary<number> =>
  fc.integer({ min: 0, max });

export const positiveNatural = (max = 20): fc.Arbitrary<number> =>
  fc.integer({ min: 1, max });

export const fractionInput = (max = 12): fc.Arbitrary<FractionInput> =>
  fc.record({
    numerator: derivationNatural(max),
    denominator: positiveNatural(max),
  });

export const termStyle: fc.Arbitrary<TermStyle> = fc.constantFrom(...TERM_STYLES);

/** Anything a caller might pass that is not a non-negative integer */
export const invalidNatural: fc.Arbitrary<number> = fc.oneof(
  fc.integer({ min: -1_000, max: -1 }),
  fc
    .double({ min: -1_000, max: 1_000, noNaN: true, noDefaultInfinity: true })
    .filter((value) => !Number.isInteger(value)),
  fc.constantFrom(Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY)
);

/** A numeral with its value, written in any notation */
export const numeralTerm = (
  max = 30
): fc.Arbitrary<{ value: number; term: string }> =>
  fc
    .tuple(stepperNatural(max), termStyle)
    .map(([value, style]) => ({ value, term: formatTerm(value, style) }));

/** Text that is not a numeral: an unbalanced or foreign term */
export const malformedTerm: fc.Arbitrary<string> = fc.oneof(
  stepperNatural(10).map((depth) => `${'s('.repeat(depth + 1)}0${')'.repeat(depth)}`),
  stepperNatural(10).map((depth) => `${'s('.repeat(depth)}1${')'.repeat(depth)}`),
  fc.constantFrom('', 's', 's()', 'p(0)', 's^0(0)', 's^(0)', '0)')
);

/** Oracle gcd by Euclid on plain numbers */
export function referenceGcd(a: number, b: number): number {
  let x = a;
  let y = b;
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

/** Oracle lowest terms on plain numbers */
export function referenceReduce({ numerator, denominator }: FractionInput): FractionInput {
  if (numerator === 0) return { numerator: 0, denominator: 1 };
  const divisor = referenceGcd(numerator, denominator);
  return { numerator: numerator / divisor, denominator: denominator / divisor };
}
