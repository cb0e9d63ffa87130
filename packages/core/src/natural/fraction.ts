import type { TermStyle } from '../types/options.js';
import { gcd, reducePair } from '../util/rational.js';
import { zeroDenominatorError } from './input.js';
import { Natural } from './natural.js';

/**
 * An ordered pair of naturals with a non-zero denominator. Fractions are not
 * reduced on construction; `reduce()` returns the lowest-terms pair.
 */
export class Fraction {
  private constructor(
    readonly numerator: Natural,
    readonly denominator: Natural
  ) {}

  /** @throws {InvalidInputError} ZERO_DENOMINATOR */
  static of(numerator: Natural, denominator: Natural): Fraction {
    if (denominator.isZero()) {
      throw zeroDenominatorError('denominator');
    }
    return new Fraction(numerator, denominator);
  }

  static fromIntegers(numerator: number, denominator: number): Fraction {
    return Fraction.of(Natural.of(numerator), Natural.of(denominator));
  }

  /** x/1 */
  static fromNatural(value: Natural): Fraction {
    return new Fraction(value, Natural.of(1));
  }

  gcd(): number {
    return gcd(this.numerator.value, this.denominator.value);
  }

  isReduced(): boolean {
    return this.gcd() === 1;
  }

  reduce(): Fraction {
    const { numerator, denominator, divisor } = reducePair(
      this.numerator.value,
      this.denominator.value
    );
    if (divisor === 1) return this;
    return new Fraction(Natural.of(numerator), Natural.of(denominator));
  }

  /** Same numerator and denominator, not value equivalence. */
  equals(other: Fraction): boolean {
    return (
      this.numerator.equals(other.numerator) &&
      this.denominator.equals(other.denominator)
    );
  }

  /** Value equivalence by cross-multiplication. */
  equivalent(other: Fraction): boolean {
    return (
      this.numerator.value * other.denominator.value ===
      other.numerator.value * this.denominator.value
    );
  }

  toTerm(style: TermStyle = 'full'): string {
    return `${this.numerator.toTerm(style)}/${this.denominator.toTerm(style)}`;
  }

  toString(): string {
    return `${this.numerator.value}/${this.denominator.value}`;
  }
}
