import { ErrorCode } from '../errors/codes.js';
import { zeroDenominatorError } from '../natural/input.js';
import { InvalidInputError } from '../types/errors.js';
import type { PeanoArithmetic } from './engine.js';
import type { FractionValue } from './types.js';

export interface DivisionCheck {
  gcd: number;
  simplified: FractionValue;
  quotient: number;
  remainder: number;
  product: number;
  rhs: number;
}

/**
 * Fraction arithmetic on top of PeanoArithmetic. Every result is simplified
 * by dividing through the gcd; subtraction clamps at zero like naturals do.
 */
export class FractionArithmetic {
  constructor(private readonly peano: PeanoArithmetic) {}

  /** @throws {InvalidInputError} ZERO_DENOMINATOR */
  make(numerator: number, denominator: number): FractionValue {
    if (denominator === 0) throw zeroDenominatorError('denominator');
    return { numerator, denominator };
  }

  /** x/1, with 1 derived as s(0) */
  fromNatural(x: number): FractionValue {
    return { numerator: x, denominator: this.peano.successor(0) };
  }

  simplify(fraction: FractionValue): FractionValue {
    const g = this.peano.gcd(fraction.numerator, fraction.denominator);
    return {
      numerator: this.peano.divide(fraction.numerator, g),
      denominator: this.peano.divide(fraction.denominator, g),
    };
  }

  add(a: FractionValue, b: FractionValue): FractionValue {
    const numerator = this.peano.add(
      this.peano.multiply(a.numerator, b.denominator),
      this.peano.multiply(b.numerator, a.denominator)
    );
    const denominator = this.peano.multiply(a.denominator, b.denominator);
    return this.simplify({ numerator, denominator });
  }

  subtract(a: FractionValue, b: FractionValue): FractionValue {
    const numerator = this.peano.subtract(
      this.peano.multiply(a.numerator, b.denominator),
      this.peano.multiply(b.numerator, a.denominator)
    );
    const denominator = this.peano.multiply(a.denominator, b.denominator);
    return this.simplify({ numerator, denominator });
  }

  multiply(a: FractionValue, b: FractionValue): FractionValue {
    const numerator = this.peano.multiply(a.numerator, b.numerator);
    const denominator = this.peano.multiply(a.denominator, b.denominator);
    return this.simplify({ numerator, denominator });
  }

  /** @throws {InvalidInputError} DIVISION_BY_ZERO when b is 0/d */
  divide(a: FractionValue, b: FractionValue): FractionValue {
    if (this.peano.equal(b.numerator, 0)) {
      throw new InvalidInputError({
        message: 'Cannot divide by a fraction equal to zero',
        errorCode: ErrorCode.DIVISION_BY_ZERO,
        context: {
          argument: 'b',
          operation: 'fraction:divide',
          value: `${b.numerator}/${b.denominator}`,
          suggestion: 'Use a divisor with a non-zero numerator',
        },
      });
    }
    const numerator = this.peano.multiply(a.numerator, b.denominator);
    const denominator = this.peano.multiply(a.denominator, b.numerator);
    return this.simplify({ numerator, denominator });
  }

  /** gcd, lowest terms and the check n = d·q + r */
  describe(fraction: FractionValue): DivisionCheck {
    const { numerator: n, denominator: d } = fraction;
    const gcd = this.peano.gcd(n, d);
    const simplified = {
      numerator: this.peano.divide(n, gcd),
      denominator: this.peano.divide(d, gcd),
    };
    const quotient = this.peano.divide(n, d);
    const remainder = this.peano.modulo(n, d);
    const product = this.peano.multiply(d, quotient);
    const rhs = this.peano.add(product, remainder);
    return { gcd, simplified, quotient, remainder, product, rhs };
  }
}
