import { ErrorCode } from '../errors/codes.js';
import { InvalidInputError } from '../types/errors.js';
import type { TermStyle } from '../types/options.js';
import { formatTerm, parseTerm } from './term.js';

/**
 * A Peano natural: Zero or Successor(Natural).
 *
 * Stored as its depth (the number of successor applications from Zero)
 * instead of a chain of nodes, so construction and comparison stay flat for
 * large values. The canonical integer value is the depth.
 */
export class Natural {
  static readonly ZERO = new Natural(0);

  private constructor(readonly depth: number) {}

  /** @throws {InvalidInputError} when depth is not a non-negative safe integer */
  static of(depth: number): Natural {
    if (!Number.isSafeInteger(depth) || depth < 0) {
      throw new InvalidInputError({
        message: `A natural needs a non-negative integer depth, got ${depth}`,
        errorCode: ErrorCode.INVALID_INPUT,
        context: { argument: 'depth', value: depth },
      });
    }
    return depth === 0 ? Natural.ZERO : new Natural(depth);
  }

  /** @throws {InvalidInputError} MALFORMED_TERM */
  static fromTerm(term: string): Natural {
    return Natural.of(parseTerm(term));
  }

  get value(): number {
    return this.depth;
  }

  isZero(): boolean {
    return this.depth === 0;
  }

  successor(): Natural {
    return new Natural(this.depth + 1);
  }

  /** Clamped at zero: pred(0) = 0. */
  predecessor(): Natural {
    return this.depth === 0 ? Natural.ZERO : Natural.of(this.depth - 1);
  }

  equals(other: Natural): boolean {
    return this.depth === other.depth;
  }

  compare(other: Natural): -1 | 0 | 1 {
    if (this.depth === other.depth) return 0;
    return this.depth < other.depth ? -1 : 1;
  }

  toTerm(style: TermStyle = 'full'): string {
    return formatTerm(this.depth, style);
  }

  toString(): string {
    return String(this.depth);
  }
}
