import { ErrorCode } from '../errors/codes.js';
import { normalizeTerm, peelSuccessor } from '../natural/term.js';
import { InvalidInputError } from '../types/errors.js';
import type { DerivationRecorder } from './recorder.js';
import { bool, natural, term } from './recorder.js';
import type { DerivationNode } from './types.js';

function divisionByZero(operation: string): InvalidInputError {
  return new InvalidInputError({
    message: `${operation} by zero is undefined`,
    errorCode: ErrorCode.DIVISION_BY_ZERO,
    context: {
      argument: 'y',
      operation,
      value: 0,
      suggestion: 'Use a divisor of at least 1',
    },
  });
}

/**
 * Peano arithmetic over naturals, recorded node by node.
 *
 * Primitive recursive definitions are evaluated with loops: each recursive
 * call becomes an open node, and the open nodes are closed innermost first
 * once the base case is reached. The resulting tree has the same shape a
 * recursive evaluation would produce.
 *
 * One instance serves a single derivation.
 */
export class PeanoArithmetic {
  constructor(private readonly recorder: DerivationRecorder) {}

  successor(x: number): number {
    this.recorder.leaf('successor', [natural(x)], natural(x + 1));
    return x + 1;
  }

  /** Clamped: pred(0) = 0 */
  predecessor(x: number): number {
    const result = x === 0 ? 0 : x - 1;
    this.recorder.leaf('predecessor', [natural(x)], natural(result));
    return result;
  }

  isZero(x: number): boolean {
    const node = this.recorder.enter('is-zero', [natural(x)]);
    if (x === 0) node.axiom = 'A1';
    this.recorder.exit(node, bool(x === 0));
    return x === 0;
  }

  /** Well-formedness of a raw term by A1 and A2. Never throws on bad text. */
  recognize(text: string): boolean {
    const open: DerivationNode[] = [];
    let current = normalizeTerm(text);
    let result: boolean;

    for (;;) {
      const node = this.recorder.enter('peano', [term(current)]);
      open.push(node);
      if (current === '0') {
        node.axiom = 'A1';
        result = true;
        break;
      }
      const inner = peelSuccessor(current);
      if (inner === undefined) {
        result = false;
        break;
      }
      node.axiom = 'A2';
      this.recorder.leaf('predecessor', [term(current)], term(inner));
      current = inner;
    }

    this.recorder.exitAll(open, bool(result));
    return result;
  }

  /** A3: s(x) ≠ 0. A4: s(x) = s(y) → x = y. */
  equal(x: number, y: number): boolean {
    const open: DerivationNode[] = [];
    let a = x;
    let b = y;
    let result: boolean;

    for (;;) {
      const node = this.recorder.enter('equal', [natural(a), natural(b)]);
      open.push(node);
      if (a === 0 && b === 0) {
        result = true;
        break;
      }
      if (a === 0 || b === 0) {
        node.axiom = 'A3';
        result = false;
        break;
      }
      node.axiom = 'A4';
      a = this.predecessor(a);
      b = this.predecessor(b);
    }

    this.recorder.exitAll(open, bool(result));
    return result;
  }

  lessThan(x: number, y: number): boolean {
    const open: DerivationNode[] = [];
    let a = x;
    let b = y;
    let result: boolean;

    for (;;) {
      const node = this.recorder.enter('less-than', [natural(a), natural(b)]);
      open.push(node);
      if (a === 0 || b === 0) {
        // lt(0,0) = false, lt(0,s(y)) = true, lt(s(x),0) = false
        node.definition = 'LT-BASE';
        result = a === 0 && b !== 0;
        break;
      }
      node.definition = 'LT-REC';
      a = this.predecessor(a);
      b = this.predecessor(b);
    }

    this.recorder.exitAll(open, bool(result));
    return result;
  }

  /** Neither equal nor less; the less-than check is skipped when equal. */
  greaterThan(x: number, y: number): boolean {
    const node = this.recorder.enter('greater-than', [natural(x), natural(y)]);
    const result = !this.equal(x, y) && !this.lessThan(x, y);
    this.recorder.exit(node, bool(result));
    return result;
  }

  /** add(x, 0) = x; add(x, s(y)) = s(add(x, y)) */
  add(x: number, y: number): number {
    const open: DerivationNode[] = [];
    let k = y;

    for (;;) {
      const node = this.recorder.enter('add', [natural(x), natural(k)]);
      if (k === 0) {
        node.definition = 'ADD-BASE';
        this.recorder.exit(node, natural(x));
        break;
      }
      node.definition = 'ADD-REC';
      open.push(node);
      k = this.predecessor(k);
    }

    let sum = x;
    for (let i = open.length - 1; i >= 0; i -= 1) {
      const node = open[i];
      if (!node) continue;
      sum += 1;
      this.recorder.exit(node, natural(sum));
    }
    return sum;
  }

  /** sub(x, 0) = x; sub(0, s(y)) = 0 (clamped); sub(s(x), s(y)) = sub(x, y) */
  subtract(x: number, y: number): number {
    const open: DerivationNode[] = [];
    let a = x;
    let b = y;
    let result: number;

    for (;;) {
      const node = this.recorder.enter('subtract', [natural(a), natural(b)]);
      open.push(node);
      if (b === 0) {
        node.definition = 'SUB-BASE';
        result = a;
        break;
      }
      if (a === 0) {
        node.definition = 'SUB-BASE';
        this.recorder.markNegative();
        result = 0;
        break;
      }
      node.definition = 'SUB-REC';
      a = this.predecessor(a);
      b = this.predecessor(b);
    }

    this.recorder.exitAll(open, natural(result));
    return result;
  }

  /** mult(x, 0) = 0; mult(x, s(y)) = mult(x, y) + x */
  multiply(x: number, y: number): number {
    const open: DerivationNode[] = [];
    let k = y;

    for (;;) {
      const node = this.recorder.enter('multiply', [natural(x), natural(k)]);
      if (k === 0) {
        node.definition = 'MULT-BASE';
        this.recorder.exit(node, natural(0));
        break;
      }
      node.definition = 'MULT-REC';
      open.push(node);
      k = this.predecessor(k);
    }

    let product = 0;
    for (let i = open.length - 1; i >= 0; i -= 1) {
      const node = open[i];
      if (!node) continue;
      // recorded under the still-open mult(x, s(k)) node
      product = this.add(product, x);
      this.recorder.exit(node, natural(product));
    }
    return product;
  }

  /**
   * Quotient by repeated subtraction.
   *
   * @throws {InvalidInputError} DIVISION_BY_ZERO
   */
  divide(x: number, y: number): number {
    if (y === 0) throw divisionByZero('divide');
    const root = this.recorder.enter('divide', [natural(x), natural(y)]);
    root.definition = 'DIV-DEF';

    const open: DerivationNode[] = [];
    let remainder = x;
    let quotient = 0;
    for (;;) {
      const step = this.recorder.enter('divide-step', [
        natural(remainder),
        natural(y),
        natural(quotient),
      ]);
      step.definition = 'DIV-STEP';
      open.push(step);
      if (this.lessThan(remainder, y)) break;
      remainder = this.subtract(remainder, y);
      quotient = this.successor(quotient);
    }

    this.recorder.exitAll(open, natural(quotient));
    this.recorder.exit(root, natural(quotient));
    return quotient;
  }

  /**
   * Remainder by repeated subtraction.
   *
   * @throws {InvalidInputError} DIVISION_BY_ZERO
   */
  modulo(x: number, y: number): number {
    if (y === 0) throw divisionByZero('modulo');
    const root = this.recorder.enter('modulo', [natural(x), natural(y)]);
    root.definition = 'MOD-DEF';

    const open: DerivationNode[] = [];
    let remainder = x;
    for (;;) {
      const step = this.recorder.enter('modulo-step', [
        natural(remainder),
        natural(y),
      ]);
      step.definition = 'MOD-STEP';
      open.push(step);
      if (this.lessThan(remainder, y)) break;
      remainder = this.subtract(remainder, y);
    }

    this.recorder.exitAll(open, natural(remainder));
    this.recorder.exit(root, natural(remainder));
    return remainder;
  }

  /** gcd(x, 0) = x; gcd(x, y) = gcd(y, mod(x, y)) */
  gcd(x: number, y: number): number {
    const open: DerivationNode[] = [];
    let a = x;
    let b = y;

    for (;;) {
      const node = this.recorder.enter('gcd', [natural(a), natural(b)]);
      open.push(node);
      if (b === 0) {
        node.definition = 'GCD-BASE';
        break;
      }
      node.definition = 'GCD-REC';
      const r = this.modulo(a, b);
      a = b;
      b = r;
    }

    this.recorder.exitAll(open, natural(a));
    return a;
  }
}
