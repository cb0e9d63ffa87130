import { describe, expect, it } from 'vitest';

import {
  ConfigurationError,
  ErrorCode,
  InvalidInputError,
  derive,
  deriveFraction,
  describeFraction,
  parseFractionOperation,
  parseNaturalOperation,
  recognizeTerm,
} from '../../src/index.js';

function rejection(fn: () => unknown): InvalidInputError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidInputError) return error;
    throw error;
  }
  throw new Error('expected the call to be rejected');
}

describe('Node API: derive', () => {
  it('derives a sum with its rows', () => {
    const derivation = derive('add', 2, 3);
    expect(derivation.operation).toBe('add');
    expect(derivation.inputs).toEqual([2, 3]);
    expect(derivation.result).toEqual({
      kind: 'natural',
      value: 5,
      term: 's(s(s(s(s(0)))))',
    });
    expect(derivation.stepCount).toBe(7);
    expect(derivation.negativeEncountered).toBe(false);
    expect(derivation.rows.map((row) => row.meaning)).toEqual([
      '2 + 3 = 5',
      '2 + 2 = 4',
      '2 + 1 = 3',
      '2 + 0 = 2',
    ]);
    expect(derivation.metrics).toBeUndefined();
  });

  it('ignores y for unary operations', () => {
    const derivation = derive('successor', 4, 99);
    expect(derivation.inputs).toEqual([4]);
    expect(derivation.result).toEqual({ kind: 'natural', value: 5, term: 's(s(s(s(s(0)))))' });
    expect(derivation.stepCount).toBe(1);
    expect(derivation.rows).toEqual([]);
  });

  it('returns booleans for comparisons', () => {
    expect(derive('less-than', 2, 3).result).toEqual({ kind: 'boolean', value: true });
    expect(derive('equal', 2, 3).result).toEqual({ kind: 'boolean', value: false });
    expect(derive('greater-than', 3, 2).result).toEqual({ kind: 'boolean', value: true });
  });

  it('returns fractions for to-fraction and simplify', () => {
    expect(derive('to-fraction', 3).result).toEqual({
      kind: 'fraction',
      numerator: 3,
      denominator: 1,
      term: 's(s(s(0)))/s(0)',
    });
    expect(derive('simplify', 6, 9).result).toEqual({
      kind: 'fraction',
      numerator: 2,
      denominator: 3,
      term: 's(s(0))/s(s(s(0)))',
    });
  });

  it('computes division, remainder and gcd', () => {
    expect(derive('divide', 7, 2).result).toMatchObject({ value: 3 });
    expect(derive('modulo', 7, 2).result).toMatchObject({ value: 1 });
    expect(derive('gcd', 12, 18).result).toMatchObject({ value: 6 });
    expect(derive('multiply', 3, 4).result).toMatchObject({ value: 12 });
    expect(derive('predecessor', 0).result).toMatchObject({ value: 0 });
  });

  it('flags clamped subtraction', () => {
    const derivation = derive('subtract', 2, 5);
    expect(derivation.result).toEqual({ kind: 'natural', value: 0, term: '0' });
    expect(derivation.negativeEncountered).toBe(true);
  });

  it('requires y for binary operations', () => {
    const error = rejection(() => derive('add', 2));
    expect(error.errorCode).toBe(ErrorCode.INVALID_INPUT);
    expect(error.message).toBe('add needs a second argument y');
    expect(error.argument).toBe('y');
  });

  it('reports bad operands by name', () => {
    const error = rejection(() => derive('add', -1, 2));
    expect(error.argument).toBe('x');
    expect(error.context?.operation).toBe('add');
    expect(rejection(() => derive('divide', 4, 0)).errorCode).toBe(
      ErrorCode.DIVISION_BY_ZERO
    );
    const zero = rejection(() => derive('simplify', 6, 0));
    expect(zero.errorCode).toBe(ErrorCode.ZERO_DENOMINATOR);
    expect(zero.argument).toBe('y');
  });

  it('enforces the step budget', () => {
    expect(
      rejection(() => derive('multiply', 20, 20, { limits: { maxSteps: 50 } })).errorCode
    ).toBe(ErrorCode.STEP_BUDGET_EXCEEDED);
  });

  it('rejects invalid options', () => {
    expect(() => derive('add', 1, 1, { limits: { maxSteps: 0 } })).toThrow(
      ConfigurationError
    );
  });

  it('collects metrics on request', () => {
    const { metrics } = derive('add', 2, 3, { metrics: true });
    expect(metrics).toMatchObject({
      stepCount: 7,
      rowsEmitted: 4,
      rowsHidden: 3,
      maxDepthReached: 3,
      opCounts: { add: 4, predecessor: 3 },
    });
  });
});

describe('Node API: deriveFraction', () => {
  it('adds fractions in lowest terms', () => {
    const derivation = deriveFraction(
      'add',
      { numerator: 1, denominator: 2 },
      { numerator: 1, denominator: 3 }
    );
    expect(derivation.operation).toBe('fraction:add');
    expect(derivation.inputs).toEqual([
      { numerator: 1, denominator: 2 },
      { numerator: 1, denominator: 3 },
    ]);
    expect(derivation.result).toEqual({
      kind: 'fraction',
      numerator: 5,
      denominator: 6,
      term: 's(s(s(s(s(0)))))/s(s(s(s(s(s(0))))))',
    });
  });

  it('simplify takes a single operand', () => {
    const derivation = deriveFraction('simplify', { numerator: 6, denominator: 9 });
    expect(derivation.inputs).toEqual([{ numerator: 6, denominator: 9 }]);
    expect(derivation.result).toMatchObject({ numerator: 2, denominator: 3 });
  });

  it('rejects missing, zero and invalid operands', () => {
    expect(
      rejection(() => deriveFraction('add', { numerator: 1, denominator: 2 })).message
    ).toBe('fraction:add needs a second argument b');

    const zero = rejection(() =>
      deriveFraction(
        'add',
        { numerator: 1, denominator: 0 },
        { numerator: 1, denominator: 2 }
      )
    );
    expect(zero.errorCode).toBe(ErrorCode.ZERO_DENOMINATOR);
    expect(zero.argument).toBe('a.denominator');

    expect(
      rejection(() =>
        deriveFraction(
          'divide',
          { numerator: 1, denominator: 2 },
          { numerator: 0, denominator: 3 }
        )
      ).errorCode
    ).toBe(ErrorCode.DIVISION_BY_ZERO);
  });
});

describe('Node API: describeFraction', () => {
  it('reports gcd, lowest terms and the division check', () => {
    const description = describeFraction(7, 3);
    expect(description).toMatchObject({
      numerator: 7,
      denominator: 3,
      gcd: 1,
      simplified: { numerator: 7, denominator: 3 },
      quotient: 2,
      remainder: 1,
      check: { lhs: 7, product: 6, rhs: 7 },
    });
    expect(description.stepCount).toBeGreaterThan(0);
  });

  it('rejects a zero denominator', () => {
    const error = rejection(() => describeFraction(7, 0));
    expect(error.errorCode).toBe(ErrorCode.ZERO_DENOMINATOR);
    expect(error.argument).toBe('fraction.denominator');
  });
});

describe('Node API: recognizeTerm', () => {
  it('recognizes a numeral and reports its value', () => {
    const recognition = recognizeTerm('s(s(0))');
    expect(recognition.wellFormed).toBe(true);
    expect(recognition.value).toBe(2);
    expect(recognition.stepCount).toBe(5);
    expect(recognition.rows.map((row) => [row.op, row.depth, row.axiom])).toEqual([
      ['peano', 0, 'A2'],
      ['peano', 1, 'A2'],
      ['peano', 2, 'A1'],
    ]);
  });

  it('reports malformed text without throwing', () => {
    const recognition = recognizeTerm('s(0');
    expect(recognition.wellFormed).toBe(false);
    expect('value' in recognition).toBe(false);
    expect(recognition.stepCount).toBe(1);
  });

  it('rejects a numeral above maxNatural before deriving it', () => {
    const error = rejection(() => recognizeTerm('s^200000(0)'));
    expect(error.errorCode).toBe(ErrorCode.INPUT_LIMIT_EXCEEDED);
    expect(error.message).toBe('term exceeds the configured maximum of 100000');
    expect(error.context).toMatchObject({ argument: 'term', operation: 'recognize', limit: 100000 });
  });

  it('bounds malformed text by its successor prefix', () => {
    const error = rejection(() => recognizeTerm('s^200000(1)'));
    expect(error.errorCode).toBe(ErrorCode.INPUT_LIMIT_EXCEEDED);
  });

  it('honours a lowered maxNatural', () => {
    const options = { limits: { maxNatural: 3 } };
    expect(recognizeTerm('s(s(s(0)))', options).value).toBe(3);
    const error = rejection(() => recognizeTerm('s(s(s(s(0))))', options));
    expect(error.errorCode).toBe(ErrorCode.INPUT_LIMIT_EXCEEDED);
    expect(error.message).toBe('term exceeds the configured maximum of 3');
  });
});

describe('Node API: operation names', () => {
  it('accepts known names and rejects the rest', () => {
    expect(parseNaturalOperation('gcd')).toBe('gcd');
    expect(parseFractionOperation('divide')).toBe('divide');

    const error = rejection(() => parseNaturalOperation('pow'));
    expect(error.errorCode).toBe(ErrorCode.UNSUPPORTED_OPERATION);
    expect(error.message).toBe('Unsupported operation "pow"');
    expect(rejection(() => parseFractionOperation('gcd')).errorCode).toBe(
      ErrorCode.UNSUPPORTED_OPERATION
    );
  });
});
