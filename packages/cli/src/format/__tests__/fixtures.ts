import type {
  Derivation,
  FractionDescription,
  TermRecognition,
} from '@peanotrace/core';

export function addDerivation(): Derivation {
  return {
    operation: 'add',
    inputs: [2, 3],
    result: { kind: 'natural', value: 5, term: 's(s(s(s(s(0)))))' },
    stepCount: 7,
    negativeEncountered: false,
    tree: [],
    rows: [
      {
        depth: 0,
        op: 'add',
        definition: 'ADD-REC',
        meaning: '2 + 3 = 5',
        meaningTerm: 'add: s(s(0)) + s(s(s(0))) → s(s(s(s(s(0)))))',
        explanation: 'x + s(y) = s(x + y)',
        argsInt: [2, 3],
        resultInt: 5,
      },
      {
        depth: 1,
        op: 'successor',
        axiom: 'A2',
        meaning: 'step',
        meaningTerm: 'successor: s(s(s(s(0)))) → s(s(s(s(s(0)))))',
        explanation: '',
        argsInt: [4],
        resultInt: 5,
      },
    ],
  };
}

export function subtractDerivation(): Derivation {
  return {
    operation: 'subtract',
    inputs: [1, 4],
    result: { kind: 'natural', value: 0, term: '0' },
    stepCount: 3,
    negativeEncountered: true,
    tree: [],
    rows: [],
  };
}

export function fractionDerivation(): Derivation {
  return {
    operation: 'fraction:multiply',
    inputs: [
      { numerator: 1, denominator: 2 },
      { numerator: 2, denominator: 3 },
    ],
    result: { kind: 'fraction', numerator: 1, denominator: 3, term: 's(0)/s(s(s(0)))' },
    stepCount: 40,
    negativeEncountered: false,
    tree: [],
    rows: [
      {
        depth: 0,
        op: 'less-than',
        definition: 'LT-BASE',
        meaning: 'predicate',
        meaningTerm: '',
        explanation: '0 < s(y)',
        argsInt: [0, null],
        resultInt: true,
      },
    ],
  };
}

export function sixNinths(): FractionDescription {
  return {
    numerator: 6,
    denominator: 9,
    gcd: 3,
    simplified: { numerator: 2, denominator: 3 },
    quotient: 0,
    remainder: 6,
    check: { lhs: 6, product: 0, rhs: 6 },
    stepCount: 12,
    tree: [],
    rows: [],
  };
}

export function malformedTerm(): TermRecognition {
  return { term: 's(0', wellFormed: false, stepCount: 2, tree: [], rows: [] };
}

export function twoTerm(): TermRecognition {
  return { term: 's(s(0))', wellFormed: true, value: 2, stepCount: 5, tree: [], rows: [] };
}
