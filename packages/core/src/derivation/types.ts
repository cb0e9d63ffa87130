import type { MetricsSnapshot } from '../util/metrics.js';

/** Operations that can appear as nodes of a derivation tree */
export type NodeOp =
  | 'is-zero'
  | 'peano'
  | 'successor'
  | 'predecessor'
  | 'equal'
  | 'less-than'
  | 'greater-than'
  | 'add'
  | 'subtract'
  | 'multiply'
  | 'divide'
  | 'divide-step'
  | 'modulo'
  | 'modulo-step'
  | 'gcd';

/** Peano axioms cited by nodes */
export type Axiom = 'A1' | 'A2' | 'A3' | 'A4';

/** Definitional rules of the derived operations */
export type Definition =
  | 'ADD-BASE'
  | 'ADD-REC'
  | 'MULT-BASE'
  | 'MULT-REC'
  | 'LT-BASE'
  | 'LT-REC'
  | 'SUB-BASE'
  | 'SUB-REC'
  | 'DIV-DEF'
  | 'DIV-STEP'
  | 'MOD-DEF'
  | 'MOD-STEP'
  | 'GCD-BASE'
  | 'GCD-REC';

export type NodeValue =
  | { kind: 'natural'; value: number }
  | { kind: 'boolean'; value: boolean }
  /** Raw term text, only produced while recognizing a term */
  | { kind: 'term'; value: string };

export interface DerivationNode {
  op: NodeOp;
  args: NodeValue[];
  result?: NodeValue;
  axiom?: Axiom;
  definition?: Definition;
  children: DerivationNode[];
}

/** A derivation node flattened for display */
export interface DerivationRow {
  depth: number;
  op: NodeOp;
  axiom?: Axiom;
  definition?: Definition;
  /** Integer reading, e.g. `2 + 3 = 5` */
  meaning: string;
  /** Term reading, e.g. `add: s(s(0)) + s(s(s(0))) → …` */
  meaningTerm: string;
  explanation: string;
  /** Integer value of each argument; null where an argument is not a numeral */
  argsInt: Array<number | boolean | null>;
  resultInt: number | boolean | null;
}

export type NaturalOperation =
  | 'successor'
  | 'predecessor'
  | 'add'
  | 'subtract'
  | 'multiply'
  | 'less-than'
  | 'equal'
  | 'greater-than'
  | 'divide'
  | 'modulo'
  | 'gcd'
  | 'to-fraction'
  | 'simplify';

export type FractionOperation =
  | 'simplify'
  | 'add'
  | 'subtract'
  | 'multiply'
  | 'divide';

export const NATURAL_OPERATIONS: readonly NaturalOperation[] = [
  'successor',
  'predecessor',
  'add',
  'subtract',
  'multiply',
  'less-than',
  'equal',
  'greater-than',
  'divide',
  'modulo',
  'gcd',
  'to-fraction',
  'simplify',
];

export const FRACTION_OPERATIONS: readonly FractionOperation[] = [
  'simplify',
  'add',
  'subtract',
  'multiply',
  'divide',
];

/** Operations that take a single argument */
export const UNARY_OPERATIONS: readonly NaturalOperation[] = [
  'successor',
  'predecessor',
  'to-fraction',
];

export interface FractionValue {
  numerator: number;
  denominator: number;
}

export type DerivedValue =
  | { kind: 'natural'; value: number; term: string }
  | { kind: 'boolean'; value: boolean }
  | {
      kind: 'fraction';
      numerator: number;
      denominator: number;
      term: string;
    };

export type DerivationInput = number | FractionValue;

export interface Derivation {
  /** e.g. `add` or `fraction:multiply` */
  operation: string;
  inputs: DerivationInput[];
  result: DerivedValue;
  /** Number of nodes recorded, primitives included */
  stepCount: number;
  /** A clamped subtraction hit zero on the way */
  negativeEncountered: boolean;
  /** Root nodes in evaluation order */
  tree: DerivationNode[];
  rows: DerivationRow[];
  metrics?: MetricsSnapshot;
}

export interface FractionDescription {
  numerator: number;
  denominator: number;
  gcd: number;
  simplified: FractionValue;
  quotient: number;
  remainder: number;
  /** `numerator = denominator × quotient + remainder` */
  check: { lhs: number; product: number; rhs: number };
  stepCount: number;
  tree: DerivationNode[];
  rows: DerivationRow[];
  metrics?: MetricsSnapshot;
}

export interface TermRecognition {
  term: string;
  /** Well-formed by A1/A2 */
  wellFormed: boolean;
  /** Successor count when well-formed */
  value?: number;
  stepCount: number;
  tree: DerivationNode[];
  rows: DerivationRow[];
}
