import type { Fraction } from '../natural/fraction.js';
import type { Natural } from '../natural/natural.js';

export type StepRule = 'zero' | 'successor' | 'pair' | 'reduce';

export type StepRole = 'numerator' | 'denominator';

export type StepValue =
  | { kind: 'natural'; value: number; term: string }
  | { kind: 'fraction'; numerator: number; denominator: number; term: string };

/**
 * One derivation action. Steps are ordered; `index` is the position in the
 * owning trace.
 */
export interface Step {
  readonly index: number;
  readonly rule: StepRule;
  /** Short name shown in step lists: Zero, Succ, Pair, Reduce */
  readonly label: string;
  /** The rule as applied, e.g. "apply Successor" or "reduce by gcd=3" */
  readonly ruleText: string;
  readonly description: string;
  readonly value: StepValue;
  /** Peano axiom backing the step, when there is one */
  readonly axiom?: 'A1' | 'A2';
  /** Which half of a fraction a natural sub-trace builds */
  readonly role?: StepRole;
}

export interface NaturalTrace {
  readonly kind: 'natural';
  readonly steps: readonly Step[];
  readonly result: Natural;
}

export interface FractionTrace {
  readonly kind: 'fraction';
  readonly steps: readonly Step[];
  readonly result: Fraction;
  /** Reduction was requested and evaluated; the result is in lowest terms */
  readonly reduced: boolean;
  /** gcd of the pair when reduction was evaluated */
  readonly gcd?: number;
}

export type Trace = NaturalTrace | FractionTrace;
