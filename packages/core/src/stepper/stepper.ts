import { Fraction } from '../natural/fraction.js';
import { assertNaturalInput, zeroDenominatorError } from '../natural/input.js';
import { Natural } from '../natural/natural.js';
import { formatTerm } from '../natural/term.js';
import {
  resolveOptions,
  type StepperOptions,
  type TermStyle,
} from '../types/options.js';
import { gcd } from '../util/rational.js';
import type {
  FractionTrace,
  NaturalTrace,
  Step,
  StepRole,
  StepValue,
} from './types.js';

function naturalValue(value: number, style: TermStyle): StepValue {
  return { kind: 'natural', value, term: formatTerm(value, style) };
}

function fractionValue(
  numerator: number,
  denominator: number,
  style: TermStyle
): StepValue {
  return {
    kind: 'fraction',
    numerator,
    denominator,
    term: `${formatTerm(numerator, style)}/${formatTerm(denominator, style)}`,
  };
}

/**
 * Zero step followed by one Successor step per unit, indexed from `offset`.
 * Built with a counter; no intermediate Natural objects are chained.
 */
function naturalSteps(
  depth: number,
  style: TermStyle,
  offset: number,
  role?: StepRole
): Step[] {
  const withRole = role ? { role } : {};
  const steps: Step[] = [
    {
      index: offset,
      rule: 'zero',
      label: 'Zero',
      ruleText: 'axiom A1: 0 is a natural number',
      description: role
        ? `Start the ${role} from 0, a natural number by A1.`
        : '0 is a natural number by A1.',
      value: naturalValue(0, style),
      axiom: 'A1',
      ...withRole,
    },
  ];

  for (let k = 1; k <= depth; k += 1) {
    steps.push({
      index: offset + k,
      rule: 'successor',
      label: 'Succ',
      ruleText: 'apply Successor',
      description: `The successor of ${k - 1} is ${k}, a natural number by A2.`,
      value: naturalValue(k, style),
      axiom: 'A2',
      ...withRole,
    });
  }
  return steps;
}

/**
 * Construct n from Zero by repeated Successor.
 *
 * The trace holds exactly n + 1 steps whose values run 0, 1, …, n.
 *
 * @throws {InvalidInputError} for negative, non-integer or over-limit n
 */
export function buildNatural(
  n: number,
  options: Partial<StepperOptions> = {}
): NaturalTrace {
  const resolved = resolveOptions(options);
  const depth = assertNaturalInput(n, {
    argument: 'n',
    operation: 'buildNatural',
    maxNatural: resolved.limits.maxNatural,
  });

  return {
    kind: 'natural',
    steps: naturalSteps(depth, resolved.trace.termStyle, 0),
    result: Natural.of(depth),
  };
}

/**
 * Construct numerator/denominator: the numerator's trace, the denominator's
 * trace, a pairing step and, when `reduce` is set, a reduction step by the
 * gcd. The reduction step is left out when the gcd is 1, and reduction is
 * skipped entirely for a zero numerator (0/d is reported as is).
 *
 * Both arguments are checked before any step is built.
 *
 * @throws {InvalidInputError} for negative or non-integer arguments and a zero denominator
 */
export function buildFraction(
  numerator: number,
  denominator: number,
  reduce = true,
  options: Partial<StepperOptions> = {}
): FractionTrace {
  const resolved = resolveOptions(options);
  const { maxNatural } = resolved.limits;
  const style = resolved.trace.termStyle;

  const n = assertNaturalInput(numerator, {
    argument: 'numerator',
    operation: 'buildFraction',
    maxNatural,
  });
  const d = assertNaturalInput(denominator, {
    argument: 'denominator',
    operation: 'buildFraction',
    maxNatural,
  });
  if (d === 0) {
    throw zeroDenominatorError('denominator', 'buildFraction');
  }

  const steps: Step[] = [
    ...naturalSteps(n, style, 0, 'numerator'),
    ...naturalSteps(d, style, n + 1, 'denominator'),
  ];
  steps.push({
    index: steps.length,
    rule: 'pair',
    label: 'Pair',
    ruleText: 'pair numerator and denominator',
    description: `Pair ${n} with the non-zero ${d} to form ${n}/${d}.`,
    value: fractionValue(n, d, style),
  });

  const paired = Fraction.fromIntegers(n, d);
  if (!reduce || n === 0) {
    return { kind: 'fraction', steps, result: paired, reduced: false };
  }

  const divisor = gcd(n, d);
  if (divisor === 1) {
    return {
      kind: 'fraction',
      steps,
      result: paired,
      reduced: true,
      gcd: divisor,
    };
  }

  const rn = n / divisor;
  const rd = d / divisor;
  steps.push({
    index: steps.length,
    rule: 'reduce',
    label: 'Reduce',
    ruleText: `reduce by gcd=${divisor}`,
    description: `gcd(${n}, ${d}) = ${divisor}; ${n}/${divisor} = ${rn} and ${d}/${divisor} = ${rd}.`,
    value: fractionValue(rn, rd, style),
  });

  return {
    kind: 'fraction',
    steps,
    result: Fraction.fromIntegers(rn, rd),
    reduced: true,
    gcd: divisor,
  };
}
