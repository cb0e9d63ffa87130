import { PeanoArithmetic } from './derivation/engine.js';
import { explainDerivation } from './derivation/explain.js';
import { FractionArithmetic } from './derivation/fractions.js';
import { DerivationRecorder } from './derivation/recorder.js';
import {
  FRACTION_OPERATIONS,
  NATURAL_OPERATIONS,
  UNARY_OPERATIONS,
  type Derivation,
  type DerivationRow,
  type DerivedValue,
  type FractionDescription,
  type FractionOperation,
  type FractionValue,
  type NaturalOperation,
  type TermRecognition,
} from './derivation/types.js';
import { ErrorCode } from './errors/codes.js';
import { assertNaturalInput, zeroDenominatorError } from './natural/input.js';
import { formatTerm, leadingSuccessors, parseTerm } from './natural/term.js';
import { InvalidInputError } from './types/errors.js';
import {
  resolveOptions,
  type ResolvedOptions,
  type StepperOptions,
} from './types/options.js';
import { MetricsCollector } from './util/metrics.js';

// Facades over the derivation engine. Each call resolves its options, checks
// every input, then runs on a fresh recorder; nothing is shared between calls.

interface Session {
  options: ResolvedOptions;
  metrics: MetricsCollector;
  recorder: DerivationRecorder;
  peano: PeanoArithmetic;
  fractions: FractionArithmetic;
}

function openSession(
  operation: string,
  userOptions: Partial<StepperOptions>
): Session {
  const options = resolveOptions(userOptions);
  const metrics = new MetricsCollector({
    enabled: options.metrics,
    verbosity: 'ci',
  });
  const recorder = new DerivationRecorder({
    maxSteps: options.limits.maxSteps,
    operation,
    metrics,
  });
  const peano = new PeanoArithmetic(recorder);
  return {
    options,
    metrics,
    recorder,
    peano,
    fractions: new FractionArithmetic(peano),
  };
}

function explain(session: Session): DerivationRow[] {
  return session.metrics.measure('EXPLAIN', () =>
    explainDerivation(session.recorder.roots, session.options.trace, session.metrics)
  );
}

function finish(session: Session): { stepCount: number; metrics?: Derivation['metrics'] } {
  const stepCount = session.recorder.stepCount;
  session.metrics.addSteps(stepCount);
  return session.metrics.isEnabled()
    ? { stepCount, metrics: session.metrics.snapshotMetrics() }
    : { stepCount };
}

function unsupported(operation: string, known: readonly string[]): InvalidInputError {
  return new InvalidInputError({
    message: `Unsupported operation "${operation}"`,
    errorCode: ErrorCode.UNSUPPORTED_OPERATION,
    context: {
      argument: 'operation',
      value: operation,
      suggestion: `Use one of: ${known.join(', ')}`,
    },
  });
}

export function isNaturalOperation(value: string): value is NaturalOperation {
  return NATURAL_OPERATIONS.some((op) => op === value);
}

export function isFractionOperation(value: string): value is FractionOperation {
  return FRACTION_OPERATIONS.some((op) => op === value);
}

/** @throws {InvalidInputError} UNSUPPORTED_OPERATION */
export function parseNaturalOperation(value: string): NaturalOperation {
  if (!isNaturalOperation(value)) throw unsupported(value, NATURAL_OPERATIONS);
  return value;
}

/** @throws {InvalidInputError} UNSUPPORTED_OPERATION */
export function parseFractionOperation(value: string): FractionOperation {
  if (!isFractionOperation(value)) throw unsupported(value, FRACTION_OPERATIONS);
  return value;
}

function naturalResult(value: number, options: ResolvedOptions): DerivedValue {
  return {
    kind: 'natural',
    value,
    term: formatTerm(value, options.trace.termStyle),
  };
}

function fractionResult(value: FractionValue, options: ResolvedOptions): DerivedValue {
  const style = options.trace.termStyle;
  return {
    kind: 'fraction',
    numerator: value.numerator,
    denominator: value.denominator,
    term: `${formatTerm(value.numerator, style)}/${formatTerm(value.denominator, style)}`,
  };
}

function missingArgument(argument: string, operation: string): InvalidInputError {
  return new InvalidInputError({
    message: `${operation} needs a second argument ${argument}`,
    context: {
      argument,
      operation,
      suggestion: `Pass ${argument} after the first operand`,
    },
  });
}

/**
 * Derive an arithmetic fact about naturals from the Peano axioms and the
 * primitive recursive definitions built on them.
 *
 * Unary operations (`successor`, `predecessor`, `to-fraction`) ignore `y`.
 *
 * @throws {InvalidInputError} for bad operands, a missing `y`, division by
 * zero or an exhausted step budget
 * @throws {ConfigurationError} for invalid options
 */
export function derive(
  operation: NaturalOperation,
  x: number,
  y?: number,
  options: Partial<StepperOptions> = {}
): Derivation {
  const session = openSession(operation, options);
  const { maxNatural } = session.options.limits;
  const unary = UNARY_OPERATIONS.includes(operation);

  const inputs = session.metrics.measure('VALIDATE', () => {
    const first = assertNaturalInput(x, { argument: 'x', operation, maxNatural });
    if (unary) return [first];
    if (y === undefined) throw missingArgument('y', operation);
    const second = assertNaturalInput(y, { argument: 'y', operation, maxNatural });
    if (operation === 'simplify' && second === 0) {
      throw zeroDenominatorError('y', operation);
    }
    return [first, second];
  });

  const [a = 0, b = 0] = inputs;
  const { peano, fractions } = session;
  const result = session.metrics.measure('DERIVE', (): DerivedValue => {
    switch (operation) {
      case 'successor':
        return naturalResult(peano.successor(a), session.options);
      case 'predecessor':
        return naturalResult(peano.predecessor(a), session.options);
      case 'add':
        return naturalResult(peano.add(a, b), session.options);
      case 'subtract':
        return naturalResult(peano.subtract(a, b), session.options);
      case 'multiply':
        return naturalResult(peano.multiply(a, b), session.options);
      case 'less-than':
        return { kind: 'boolean', value: peano.lessThan(a, b) };
      case 'equal':
        return { kind: 'boolean', value: peano.equal(a, b) };
      case 'greater-than':
        return { kind: 'boolean', value: peano.greaterThan(a, b) };
      case 'divide':
        return naturalResult(peano.divide(a, b), session.options);
      case 'modulo':
        return naturalResult(peano.modulo(a, b), session.options);
      case 'gcd':
        return naturalResult(peano.gcd(a, b), session.options);
      case 'to-fraction':
        return fractionResult(fractions.fromNatural(a), session.options);
      case 'simplify':
        return fractionResult(
          fractions.simplify(fractions.make(a, b)),
          session.options
        );
    }
  });

  const rows = explain(session);
  return {
    operation,
    inputs,
    result,
    negativeEncountered: session.recorder.negativeEncountered,
    tree: session.recorder.roots,
    rows,
    ...finish(session),
  };
}

function assertFractionInput(
  value: FractionValue,
  argument: string,
  operation: string,
  maxNatural: number
): FractionValue {
  const numerator = assertNaturalInput(value.numerator, {
    argument: `${argument}.numerator`,
    operation,
    maxNatural,
  });
  const denominator = assertNaturalInput(value.denominator, {
    argument: `${argument}.denominator`,
    operation,
    maxNatural,
  });
  if (denominator === 0) {
    throw zeroDenominatorError(`${argument}.denominator`, operation);
  }
  return { numerator, denominator };
}

/**
 * Fraction arithmetic. Results are always in lowest terms; subtraction
 * clamps at zero and raises `negativeEncountered`.
 *
 * @throws {InvalidInputError}
 */
export function deriveFraction(
  operation: FractionOperation,
  a: FractionValue,
  b?: FractionValue,
  options: Partial<StepperOptions> = {}
): Derivation {
  const name = `fraction:${operation}`;
  const session = openSession(name, options);
  const { maxNatural } = session.options.limits;

  const { left, right } = session.metrics.measure('VALIDATE', () => {
    const first = assertFractionInput(a, 'a', name, maxNatural);
    if (operation === 'simplify') return { left: first, right: undefined };
    if (b === undefined) throw missingArgument('b', name);
    return { left: first, right: assertFractionInput(b, 'b', name, maxNatural) };
  });

  const requireRight = (): FractionValue => {
    if (!right) throw missingArgument('b', name);
    return right;
  };
  const { fractions } = session;
  const value = session.metrics.measure('DERIVE', (): FractionValue => {
    switch (operation) {
      case 'simplify':
        return fractions.simplify(left);
      case 'add':
        return fractions.add(left, requireRight());
      case 'subtract':
        return fractions.subtract(left, requireRight());
      case 'multiply':
        return fractions.multiply(left, requireRight());
      case 'divide':
        return fractions.divide(left, requireRight());
    }
  });

  const rows = explain(session);
  return {
    operation: name,
    inputs: right ? [left, right] : [left],
    result: fractionResult(value, session.options),
    negativeEncountered: session.recorder.negativeEncountered,
    tree: session.recorder.roots,
    rows,
    ...finish(session),
  };
}

/**
 * gcd, lowest terms, quotient and remainder of numerator/denominator, with
 * the check `numerator = denominator × quotient + remainder`.
 *
 * @throws {InvalidInputError}
 */
export function describeFraction(
  numerator: number,
  denominator: number,
  options: Partial<StepperOptions> = {}
): FractionDescription {
  const session = openSession('describe', options);
  const fraction = session.metrics.measure('VALIDATE', () =>
    assertFractionInput(
      { numerator, denominator },
      'fraction',
      'describe',
      session.options.limits.maxNatural
    )
  );

  const check = session.metrics.measure('DERIVE', () =>
    session.fractions.describe(fraction)
  );
  const rows = explain(session);

  return {
    numerator: fraction.numerator,
    denominator: fraction.denominator,
    gcd: check.gcd,
    simplified: check.simplified,
    quotient: check.quotient,
    remainder: check.remainder,
    check: {
      lhs: fraction.numerator,
      product: check.product,
      rhs: check.rhs,
    },
    tree: session.recorder.roots,
    rows,
    ...finish(session),
  };
}

/**
 * Decide by A1 and A2 whether `term` is a Peano numeral. Malformed text is
 * reported as not well formed rather than thrown.
 *
 * @throws {InvalidInputError} INPUT_LIMIT_EXCEEDED when the term opens with
 * more than `maxNatural` successors
 */
export function recognizeTerm(
  term: string,
  options: Partial<StepperOptions> = {}
): TermRecognition {
  const session = openSession('recognize', options);
  session.metrics.measure('VALIDATE', () =>
    assertNaturalInput(leadingSuccessors(term), {
      argument: 'term',
      operation: 'recognize',
      maxNatural: session.options.limits.maxNatural,
    })
  );
  const wellFormed = session.metrics.measure('DERIVE', () =>
    session.peano.recognize(term)
  );
  const rows = explain(session);

  return {
    term,
    wellFormed,
    ...(wellFormed ? { value: parseTerm(term) } : {}),
    stepCount: session.recorder.stepCount,
    tree: session.recorder.roots,
    rows,
  };
}
