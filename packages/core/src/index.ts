// @peanotrace/core entry point
//
// Public API:
// - Stepper: buildNatural/buildFraction construct values from the Peano axioms
//   and return the ordered step trace.
// - Derivations: derive/deriveFraction/describeFraction/recognizeTerm evaluate
//   arithmetic through primitive recursive definitions and return the
//   derivation tree plus display rows.
// - Building blocks: Natural/Fraction, term formatting and parsing, options,
//   errors and the error presenter, serialization, metrics.

// Stepper
export { buildNatural, buildFraction } from './stepper/stepper.js';
export type {
  Step,
  StepRule,
  StepRole,
  StepValue,
  Trace,
  NaturalTrace,
  FractionTrace,
} from './stepper/types.js';

// Derivation facades
export {
  derive,
  deriveFraction,
  describeFraction,
  recognizeTerm,
  isNaturalOperation,
  isFractionOperation,
  parseNaturalOperation,
  parseFractionOperation,
} from './api.js';
export {
  NATURAL_OPERATIONS,
  FRACTION_OPERATIONS,
  UNARY_OPERATIONS,
  type Axiom,
  type Definition,
  type Derivation,
  type DerivationInput,
  type DerivationNode,
  type DerivationRow,
  type DerivedValue,
  type FractionDescription,
  type FractionOperation,
  type FractionValue,
  type NaturalOperation,
  type NodeOp,
  type NodeValue,
  type TermRecognition,
} from './derivation/types.js';
export {
  explainDerivation,
  flattenDerivation,
  type ExplainOptions,
} from './derivation/explain.js';

// Model
export { Natural } from './natural/natural.js';
export { Fraction } from './natural/fraction.js';
export {
  formatTerm,
  parseTerm,
  normalizeTerm,
  AUTO_FULL_TERM_LIMIT,
} from './natural/term.js';
export { gcd, reducePair } from './util/rational.js';

// Options
export {
  DEFAULT_OPTIONS,
  TERM_STYLES,
  resolveOptions,
  type LimitsOptions,
  type ResolvedOptions,
  type StepperOptions,
  type TermStyle,
  type TraceOptions,
} from './types/options.js';

// Errors
export {
  ErrorCode,
  type Severity,
  getExitCode,
  getHttpStatus,
  isInputErrorCode,
} from './errors/codes.js';
export {
  PeanoError,
  InvalidInputError,
  ConfigurationError,
  ParseError,
  isPeanoError,
  isInvalidInputError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type APIErrorView,
  type ProductionView,
} from './errors/presenter.js';

// Serialization & metrics
export {
  serializeTrace,
  serializeDerivation,
  type SerializedTrace,
  type SerializedDerivation,
  type SerializeOptions,
} from './trace/serialize.js';
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsSnapshot,
  type MetricsVerbosity,
} from './util/metrics.js';
