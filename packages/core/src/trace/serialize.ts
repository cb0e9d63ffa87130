import type {
  Derivation,
  DerivationNode,
  DerivationRow,
  DerivationInput,
  DerivedValue,
} from '../derivation/types.js';
import { DEFAULT_OPTIONS, type TermStyle } from '../types/options.js';
import type { MetricsSnapshot } from '../util/metrics.js';
import type { Step, Trace } from '../stepper/types.js';

/** JSON shape of a trace; see schemas/trace.schema.json */
export interface SerializedTrace {
  kind: Trace['kind'];
  stepCount: number;
  steps: Step[];
  result:
    | { kind: 'natural'; value: number; term: string }
    | { kind: 'fraction'; numerator: number; denominator: number; term: string };
  reduced?: boolean;
  gcd?: number;
}

export interface SerializedDerivation {
  operation: string;
  inputs: DerivationInput[];
  result: DerivedValue;
  stepCount: number;
  negativeEncountered: boolean;
  rows: DerivationRow[];
  tree?: DerivationNode[];
  metrics?: MetricsSnapshot;
}

export interface SerializeOptions {
  termStyle?: TermStyle;
  /** Include the full derivation tree (default: false) */
  includeTree?: boolean;
}

export function serializeTrace(
  trace: Trace,
  options: SerializeOptions = {}
): SerializedTrace {
  const style = options.termStyle ?? DEFAULT_OPTIONS.trace.termStyle;
  const steps = trace.steps.map((step) => ({ ...step }));

  if (trace.kind === 'natural') {
    return {
      kind: 'natural',
      stepCount: steps.length,
      steps,
      result: {
        kind: 'natural',
        value: trace.result.value,
        term: trace.result.toTerm(style),
      },
    };
  }

  return {
    kind: 'fraction',
    stepCount: steps.length,
    steps,
    result: {
      kind: 'fraction',
      numerator: trace.result.numerator.value,
      denominator: trace.result.denominator.value,
      term: trace.result.toTerm(style),
    },
    reduced: trace.reduced,
    ...(trace.gcd !== undefined ? { gcd: trace.gcd } : {}),
  };
}

export function serializeDerivation(
  derivation: Derivation,
  options: SerializeOptions = {}
): SerializedDerivation {
  return {
    operation: derivation.operation,
    inputs: derivation.inputs,
    result: derivation.result,
    stepCount: derivation.stepCount,
    negativeEncountered: derivation.negativeEncountered,
    rows: derivation.rows,
    ...(options.includeTree ? { tree: derivation.tree } : {}),
    ...(derivation.metrics ? { metrics: derivation.metrics } : {}),
  };
}
