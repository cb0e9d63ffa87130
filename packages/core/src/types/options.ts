/**
 * Configuration options for the stepper and derivation engine
 *
 * All options are optional with conservative defaults. Callers pass a
 * Partial<StepperOptions>; resolveOptions merges it over DEFAULT_OPTIONS and
 * rejects invalid values.
 */

import { ConfigurationError } from './errors.js';

/** How Peano terms are written in steps and rows */
export type TermStyle = 'full' | 'compact' | 'auto';

export const TERM_STYLES: readonly TermStyle[] = ['full', 'compact', 'auto'];

/**
 * Input and work bounds
 */
export interface LimitsOptions {
  /** Largest natural accepted as input (default: 100_000) */
  maxNatural?: number;
  /** Largest number of derivation nodes a single derivation may record (default: 250_000) */
  maxSteps?: number;
}

/**
 * Trace rendering configuration
 */
export interface TraceOptions {
  /** Term notation for values (default: 'auto') */
  termStyle?: TermStyle;
  /** Rows deeper than this are dropped from explained derivations (default: 10) */
  maxDepth?: number;
  /** Hide successor/predecessor rows from explained derivations (default: true) */
  hidePrimitives?: boolean;
}

/**
 * Complete configuration options
 */
export interface StepperOptions {
  limits?: LimitsOptions;
  trace?: TraceOptions;
  /** Collect phase timings and counters on derivations (default: false) */
  metrics?: boolean;
}

export interface ResolvedOptions {
  limits: Required<LimitsOptions>;
  trace: Required<TraceOptions>;
  metrics: boolean;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  limits: {
    maxNatural: 100_000,
    maxSteps: 250_000,
  },
  trace: {
    termStyle: 'auto',
    maxDepth: 10,
    hidePrimitives: true,
  },
  metrics: false,
};

/**
 * Merge user options over defaults.
 *
 * @throws {ConfigurationError} When a value is out of range
 */
export function resolveOptions(
  userOptions: Partial<StepperOptions> = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    limits: { ...DEFAULT_OPTIONS.limits, ...userOptions.limits },
    trace: { ...DEFAULT_OPTIONS.trace, ...userOptions.trace },
    metrics: userOptions.metrics ?? DEFAULT_OPTIONS.metrics,
  };

  validateOptions(resolved);
  return resolved;
}

function isPositiveSafeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

function validateOptions(options: ResolvedOptions): void {
  if (!isPositiveSafeInteger(options.limits.maxNatural)) {
    throw new ConfigurationError(
      'limits.maxNatural must be a positive integer',
      'limits.maxNatural'
    );
  }
  if (!isPositiveSafeInteger(options.limits.maxSteps)) {
    throw new ConfigurationError(
      'limits.maxSteps must be a positive integer',
      'limits.maxSteps'
    );
  }
  if (!TERM_STYLES.includes(options.trace.termStyle)) {
    throw new ConfigurationError(
      `trace.termStyle must be one of ${TERM_STYLES.join(', ')}`,
      'trace.termStyle'
    );
  }
  if (!Number.isSafeInteger(options.trace.maxDepth) || options.trace.maxDepth < 0) {
    throw new ConfigurationError(
      'trace.maxDepth must be a non-negative integer',
      'trace.maxDepth'
    );
  }
  if (typeof options.trace.hidePrimitives !== 'boolean') {
    throw new ConfigurationError(
      'trace.hidePrimitives must be boolean',
      'trace.hidePrimitives'
    );
  }
  if (typeof options.metrics !== 'boolean') {
    throw new ConfigurationError('metrics must be boolean', 'metrics');
  }
}
