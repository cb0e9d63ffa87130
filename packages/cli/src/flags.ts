import {
  ConfigurationError,
  InvalidInputError,
  TERM_STYLES,
  type FractionValue,
  type StepperOptions,
  type TermStyle,
} from '@peanotrace/core';

export type OutputFormat = 'text' | 'markdown' | 'json';
export type BatchOutputFormat = 'json' | 'ndjson';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  format?: string;
  out?: string;
  termStyle?: string;
  maxNatural?: string | number;
  maxSteps?: string | number;
  maxDepth?: string | number;
  showPrimitives?: boolean;
  printMetrics?: boolean;
  profile?: string;
  debug?: boolean;
  // Commander sets reduce=false for --no-reduce
  reduce?: boolean;
  file?: string;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

const NUMBER_TEXT = /^[+-]?\d+(\.\d+)?$/;

/**
 * Parse a numeric operand. Sign and fractional part are kept so that the
 * engine reports negative and non-integer operands itself.
 *
 * @throws {InvalidInputError} when the text is not a number
 */
export function parseNaturalArgument(raw: string, argument: string): number {
  const text = raw.trim();
  if (!NUMBER_TEXT.test(text)) {
    throw new InvalidInputError({
      message: `${argument} must be a number, got "${raw}"`,
      context: {
        argument,
        value: raw,
        suggestion: 'Pass a non-negative integer such as 0, 1 or 42',
      },
    });
  }
  return Number(text);
}

/**
 * Parse `n/d`, or a bare `n` read as `n/1`.
 *
 * @throws {InvalidInputError} when either part is not a number
 */
export function parseFractionArgument(raw: string, argument: string): FractionValue {
  const parts = raw.split('/');
  const [numerator, denominator] = parts;
  if (numerator === undefined || parts.length > 2) {
    throw new InvalidInputError({
      message: `${argument} must be written as n/d, got "${raw}"`,
      context: {
        argument,
        value: raw,
        suggestion: 'Write fractions as 3/4, or a whole number as 3',
      },
    });
  }
  return {
    numerator: parseNaturalArgument(numerator, `${argument}.numerator`),
    denominator:
      denominator === undefined
        ? 1
        : parseNaturalArgument(denominator, `${argument}.denominator`),
  };
}

function parseIntegerOption(
  value: string | number,
  flag: string,
  setting: string,
  minimum: number
): number {
  const num = typeof value === 'number' ? value : Number(String(value));
  if (!Number.isSafeInteger(num) || num < minimum) {
    const expected = minimum > 0 ? 'a positive integer' : 'a non-negative integer';
    throw new ConfigurationError(
      `Invalid ${flag} value "${String(value)}". Expected ${expected}.`,
      setting
    );
  }
  return num;
}

/**
 * Parse CLI options into StepperOptions. Flags that were not given are left
 * out so the engine defaults apply.
 */
export function parseStepperOptions(options: CliOptions): Partial<StepperOptions> {
  const stepperOptions: Partial<StepperOptions> = {};

  if (options.maxNatural !== undefined || options.maxSteps !== undefined) {
    stepperOptions.limits = {};
    if (options.maxNatural !== undefined) {
      stepperOptions.limits.maxNatural = parseIntegerOption(
        options.maxNatural,
        '--max-natural',
        'limits.maxNatural',
        1
      );
    }
    if (options.maxSteps !== undefined) {
      stepperOptions.limits.maxSteps = parseIntegerOption(
        options.maxSteps,
        '--max-steps',
        'limits.maxSteps',
        1
      );
    }
  }

  const termStyle = resolveTermStyle(options.termStyle);
  if (
    termStyle !== undefined ||
    options.maxDepth !== undefined ||
    typeof options.showPrimitives === 'boolean'
  ) {
    stepperOptions.trace = {};
    if (termStyle !== undefined) {
      stepperOptions.trace.termStyle = termStyle;
    }
    if (options.maxDepth !== undefined) {
      stepperOptions.trace.maxDepth = parseIntegerOption(
        options.maxDepth,
        '--max-depth',
        'trace.maxDepth',
        0
      );
    }
    if (typeof options.showPrimitives === 'boolean') {
      stepperOptions.trace.hidePrimitives = !options.showPrimitives;
    }
  }

  if (options.printMetrics === true) {
    stepperOptions.metrics = true;
  }

  return stepperOptions;
}

export function resolveTermStyle(value: unknown): TermStyle | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const raw = String(value).toLowerCase();
  const style = TERM_STYLES.find((candidate) => candidate === raw);
  if (style) {
    return style;
  }
  throw new ConfigurationError(
    `Invalid --term-style value "${String(value)}". Expected one of: ${TERM_STYLES.join(', ')}.`,
    'trace.termStyle'
  );
}

/**
 * Resolve the --format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'text' || raw === 'markdown' || raw === 'json') {
    return raw;
  }
  throw new ConfigurationError(
    `Invalid --format value "${String(value)}". Supported formats are "text", "markdown" and "json".`,
    'format'
  );
}

/**
 * Resolve the batch --out flag into a known format or throw.
 */
export function resolveBatchFormat(value: unknown): BatchOutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'json';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'json' || raw === 'ndjson') {
    return raw;
  }
  throw new ConfigurationError(
    `Invalid --out value "${String(value)}". Supported formats are "json" and "ndjson".`,
    'out'
  );
}
