import type {
  Derivation,
  DerivationInput,
  DerivationRow,
  DerivedValue,
  FractionDescription,
  Step,
  TermRecognition,
  Trace,
} from '@peanotrace/core';

export function formatInput(input: DerivationInput): string {
  return typeof input === 'number'
    ? String(input)
    : `${input.numerator}/${input.denominator}`;
}

export function formatDerivedValue(value: DerivedValue): string {
  switch (value.kind) {
    case 'natural':
      return `${value.value} = ${value.term}`;
    case 'boolean':
      return String(value.value);
    case 'fraction':
      return `${value.numerator}/${value.denominator} = ${value.term}`;
  }
}

export function formatStepValue(step: Step): string {
  return step.value.kind === 'natural'
    ? String(step.value.value)
    : `${step.value.numerator}/${step.value.denominator}`;
}

/** Heading shared by the text and markdown renderers */
export function traceTitle(trace: Trace): string {
  if (trace.kind === 'natural') {
    return `Natural ${trace.result.value}`;
  }
  return `Fraction ${trace.result.toString()}`;
}

/** How reduction went, for fraction traces */
export function reductionNote(trace: Trace): string | undefined {
  if (trace.kind !== 'fraction') return undefined;
  if (!trace.reduced) return 'not reduced';
  if (trace.gcd === undefined || trace.gcd === 1) return 'already in lowest terms';
  return `reduced by gcd=${trace.gcd}`;
}

export function formatDerivationCall(derivation: Derivation): string {
  return `${derivation.operation}(${derivation.inputs.map(formatInput).join(', ')})`;
}

/**
 * Rows whose integer meaning is only a marker (`step`, `predicate`) or
 * missing are shown as a call with their integer arguments.
 */
export function rowSummary(row: DerivationRow): string {
  if (row.meaning && row.meaning !== 'step' && row.meaning !== 'predicate') {
    return row.meaning;
  }
  const args = row.argsInt.map((arg) => (arg === null ? '?' : String(arg)));
  const result = row.resultInt === null ? '?' : String(row.resultInt);
  return `${row.op}(${args.join(', ')}) → ${result}`;
}

export function rowRule(row: DerivationRow): string | undefined {
  return row.axiom ?? row.definition;
}

function renderRows(rows: readonly DerivationRow[]): string[] {
  return rows.map((row) => {
    const rule = rowRule(row);
    return `${'  '.repeat(row.depth)}${rowSummary(row)}${rule ? ` [${rule}]` : ''}`;
  });
}

function stepLine(step: Step, indexWidth: number, termWidth: number): string {
  const role = step.role ? ` [${step.role}]` : '';
  return [
    String(step.index).padStart(indexWidth),
    step.label.padEnd(6),
    step.value.term.padEnd(termWidth),
    `${step.ruleText}${role}`,
  ].join('  ');
}

export function renderTraceText(trace: Trace): string {
  const { steps } = trace;
  const indexWidth = String(Math.max(steps.length - 1, 0)).length;
  const termWidth = steps.reduce(
    (width, step) => Math.max(width, step.value.term.length),
    0
  );

  const lines = [`${traceTitle(trace)}: ${steps.length} steps`];
  for (const step of steps) {
    lines.push(stepLine(step, indexWidth, termWidth));
  }

  const last = steps[steps.length - 1];
  if (last) {
    lines.push(`Result: ${formatStepValue(last)} = ${last.value.term}`);
  }
  const note = reductionNote(trace);
  if (note) {
    lines.push(`Reduction: ${note}`);
  }
  return lines.join('\n');
}

export function renderDerivationText(derivation: Derivation): string {
  const lines = [
    `${formatDerivationCall(derivation)} = ${formatDerivedValue(derivation.result)}`,
    `Steps: ${derivation.stepCount}${
      derivation.negativeEncountered ? ' (subtraction clamped at 0)' : ''
    }`,
  ];
  if (derivation.rows.length > 0) {
    lines.push('', ...renderRows(derivation.rows));
  }
  return lines.join('\n');
}

export function renderDescriptionText(description: FractionDescription): string {
  const { numerator: n, denominator: d, simplified, quotient, remainder } =
    description;
  const { product, rhs, lhs } = description.check;
  const lines = [
    `Fraction ${n}/${d}`,
    `gcd: ${description.gcd}`,
    `Simplified: ${simplified.numerator}/${simplified.denominator}`,
    `Division: ${n} = ${d} × ${quotient} + ${remainder}`,
    `Check: ${d} × ${quotient} = ${product}, ${product} + ${remainder} = ${rhs} ${
      rhs === lhs ? '(holds)' : '(fails)'
    }`,
    `Steps: ${description.stepCount}`,
  ];
  if (description.rows.length > 0) {
    lines.push('', ...renderRows(description.rows));
  }
  return lines.join('\n');
}

export function renderRecognitionText(recognition: TermRecognition): string {
  const verdict =
    recognition.wellFormed && recognition.value !== undefined
      ? `${recognition.term} is a Peano numeral for ${recognition.value}`
      : `${recognition.term} is not a Peano numeral`;
  const lines = [verdict, `Steps: ${recognition.stepCount}`];
  if (recognition.rows.length > 0) {
    lines.push('', ...renderRows(recognition.rows));
  }
  return lines.join('\n');
}
