import type {
  Derivation,
  DerivationRow,
  FractionDescription,
  TermRecognition,
  Trace,
} from '@peanotrace/core';
import {
  formatDerivationCall,
  formatDerivedValue,
  formatStepValue,
  reductionNote,
  rowRule,
  rowSummary,
  traceTitle,
} from './text.js';

function code(text: string): string {
  return `\`${text}\``;
}

function renderRowTable(rows: readonly DerivationRow[]): string[] {
  if (rows.length === 0) {
    return ['No rows at this depth.'];
  }
  const header = '| depth | meaning | rule | explanation |';
  const divider = '|---|---|---|---|';
  const body = rows.map(
    (row) =>
      `| ${row.depth} | ${rowSummary(row)} | ${rowRule(row) ?? '—'} | ${row.explanation || '—'} |`
  );
  return [header, divider, ...body];
}

export function renderTraceMarkdown(trace: Trace): string {
  const lines = [`## ${traceTitle(trace)}`, ''];
  const withRole = trace.kind === 'fraction';

  lines.push(
    withRole
      ? '| # | role | step | value | term | rule |'
      : '| # | step | value | term | rule |',
    withRole ? '|---|---|---|---|---|---|' : '|---|---|---|---|---|'
  );
  for (const step of trace.steps) {
    const cells = [
      String(step.index),
      ...(withRole ? [step.role ?? '—'] : []),
      step.label,
      formatStepValue(step),
      code(step.value.term),
      step.ruleText,
    ];
    lines.push(`| ${cells.join(' | ')} |`);
  }

  const last = trace.steps[trace.steps.length - 1];
  lines.push('');
  if (last) {
    lines.push(`- result: ${formatStepValue(last)} = ${code(last.value.term)}`);
  }
  lines.push(`- steps: ${trace.steps.length}`);
  const note = reductionNote(trace);
  if (note) {
    lines.push(`- reduction: ${note}`);
  }
  return lines.join('\n');
}

export function renderDerivationMarkdown(derivation: Derivation): string {
  return [
    `## ${formatDerivationCall(derivation)}`,
    '',
    `- result: ${formatDerivedValue(derivation.result)}`,
    `- steps: ${derivation.stepCount}`,
    `- negative encountered: ${derivation.negativeEncountered ? 'yes' : 'no'}`,
    '',
    ...renderRowTable(derivation.rows),
  ].join('\n');
}

export function renderDescriptionMarkdown(description: FractionDescription): string {
  const { numerator: n, denominator: d, quotient, remainder } = description;
  return [
    `## Fraction ${n}/${d}`,
    '',
    `- gcd: ${description.gcd}`,
    `- simplified: ${description.simplified.numerator}/${description.simplified.denominator}`,
    `- division: ${n} = ${d} × ${quotient} + ${remainder}`,
    `- check: ${description.check.rhs === description.check.lhs ? 'holds' : 'fails'}`,
    `- steps: ${description.stepCount}`,
    '',
    ...renderRowTable(description.rows),
  ].join('\n');
}

export function renderRecognitionMarkdown(recognition: TermRecognition): string {
  return [
    `## ${code(recognition.term)}`,
    '',
    `- well formed: ${recognition.wellFormed ? 'yes' : 'no'}`,
    ...(recognition.value !== undefined ? [`- value: ${recognition.value}`] : []),
    `- steps: ${recognition.stepCount}`,
    '',
    ...renderRowTable(recognition.rows),
  ].join('\n');
}
