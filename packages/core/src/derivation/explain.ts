import { formatTerm, parseTerm } from '../natural/term.js';
import { isInvalidInputError } from '../types/errors.js';
import type { TermStyle } from '../types/options.js';
import type { MetricsCollector } from '../util/metrics.js';
import type {
  DerivationNode,
  DerivationRow,
  NodeOp,
  NodeValue,
} from './types.js';

export interface ExplainOptions {
  termStyle: TermStyle;
  maxDepth: number;
  hidePrimitives: boolean;
}

export interface FlatNode {
  node: DerivationNode;
  depth: number;
}

const PRIMITIVE_OPS: ReadonlySet<NodeOp> = new Set(['successor', 'predecessor']);

const COMPARISON_SYMBOLS: Partial<Record<NodeOp, string>> = {
  'less-than': '<',
  equal: '=',
  'greater-than': '>',
};

/** Pre-order walk of a derivation forest, roots at depth 0. */
export function flattenDerivation(roots: readonly DerivationNode[]): FlatNode[] {
  const out: FlatNode[] = [];
  const pending: FlatNode[] = [];
  for (let i = roots.length - 1; i >= 0; i -= 1) {
    const node = roots[i];
    if (node) pending.push({ node, depth: 0 });
  }

  for (let item = pending.pop(); item; item = pending.pop()) {
    out.push(item);
    const { children } = item.node;
    for (let i = children.length - 1; i >= 0; i -= 1) {
      const child = children[i];
      if (child) pending.push({ node: child, depth: item.depth + 1 });
    }
  }
  return out;
}

function termParses(text: string): number | null {
  try {
    return parseTerm(text);
  } catch (error) {
    if (isInvalidInputError(error)) return null;
    throw error;
  }
}

function toInt(value: NodeValue | undefined): number | boolean | null {
  if (!value) return null;
  if (value.kind === 'term') return termParses(value.value);
  return value.value;
}

function toText(value: NodeValue | undefined, style: TermStyle): string {
  if (!value) return '';
  switch (value.kind) {
    case 'natural':
      return formatTerm(value.value, style);
    case 'boolean':
      return String(value.value);
    case 'term':
      return value.value;
  }
}

function intMeaning(
  op: NodeOp,
  args: ReadonlyArray<number | boolean | null>,
  result: number | boolean | null
): string {
  if (op === 'divide-step' || op === 'modulo-step') return 'step';
  if (op === 'is-zero' || op === 'peano') return 'predicate';
  if (args.some((arg) => arg === null) || result === null) return '';

  const [a, b] = args;
  const symbol = COMPARISON_SYMBOLS[op];
  if (symbol) return `${a} ${symbol} ${b} = ${result}`;

  switch (op) {
    case 'successor':
      return `${a} + 1 = ${result}`;
    case 'predecessor':
      return `${a} - 1 = ${result}${a === 0 ? ' (clamped)' : ''}`;
    case 'add':
      return `${a} + ${b} = ${result}`;
    case 'subtract': {
      const clamped =
        typeof a === 'number' && typeof b === 'number' && a < b;
      return `${a} - ${b} = ${result}${clamped ? ' (clamped)' : ''}`;
    }
    case 'multiply':
      return `${a} × ${b} = ${result}`;
    case 'divide':
      return `${a} ÷ ${b} = ${result}`;
    case 'modulo':
      return `${a} mod ${b} = ${result}`;
    case 'gcd':
      return `gcd(${a}, ${b}) = ${result}`;
    default:
      return '';
  }
}

function termMeaning(op: NodeOp, args: readonly string[], result: string): string {
  const [a = '', b = ''] = args;
  const symbol = COMPARISON_SYMBOLS[op];
  if (symbol) return `compare: ${a} ${symbol} ${b} → ${result}`;

  switch (op) {
    case 'successor':
      return `successor: ${a} → ${result}`;
    case 'predecessor':
      return `pred (derived): ${a} → ${result}`;
    case 'add':
      return `add: ${a} + ${b} → ${result}`;
    case 'subtract':
      return `sub (derived, clamped): ${a} − ${b} → ${result}`;
    case 'multiply':
      return `mult: ${a} × ${b} → ${result}`;
    case 'divide':
      return `divide: ${a} ÷ ${b} → ${result}`;
    case 'modulo':
      return `mod: ${a} mod ${b} → ${result}`;
    case 'gcd':
      return `gcd: ${a}, ${b} → ${result}`;
    case 'divide-step':
    case 'modulo-step':
      return 'step';
    default:
      return 'predicate';
  }
}

function naturalLanguage(op: NodeOp, args: readonly string[], result: string): string {
  const [a = '', b = ''] = args;
  switch (op) {
    case 'successor':
      return `Successor of ${a} is ${result}.`;
    case 'predecessor':
      return `Predecessor of ${a} (clamped at 0) is ${result}.`;
    case 'add':
      return `Add ${a} and ${b} → ${result}.`;
    case 'subtract':
      return `Subtract ${b} from ${a} (clamped at 0) → ${result}.`;
    case 'multiply':
      return `Multiply ${a} by ${b} (repeated addition) → ${result}.`;
    case 'less-than':
      return `Check ${a} < ${b} → ${result}.`;
    case 'equal':
      return `Check ${a} = ${b} → ${result}.`;
    case 'greater-than':
      return `Check ${a} > ${b} → ${result}.`;
    case 'divide':
      return `Divide ${a} by ${b} (repeated subtraction) → quotient ${result}.`;
    case 'modulo':
      return `Compute ${a} mod ${b} (repeated subtraction) → remainder ${result}.`;
    case 'gcd':
      return `gcd(${a}, ${b}) via Euclidean method → ${result}.`;
    case 'divide-step':
      return 'Division step: if remainder < divisor stop; otherwise subtract divisor and increment quotient.';
    case 'modulo-step':
      return 'Modulo step: if remainder < divisor stop; otherwise subtract divisor and continue.';
    case 'is-zero':
    case 'peano':
      return 'Predicate evaluation.';
  }
}

export function describeNode(
  node: DerivationNode,
  depth: number,
  style: TermStyle
): DerivationRow {
  const argsInt = node.args.map((arg) => toInt(arg));
  const resultInt = toInt(node.result);
  const argsText = node.args.map((arg) => toText(arg, style));
  const resultText = toText(node.result, style);

  return {
    depth,
    op: node.op,
    ...(node.axiom ? { axiom: node.axiom } : {}),
    ...(node.definition ? { definition: node.definition } : {}),
    meaning: intMeaning(node.op, argsInt, resultInt),
    meaningTerm: termMeaning(node.op, argsText, resultText),
    explanation: naturalLanguage(node.op, argsText, resultText),
    argsInt,
    resultInt,
  };
}

/**
 * Flatten a derivation into display rows, dropping rows below `maxDepth`
 * and, with `hidePrimitives`, successor/predecessor rows.
 */
export function explainDerivation(
  roots: readonly DerivationNode[],
  options: ExplainOptions,
  metrics?: MetricsCollector
): DerivationRow[] {
  const rows: DerivationRow[] = [];
  let hidden = 0;

  for (const { node, depth } of flattenDerivation(roots)) {
    metrics?.observeDepth(depth);
    if (depth > options.maxDepth) {
      hidden += 1;
      continue;
    }
    if (options.hidePrimitives && PRIMITIVE_OPS.has(node.op)) {
      hidden += 1;
      continue;
    }
    rows.push(describeNode(node, depth, options.termStyle));
  }

  metrics?.recordRows(rows.length, hidden);
  return rows;
}
