import { ErrorCode } from '../errors/codes.js';
import { InvalidInputError } from '../types/errors.js';
import type { MetricsCollector } from '../util/metrics.js';
import type { DerivationNode, NodeOp, NodeValue } from './types.js';

export interface RecorderOptions {
  maxSteps: number;
  /** Reported on STEP_BUDGET_EXCEEDED */
  operation?: string;
  metrics?: MetricsCollector;
}

/**
 * Records derivation nodes as a forest. `enter` opens a node under the
 * innermost open node (or as a new root) and counts one step; `exit` closes
 * it with its result. Nodes must be closed in reverse order of opening.
 */
export class DerivationRecorder {
  readonly roots: DerivationNode[] = [];
  private readonly open: DerivationNode[] = [];
  private steps = 0;
  private negative = false;

  constructor(private readonly options: RecorderOptions) {}

  get stepCount(): number {
    return this.steps;
  }

  get negativeEncountered(): boolean {
    return this.negative;
  }

  get depth(): number {
    return this.open.length;
  }

  markNegative(): void {
    this.negative = true;
  }

  /** @throws {InvalidInputError} STEP_BUDGET_EXCEEDED past `maxSteps` */
  enter(op: NodeOp, args: NodeValue[]): DerivationNode {
    this.steps += 1;
    if (this.steps > this.options.maxSteps) {
      throw new InvalidInputError({
        message: `Derivation needs more than ${this.options.maxSteps} steps`,
        errorCode: ErrorCode.STEP_BUDGET_EXCEEDED,
        context: {
          operation: this.options.operation,
          limit: this.options.maxSteps,
          suggestion: 'Raise limits.maxSteps or use smaller operands',
        },
      });
    }

    const node: DerivationNode = { op, args, children: [] };
    const parent = this.open[this.open.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      this.roots.push(node);
    }
    this.open.push(node);
    this.options.metrics?.addOperation(op);
    return node;
  }

  exit(node: DerivationNode, result: NodeValue): void {
    if (this.open[this.open.length - 1] !== node) {
      throw new Error(`Derivation node "${node.op}" closed out of order`);
    }
    node.result = result;
    this.open.pop();
  }

  /** Close every node in `nodes`, innermost first, with the same result. */
  exitAll(nodes: readonly DerivationNode[], result: NodeValue): void {
    for (let i = nodes.length - 1; i >= 0; i -= 1) {
      const node = nodes[i];
      if (node) this.exit(node, result);
    }
  }

  leaf(op: NodeOp, args: NodeValue[], result: NodeValue): DerivationNode {
    const node = this.enter(op, args);
    this.exit(node, result);
    return node;
  }
}

export function natural(value: number): NodeValue {
  return { kind: 'natural', value };
}

export function bool(value: boolean): NodeValue {
  return { kind: 'boolean', value };
}

export function term(value: string): NodeValue {
  return { kind: 'term', value };
}
