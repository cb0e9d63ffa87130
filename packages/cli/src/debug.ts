import {
  flattenDerivation,
  type DerivationNode,
  type ResolvedOptions,
} from '@peanotrace/core';

export interface DerivationDebugInput {
  operation: string;
  stepCount: number;
  negativeEncountered?: boolean;
  tree: readonly DerivationNode[];
}

/**
 * Print the effective configuration to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printEffectiveConfig(options: ResolvedOptions): void {
  process.stderr.write(
    `[peanotrace] effective config: ${JSON.stringify(options, null, 2)}\n`
  );
}

/**
 * Print a summary of a derivation tree to stderr: step count, depth and
 * node count per operation, including rows the display filter hides.
 */
export function printDerivationDebug(input: DerivationDebugInput): void {
  const nodes = flattenDerivation(input.tree);
  if (nodes.length === 0) {
    process.stderr.write('[peanotrace] derivation(tree): <empty>\n');
    return;
  }

  let maxDepth = 0;
  const ops: Record<string, number> = {};
  for (const { node, depth } of nodes) {
    maxDepth = Math.max(maxDepth, depth);
    ops[node.op] = (ops[node.op] ?? 0) + 1;
  }

  process.stderr.write(
    `[peanotrace] derivation: ${JSON.stringify({
      operation: input.operation,
      stepCount: input.stepCount,
      negativeEncountered: input.negativeEncountered ?? false,
      roots: input.tree.length,
      maxDepth,
    })}\n`
  );
  process.stderr.write(`[peanotrace] derivation.ops: ${JSON.stringify(ops)}\n`);
}
