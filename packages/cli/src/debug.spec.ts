import { describe, it, expect, vi } from 'vitest';

import { DEFAULT_OPTIONS, derive } from '@peanotrace/core';
import { printDerivationDebug, printEffectiveConfig } from './debug.js';

function captureStderr(fn: () => void): string {
  const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  try {
    fn();
    return spy.mock.calls.map((call) => String(call[0])).join('');
  } finally {
    spy.mockRestore();
  }
}

describe('printDerivationDebug', () => {
  it('prints a summary and the node count per operation', () => {
    const output = captureStderr(() =>
      printDerivationDebug({
        operation: 'successor',
        stepCount: 2,
        tree: [
          {
            op: 'successor',
            args: [{ kind: 'natural', value: 1 }],
            result: { kind: 'natural', value: 2 },
            axiom: 'A2',
            children: [
              {
                op: 'peano',
                args: [{ kind: 'natural', value: 1 }],
                result: { kind: 'boolean', value: true },
                children: [],
              },
            ],
          },
        ],
      })
    );

    expect(output.split('\n')).toEqual([
      '[peanotrace] derivation: {"operation":"successor","stepCount":2,"negativeEncountered":false,"roots":1,"maxDepth":1}',
      '[peanotrace] derivation.ops: {"successor":1,"peano":1}',
      '',
    ]);
  });

  it('reports an empty tree', () => {
    const output = captureStderr(() =>
      printDerivationDebug({ operation: 'check', stepCount: 0, tree: [] })
    );
    expect(output).toBe('[peanotrace] derivation(tree): <empty>\n');
  });

  it('counts every node of an engine derivation', () => {
    const derivation = derive('add', 2, 3);
    const output = captureStderr(() => printDerivationDebug(derivation));
    const opsLine = output.split('\n')[1] ?? '';
    const ops: unknown = JSON.parse(opsLine.replace('[peanotrace] derivation.ops: ', ''));
    const counts: unknown[] = ops !== null && typeof ops === 'object' ? Object.values(ops) : [];
    const total = counts.reduce<number>(
      (sum, count) => sum + (typeof count === 'number' ? count : 0),
      0
    );
    expect(total).toBe(derivation.stepCount);
    expect(total).toBe(7);
  });
});

describe('printEffectiveConfig', () => {
  it('prints the resolved options as JSON', () => {
    const output = captureStderr(() => printEffectiveConfig(DEFAULT_OPTIONS));
    expect(output).toBe(
      `[peanotrace] effective config: ${JSON.stringify(DEFAULT_OPTIONS, null, 2)}\n`
    );
  });
});
