import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';

import { ErrorCode, getExitCode } from '@peanotrace/core';
import { createProgram, main, program } from './index.js';
import { stripAnsi } from './render.js';

interface Captured {
  stdout: string[];
  stderr: string[];
  errors: string[];
}

let captured: Captured;
let spies: Array<Pick<MockInstance, 'mockRestore'>>;

beforeEach(() => {
  captured = { stdout: [], stderr: [], errors: [] };
  spies = [
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      captured.stdout.push(String(chunk));
      return true;
    }),
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      captured.stderr.push(String(chunk));
      return true;
    }),
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      captured.errors.push(args.map(String).join(' '));
    }),
    vi.spyOn(process, 'exit').mockImplementation(((code?: number) => {
      throw new Error(`process.exit(${code ?? 0}) intercepted in tests`);
    }) as never),
  ];
});

afterEach(() => {
  for (const spy of spies) spy.mockRestore();
});

async function run(args: string[]): Promise<void> {
  await createProgram().parseAsync(args, { from: 'user' });
}

function stdoutLines(): string[] {
  return captured.stdout.join('').split('\n');
}

describe('peanotrace natural', () => {
  it('prints the step trace', async () => {
    await run(['natural', '2']);
    expect(captured.stdout.join('')).toBe(
      [
        'Natural 2: 3 steps',
        '0  Zero    0        axiom A1: 0 is a natural number',
        '1  Succ    s(0)     apply Successor',
        '2  Succ    s(s(0))  apply Successor',
        'Result: 2 = s(s(0))',
        '',
      ].join('\n')
    );
  });

  it('honours the term style and markdown format', async () => {
    await run(['natural', '2', '--format', 'markdown', '--term-style', 'compact']);
    expect(stdoutLines()).toContain('| 2 | Succ | 2 | `s^2(0)` | apply Successor |');
  });

  it('prints the effective configuration with --debug', async () => {
    await run(['natural', '0', '--debug', '--max-natural', '5']);
    const stderr = captured.stderr.join('');
    expect(stderr.startsWith('[peanotrace] effective config: ')).toBe(true);
    expect(stderr).toContain('"maxNatural": 5');
  });

  it('prints metrics to stderr', async () => {
    await run(['natural', '3', '--print-metrics']);
    expect(captured.stderr.join('')).toMatch(/^\[peanotrace\] metrics: \{.*\}\n$/);
  });

  it('exits with the input error code on a non-integer n', async () => {
    await expect(run(['natural', '1.5'])).rejects.toThrow(
      `process.exit(${getExitCode(ErrorCode.INVALID_INPUT)}) intercepted in tests`
    );
    expect(captured.stdout).toEqual([]);
    expect(captured.errors).toHaveLength(1);
  });

  it('exits with the limit code past --max-natural', async () => {
    await expect(run(['natural', '6', '--max-natural', '5'])).rejects.toThrow(
      'process.exit(6) intercepted in tests'
    );
  });

  it('exits with the configuration code on an unknown format', async () => {
    await expect(run(['natural', '2', '--format', 'yaml'])).rejects.toThrow(
      'process.exit(50) intercepted in tests'
    );
    expect(stripAnsi(captured.errors.join('\n'))).toContain(
      'Error E300: Invalid --format value "yaml".'
    );
  });
});

describe('peanotrace fraction', () => {
  it('prints the reduced trace as JSON', async () => {
    await run(['fraction', '6', '9', '--format', 'json']);
    const parsed: unknown = JSON.parse(captured.stdout.join(''));
    expect(parsed).toMatchObject({
      kind: 'fraction',
      stepCount: 19,
      reduced: true,
      gcd: 3,
      result: { numerator: 2, denominator: 3 },
    });
  });

  it('keeps the pair with --no-reduce', async () => {
    await run(['fraction', '6', '9', '--no-reduce']);
    const lines = stdoutLines();
    expect(lines[0]).toBe('Fraction 6/9: 18 steps');
    expect(lines.slice(-3)).toEqual([
      'Result: 6/9 = s(s(s(s(s(s(0))))))/s(s(s(s(s(s(s(s(s(0)))))))))',
      'Reduction: not reduced',
      '',
    ]);
  });

  it('rejects a zero denominator without printing a trace', async () => {
    await expect(run(['fraction', '1', '0'])).rejects.toThrow(
      'process.exit(3) intercepted in tests'
    );
    expect(captured.stdout).toEqual([]);
    const message = stripAnsi(captured.errors.join('\n')).split('\n');
    expect(message).toEqual([
      '❌ Error E002: denominator must not be zero',
      '📍 Argument: denominator of buildFraction',
      'Value: 0',
      '💡 Try: A fraction needs a denominator of at least 1',
    ]);
  });
});

describe('peanotrace derive', () => {
  it('prints the call and its step count', async () => {
    await run(['derive', 'add', '2', '3']);
    expect(stdoutLines().slice(0, 2)).toEqual([
      'add(2, 3) = 5 = s(s(s(s(s(0)))))',
      'Steps: 7',
    ]);
  });

  it('prints a derivation summary with --debug', async () => {
    await run(['derive', 'add', '2', '3', '--debug']);
    const stderr = captured.stderr.join('');
    expect(stderr).toContain(
      '[peanotrace] derivation: {"operation":"add","stepCount":7,"negativeEncountered":false'
    );
  });

  it('prints derivation metrics', async () => {
    await run(['derive', 'successor', '1', '--print-metrics']);
    expect(captured.stderr.join('')).toMatch(/^\[peanotrace\] metrics: \{.*\}\n$/);
  });

  it('exits with the unsupported-operation code', async () => {
    await expect(run(['derive', 'power', '2', '3'])).rejects.toThrow(
      'process.exit(8) intercepted in tests'
    );
  });
});

describe('peanotrace fraction-op', () => {
  it('multiplies fractions and reduces the product', async () => {
    await run(['fraction-op', 'multiply', '1/2', '2/3', '--format', 'json']);
    const parsed: unknown = JSON.parse(captured.stdout.join(''));
    expect(parsed).toMatchObject({
      operation: 'fraction:multiply',
      inputs: [
        { numerator: 1, denominator: 2 },
        { numerator: 2, denominator: 3 },
      ],
      result: { kind: 'fraction', numerator: 1, denominator: 3 },
    });
  });

  it('exits with the division code when dividing by zero', async () => {
    await expect(run(['fraction-op', 'divide', '1/2', '0/3'])).rejects.toThrow(
      'process.exit(4) intercepted in tests'
    );
  });
});

describe('peanotrace describe and check', () => {
  it('describes a fraction', async () => {
    await run(['describe', '7', '3']);
    expect(stdoutLines().slice(0, 5)).toEqual([
      'Fraction 7/3',
      'gcd: 1',
      'Simplified: 7/3',
      'Division: 7 = 3 × 2 + 1',
      'Check: 3 × 2 = 6, 6 + 1 = 7 (holds)',
    ]);
  });

  it('recognizes a numeral', async () => {
    await run(['check', 's(s(0))']);
    expect(stdoutLines().slice(0, 2)).toEqual([
      's(s(0)) is a Peano numeral for 2',
      'Steps: 5',
    ]);
  });
});

describe('peanotrace batch', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'peanotrace-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prints one NDJSON line per request and reports rejected ones', async () => {
    const file = path.join(dir, 'requests.json');
    await writeFile(
      file,
      JSON.stringify([
        { kind: 'natural', n: 1 },
        { kind: 'fraction', numerator: 1, denominator: 0 },
      ]),
      'utf8'
    );

    await run(['batch', '--file', file, '--out', 'ndjson', '--debug']);

    const lines = captured.stdout.join('').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    const first: unknown = JSON.parse(lines[0] ?? '');
    const second: unknown = JSON.parse(lines[1] ?? '');
    expect(first).toMatchObject({ index: 0, kind: 'natural', status: 'ok' });
    expect(second).toMatchObject({
      index: 1,
      kind: 'fraction',
      status: 'error',
      error: { code: 'E002', argument: 'denominator' },
    });
    expect(captured.stderr.join('')).toContain(
      '[peanotrace] batch: 2 requests, 1 rejected\n'
    );
  });

  it('prints a JSON array by default', async () => {
    const file = path.join(dir, 'requests.json');
    await writeFile(file, JSON.stringify([{ kind: 'check', term: '0' }]), 'utf8');

    await run(['batch', '-f', file]);

    const parsed: unknown = JSON.parse(captured.stdout.join(''));
    expect(parsed).toMatchObject([
      {
        index: 0,
        kind: 'check',
        status: 'ok',
        output: { term: '0', wellFormed: true, value: 0, stepCount: 1 },
      },
    ]);
  });

  it('exits with the parse code when the file is missing', async () => {
    await expect(
      run(['batch', '--file', path.join(dir, 'missing.json')])
    ).rejects.toThrow('process.exit(60) intercepted in tests');
  });
});

describe('main', () => {
  it('parses process-style argv', async () => {
    await main(['node', 'peanotrace', 'natural', '0']);
    expect(captured.stdout.join('')).toContain('Result: 0 = 0');
  });

  it('exports the default program', () => {
    expect(program.name()).toBe('peanotrace');
    expect(program.commands.map((command) => command.name())).toEqual([
      'natural',
      'fraction',
      'derive',
      'fraction-op',
      'describe',
      'check',
      'batch',
    ]);
  });
});
