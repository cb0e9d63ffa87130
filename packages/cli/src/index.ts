#!/usr/bin/env node
/* eslint-disable max-lines-per-function */

// CLI entry point
// - Command name: `peanotrace`.
// - `natural` and `fraction` run the stepper and print the step trace.
// - `derive`, `fraction-op`, `describe` and `check` run the derivation engine and print the
//   derivation rows (filtered by --max-depth and --show-primitives).
// - `batch` runs a JSON file of requests and prints one result per request; rejected input is
//   reported in the result instead of failing the run.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  ErrorCode,
  MetricsCollector,
  PeanoError,
  buildFraction,
  buildNatural,
  derive,
  deriveFraction,
  describeFraction,
  isPeanoError,
  parseFractionOperation,
  parseNaturalOperation,
  recognizeTerm,
  resolveOptions,
  type MetricsSnapshot,
  type ResolvedOptions,
  type StepperOptions,
} from '@peanotrace/core';
import { readBatchFile, runBatch } from './batch.js';
import { printDerivationDebug, printEffectiveConfig } from './debug.js';
import {
  parseFractionArgument,
  parseNaturalArgument,
  parseStepperOptions,
  resolveBatchFormat,
  resolveOutputFormat,
  type CliOptions,
  type OutputFormat,
} from './flags.js';
import {
  renderDerivation,
  renderDescription,
  renderRecognition,
  renderTrace,
} from './format/index.js';
import { applyProfileToCliOptions } from './profiles.js';
import { renderCLIView } from './render.js';

interface PreparedRun {
  format: OutputFormat;
  stepperOptions: Partial<StepperOptions>;
  resolved: ResolvedOptions;
  metrics: MetricsCollector;
}

function withEngineOptions(command: Command): Command {
  return command
    .option('--term-style <style>', 'Term notation: full|compact|auto')
    .option('--max-natural <number>', 'Largest accepted operand')
    .option('--max-steps <number>', 'Largest number of derivation steps')
    .option('--max-depth <number>', 'Deepest derivation row shown')
    .option('--show-primitives', 'Show successor/predecessor rows')
    .option('--profile <profile>', 'Output profile: compact|standard|full')
    .option('--debug', 'Print effective configuration and derivation summary to stderr');
}

function withOutputOptions(command: Command): Command {
  return withEngineOptions(command)
    .option('--format <format>', 'Output format: text|markdown|json', 'text')
    .option('--print-metrics', 'Print metrics as JSON to stderr', false);
}

function prepareRun(options: CliOptions): PreparedRun {
  const withProfile = applyProfileToCliOptions(options, options.profile);
  const stepperOptions = parseStepperOptions(withProfile);
  const resolved = resolveOptions(stepperOptions);
  const format = resolveOutputFormat(options.format);

  if (options.debug) {
    printEffectiveConfig(resolved);
  }

  return {
    format,
    stepperOptions,
    resolved,
    metrics: new MetricsCollector({ enabled: options.printMetrics === true }),
  };
}

function writeOutput(text: string): void {
  process.stdout.write(`${text}\n`);
}

function printMetrics(metrics: MetricsSnapshot | undefined): void {
  if (!metrics) return;
  process.stderr.write(`[peanotrace] metrics: ${JSON.stringify(metrics)}\n`);
}

function collectedMetrics(run: PreparedRun): MetricsSnapshot | undefined {
  return run.metrics.isEnabled() ? run.metrics.snapshotMetrics() : undefined;
}

/**
 * Build the command tree. Commander keeps parsed option values on the
 * command objects, so every parse that needs clean state gets a new program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('peanotrace')
    .description('Construct naturals and fractions from the Peano axioms, step by step')
    .version('0.1.0');

  withOutputOptions(
    program
      .command('natural')
      .description('Construct n from Zero by repeated Successor')
      .argument('<n>', 'Non-negative integer')
  ).action((n: string, options: CliOptions) => {
    try {
      const run = prepareRun(options);
      const value = parseNaturalArgument(n, 'n');
      const trace = run.metrics.measure('BUILD', () =>
        buildNatural(value, run.stepperOptions)
      );
      run.metrics.addSteps(trace.steps.length);
      writeOutput(renderTrace(trace, run.format, run.resolved.trace.termStyle));
      printMetrics(collectedMetrics(run));
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

  withOutputOptions(
    program
      .command('fraction')
      .description('Construct numerator/denominator, reducing by the gcd unless --no-reduce')
      .argument('<numerator>', 'Non-negative integer')
      .argument('<denominator>', 'Positive integer')
      .option('--no-reduce', 'Keep the fraction as paired')
  ).action((numerator: string, denominator: string, options: CliOptions) => {
    try {
      const run = prepareRun(options);
      const n = parseNaturalArgument(numerator, 'numerator');
      const d = parseNaturalArgument(denominator, 'denominator');
      const trace = run.metrics.measure('BUILD', () =>
        buildFraction(n, d, options.reduce !== false, run.stepperOptions)
      );
      run.metrics.addSteps(trace.steps.length);
      writeOutput(renderTrace(trace, run.format, run.resolved.trace.termStyle));
      printMetrics(collectedMetrics(run));
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

  withOutputOptions(
    program
      .command('derive')
      .description('Derive an arithmetic fact about naturals')
      .argument(
        '<operation>',
        'successor|predecessor|add|subtract|multiply|less-than|equal|greater-than|divide|modulo|gcd|to-fraction|simplify'
      )
      .argument('<x>', 'First operand')
      .argument('[y]', 'Second operand for binary operations')
  ).action((operation: string, x: string, y: string | undefined, options: CliOptions) => {
    try {
      const run = prepareRun(options);
      const op = parseNaturalOperation(operation);
      const derivation = derive(
        op,
        parseNaturalArgument(x, 'x'),
        y === undefined ? undefined : parseNaturalArgument(y, 'y'),
        { ...run.stepperOptions, metrics: options.printMetrics === true }
      );
      if (options.debug) {
        printDerivationDebug(derivation);
      }
      writeOutput(renderDerivation(derivation, run.format));
      printMetrics(derivation.metrics);
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

  withOutputOptions(
    program
      .command('fraction-op')
      .description('Fraction arithmetic; operands are written n/d')
      .argument('<operation>', 'simplify|add|subtract|multiply|divide')
      .argument('<a>', 'First fraction, e.g. 3/4')
      .argument('[b]', 'Second fraction for binary operations')
  ).action((operation: string, a: string, b: string | undefined, options: CliOptions) => {
    try {
      const run = prepareRun(options);
      const op = parseFractionOperation(operation);
      const derivation = deriveFraction(
        op,
        parseFractionArgument(a, 'a'),
        b === undefined ? undefined : parseFractionArgument(b, 'b'),
        { ...run.stepperOptions, metrics: options.printMetrics === true }
      );
      if (options.debug) {
        printDerivationDebug(derivation);
      }
      writeOutput(renderDerivation(derivation, run.format));
      printMetrics(derivation.metrics);
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

  withOutputOptions(
    program
      .command('describe')
      .description('gcd, lowest terms and division check of numerator/denominator')
      .argument('<numerator>', 'Non-negative integer')
      .argument('<denominator>', 'Positive integer')
  ).action((numerator: string, denominator: string, options: CliOptions) => {
    try {
      const run = prepareRun(options);
      const description = describeFraction(
        parseNaturalArgument(numerator, 'numerator'),
        parseNaturalArgument(denominator, 'denominator'),
        { ...run.stepperOptions, metrics: options.printMetrics === true }
      );
      if (options.debug) {
        printDerivationDebug({ operation: 'describe', ...description });
      }
      writeOutput(renderDescription(description, run.format));
      printMetrics(description.metrics);
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

  withOutputOptions(
    program
      .command('check')
      .description('Decide whether a term such as s(s(0)) is a Peano numeral')
      .argument('<term>', 'Peano term')
  ).action((term: string, options: CliOptions) => {
    try {
      const run = prepareRun(options);
      const recognition = recognizeTerm(term, run.stepperOptions);
      if (options.debug) {
        printDerivationDebug({ operation: 'check', ...recognition });
      }
      writeOutput(renderRecognition(recognition, run.format));
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

  withEngineOptions(
    program
      .command('batch')
      .description('Run a JSON file of requests')
      .requiredOption('-f, --file <path>', 'JSON array of requests')
      .option('--out <format>', 'Output format: json|ndjson', 'json')
  ).action((options: CliOptions) => {
    try {
      const withProfile = applyProfileToCliOptions(options, options.profile);
      const stepperOptions = parseStepperOptions(withProfile);
      const resolved = resolveOptions(stepperOptions);
      const outFormat = resolveBatchFormat(options.out);
      if (options.debug) {
        printEffectiveConfig(resolved);
      }

      const filePath = typeof options.file === 'string' ? options.file : '';
      const results = runBatch(readBatchFile(filePath), stepperOptions);

      if (outFormat === 'ndjson') {
        const lines = results.map((result) => JSON.stringify(result));
        if (lines.length > 0) {
          process.stdout.write(lines.join('\n') + '\n');
        }
      } else {
        writeOutput(JSON.stringify(results, null, 2));
      }

      if (options.debug) {
        const failed = results.filter((result) => result.status === 'error').length;
        process.stderr.write(
          `[peanotrace] batch: ${results.length} requests, ${failed} rejected\n`
        );
      }
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

  return program;
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: PeanoError;
  if (isPeanoError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends PeanoError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

const program = createProgram();

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
