import { readFileSync } from 'node:fs';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { Ajv2020 } from 'ajv/dist/2020.js';
import {
  ParseError,
  buildFraction,
  buildNatural,
  derive,
  deriveFraction,
  describeFraction,
  isInputErrorCode,
  isPeanoError,
  recognizeTerm,
  resolveOptions,
  serializeDerivation,
  serializeTrace,
  type FractionDescription,
  type FractionOperation,
  type FractionValue,
  type NaturalOperation,
  type SerializedDerivation,
  type SerializedTrace,
  type StepperOptions,
  type TermRecognition,
  type UserError,
} from '@peanotrace/core';

export type BatchRequest =
  | { kind: 'natural'; n: number }
  | { kind: 'fraction'; numerator: number; denominator: number; reduce?: boolean }
  | { kind: 'derive'; operation: NaturalOperation; x: number; y?: number }
  | {
      kind: 'fraction-op';
      operation: FractionOperation;
      a: FractionValue;
      b?: FractionValue;
    }
  | { kind: 'describe'; numerator: number; denominator: number }
  | { kind: 'check'; term: string };

export type BatchOutput =
  | SerializedTrace
  | SerializedDerivation
  | Omit<FractionDescription, 'tree'>
  | Omit<TermRecognition, 'tree'>;

export type BatchResult =
  | { index: number; kind: BatchRequest['kind']; status: 'ok'; output: BatchOutput }
  | { index: number; kind: BatchRequest['kind']; status: 'error'; error: UserError };

const SCHEMA_URL = new URL('../schemas/batch-request.schema.json', import.meta.url);
const MAX_REPORTED_SCHEMA_ERRORS = 5;

let cachedValidator: ValidateFunction<BatchRequest[]> | undefined;

function getValidator(): ValidateFunction<BatchRequest[]> {
  if (!cachedValidator) {
    const schema = JSON.parse(readFileSync(SCHEMA_URL, 'utf8'));
    const ajv = new Ajv2020({ allErrors: true });
    cachedValidator = ajv.compile<BatchRequest[]>(schema);
  }
  return cachedValidator;
}

export function formatSchemaErrors(
  errors: ErrorObject[] | null | undefined
): string {
  if (!errors || errors.length === 0) return 'unknown schema error';
  const shown = errors
    .slice(0, MAX_REPORTED_SCHEMA_ERRORS)
    .map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`);
  const more = errors.length - shown.length;
  return more > 0 ? `${shown.join('; ')} (+${more} more)` : shown.join('; ');
}

/**
 * Decode and validate batch requests.
 *
 * @throws {ParseError} when the text is not JSON or does not match the schema
 */
export function parseBatchRequests(raw: string, source: string): BatchRequest[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ParseError({
      message: `Batch file ${source} is not valid JSON`,
      context: { argument: 'file', value: source },
      cause: error instanceof Error ? error : undefined,
    });
  }

  const validate = getValidator();
  if (!validate(data)) {
    throw new ParseError({
      message: `Batch file ${source} does not match the request schema: ${formatSchemaErrors(
        validate.errors
      )}`,
      context: {
        argument: 'file',
        value: source,
        suggestion:
          'Each entry needs a "kind": natural, fraction, derive, fraction-op, describe or check',
      },
    });
  }
  return data;
}

/** @throws {ParseError} when the file cannot be read or decoded */
export function readBatchFile(filePath: string): BatchRequest[] {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ParseError({
      message: `Cannot read batch file ${filePath}`,
      context: { argument: 'file', value: filePath },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseBatchRequests(raw, filePath);
}

export function runBatchRequest(
  request: BatchRequest,
  options: Partial<StepperOptions>
): BatchOutput {
  const { termStyle } = resolveOptions(options).trace;
  switch (request.kind) {
    case 'natural':
      return serializeTrace(buildNatural(request.n, options), { termStyle });
    case 'fraction':
      return serializeTrace(
        buildFraction(
          request.numerator,
          request.denominator,
          request.reduce ?? true,
          options
        ),
        { termStyle }
      );
    case 'derive':
      return serializeDerivation(
        derive(request.operation, request.x, request.y, options)
      );
    case 'fraction-op':
      return serializeDerivation(
        deriveFraction(request.operation, request.a, request.b, options)
      );
    case 'describe': {
      const { tree: _tree, ...rest } = describeFraction(
        request.numerator,
        request.denominator,
        options
      );
      return rest;
    }
    case 'check': {
      const { tree: _tree, ...rest } = recognizeTerm(request.term, options);
      return rest;
    }
  }
}

/**
 * Run every request. Rejected input is reported in the request's result;
 * any other failure aborts the batch.
 */
export function runBatch(
  requests: readonly BatchRequest[],
  options: Partial<StepperOptions>
): BatchResult[] {
  return requests.map((request, index): BatchResult => {
    try {
      return {
        index,
        kind: request.kind,
        status: 'ok',
        output: runBatchRequest(request, options),
      };
    } catch (error) {
      if (!isPeanoError(error) || !isInputErrorCode(error.errorCode)) throw error;
      return {
        index,
        kind: request.kind,
        status: 'error',
        error: error.toUserError(),
      };
    }
  });
}
