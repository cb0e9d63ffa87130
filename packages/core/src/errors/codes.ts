/**
 * Error Code Infrastructure
 * Stable error codes, exit codes, and HTTP status mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Input Errors (E001–E099)
  INVALID_INPUT = 'E001',
  ZERO_DENOMINATOR = 'E002',
  DIVISION_BY_ZERO = 'E003',
  MALFORMED_TERM = 'E004',
  INPUT_LIMIT_EXCEEDED = 'E005',
  STEP_BUDGET_EXCEEDED = 'E006',
  UNSUPPORTED_OPERATION = 'E007',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_INPUT]: 2,
  [ErrorCode.ZERO_DENOMINATOR]: 3,
  [ErrorCode.DIVISION_BY_ZERO]: 4,
  [ErrorCode.MALFORMED_TERM]: 5,
  [ErrorCode.INPUT_LIMIT_EXCEEDED]: 6,
  [ErrorCode.STEP_BUDGET_EXCEEDED]: 7,
  [ErrorCode.UNSUPPORTED_OPERATION]: 8,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

// HTTP status mapping for callers that answer over HTTP
export const HTTP_STATUS_BY_CODE = {
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.ZERO_DENOMINATOR]: 400,
  [ErrorCode.DIVISION_BY_ZERO]: 400,
  [ErrorCode.MALFORMED_TERM]: 400,
  [ErrorCode.INPUT_LIMIT_EXCEEDED]: 400,
  [ErrorCode.STEP_BUDGET_EXCEEDED]: 400,
  [ErrorCode.UNSUPPORTED_OPERATION]: 400,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.PARSE_ERROR]: 400,
  [ErrorCode.INTERNAL_ERROR]: 500,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}

export function getHttpStatus(code: ErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}

/** True for every code that reports a rejected caller input. */
export function isInputErrorCode(code: ErrorCode): boolean {
  return HTTP_STATUS_BY_CODE[code] === 400 && code !== ErrorCode.PARSE_ERROR;
}
