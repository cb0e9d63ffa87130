/**
 * ErrorPresenter - pure presentation layer for PeanoError instances
 * - No business logic; formats into environment-specific view objects
 */

import { getHttpStatus, type ErrorCode } from './codes.js';
import type {
  ErrorContext,
  PeanoError,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  requestId?: string;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  argument?: string;
  excerpt?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export interface APIErrorView {
  status: number;
  title: string;
  detail: string;
  instance?: string;
  code: ErrorCode;
  argument?: string;
  suggestions: string[];
}

export type ProductionView = SerializedError & { requestId?: string };

const MAX_EXCERPT_LENGTH = 60;

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: PeanoError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      argument: error.context?.argument,
      excerpt: this.#formatExcerpt(error.context),
      workaround: error.suggestions[0],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForAPI(error: PeanoError): APIErrorView {
    return {
      status: getHttpStatus(error.errorCode),
      title: error.message,
      detail: this.#getDetail(error),
      instance: this.#getRequestId(),
      code: error.errorCode,
      argument: error.context?.argument,
      suggestions: error.suggestions,
    };
  }

  formatForProduction(error: PeanoError): ProductionView {
    return { ...error.toJSON('prod'), requestId: this.#getRequestId() };
  }

  // Helpers
  #formatTitle(error: PeanoError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.argument && ctx.operation) {
      return `Argument: ${ctx.argument} of ${ctx.operation}`;
    }
    if (ctx.argument) return `Argument: ${ctx.argument}`;
    if (ctx.setting) return `Option: ${ctx.setting}`;
    if (ctx.operation) return `Operation: ${ctx.operation}`;
    return undefined;
  }

  #formatExcerpt(ctx?: ErrorContext): string | undefined {
    if (!ctx || !('value' in ctx)) return undefined;
    const raw =
      typeof ctx.value === 'string' ? ctx.value : JSON.stringify(ctx.value);
    if (raw === undefined) return String(ctx.value);
    return raw.length > MAX_EXCERPT_LENGTH
      ? `${raw.slice(0, MAX_EXCERPT_LENGTH - 1)}…`
      : raw;
  }

  #getDetail(error: PeanoError): string {
    const parts: string[] = [error.message];
    const argument = error.context?.argument;
    if (argument) parts.push(`(argument: ${argument})`);
    return parts.join(' ');
  }

  #getRequestId(): string | undefined {
    return this.options.requestId || process.env.REQUEST_ID || undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}

export default ErrorPresenter;
