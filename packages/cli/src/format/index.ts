import {
  serializeDerivation,
  serializeTrace,
  type Derivation,
  type FractionDescription,
  type TermRecognition,
  type TermStyle,
  type Trace,
} from '@peanotrace/core';
import type { OutputFormat } from '../flags.js';
import {
  renderDerivationMarkdown,
  renderDescriptionMarkdown,
  renderRecognitionMarkdown,
  renderTraceMarkdown,
} from './markdown.js';
import {
  renderDerivationText,
  renderDescriptionText,
  renderRecognitionText,
  renderTraceText,
} from './text.js';

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function renderTrace(
  trace: Trace,
  format: OutputFormat,
  termStyle: TermStyle
): string {
  switch (format) {
    case 'json':
      return toJson(serializeTrace(trace, { termStyle }));
    case 'markdown':
      return renderTraceMarkdown(trace);
    case 'text':
      return renderTraceText(trace);
  }
}

export function renderDerivation(derivation: Derivation, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return toJson(serializeDerivation(derivation));
    case 'markdown':
      return renderDerivationMarkdown(derivation);
    case 'text':
      return renderDerivationText(derivation);
  }
}

export function renderDescription(
  description: FractionDescription,
  format: OutputFormat
): string {
  switch (format) {
    case 'json': {
      const { tree: _tree, ...rest } = description;
      return toJson(rest);
    }
    case 'markdown':
      return renderDescriptionMarkdown(description);
    case 'text':
      return renderDescriptionText(description);
  }
}

export function renderRecognition(
  recognition: TermRecognition,
  format: OutputFormat
): string {
  switch (format) {
    case 'json': {
      const { tree: _tree, ...rest } = recognition;
      return toJson(rest);
    }
    case 'markdown':
      return renderRecognitionMarkdown(recognition);
    case 'text':
      return renderRecognitionText(recognition);
  }
}
