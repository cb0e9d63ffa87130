import { describe, it, expect } from 'vitest';
import { buildFraction, buildNatural } from '@peanotrace/core';
import {
  renderDerivation,
  renderDescription,
  renderRecognition,
  renderTrace,
} from '../index.js';
import { renderTraceText } from '../text.js';
import { addDerivation, sixNinths, twoTerm } from './fixtures.js';

describe('format dispatch', () => {
  it('renders text traces through the text renderer', () => {
    const trace = buildNatural(3);
    expect(renderTrace(trace, 'text', 'auto')).toBe(renderTraceText(trace));
  });

  it('serializes traces with the requested term style', () => {
    const parsed: unknown = JSON.parse(renderTrace(buildFraction(6, 9), 'json', 'compact'));
    expect(parsed).toMatchObject({
      kind: 'fraction',
      stepCount: 19,
      reduced: true,
      gcd: 3,
      result: { kind: 'fraction', numerator: 2, denominator: 3, term: 's^2(0)/s^3(0)' },
    });
  });

  it('starts markdown output with a heading', () => {
    expect(renderDerivation(addDerivation(), 'markdown').split('\n')[0]).toBe('## add(2, 3)');
  });

  it('serializes derivations without the tree', () => {
    const parsed: unknown = JSON.parse(renderDerivation(addDerivation(), 'json'));
    expect(parsed).toEqual({
      operation: 'add',
      inputs: [2, 3],
      result: { kind: 'natural', value: 5, term: 's(s(s(s(s(0)))))' },
      stepCount: 7,
      negativeEncountered: false,
      rows: addDerivation().rows,
    });
  });

  it('drops the tree from JSON descriptions and recognitions', () => {
    const description: unknown = JSON.parse(renderDescription(sixNinths(), 'json'));
    expect(description).not.toHaveProperty('tree');
    expect(description).toHaveProperty('gcd', 3);

    const recognition: unknown = JSON.parse(renderRecognition(twoTerm(), 'json'));
    expect(recognition).toEqual({
      term: 's(s(0))',
      wellFormed: true,
      value: 2,
      stepCount: 5,
      rows: [],
    });
  });
});
