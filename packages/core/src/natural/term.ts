import { ErrorCode } from '../errors/codes.js';
import { InvalidInputError } from '../types/errors.js';
import type { TermStyle } from '../types/options.js';

/** `auto` writes terms in full up to this many successor applications. */
export const AUTO_FULL_TERM_LIMIT = 10;

export function formatTerm(depth: number, style: TermStyle = 'full'): string {
  if (style === 'compact' || (style === 'auto' && depth > AUTO_FULL_TERM_LIMIT)) {
    if (depth === 0) return '0';
    if (depth === 1) return 's(0)';
    return `s^${depth}(0)`;
  }
  return `${'s('.repeat(depth)}0${')'.repeat(depth)}`;
}

export function normalizeTerm(text: string): string {
  return text.replace(/\s+/g, '');
}

function malformed(text: string, reason: string): InvalidInputError {
  return new InvalidInputError({
    message: `Invalid Peano term "${text}": ${reason}`,
    errorCode: ErrorCode.MALFORMED_TERM,
    context: {
      argument: 'term',
      value: text,
      suggestion: 'Write terms as 0, s(0), s(s(0)) or s^k(0)',
    },
  });
}

/**
 * Parse `0`, `s(<term>)` and `s^k(<term>)` into the number of successor
 * applications. Whitespace is ignored.
 *
 * @throws {InvalidInputError} MALFORMED_TERM when the text is not a numeral
 */
export function parseTerm(text: string): number {
  const s = normalizeTerm(text);
  let pos = 0;
  let depth = 0;
  let open = 0;

  while (s[pos] === 's') {
    if (s[pos + 1] === '(') {
      depth += 1;
      pos += 2;
    } else if (s[pos + 1] === '^') {
      const match = /^\d+/.exec(s.slice(pos + 2));
      if (!match) throw malformed(text, 'expected an exponent after "s^"');
      const power = Number(match[0]);
      if (power === 0) throw malformed(text, 'exponent must be at least 1');
      pos += 2 + match[0].length;
      if (s[pos] !== '(') throw malformed(text, 'expected "(" after exponent');
      depth += power;
      pos += 1;
    } else {
      throw malformed(text, `unexpected character after "s" at ${pos + 1}`);
    }
    open += 1;
    if (!Number.isSafeInteger(depth)) {
      throw malformed(text, 'numeral is too large');
    }
  }

  if (s[pos] !== '0') {
    throw malformed(text, pos === s.length ? 'missing 0' : `expected "0" at ${pos}`);
  }
  pos += 1;

  const closing = s.slice(pos);
  if (closing !== ')'.repeat(open)) {
    throw malformed(text, 'unbalanced parentheses');
  }
  return depth;
}

/**
 * Remove the outermost successor of a normalized term without validating the
 * rest of it. Returns undefined when the term does not start with a
 * successor application.
 */
export function peelSuccessor(term: string): string | undefined {
  if (!term.endsWith(')')) return undefined;
  if (term.startsWith('s(')) return term.slice(2, -1);

  const match = /^s\^(\d+)\(/.exec(term);
  if (!match?.[1]) return undefined;
  const power = Number(match[1]);
  if (power === 0) return undefined;
  const inner = term.slice(match[0].length, -1);
  if (power === 1) return inner;
  if (power === 2) return `s(${inner})`;
  return `s^${power - 1}(${inner})`;
}

const POWER_PREFIX = /s\^(\d+)\(/y;

/**
 * Count the successor applications written before the first token that is
 * not `s(` or `s^k(`. The rest of the term is not checked, so this bounds
 * the peeling work for malformed text as well. Saturates at
 * `Number.MAX_SAFE_INTEGER`.
 */
export function leadingSuccessors(text: string): number {
  const s = normalizeTerm(text);
  let pos = 0;
  let count = 0;

  for (;;) {
    if (s.startsWith('s(', pos)) {
      count += 1;
      pos += 2;
      continue;
    }
    POWER_PREFIX.lastIndex = pos;
    const match = POWER_PREFIX.exec(s);
    if (!match?.[1]) return count;
    count = Math.min(count + Number(match[1]), Number.MAX_SAFE_INTEGER);
    pos = POWER_PREFIX.lastIndex;
  }
}
