import { ConfigurationError } from '@peanotrace/core';
import type { CliOptions } from './flags.js';

export type ProfileId = 'compact' | 'standard' | 'full';

/** Depth used by the full profile; deep enough to keep every row of a CLI-sized derivation. */
export const FULL_PROFILE_MAX_DEPTH = 10_000;

function parseProfile(raw: unknown): ProfileId | undefined {
  if (raw === undefined || raw === null || raw === '') {
    return undefined;
  }
  const value = String(raw).toLowerCase();
  if (value === 'compact' || value === 'standard' || value === 'full') {
    return value;
  }
  throw new ConfigurationError(
    `Invalid --profile value "${String(
      raw
    )}". Expected one of: compact, standard, full.`,
    'profile'
  );
}

/**
 * Apply an output profile on top of existing options.
 *
 * Rules:
 * - standard: no-op (engine defaults and explicit flags).
 * - compact: compact terms and rows no deeper than 3, when not already set.
 * - full: full terms, primitive rows shown and no practical depth cut,
 *   when not already set.
 * - Explicit --term-style/--max-depth/--show-primitives always take precedence.
 */
export function applyProfileToCliOptions(
  base: CliOptions,
  rawProfile: unknown
): CliOptions {
  const profile = parseProfile(rawProfile);
  if (!profile || profile === 'standard') {
    return base;
  }

  const next: CliOptions = { ...base };

  if (profile === 'compact') {
    next.termStyle ??= 'compact';
    next.maxDepth ??= 3;
    return next;
  }

  next.termStyle ??= 'full';
  next.maxDepth ??= FULL_PROFILE_MAX_DEPTH;
  if (typeof next.showPrimitives !== 'boolean') {
    next.showPrimitives = true;
  }
  return next;
}
