/**
 * Command-line argument parsing
 */

import { InputError, UsageError } from './utils/errors.js';
import type { ParsedArgs } from './types.js';

const ARG_NAMES = ['o_x_km', 'o_y_km', 'o_z_km', 'x_km', 'y_km', 'z_km'] as const;

export const USAGE = `Usage: ecef-to-sez ${ARG_NAMES.join(' ')}`;

// Signed decimal with optional fraction and exponent: 1, -2.5, .5, 3., 6.4e3
const DECIMAL_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse one base-10 floating-point literal
 */
export function parseCoordinate(value: string, name: string): number {
  const trimmed = value.trim();

  if (!DECIMAL_LITERAL.test(trimmed)) {
    throw new InputError(`Invalid number for ${name}: "${value}"`, { name, value });
  }

  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    throw new InputError(`Number out of range for ${name}: "${value}"`, { name, value });
  }

  return parsed;
}

/**
 * Parse the positional arguments (program name excluded)
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  if (args.length !== ARG_NAMES.length) {
    throw new UsageError(
      `Expected ${ARG_NAMES.length} arguments, got ${args.length}`,
      { received: args.length }
    );
  }

  const [ox, oy, oz, x, y, z] = ARG_NAMES.map((name, i) => parseCoordinate(args[i], name));

  return {
    observer: [ox, oy, oz],
    target: [x, y, z],
  };
}
