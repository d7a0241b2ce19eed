import type { OutcomeCategory } from '../types.js';

// ANSI color codes
export const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
};

export type Style = OutcomeCategory | 'bold' | 'error';

/** Applies presentation styling to a piece of report text. */
export type Painter = (style: Style, text: string) => string;

const STYLE_CODES: Record<Style, string> = {
  missing: COLORS.yellow,
  pass: COLORS.green,
  fail: COLORS.red,
  error: COLORS.red,
  bold: COLORS.bold,
};

export const plainPainter: Painter = (_style, text) => text;

export const ansiPainter: Painter = (style, text) =>
  `${STYLE_CODES[style]}${text}${COLORS.reset}`;

/**
 * Pick a painter for the current terminal. Color is off when explicitly
 * disabled, when NO_COLOR is set, or when stdout is not a TTY.
 */
export function createPainter(
  color: boolean | undefined,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true,
): Painter {
  if (color === false) return plainPainter;
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') return plainPainter;
  return isTTY ? ansiPainter : plainPainter;
}
