/**
 * Severity levels, in ascending order
 */
export type Level = 'trace' | 'debug' | 'info' | 'warning' | 'error';

export const LEVELS: readonly Level[] = ['trace', 'debug', 'info', 'warning', 'error'];

export const LEVEL_PRIORITY: Readonly<Record<Level, number>> = {
  trace: 0,
  debug: 1,
  info: 2,
  warning: 3,
  error: 4,
};

const DISPLAY_NAMES: Readonly<Record<Level, string>> = {
  trace: 'TRACE',
  debug: 'DEBUG',
  info: 'INFO',
  warning: 'WARNING',
  error: 'ERROR',
};

/**
 * True when `level` is at least as severe as `minimum`
 */
export function isAtLeast(level: Level, minimum: Level): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minimum];
}

export function compareLevels(a: Level, b: Level): number {
  return LEVEL_PRIORITY[a] - LEVEL_PRIORITY[b];
}

function isLevel(value: string): value is Level {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/**
 * Case-insensitive parse of one of the five level names.
 * Anything else returns `fallback` unchanged.
 */
export function parseLevel(input: string | undefined, fallback: Level): Level {
  if (input === undefined) return fallback;
  const lowered = input.toLowerCase();
  return isLevel(lowered) ? lowered : fallback;
}

export function levelDisplayName(level: Level): string {
  return DISPLAY_NAMES[level];
}
