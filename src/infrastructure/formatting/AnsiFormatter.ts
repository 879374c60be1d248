import type { Level } from '../../domain/entities/Level.js';
import { levelDisplayName } from '../../domain/entities/Level.js';
import type { LogRecord } from '../../domain/entities/LogRecord.js';
import type { Formatter, Sink } from '../../domain/ports/IFormatter.js';

// ── ANSI escape sequences ──────────────────────────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc('0');

const LEVEL_COLORS: Readonly<Record<Level, string>> = {
  trace: esc('37'), // gray
  debug: esc('34'), // blue
  info: esc('32'), // green
  warning: esc('33'), // yellow
  error: esc('31'), // red
};

/**
 * Level name wrapped in its color, reset right after the name
 */
export const levelBadge = (level: Level): string =>
  `${LEVEL_COLORS[level]}${levelDisplayName(level)}${reset}`;

const renderLine = (badge: string, record: LogRecord): string => {
  const { file, line, column } = record.location;
  return `[${badge} ${file}:${line}:${column}] ${record.message}\n`;
};

/**
 * Format a record as a colored line.
 *
 *   [INFO src/app.ts:3:7] server listening
 */
export const formatColoredLine = (record: LogRecord): string =>
  renderLine(levelBadge(record.level), record);

export const formatPlainLine = (record: LogRecord): string =>
  renderLine(levelDisplayName(record.level), record);

/**
 * Built-in formatter. The whole line goes out in a single write.
 */
export const defaultFormatter: Formatter = (sink: Sink, record: LogRecord): void => {
  sink.write(formatColoredLine(record));
};

/**
 * Same layout as the default formatter without color codes
 */
export const plainFormatter: Formatter = (sink: Sink, record: LogRecord): void => {
  sink.write(formatPlainLine(record));
};
