import pino from 'pino';
import { prettyFactory } from 'pino-pretty';
import type { Level } from '../../domain/entities/Level.js';
import type { LogRecord } from '../../domain/entities/LogRecord.js';
import type { Formatter, Sink } from '../../domain/ports/IFormatter.js';

type PinoMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const PINO_METHODS: Readonly<Record<Level, PinoMethod>> = {
  trace: 'trace',
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error',
};

export interface PinoFormatterOptions {
  name?: string;
  /** Pino's own threshold. Defaults to 'trace' so the active Configuration decides. */
  level?: pino.LevelWithSilent;
  /** Human-readable lines through pino-pretty instead of JSON. */
  pretty?: boolean;
  /** Color pretty output. Defaults to true. */
  colorize?: boolean;
  /** Where pino writes, pretty or not. Defaults to stdout. */
  destination?: pino.DestinationStream;
}

/**
 * Build a pino logger for use behind a formatter
 */
export function createPinoLogger(options: PinoFormatterOptions = {}): pino.Logger {
  const base: pino.LoggerOptions = {
    name: options.name ?? 'leveled-tracing',
    level: options.level ?? 'trace',
  };
  const destination = options.destination ?? process.stdout;

  if (options.pretty) {
    const prettify = prettyFactory({
      colorize: options.colorize ?? true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    });
    return pino(base, {
      write(line: string): void {
        destination.write(prettify(line));
      },
    });
  }

  return pino(base, destination);
}

/**
 * Formatter that hands records to pino instead of writing to the sink.
 * The call-site location travels as `file`, `line` and `column` fields.
 */
export function createPinoFormatter(target: pino.Logger | PinoFormatterOptions = {}): Formatter {
  const logger = 'child' in target ? target : createPinoLogger(target);

  return (_sink: Sink, record: LogRecord): void => {
    const { file, line, column } = record.location;
    logger[PINO_METHODS[record.level]]({ file, line, column }, record.message);
  };
}
