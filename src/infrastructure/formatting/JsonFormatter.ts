import type { LogRecord } from '../../domain/entities/LogRecord.js';
import type { Formatter, Sink } from '../../domain/ports/IFormatter.js';

/**
 * Format a record as structured JSON (for log aggregators).
 */
export const formatJsonEntry = (record: LogRecord): string => {
  const entry = {
    level: record.level,
    msg: record.message,
    file: record.location.file,
    line: record.location.line,
    column: record.location.column,
  };
  return `${JSON.stringify(entry)}\n`;
};

export const jsonFormatter: Formatter = (sink: Sink, record: LogRecord): void => {
  sink.write(formatJsonEntry(record));
};
