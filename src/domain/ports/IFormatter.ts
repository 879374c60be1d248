import type { LogRecord } from '../entities/LogRecord.js';

/**
 * Destination a formatter writes rendered output to.
 * `process.stdout` and `process.stderr` satisfy it.
 */
export interface Sink {
  write(chunk: string): unknown;
}

/**
 * Renders a record to a sink. Swappable as a whole, never chained.
 */
export type Formatter = (sink: Sink, record: LogRecord) => void;
