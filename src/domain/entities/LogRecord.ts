import type { Level } from './Level.js';
import type { SourceLocation } from './SourceLocation.js';

/**
 * One rendered log event, handed to the active formatter
 */
export interface LogRecord {
  readonly level: Level;
  /** Fully rendered message; may be empty */
  readonly message: string;
  readonly location: SourceLocation;
}

export function createRecord(level: Level, message: string, location: SourceLocation): LogRecord {
  return Object.freeze({ level, message, location: Object.freeze({ ...location }) });
}
