import type { FormatArgs } from '../entities/Template.js';

/**
 * Port interface for the per-severity emission entry points
 */
export interface ILogger {
  /**
   * Log at trace level
   */
  trace<T extends string>(template: T, ...args: FormatArgs<T>): void;

  /**
   * Log at debug level
   */
  debug<T extends string>(template: T, ...args: FormatArgs<T>): void;

  /**
   * Log at info level
   */
  info<T extends string>(template: T, ...args: FormatArgs<T>): void;

  /**
   * Log at warning level
   */
  warning<T extends string>(template: T, ...args: FormatArgs<T>): void;

  /**
   * Log at error level
   */
  error<T extends string>(template: T, ...args: FormatArgs<T>): void;
}
