import type { Level } from '../domain/entities/Level.js';
import { isAtLeast } from '../domain/entities/Level.js';
import { createRecord } from '../domain/entities/LogRecord.js';
import type { SourceLocation } from '../domain/entities/SourceLocation.js';
import type { Displayable, FormatArgs } from '../domain/entities/Template.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { captureCallSite } from '../infrastructure/callsite/captureCallSite.js';
import { formatTemplate } from '../infrastructure/formatting/TemplateFormatter.js';
import { currentConfiguration } from './Configuration.js';

type Callee = (...args: never[]) => unknown;

/**
 * Whether a message at `level` would currently be emitted
 */
export function isEnabled(level: Level): boolean {
  return isAtLeast(level, currentConfiguration().level);
}

function write(level: Level, template: string, args: readonly Displayable[], location: SourceLocation): void {
  const config = currentConfiguration();
  const record = createRecord(level, formatTemplate(template, args), location);
  config.formatter(process.stdout, record);
}

/**
 * Shared emission path. Nothing is rendered and no location is captured
 * unless the level passes.
 */
function emit(level: Level, callee: Callee, template: string, args: readonly Displayable[]): void {
  if (!isEnabled(level)) return;
  write(level, template, args, captureCallSite(callee));
}

/**
 * Emit with an explicitly supplied location instead of the captured one
 */
export function emitAt<T extends string>(
  level: Level,
  location: SourceLocation,
  template: T,
  ...args: FormatArgs<T>
): void {
  if (!isEnabled(level)) return;
  write(level, template, args, location);
}

export function trace<T extends string>(template: T, ...args: FormatArgs<T>): void {
  emit('trace', trace, template, args);
}

export function debug<T extends string>(template: T, ...args: FormatArgs<T>): void {
  emit('debug', debug, template, args);
}

export function info<T extends string>(template: T, ...args: FormatArgs<T>): void {
  emit('info', info, template, args);
}

export function warning<T extends string>(template: T, ...args: FormatArgs<T>): void {
  emit('warning', warning, template, args);
}

export function error<T extends string>(template: T, ...args: FormatArgs<T>): void {
  emit('error', error, template, args);
}

export const tracing: ILogger = { trace, debug, info, warning, error };
