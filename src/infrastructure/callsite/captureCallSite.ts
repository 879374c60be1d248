import { fileURLToPath } from 'node:url';
import type { SourceLocation } from '../../domain/entities/SourceLocation.js';
import { UNKNOWN_LOCATION } from '../../domain/entities/SourceLocation.js';

// "    at fn (/path/file.ts:12:5)" or "    at /path/file.ts:12:5"
const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):(\d+)\)?$/;

function toPath(file: string): string {
  if (!file.startsWith('file://')) return file;
  try {
    return fileURLToPath(file);
  } catch {
    return file;
  }
}

/**
 * Parse the first frame out of a V8 stack string
 */
export function parseFrame(stack: string): SourceLocation {
  for (const line of stack.split('\n')) {
    const match = FRAME_PATTERN.exec(line);
    if (match) {
      const [, file, lineNo, column] = match;
      return {
        file: toPath(file),
        line: parseInt(lineNo, 10),
        column: parseInt(column, 10),
      };
    }
  }
  return UNKNOWN_LOCATION;
}

/**
 * Location of whoever called `callee`. Frames from `callee` inward are
 * dropped, so the result points at application code, not at this package.
 */
export function captureCallSite(callee: (...args: never[]) => unknown): SourceLocation {
  const holder: { stack?: string } = {};
  const limit = Error.stackTraceLimit;
  Error.stackTraceLimit = 1;
  try {
    Error.captureStackTrace(holder, callee);
  } finally {
    Error.stackTraceLimit = limit;
  }
  return holder.stack ? parseFrame(holder.stack) : UNKNOWN_LOCATION;
}
