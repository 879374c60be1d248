export * from './entities/Level.js';
export * from './entities/SourceLocation.js';
export * from './entities/LogRecord.js';
export * from './entities/Template.js';
export type * from './ports/IFormatter.js';
export type * from './ports/ILogger.js';
export { FormatError } from './errors/FormatError.js';
