/**
 * Position of a logging call in the caller's source
 */
export interface SourceLocation {
  readonly file: string;
  readonly line: number;
  readonly column: number;
}

export const UNKNOWN_LOCATION: SourceLocation = Object.freeze({
  file: '<unknown>',
  line: 0,
  column: 0,
});
