/**
 * A template did not match its arguments. Programming error, not an
 * operational fault: thrown synchronously from the emitting call.
 */
export class FormatError extends Error {
  /** The template being rendered. */
  readonly template: string;
  /** What was wrong with it. */
  readonly reason: string;

  constructor(template: string, reason: string) {
    super(`Invalid log template ${JSON.stringify(template)}: ${reason}`);
    this.name = 'FormatError';
    this.template = template;
    this.reason = reason;
  }
}
