import type { Level } from '../domain/entities/Level.js';
import { parseLevel } from '../domain/entities/Level.js';
import type { Formatter } from '../domain/ports/IFormatter.js';
import { defaultFormatter } from '../infrastructure/formatting/AnsiFormatter.js';

const DEFAULT_LEVEL: Level = 'warning';

/**
 * Minimum level plus formatter, governing every emission in the process.
 *
 * Values are immutable; `init()` swaps the process-wide instance wholesale.
 * There is no lock around the swap: a Node.js isolate runs one thread of
 * JavaScript, so an emission always sees either the old or the new instance.
 * Worker threads load their own copy of this module and their own instance.
 */
export class Configuration {
  private constructor(
    readonly level: Level,
    readonly formatter: Formatter
  ) {}

  /**
   * Level 'warning', colored line formatter
   */
  static default(): Configuration {
    return new Configuration(DEFAULT_LEVEL, defaultFormatter);
  }

  /**
   * Default configuration with its level taken from the environment variable
   * `name`, if set to one of the level names (any casing). Unset or
   * unrecognized values keep the default silently.
   */
  static fromEnv(name: string, env: NodeJS.ProcessEnv = process.env): Configuration {
    const defaults = Configuration.default();
    return defaults.withLevel(parseLevel(env[name], defaults.level));
  }

  withLevel(level: Level): Configuration {
    return new Configuration(level, this.formatter);
  }

  withFormatter(formatter: Formatter): Configuration {
    return new Configuration(this.level, formatter);
  }

  /**
   * Make this the process-wide configuration
   */
  init(): void {
    active = this;
  }
}

let active: Configuration = Configuration.default();

export function currentConfiguration(): Configuration {
  return active;
}

/**
 * Put the built-in default back in place
 */
export function resetConfiguration(): void {
  active = Configuration.default();
}
