import dotenv from "dotenv";
import { Configuration } from "../../application/Configuration.js";
import type { Formatter } from "../../domain/ports/IFormatter.js";
import { defaultFormatter, plainFormatter } from "../formatting/AnsiFormatter.js";
import { jsonFormatter } from "../formatting/JsonFormatter.js";

export type OutputFormat = "pretty" | "plain" | "json";

const FORMATTERS: Readonly<Record<OutputFormat, Formatter>> = {
  pretty: defaultFormatter,
  plain: plainFormatter,
  json: jsonFormatter,
};

export interface LoadConfigOptions {
  /** Variable holding the minimum level. Defaults to TRACING_LOG. */
  levelVar?: string;
  /** Variable holding the output format. Defaults to TRACING_LOG_FORMAT. */
  formatVar?: string;
  /** .env file to read first; false skips it. Defaults to ./.env */
  dotenvPath?: string | false;
  /** Environment to read and populate. Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

function isOutputFormat(value: string): value is OutputFormat {
  return Object.prototype.hasOwnProperty.call(FORMATTERS, value);
}

/**
 * Resolve the output format, falling back to "pretty".
 * NO_COLOR (any non-empty value) downgrades "pretty" to "plain".
 */
export function resolveOutputFormat(env: NodeJS.ProcessEnv, formatVar: string): OutputFormat {
  const raw = env[formatVar]?.trim().toLowerCase() ?? "";
  const format = isOutputFormat(raw) ? raw : "pretty";
  if (format === "pretty" && env.NO_COLOR) {
    return "plain";
  }
  return format;
}

/**
 * Copy variables from a .env file into `env` without overriding ones already set.
 * A missing file leaves `env` untouched.
 */
export function loadDotenv(path: string, env: NodeJS.ProcessEnv): void {
  dotenv.config({ path, processEnv: env, override: false });
}

/**
 * Load logging configuration from the environment.
 *
 * Variables already set win over the .env file. Missing files and
 * unrecognized values never fail: they leave the defaults in place.
 */
export function loadConfig(options: LoadConfigOptions = {}): Configuration {
  const env = options.env ?? process.env;
  const levelVar = options.levelVar ?? "TRACING_LOG";
  const formatVar = options.formatVar ?? "TRACING_LOG_FORMAT";
  const dotenvPath = options.dotenvPath ?? ".env";

  if (dotenvPath !== false) {
    loadDotenv(dotenvPath, env);
  }

  const format = resolveOutputFormat(env, formatVar);
  return Configuration.fromEnv(levelVar, env).withFormatter(FORMATTERS[format]);
}
