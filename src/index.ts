export * from "./domain/index.js";
export {
  Configuration,
  currentConfiguration,
  resetConfiguration,
} from "./application/Configuration.js";
export {
  trace,
  debug,
  info,
  warning,
  error,
  emitAt,
  isEnabled,
  tracing,
} from "./application/Tracing.js";
export { formatTemplate } from "./infrastructure/formatting/TemplateFormatter.js";
export {
  defaultFormatter,
  plainFormatter,
  formatColoredLine,
  formatPlainLine,
  levelBadge,
} from "./infrastructure/formatting/AnsiFormatter.js";
export { jsonFormatter, formatJsonEntry } from "./infrastructure/formatting/JsonFormatter.js";
export {
  createPinoFormatter,
  createPinoLogger,
  type PinoFormatterOptions,
} from "./infrastructure/logging/PinoFormatter.js";
export { captureCallSite, parseFrame } from "./infrastructure/callsite/captureCallSite.js";
export { MemorySink } from "./infrastructure/sinks/MemorySink.js";
export {
  loadConfig,
  loadDotenv,
  resolveOutputFormat,
  type LoadConfigOptions,
  type OutputFormat,
} from "./infrastructure/config/Config.js";
