/**
 * CLI module exports
 */

export { handleEvaluateCommand } from "./evaluate";
export { formatJson, formatText, formatTrace } from "./formatters";
export {
  commonOptions,
  parseFormat,
  parseMaxExponent,
  parseRangeTier,
  usage,
  type Format,
} from "./options";
export {
  displayErrors,
  displayWarnings,
  writeOutput,
  exitWithError,
} from "./output";
export { formatError, formatWarning } from "./error-formatter";
export { loadConfig, DEFAULT_CONFIG_FILE } from "./config";
