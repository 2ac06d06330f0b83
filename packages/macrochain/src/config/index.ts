/**
 * Engine options and configuration files
 */

export {
  type EngineOptions,
  DEFAULT_OPTIONS,
  MAX_EXPONENT_LIMIT,
  checkOptions,
  checkRange,
  checkMaxExponent,
  checkTrace,
  readOptions,
  parseConfig,
  resolveOptions,
} from "./options";
export { Error as ConfigError, ErrorCode, ErrorMessages } from "./errors";
