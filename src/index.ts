export * from './assertions/index.js'

export { JsonDocument } from './document.js'

export {
  DEFAULT_INVALID_TAG_PREFIX,
  DEFAULT_LOG_LEVEL,
  DEFAULT_ROOT_TAG,
  LOG_LEVEL_ENV,
  resolveConfig,
  type JsonAssertConfig,
  type JsonAssertOptions,
} from './config.js'

export {
  AssertionMismatch,
  DecodeError,
  ErrorCode,
  JsonAssertError,
  QueryError,
  UnsupportedPatternError,
  assertPassed,
  isJsonAssertError,
  type ErrorCodeType,
  type QueryLanguage,
} from './errors.js'

export { createLogger, createSilentLogger, isLogLevel, type LogLevel, type Logger, type LoggerOptions } from './logger.js'

export { lazy } from './helpers/lazy.js'
export { expandExponent, formatNumber, isNumericString, parseNumericString } from './helpers/numbers.js'

export {
  compactJson,
  decodeDocument,
  decodeJson,
  deepEqual,
  deepFreeze,
  isJsonArray,
  isJsonContainer,
  isJsonObject,
  isJsonScalar,
  normalizeDocument,
  toJsonValue,
} from './value.js'

export type {
  JsonArray,
  JsonContainer,
  JsonObject,
  JsonScalar,
  JsonTypeName,
  JsonTypeShape,
  JsonTypeSpec,
  JsonValue,
  MatchResult,
  XPathValue,
} from './types.js'
