import { JsonAssertError, ErrorCode } from './errors.js'
import { createLogger, isLogLevel, type Logger, type LogLevel } from './logger.js'
import { JsonTypeFilters } from './assertions/filters.js'
import { isValidTagName } from './assertions/projection.js'

// =============================================================================
// Types
// =============================================================================

export interface JsonAssertConfig {
  /** Root tag of a projected tree when the document has no single wrapper key */
  rootTag: string
  /** Prefix of the placeholder tags that replace keys which are not valid XML names */
  invalidTagPrefix: string
  /** Custom filters available to type patterns */
  filters: JsonTypeFilters
  logger: Logger
}

export type JsonAssertOptions = Partial<JsonAssertConfig>

export const DEFAULT_ROOT_TAG = 'root'
export const DEFAULT_INVALID_TAG_PREFIX = 'invalidTag'
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

/** Environment variable read for the default logger level */
export const LOG_LEVEL_ENV = 'JSON_ASSERT_LOG_LEVEL'

// =============================================================================
// Main Resolver
// =============================================================================

/**
 * Resolve partial options into a complete config.
 *
 * - No input → defaults (`root`, `invalidTag`, empty filter registry, console logger)
 * - Logger level defaults to `JSON_ASSERT_LOG_LEVEL`, then `warn`
 */
export function resolveConfig(
  input: JsonAssertOptions = {},
  env: Record<string, string | undefined> = process.env
): JsonAssertConfig {
  const rootTag = input.rootTag ?? DEFAULT_ROOT_TAG
  const invalidTagPrefix = input.invalidTagPrefix ?? DEFAULT_INVALID_TAG_PREFIX

  if (!isValidTagName(rootTag)) {
    throw new JsonAssertError(`rootTag "${rootTag}" is not a valid XML element name`, ErrorCode.CONFIG_ERROR)
  }
  if (!isValidTagName(`${invalidTagPrefix}1`)) {
    throw new JsonAssertError(
      `invalidTagPrefix "${invalidTagPrefix}" does not form valid XML element names`,
      ErrorCode.CONFIG_ERROR
    )
  }

  return {
    rootTag,
    invalidTagPrefix,
    filters: input.filters ?? new JsonTypeFilters(),
    logger: input.logger ?? createLogger({ level: resolveLogLevel(env), prefix: 'json-assert' }),
  }
}

function resolveLogLevel(env: Record<string, string | undefined>): LogLevel {
  const fromEnv = env[LOG_LEVEL_ENV]?.trim().toLowerCase()
  if (fromEnv === undefined || fromEnv === '') {
    return DEFAULT_LOG_LEVEL
  }
  if (!isLogLevel(fromEnv)) {
    throw new JsonAssertError(
      `${LOG_LEVEL_ENV} must be one of debug, info, warn, error, silent (got "${fromEnv}")`,
      ErrorCode.CONFIG_ERROR
    )
  }
  return fromEnv
}
