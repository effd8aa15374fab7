/**
 * Standardized Logging Utilities
 *
 * Level-filtered console output shared by the strategies, the batch runner
 * and the pipeline. The threshold is read from LOG_LEVEL when the module loads.
 */

type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error' | 'skip'

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  skip: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS
}

function resolveThreshold(raw: string | undefined): number {
  const level = raw?.toLowerCase() ?? 'info'
  return isLogLevel(level) ? LOG_LEVELS[level] : LOG_LEVELS.info
}

const currentLevelPriority = resolveThreshold(process.env.LOG_LEVEL)

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelPriority
}

export interface Logger {
  info(message: string): void
  debug(message: string): void
  success(message: string): void
  warning(message: string): void
  error(message: string): void
  skip(message: string): void
}

function buildLogger(prefix: string): Logger {
  return {
    info: (message) => {
      if (shouldLog('info')) console.info(`${prefix}${message}`)
    },

    debug: (message) => {
      if (shouldLog('debug')) console.debug(`${prefix}${message}`)
    },

    /**
     * Successful operation (✓)
     */
    success: (message) => {
      if (shouldLog('success')) console.info(`✓ ${prefix}${message}`)
    },

    /**
     * Warning message (⚠)
     */
    warning: (message) => {
      if (shouldLog('warn')) console.warn(`⚠ ${prefix}${message}`)
    },

    /**
     * Error message (✗)
     */
    error: (message) => {
      if (shouldLog('error')) console.error(`✗ ${prefix}${message}`)
    },

    /**
     * Skipped operation (⊳)
     */
    skip: (message) => {
      if (shouldLog('skip')) console.debug(`⊳ ${prefix}${message}`)
    },
  }
}

export const log: Logger = buildLogger('')

/**
 * Logger whose lines are tagged with `[scope]`, e.g. `[visible-text] 2/5 → Completed`.
 */
export function createLogger(scope: string): Logger {
  return buildLogger(`[${scope}] `)
}
