/**
 * Package configuration
 *
 * Holds the process-wide logging settings. Conversions themselves are pure;
 * the only thing they read from here is where to report a broken invariant.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

// Logging configuration
export interface LoggingConfig {
  level: LogLevel
  logger?: (level: LogLevel, message: string) => void
}

// Package configuration
export interface Config {
  logging?: Partial<LoggingConfig>
}

export interface ResolvedConfig {
  readonly logging: Readonly<LoggingConfig>
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

const DEFAULT_CONFIG: ResolvedConfig = Object.freeze({
  logging: Object.freeze({ level: 'warn' as const }),
})

let current: ResolvedConfig = DEFAULT_CONFIG

/**
 * Merges the given settings over the current configuration
 */
export function configure(config: Config): void {
  current = Object.freeze({
    logging: Object.freeze({
      level: config.logging?.level ?? current.logging.level,
      logger: config.logging?.logger ?? current.logging.logger,
    }),
  })
}

/**
 * Returns the active configuration
 */
export function getConfig(): ResolvedConfig {
  return current
}

/**
 * Restores the default configuration
 */
export function resetConfig(): void {
  current = DEFAULT_CONFIG
}

function consoleLogger(level: LogLevel, message: string): void {
  console[level](`[infallible-bigint] ${message}`)
}

/**
 * Writes a message through the configured logger if its level is enabled
 */
export function log(level: LogLevel, message: string): void {
  const { level: threshold, logger } = current.logging
  if (LEVEL_ORDER[level] > LEVEL_ORDER[threshold]) {
    return
  }
  const sink = logger ?? consoleLogger
  sink(level, message)
}
