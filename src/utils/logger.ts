/**
 * Logger utility for Baton
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // Plain CLI use: stay quiet unless asked
  return 'warn'
}

/** Whether to use pretty printing */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; only opt in for interactive development
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

// Every logger created so far, so a level read from configuration can be
// applied after module-level loggers already exist
const registry = new Set<pino.Logger>()

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  let instance: pino.Logger
  if (pretty) {
    // pino-pretty is a devDependency; transport errors surface asynchronously
    instance = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  } else {
    // stderr keeps stdout free for command output
    instance = pino(baseOptions, pino.destination(2))
  }
  registry.add(instance)
  return instance
}

/**
 * Apply a level to every logger created so far.
 * The LOG_LEVEL environment variable still wins when set.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  for (const instance of registry) instance.level = level
}

/** Root application logger */
export const logger = createLogger('baton')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
