/**
 * Logging for the SDK.
 *
 * Modules obtain a logger with {@link getLogger} and log structured context plus a message,
 * pino style. The root logger is pino by default and can be replaced with any
 * pino-compatible logger through {@link configureLogging}.
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import { configureLogging } from 'agent-steps'
 *
 * configureLogging(pino({ level: 'debug' }))
 * ```
 */
import pino from 'pino'

const ROOT_NAME = 'agent-steps'

/**
 * Logger interface compatible with pino's API.
 */
export interface Logger {
  debug(context: Record<string, unknown>, message: string): void
  info(context: Record<string, unknown>, message: string): void
  warn(context: Record<string, unknown>, message: string): void
  error(context: Record<string, unknown>, message: string): void
  /**
   * Creates a logger that adds the bindings to every entry.
   * Loggers without it receive the entries unbound.
   */
  child?(bindings: Record<string, unknown>): Logger
}

let rootLogger: Logger | undefined

/**
 * Replaces the root logger used by every SDK module.
 * Passing undefined restores the default pino logger.
 *
 * @param logger - Pino or any compatible logger
 */
export function configureLogging(logger: Logger | undefined): void {
  rootLogger = logger
}

/**
 * Returns a logger bound to a module name.
 * The binding is resolved against the root logger at call time, so loggers created at
 * import time follow later {@link configureLogging} calls.
 *
 * @param module - Module name added to every entry
 */
export function getLogger(module: string): Logger {
  let boundRoot: Logger | undefined
  let bound: Logger | undefined

  const resolve = (): Logger => {
    const root = rootLogger ?? (rootLogger = createDefaultLogger())
    if (bound === undefined || boundRoot !== root) {
      boundRoot = root
      bound = root.child !== undefined ? root.child({ module }) : root
    }
    return bound
  }

  return {
    debug: (context, message) => resolve().debug(context, message),
    info: (context, message) => resolve().info(context, message),
    warn: (context, message) => resolve().warn(context, message),
    error: (context, message) => resolve().error(context, message),
  }
}

/**
 * Creates a logger that discards everything.
 */
export function createNoopLogger(): Logger {
  const noop = (): void => {}
  return { debug: noop, info: noop, warn: noop, error: noop }
}

function createDefaultLogger(): Logger {
  return pino({ name: ROOT_NAME, level: process.env['LOG_LEVEL'] ?? 'warn' })
}
