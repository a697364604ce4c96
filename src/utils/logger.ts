/**
 * Logging
 *
 * Structured pino logger. Child loggers carry a `module` binding; cleanup
 * invocations additionally stamp every line with the channel and trigger IDs.
 */

import { AsyncLocalStorage } from 'async_hooks'
import pino from 'pino'

interface InvocationBindings {
  channelId: string
  triggerId: string
}

const invocationStore = new AsyncLocalStorage<InvocationBindings>()

export const logger = pino({
  name: 'cleanup-bot',
  level: process.env.LOG_LEVEL || 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  mixin() {
    return invocationStore.getStore() ?? {}
  },
})

export function createLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings)
}

/**
 * Run `fn` with channel/trigger bindings attached to every log line it writes
 * (including lines from child loggers and awaited callees).
 */
export function withCleanupLogging<T>(
  channelId: string,
  triggerId: string,
  fn: () => Promise<T>
): Promise<T> {
  return invocationStore.run({ channelId, triggerId }, fn)
}
