/**
 * Retry helpers for Discord API calls
 */

import { logger } from './logger.js'

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export interface RetryOptions {
  maxBackoffMs: number
  maxAttempts?: number
  baseDelayMs?: number
}

const RETRYABLE_NETWORK_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN']

/** 429, 5xx and dropped connections are worth another attempt; everything else is final. */
export function isRetryableDiscordError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false
  }
  const err = error as { status?: unknown; code?: unknown }
  if (typeof err.status === 'number') {
    return err.status === 429 || err.status >= 500
  }
  return typeof err.code === 'string' && RETRYABLE_NETWORK_CODES.includes(err.code)
}

/**
 * Run a Discord call with exponential backoff on transient failures.
 * Non-retryable errors and the last attempt's error are rethrown unchanged.
 */
export async function retryDiscord<T>(
  fn: () => Promise<T>,
  options: number | RetryOptions
): Promise<T> {
  const opts: RetryOptions = typeof options === 'number' ? { maxBackoffMs: options } : options
  const maxAttempts = opts.maxAttempts ?? 5
  const baseDelayMs = opts.baseDelayMs ?? 1000

  let attempt = 0
  for (;;) {
    attempt++
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryableDiscordError(error)) {
        throw error
      }
      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), opts.maxBackoffMs)
      logger.warn({ attempt, delay, error }, 'Discord call failed, retrying')
      await sleep(delay)
    }
  }
}
