/**
 * Deletion dispatcher
 *
 * Deletes a selection either in bulk batches (needs Manage Messages) or one
 * message at a time with a pause between calls. Each call is made exactly once;
 * a failed batch or message is recorded and the rest carry on.
 */

import type { CleanupMessage, DeletionErrorKind } from '../types.js'
import { createLogger } from '../utils/logger.js'
import { sleep as defaultSleep } from '../utils/retry.js'

const logger = createLogger({ module: 'dispatcher' })

// ============================================================================
// Types
// ============================================================================

export interface MessageDeleter {
  /**
   * Delete up to the batch limit in one call. A resolved call means the whole
   * batch is gone; the platform's own tally is not trusted (a single-ID batch
   * reports only what it had cached).
   */
  bulkDelete(channelId: string, messageIds: string[]): Promise<void>
  deleteOne(channelId: string, messageId: string): Promise<void>
}

export interface DispatchOptions {
  /** Bulk delete batch size (default: 100, Discord's maximum) */
  batchLimit?: number
  /** Pause between sequential deletes in ms (default: 1100) */
  delayMs?: number
  sleep?: (ms: number) => Promise<void>
}

export type DeletionStrategy = 'bulk' | 'sequential'

export interface DeletionFailure {
  messageIds: string[]
  kind: DeletionErrorKind
  error: string
}

export interface DeletionOutcome {
  strategy: DeletionStrategy
  attempted: number
  deleted: number
  failures: DeletionFailure[]
}

export const BULK_DELETE_LIMIT = 100
export const DEFAULT_SEQUENTIAL_DELAY_MS = 1100

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Map a Discord failure onto a deletion error kind.
 * Uses the JSON error code where present (50013 Missing Permissions,
 * 10008 Unknown Message), falling back to the HTTP status.
 */
export function classifyDeletionError(error: unknown): DeletionErrorKind {
  if (error && typeof error === 'object') {
    const err = error as { code?: unknown; status?: unknown }
    if (err.code === 50013) return 'permission_denied'
    if (err.code === 10008) return 'not_found'
    if (err.status === 429) return 'rate_limited'
    if (err.status === 403) return 'permission_denied'
    if (err.status === 404) return 'not_found'
  }
  return 'platform'
}

function toFailure(messageIds: string[], error: unknown): DeletionFailure {
  return {
    messageIds,
    kind: classifyDeletionError(error),
    error: error instanceof Error ? error.message : String(error),
  }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

// ============================================================================
// Strategies
// ============================================================================

export async function bulkDeletion(
  channelId: string,
  messages: readonly CleanupMessage[],
  deleter: MessageDeleter,
  batchLimit: number = BULK_DELETE_LIMIT
): Promise<DeletionOutcome> {
  const outcome: DeletionOutcome = { strategy: 'bulk', attempted: messages.length, deleted: 0, failures: [] }
  const batches = chunk(messages.map(m => m.id), Math.min(batchLimit, BULK_DELETE_LIMIT))

  for (const [index, ids] of batches.entries()) {
    try {
      await deleter.bulkDelete(channelId, ids)
      outcome.deleted += ids.length
    } catch (error) {
      const failure = toFailure(ids, error)
      outcome.failures.push(failure)
      logger.warn({ channelId, batch: index, size: ids.length, kind: failure.kind, error: failure.error }, 'Bulk delete batch failed')
    }
  }

  return outcome
}

export async function sequentialDeletion(
  channelId: string,
  messages: readonly CleanupMessage[],
  deleter: MessageDeleter,
  delayMs: number = DEFAULT_SEQUENTIAL_DELAY_MS,
  sleep: (ms: number) => Promise<void> = defaultSleep
): Promise<DeletionOutcome> {
  const outcome: DeletionOutcome = { strategy: 'sequential', attempted: messages.length, deleted: 0, failures: [] }

  for (const [index, message] of messages.entries()) {
    if (index > 0) {
      await sleep(delayMs)
    }
    try {
      await deleter.deleteOne(channelId, message.id)
      outcome.deleted++
    } catch (error) {
      const failure = toFailure([message.id], error)
      outcome.failures.push(failure)
      logger.warn({ channelId, messageId: message.id, kind: failure.kind, error: failure.error }, 'Message delete failed')
    }
  }

  return outcome
}

/**
 * Delete a selection using the strategy the caller's permissions allow.
 * `canBulkDelete` reflects channel-wide Manage Messages, not selection size.
 */
export async function dispatchDeletion(
  channelId: string,
  messages: readonly CleanupMessage[],
  canBulkDelete: boolean,
  deleter: MessageDeleter,
  options: DispatchOptions = {}
): Promise<DeletionOutcome> {
  const outcome = canBulkDelete
    ? await bulkDeletion(channelId, messages, deleter, options.batchLimit)
    : await sequentialDeletion(channelId, messages, deleter, options.delayMs, options.sleep)

  logger.debug({
    channelId,
    strategy: outcome.strategy,
    attempted: outcome.attempted,
    deleted: outcome.deleted,
    failed: outcome.failures.length,
  }, 'Deletion dispatched')

  return outcome
}
