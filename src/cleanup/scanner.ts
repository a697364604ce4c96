/**
 * History scanner — turns a channel's paged history into a bounded selection.
 *
 * History is consumed newest-first, one page at a time, and the scan stops as
 * soon as the answer is known: the age cutoff or `after` boundary is crossed,
 * the target count is reached, or the feed runs dry. Nothing is fetched past
 * that point.
 */

import type { Anchor, CleanupMessage } from '../types.js'
import { NotFoundError, ValidationError } from '../types.js'
import { compareSnowflakes, snowflakeToTimestamp, timestampToSnowflake } from '../discord/snowflake.js'
import { clampAfter, computeCutoff, isPastCutoff, type CutoffPolicy } from './cutoff.js'
import { describePredicate, matchesPredicate, type PredicateContext, type SelectionPredicate } from './predicates.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger({ module: 'scanner' })

// ────────────────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────────────────

/** Paged channel history — backed by the Discord API in production, arrays in tests. */
export interface HistoryFeed {
  /** Fetch up to `limit` messages older than `before` (or the newest, without a cursor), newest-first. */
  fetchPage(channelId: string, options: { before?: string; limit: number }): Promise<CleanupMessage[]>
}

export interface MessageLookup {
  fetchMessage(channelId: string, messageId: string): Promise<CleanupMessage | null>
}

export interface SelectionRequest {
  channelId: string
  predicate: SelectionPredicate
  context: PredicateContext
  /** Stop once this many messages are selected. Unbounded when omitted. */
  targetCount?: number
  /** Only messages strictly older than this anchor are scanned. */
  before?: Anchor
  /** Only messages strictly newer than this anchor are scanned. Cannot be combined with targetCount. */
  after?: Anchor
  includePinned: boolean
  /** Defaults to Date.now() */
  now?: number
  cutoffPolicy?: CutoffPolicy
  pageSize?: number
}

export type StopReason = 'target' | 'cutoff' | 'anchor' | 'exhausted'

export interface Selection {
  /** Selected messages, newest first. */
  messages: CleanupMessage[]
  stopReason: StopReason
  /** Messages examined, selected or not. */
  scanned: number
}

export const MAX_PAGE_SIZE = 100

// ────────────────────────────────────────────────────────────────────────────
// Feed iteration
// ────────────────────────────────────────────────────────────────────────────

export function anchorTimestamp(anchor: Anchor): number {
  return 'messageId' in anchor ? snowflakeToTimestamp(anchor.messageId) : anchor.timestamp
}

export function anchorCursor(anchor: Anchor): string {
  return 'messageId' in anchor ? anchor.messageId : timestampToSnowflake(anchor.timestamp)
}

/**
 * Has the scan reached the `after` bound? A message anchor compares by ID, so a
 * message posted in the same millisecond as the anchor still counts as newer.
 * Once the bound is clamped to the cutoff it is a plain timestamp.
 */
function reachedAfterBound(message: CleanupMessage, after: Anchor, boundary: number): boolean {
  if ('messageId' in after && boundary === snowflakeToTimestamp(after.messageId)) {
    return compareSnowflakes(message.id, after.messageId) <= 0
  }
  return message.createdAt <= boundary
}

/**
 * Lazily walk a channel's history newest-first.
 *
 * Each page is fetched only when the previous one has been consumed, so a
 * consumer that stops iterating stops the paging too. A short page means the
 * start of the channel was reached.
 */
export async function* iterateHistory(
  feed: HistoryFeed,
  channelId: string,
  options: { before?: string; pageSize?: number } = {}
): AsyncGenerator<CleanupMessage, void, undefined> {
  const pageSize = Math.min(options.pageSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE)
  let cursor = options.before

  for (;;) {
    const page = cursor
      ? await feed.fetchPage(channelId, { before: cursor, limit: pageSize })
      : await feed.fetchPage(channelId, { limit: pageSize })

    if (page.length === 0) return

    // Newest-first regardless of what order the source hands back
    const ordered = [...page].sort((a, b) => compareSnowflakes(b.id, a.id))
    for (const message of ordered) {
      yield message
    }

    const oldest = ordered[ordered.length - 1]
    if (!oldest || page.length < pageSize) return
    cursor = oldest.id
  }
}

// ────────────────────────────────────────────────────────────────────────────
// Scan
// ────────────────────────────────────────────────────────────────────────────

export function validateSelectionRequest(request: SelectionRequest): void {
  const { targetCount } = request
  if (targetCount !== undefined && (!Number.isInteger(targetCount) || targetCount < 1)) {
    throw new ValidationError(`Message count must be a positive whole number, got ${targetCount}`)
  }
  // Pages arrive newest-first, so a count combined with `after` would keep the
  // newest N rather than the N right after the anchor. Refuse instead of guessing.
  if (targetCount !== undefined && request.after !== undefined) {
    throw new ValidationError('A message count cannot be combined with an after anchor')
  }
}

/**
 * Select messages for deletion.
 *
 * Errors from the feed propagate as-is: a scan either completes or fails, it
 * never returns a partial selection.
 */
export async function scanHistory(feed: HistoryFeed, request: SelectionRequest): Promise<Selection> {
  validateSelectionRequest(request)

  const now = request.now ?? Date.now()
  const cutoff = computeCutoff(now, request.cutoffPolicy)
  const afterBoundary = request.after ? clampAfter(anchorTimestamp(request.after), cutoff) : undefined
  const before = request.before ? anchorCursor(request.before) : undefined

  const messages: CleanupMessage[] = []
  let scanned = 0
  let stopReason: StopReason = 'exhausted'

  for await (const message of iterateHistory(feed, request.channelId, { before, pageSize: request.pageSize })) {
    scanned++

    if (isPastCutoff(message, cutoff)) {
      stopReason = 'cutoff'
      break
    }
    if (request.after && afterBoundary !== undefined && reachedAfterBound(message, request.after, afterBoundary)) {
      stopReason = 'anchor'
      break
    }

    if ((request.includePinned || !message.pinned) && matchesPredicate(request.predicate, message, request.context)) {
      messages.push(message)
      if (request.targetCount !== undefined && messages.length >= request.targetCount) {
        stopReason = 'target'
        break
      }
    }
  }

  logger.debug({
    channelId: request.channelId,
    policy: describePredicate(request.predicate),
    selected: messages.length,
    scanned,
    stopReason,
  }, 'History scan complete')

  return { messages, stopReason, scanned }
}

/** Look up an anchor message before scanning; a vanished anchor is a not-found error. */
export async function resolveAnchor(
  lookup: MessageLookup,
  channelId: string,
  messageId: string
): Promise<CleanupMessage> {
  const message = await lookup.fetchMessage(channelId, messageId)
  if (!message) {
    throw new NotFoundError(`Message ${messageId} not found.`)
  }
  return message
}
