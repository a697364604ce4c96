/**
 * Tests for the history scanner.
 *
 * History comes from FakeHistory (in-memory, newest-first pages), so these
 * cover paging, cutoff handling and early termination without a Discord client.
 */

import { describe, it, expect } from 'vitest'
import {
  anchorCursor,
  anchorTimestamp,
  iterateHistory,
  resolveAnchor,
  scanHistory,
  type SelectionRequest,
} from './scanner.js'
import type { PredicateContext, SelectionPredicate } from './predicates.js'
import { NotFoundError, ValidationError } from '../types.js'
import { timestampToSnowflake } from '../discord/snowflake.js'
import { BOT_ID, CHANNEL_ID, DAY, FakeHistory, MINUTE, NOW, message } from '../testing/fake-platform.js'

const context: PredicateContext = {
  botUserId: BOT_ID,
  triggerMessageId: '1',
  prefixes: ['!'],
  isCommand: () => false,
}

function request(overrides: Partial<SelectionRequest> = {}): SelectionRequest {
  return {
    channelId: CHANNEL_ID,
    predicate: { kind: 'all' },
    context,
    includePinned: false,
    now: NOW,
    ...overrides,
  }
}

const ids = (messages: { id: string }[]) => messages.map(m => m.id)

// ────────────────────────────────────────────────────────────────────────────
// iterateHistory
// ────────────────────────────────────────────────────────────────────────────

describe('iterateHistory', () => {
  it('yields every message newest-first across pages', async () => {
    const msgs = [1, 2, 3, 4, 5].map(n => message(n * MINUTE))
    const feed = new FakeHistory(msgs)

    const seen: string[] = []
    for await (const m of iterateHistory(feed, CHANNEL_ID, { pageSize: 2 })) {
      seen.push(m.id)
    }

    expect(seen).toEqual(ids(msgs))
    // 2 + 2 + 1 (short page ends it)
    expect(feed.pageCalls).toHaveLength(3)
    expect(feed.pageCalls[1]).toEqual({ before: msgs[1]!.id, limit: 2 })
  })

  it('fetches the next page only when the consumer asks for more', async () => {
    const feed = new FakeHistory([1, 2, 3, 4].map(n => message(n * MINUTE)))

    for await (const _ of iterateHistory(feed, CHANNEL_ID, { pageSize: 2 })) {
      break
    }

    expect(feed.pageCalls).toHaveLength(1)
  })

  it('starts from the before cursor', async () => {
    const msgs = [1, 2, 3].map(n => message(n * MINUTE))
    const feed = new FakeHistory(msgs)

    const seen: string[] = []
    for await (const m of iterateHistory(feed, CHANNEL_ID, { before: msgs[0]!.id })) {
      seen.push(m.id)
    }

    expect(seen).toEqual([msgs[1]!.id, msgs[2]!.id])
    expect(feed.pageCalls[0]).toEqual({ before: msgs[0]!.id, limit: 100 })
  })

  it('caps the page size at 100', async () => {
    const feed = new FakeHistory([])
    for await (const _ of iterateHistory(feed, CHANNEL_ID, { pageSize: 500 })) {
      // empty
    }
    expect(feed.pageCalls).toEqual([{ limit: 100 }])
  })
})

// ────────────────────────────────────────────────────────────────────────────
// Anchors
// ────────────────────────────────────────────────────────────────────────────

describe('anchors', () => {
  it('converts message anchors through their snowflake', () => {
    const m = message(5 * MINUTE)
    expect(anchorTimestamp({ messageId: m.id })).toBe(m.createdAt)
    expect(anchorCursor({ messageId: m.id })).toBe(m.id)
  })

  it('converts timestamp anchors to a cursor', () => {
    expect(anchorTimestamp({ timestamp: NOW })).toBe(NOW)
    expect(anchorCursor({ timestamp: NOW })).toBe(timestampToSnowflake(NOW))
  })
})

// ────────────────────────────────────────────────────────────────────────────
// scanHistory
// ────────────────────────────────────────────────────────────────────────────

describe('scanHistory', () => {
  it('stops at the first message at or past the cutoff', async () => {
    // cutoff sits at 14 days minus 5 minutes
    const young = message(MINUTE)
    const week = message(7 * DAY)
    const nearEdge = message(14 * DAY - 10 * MINUTE)
    const atCutoff = message(14 * DAY - 5 * MINUTE)
    const older = message(14 * DAY - MINUTE)
    const feed = new FakeHistory([young, week, nearEdge, atCutoff, older])

    const selection = await scanHistory(feed, request())

    expect(ids(selection.messages)).toEqual(ids([young, week, nearEdge]))
    expect(selection.stopReason).toBe('cutoff')
    expect(selection.scanned).toBe(4)
  })

  it('never selects past the cutoff whatever the predicate', async () => {
    const feed = new FakeHistory([message(15 * DAY, { content: 'match' }), message(20 * DAY, { content: 'match' })])

    const selection = await scanHistory(feed, request({ predicate: { kind: 'substring', text: 'match' } }))

    expect(selection.messages).toEqual([])
    expect(selection.stopReason).toBe('cutoff')
  })

  it('skips pinned messages unless includePinned is set', async () => {
    const a = message(MINUTE)
    const pinned = message(2 * MINUTE, { pinned: true })
    const b = message(3 * MINUTE)
    const feed = new FakeHistory([a, pinned, b])

    const without = await scanHistory(feed, request())
    expect(ids(without.messages)).toEqual(ids([a, b]))

    const withPinned = await scanHistory(feed, request({ includePinned: true }))
    expect(ids(withPinned.messages)).toEqual(ids([a, pinned, b]))
  })

  it('returns exactly targetCount messages newest-first and stops paging', async () => {
    const msgs = [1, 2, 3, 4, 5].map(n => message(n * MINUTE))
    const feed = new FakeHistory(msgs)

    const selection = await scanHistory(feed, request({ targetCount: 3, pageSize: 2 }))

    expect(ids(selection.messages)).toEqual(ids(msgs.slice(0, 3)))
    expect(selection.stopReason).toBe('target')
    expect(feed.pageCalls).toHaveLength(2)
  })

  it('returns everything eligible when the feed runs out first', async () => {
    const msgs = [message(MINUTE), message(2 * MINUTE)]
    const feed = new FakeHistory(msgs)

    const selection = await scanHistory(feed, request({ targetCount: 5 }))

    expect(ids(selection.messages)).toEqual(ids(msgs))
    expect(selection.stopReason).toBe('exhausted')
  })

  it('counts only messages the predicate accepts', async () => {
    const hit1 = message(MINUTE, { content: 'spam here' })
    const miss = message(2 * MINUTE, { content: 'hello' })
    const hit2 = message(3 * MINUTE, { content: 'more spam' })
    const hit3 = message(4 * MINUTE, { content: 'spam again' })
    const feed = new FakeHistory([hit1, miss, hit2, hit3])
    const predicate: SelectionPredicate = { kind: 'substring', text: 'spam' }

    const selection = await scanHistory(feed, request({ predicate, targetCount: 2 }))

    expect(ids(selection.messages)).toEqual(ids([hit1, hit2]))
    expect(selection.scanned).toBe(3)
  })

  it('only scans messages older than the before anchor', async () => {
    const newest = message(MINUTE)
    const middle = message(2 * MINUTE)
    const oldest = message(3 * MINUTE)
    const feed = new FakeHistory([newest, middle, oldest])

    const selection = await scanHistory(feed, request({ before: { messageId: newest.id } }))

    expect(ids(selection.messages)).toEqual(ids([middle, oldest]))
  })

  it('stops at the after anchor and excludes the anchor itself', async () => {
    const newest = message(MINUTE)
    const middle = message(2 * MINUTE)
    const anchor = message(3 * MINUTE)
    const beyond = message(4 * MINUTE)
    const feed = new FakeHistory([newest, middle, anchor, beyond])

    const selection = await scanHistory(feed, request({
      predicate: { kind: 'anchor_exclusive' },
      after: { messageId: anchor.id },
    }))

    expect(ids(selection.messages)).toEqual(ids([newest, middle]))
    expect(selection.stopReason).toBe('anchor')
  })

  it('keeps a message from the same millisecond as the anchor when it is newer', async () => {
    const anchor = message(3 * MINUTE)
    const sibling = { ...anchor, id: (BigInt(anchor.id) + 1n).toString() }
    const feed = new FakeHistory([sibling, anchor])

    const selection = await scanHistory(feed, request({
      predicate: { kind: 'anchor_exclusive' },
      after: { messageId: anchor.id },
    }))

    expect(ids(selection.messages)).toEqual([sibling.id])
    expect(selection.stopReason).toBe('anchor')
  })

  it('clamps an after anchor older than the cutoff to the cutoff', async () => {
    const recent = message(DAY)
    const stale = message(20 * DAY)
    const feed = new FakeHistory([recent, stale])

    const selection = await scanHistory(feed, request({ after: { timestamp: NOW - 30 * DAY } }))

    expect(ids(selection.messages)).toEqual(ids([recent]))
    expect(selection.stopReason).toBe('cutoff')
  })

  it('honours a custom cutoff policy', async () => {
    const recent = message(MINUTE)
    const hourOld = message(60 * MINUTE)
    const feed = new FakeHistory([recent, hourOld])

    const selection = await scanHistory(feed, request({ cutoffPolicy: { maxAgeMs: 30 * MINUTE, safetyMarginMs: 0 } }))

    expect(ids(selection.messages)).toEqual(ids([recent]))
  })

  it('rejects a non-positive targetCount before fetching', async () => {
    const feed = new FakeHistory([message(MINUTE)])

    await expect(scanHistory(feed, request({ targetCount: 0 }))).rejects.toBeInstanceOf(ValidationError)
    await expect(scanHistory(feed, request({ targetCount: 2.5 }))).rejects.toBeInstanceOf(ValidationError)
    expect(feed.pageCalls).toHaveLength(0)
  })

  it('rejects targetCount combined with an after anchor', async () => {
    const feed = new FakeHistory([message(MINUTE)])

    await expect(scanHistory(feed, request({ targetCount: 5, after: { timestamp: NOW - DAY } })))
      .rejects.toThrow('A message count cannot be combined with an after anchor')
  })

  it('propagates feed errors instead of returning a partial selection', async () => {
    const feed = new FakeHistory([message(MINUTE)])
    feed.failWith = new Error('503 Service Unavailable')

    await expect(scanHistory(feed, request())).rejects.toThrow('503 Service Unavailable')
  })

  it('rejects when a later page fails, after earlier pages matched', async () => {
    const history = Array.from({ length: 150 }, (_, i) => message((i + 1) * MINUTE))
    const feed = new FakeHistory(history)
    feed.failWith = new Error('503 Service Unavailable')
    feed.failFromPage = 2

    await expect(scanHistory(feed, request())).rejects.toThrow('503 Service Unavailable')
    expect(feed.pageCalls).toEqual([
      { limit: 100 },
      { before: history[99]?.id, limit: 100 },
    ])
  })
})

// ────────────────────────────────────────────────────────────────────────────
// resolveAnchor
// ────────────────────────────────────────────────────────────────────────────

describe('resolveAnchor', () => {
  it('returns the anchor message', async () => {
    const anchor = message(MINUTE)
    const feed = new FakeHistory([anchor])

    await expect(resolveAnchor(feed, CHANNEL_ID, anchor.id)).resolves.toEqual(anchor)
  })

  it('reports a missing anchor as not found', async () => {
    const feed = new FakeHistory([])

    const result = resolveAnchor(feed, CHANNEL_ID, '123456789012345678')
    await expect(result).rejects.toBeInstanceOf(NotFoundError)
    await expect(resolveAnchor(feed, CHANNEL_ID, '123456789012345678')).rejects.toThrow('Message 123456789012345678 not found.')
  })
})
