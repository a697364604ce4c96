import { describe, it, expect } from 'vitest'
import { clampAfter, computeCutoff, isEligible, isPastCutoff } from './cutoff.js'
import { DAY, MINUTE, NOW, message } from '../testing/fake-platform.js'

describe('computeCutoff', () => {
  it('sits five minutes inside the 14 day bulk delete window', () => {
    expect(computeCutoff(NOW)).toBe(NOW - 14 * DAY + 5 * MINUTE)
  })

  it('accepts a custom policy', () => {
    expect(computeCutoff(NOW, { maxAgeMs: DAY, safetyMarginMs: 0 })).toBe(NOW - DAY)
  })
})

describe('isPastCutoff', () => {
  const cutoff = computeCutoff(NOW)

  it('treats a message exactly at the cutoff as too old', () => {
    expect(isPastCutoff(message(14 * DAY - 5 * MINUTE), cutoff)).toBe(true)
    expect(isPastCutoff(message(14 * DAY - 6 * MINUTE), cutoff)).toBe(false)
  })
})

describe('clampAfter', () => {
  it('never lets an after boundary reach past the cutoff', () => {
    const cutoff = computeCutoff(NOW)
    expect(clampAfter(NOW - 30 * DAY, cutoff)).toBe(cutoff)
    expect(clampAfter(NOW - DAY, cutoff)).toBe(NOW - DAY)
  })
})

describe('isEligible', () => {
  const cutoff = computeCutoff(NOW)

  it('excludes pinned messages unless asked', () => {
    const pinned = message(MINUTE, { pinned: true })
    expect(isEligible(pinned, cutoff, false)).toBe(false)
    expect(isEligible(pinned, cutoff, true)).toBe(true)
  })

  it('excludes old messages even when pins are included', () => {
    expect(isEligible(message(15 * DAY), cutoff, true)).toBe(false)
  })
})
