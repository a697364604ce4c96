/**
 * Cutoff policy
 *
 * Discord's bulk delete rejects messages older than 14 days. The cutoff sits a
 * few minutes inside that window so a message right at the edge cannot age out
 * between selection and the delete call.
 */

import type { CleanupMessage } from '../types.js'

export interface CutoffPolicy {
  maxAgeMs: number
  safetyMarginMs: number
}

export const BULK_DELETE_MAX_AGE_MS = 14 * 24 * 60 * 60 * 1000
export const DEFAULT_SAFETY_MARGIN_MS = 5 * 60 * 1000

export const DEFAULT_CUTOFF_POLICY: CutoffPolicy = {
  maxAgeMs: BULK_DELETE_MAX_AGE_MS,
  safetyMarginMs: DEFAULT_SAFETY_MARGIN_MS,
}

export function computeCutoff(now: number, policy: CutoffPolicy = DEFAULT_CUTOFF_POLICY): number {
  return now - policy.maxAgeMs + policy.safetyMarginMs
}

export function isPastCutoff(message: CleanupMessage, cutoff: number): boolean {
  return message.createdAt <= cutoff
}

/** An `after` boundary never reaches further back than the cutoff. */
export function clampAfter(after: number, cutoff: number): number {
  return Math.max(after, cutoff)
}

export function isEligible(message: CleanupMessage, cutoff: number, includePinned: boolean): boolean {
  return !isPastCutoff(message, cutoff) && (includePinned || !message.pinned)
}
