/**
 * User reference resolution for `cleanup user`.
 *
 * Accepts a mention (<@123> / <@!123>), a bare ID, or a name. Names are matched
 * exactly (case-insensitive) against username, global name and server nickname.
 */

import { NotFoundError } from '../types.js'

export interface MemberCandidate {
  id: string
  username: string
  globalName: string | null
  displayName: string
}

/** The ID a reference names directly, without a member lookup. */
export function parseUserIdRef(ref: string): string | null {
  const mention = ref.match(/^<@!?(\d+)>$/)
  if (mention) return mention[1] ?? null
  return /^\d+$/.test(ref) ? ref : null
}

export function pickMember(ref: string, candidates: readonly MemberCandidate[]): string {
  const wanted = ref.toLowerCase()
  const matches = candidates.filter(c =>
    c.username.toLowerCase() === wanted
    || c.displayName.toLowerCase() === wanted
    || c.globalName?.toLowerCase() === wanted
  )

  const [only, ...others] = matches
  if (!only) {
    throw new NotFoundError(`User "${ref}" not found.`)
  }
  if (others.length > 0) {
    throw new NotFoundError(`"${ref}" matches more than one member. Use a mention or ID instead.`)
  }
  return only.id
}
