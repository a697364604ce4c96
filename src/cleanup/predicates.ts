/**
 * Selection predicates — one variant per cleanup policy.
 *
 * Every predicate is a pure function of (message, context). Anything that would
 * otherwise be looked up from the client (bot ID, prefixes, command registry) is
 * carried in PredicateContext.
 */

import type { CleanupMessage } from '../types.js'
import { ValidationError } from '../types.js'

// ────────────────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────────────────

export interface PredicateContext {
  botUserId: string
  /** The command message that started this cleanup. */
  triggerMessageId: string
  /** Invocation prefixes configured for the guild. */
  prefixes: readonly string[]
  isCommand(name: string): boolean
}

export type SelectionPredicate =
  | { kind: 'substring'; text: string }
  | { kind: 'author'; userId: string }
  | { kind: 'command_message' }
  | { kind: 'self_message'; matcher: ContentMatcher }
  | { kind: 'anchor_exclusive' }
  | { kind: 'all' }

/** Content test for self-message cleanup, built once from the user's pattern. */
export type ContentMatcher =
  | { kind: 'any' }
  | { kind: 'substring'; text: string }
  | { kind: 'regex'; source: string; regex: RegExp }

// ────────────────────────────────────────────────────────────────────────────
// Construction
// ────────────────────────────────────────────────────────────────────────────

/** Leading inline flag group such as `(?i)` or `(?si)` */
const INLINE_FLAGS = /^\(\?([ims]+)\)/

/**
 * Lift leading inline flag groups out of a pattern body, since JavaScript
 * regexes only take flags after the closing slash.
 */
function liftInlineFlags(body: string): { body: string; flags: string } {
  const flags = new Set<string>()
  let rest = body
  for (let match = INLINE_FLAGS.exec(rest); match; match = INLINE_FLAGS.exec(rest)) {
    for (const flag of match[1] ?? '') flags.add(flag)
    rest = rest.slice(match[0].length)
  }
  return { body: rest, flags: [...flags].sort().join('') }
}

/**
 * Compile a self-cleanup pattern.
 *
 * `r(...)` is a regular expression: the leading `r` is dropped and the rest,
 * parentheses included, is matched at the start of the content. Inline flags
 * at the front of the group (`(?i)`, `(?s)`, `(?m)`, combined as `(?si)`)
 * become regex flags. Any other pattern is a plain substring. No pattern
 * matches everything.
 */
export function compileContentMatcher(pattern?: string): ContentMatcher {
  if (!pattern) {
    return { kind: 'any' }
  }
  if (pattern.startsWith('r(') && pattern.endsWith(')')) {
    const { body, flags } = liftInlineFlags(pattern.slice(2, -1))
    const source = `(${body})`
    try {
      // Sticky: matches only at lastIndex 0, i.e. the start of the content
      return { kind: 'regex', source, regex: new RegExp(source, `${flags}y`) }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ValidationError(`Invalid pattern ${pattern}: ${reason}`)
    }
  }
  return { kind: 'substring', text: pattern }
}

export function selfMessagePredicate(pattern?: string): SelectionPredicate {
  return { kind: 'self_message', matcher: compileContentMatcher(pattern) }
}

// ────────────────────────────────────────────────────────────────────────────
// Evaluation
// ────────────────────────────────────────────────────────────────────────────

export function matchesContent(matcher: ContentMatcher, content: string): boolean {
  switch (matcher.kind) {
    case 'any':
      return true
    case 'substring':
      return content.includes(matcher.text)
    case 'regex':
      matcher.regex.lastIndex = 0
      return matcher.regex.test(content)
  }
}

/**
 * Does `content` invoke a registered command? The prefix must be non-empty and
 * the token after it (up to the first space) must name a known command, so
 * chatter like "!!!" or "?what" is left alone.
 */
export function isCommandInvocation(content: string, context: PredicateContext): boolean {
  const prefix = context.prefixes.find(p => p.length > 0 && content.startsWith(p))
  if (!prefix) {
    return false
  }
  const name = content.slice(prefix.length).split(' ')[0] ?? ''
  return name.length > 0 && context.isCommand(name)
}

export function matchesPredicate(
  predicate: SelectionPredicate,
  message: CleanupMessage,
  context: PredicateContext
): boolean {
  const isTrigger = message.id === context.triggerMessageId

  switch (predicate.kind) {
    case 'substring':
      return isTrigger || message.content.includes(predicate.text)
    case 'author':
      return isTrigger || message.authorId === predicate.userId
    case 'command_message':
      return message.authorId === context.botUserId
        || isTrigger
        || isCommandInvocation(message.content, context)
    case 'self_message':
      return message.authorId === context.botUserId
        && matchesContent(predicate.matcher, message.content)
    case 'anchor_exclusive':
    case 'all':
      return true
  }
}

function describeMatcher(matcher: ContentMatcher): string {
  switch (matcher.kind) {
    case 'any':
      return ''
    case 'substring':
      return ` containing '${matcher.text}'`
    case 'regex':
      return ` matching /${matcher.source}/${matcher.regex.flags.replace('y', '')}`
  }
}

/** Short description for logs */
export function describePredicate(predicate: SelectionPredicate): string {
  switch (predicate.kind) {
    case 'substring':
      return `containing '${predicate.text}'`
    case 'author':
      return `from user ${predicate.userId}`
    case 'command_message':
      return 'command and bot messages'
    case 'self_message':
      return `sent by the bot${describeMatcher(predicate.matcher)}`
    case 'anchor_exclusive':
      return 'after anchor'
    case 'all':
      return 'any'
  }
}
