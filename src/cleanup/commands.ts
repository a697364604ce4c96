/**
 * Cleanup command parsing
 *
 *   cleanup text <substring> <count> [includePinned]
 *   cleanup user <userRef> <count> [includePinned]
 *   cleanup after <messageId> [includePinned]
 *   cleanup messages <count> [includePinned]
 *   cleanup bot <count> [includePinned]
 *   cleanup self <count> [pattern] [includePinned]
 */

import { ValidationError } from '../types.js'

export const CLEANUP_COMMAND = 'cleanup'

export type CleanupCommand =
  | { name: 'text'; text: string; count: number; includePinned: boolean }
  | { name: 'user'; userRef: string; count: number; includePinned: boolean }
  | { name: 'after'; messageId: string; includePinned: boolean }
  | { name: 'messages'; count: number; includePinned: boolean }
  | { name: 'bot'; count: number; includePinned: boolean }
  | { name: 'self'; count: number; pattern?: string; includePinned: boolean }

export const USAGE = [
  'Usage:',
  '`cleanup text "<text>" <count> [includePinned]`',
  '`cleanup user <user> <count> [includePinned]`',
  '`cleanup after <messageId> [includePinned]`',
  '`cleanup messages <count> [includePinned]`',
  '`cleanup bot <count> [includePinned]`',
  '`cleanup self <count> [pattern] [includePinned]`',
].join('\n')

/** Names the bot answers to, used to recognise command messages in history. */
export class CommandRegistry {
  private names: Set<string>

  constructor(knownCommands: readonly string[] = []) {
    this.names = new Set([CLEANUP_COMMAND, ...knownCommands].map(n => n.toLowerCase()))
  }

  isCommand(name: string): boolean {
    return this.names.has(name.toLowerCase())
  }
}

/**
 * Split an argument string on whitespace. Double quotes group words
 * (`"two words"`); the quotes themselves are dropped.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = []
  const pattern = /"([^"]*)"|(\S+)/g
  let match: RegExpExecArray | null
  while ((match = pattern.exec(input)) !== null) {
    tokens.push(match[1] ?? match[2] ?? '')
  }
  return tokens
}

/**
 * If `content` invokes cleanup with one of `prefixes`, return the argument
 * text after the command name. Otherwise null.
 */
export function extractCleanupArgs(content: string, prefixes: readonly string[]): string | null {
  for (const prefix of prefixes) {
    if (!prefix || !content.startsWith(prefix)) continue
    const rest = content.slice(prefix.length)
    const name = rest.split(/\s/, 1)[0] ?? ''
    if (name.toLowerCase() === CLEANUP_COMMAND) {
      return rest.slice(name.length).trim()
    }
  }
  return null
}

const TRUE_WORDS = ['true', 'yes', 'y', 'on', '1', 'enable']
const FALSE_WORDS = ['false', 'no', 'n', 'off', '0', 'disable']

export function parseBoolean(value: string | undefined, argName: string): boolean {
  if (value === undefined) return false
  const lower = value.toLowerCase()
  if (TRUE_WORDS.includes(lower)) return true
  if (FALSE_WORDS.includes(lower)) return false
  throw new ValidationError(`${argName} must be true or false, got '${value}'`)
}

export function parseCount(value: string | undefined): number {
  if (value === undefined) {
    throw new ValidationError('Missing message count.')
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ValidationError(`Message count must be a whole number, got '${value}'`)
  }
  const count = Number(value)
  if (count < 1 || !Number.isSafeInteger(count)) {
    throw new ValidationError(`Message count must be positive, got ${value}`)
  }
  return count
}

function required(value: string | undefined, argName: string): string {
  if (value === undefined || value === '') {
    throw new ValidationError(`Missing ${argName}.`)
  }
  return value
}

function rejectExtra(args: readonly string[], max: number): void {
  if (args.length > max) {
    throw new ValidationError(`Too many arguments.\n${USAGE}`)
  }
}

export function parseCleanupCommand(args: readonly string[]): CleanupCommand {
  const [sub, ...rest] = args
  if (!sub) {
    throw new ValidationError(USAGE)
  }

  switch (sub.toLowerCase()) {
    case 'text':
      rejectExtra(rest, 3)
      return {
        name: 'text',
        text: required(rest[0], 'text'),
        count: parseCount(rest[1]),
        includePinned: parseBoolean(rest[2], 'includePinned'),
      }
    case 'user':
      rejectExtra(rest, 3)
      return {
        name: 'user',
        userRef: required(rest[0], 'user'),
        count: parseCount(rest[1]),
        includePinned: parseBoolean(rest[2], 'includePinned'),
      }
    case 'after': {
      rejectExtra(rest, 2)
      const messageId = required(rest[0], 'message ID')
      if (!/^\d+$/.test(messageId)) {
        throw new ValidationError(`Message ID must be numeric, got '${messageId}'`)
      }
      return { name: 'after', messageId, includePinned: parseBoolean(rest[1], 'includePinned') }
    }
    case 'messages':
    case 'bot': {
      rejectExtra(rest, 2)
      const name = sub.toLowerCase() === 'bot' ? 'bot' : 'messages'
      return { name, count: parseCount(rest[0]), includePinned: parseBoolean(rest[1], 'includePinned') }
    }
    case 'self':
      rejectExtra(rest, 3)
      return {
        name: 'self',
        count: parseCount(rest[0]),
        pattern: rest[1] || undefined,
        includePinned: parseBoolean(rest[2], 'includePinned'),
      }
    default:
      throw new ValidationError(`Unknown cleanup mode '${sub}'.\n${USAGE}`)
  }
}

export function commandCount(command: CleanupCommand): number | undefined {
  return command.name === 'after' ? undefined : command.count
}
