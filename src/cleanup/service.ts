/**
 * Cleanup Service
 *
 * Runs one cleanup invocation end to end:
 * permissions → argument resolution → confirmation → scan → delete → report.
 * Selection always finishes before the first delete, so the feed being paged is
 * never modified underneath the scan.
 */

import type { CleanupMessage } from '../types.js'
import { CleanupError, PermissionDeniedError, ValidationError } from '../types.js'
import type { CleanupConfig } from '../config/system.js'
import { ConfigSystem } from '../config/system.js'
import { createLogger, withCleanupLogging } from '../utils/logger.js'
import { computeCutoff, isEligible, type CutoffPolicy } from './cutoff.js'
import {
  describePredicate,
  matchesPredicate,
  selfMessagePredicate,
  type PredicateContext,
  type SelectionPredicate,
} from './predicates.js'
import { resolveAnchor, scanHistory, type HistoryFeed, type MessageLookup, type SelectionRequest } from './scanner.js'
import { dispatchDeletion, type DeletionOutcome, type MessageDeleter } from './dispatcher.js'
import { confirmLargeDeletion, needsConfirmation, type ConversationPort } from './confirmation.js'
import {
  commandCount,
  parseCleanupCommand,
  tokenize,
  type CleanupCommand,
  type CommandRegistry,
} from './commands.js'

const logger = createLogger({ module: 'cleanup' })

// ============================================================================
// Types
// ============================================================================

export interface PermissionChecker {
  /** Does `userId` hold Manage Messages in the channel? False outside guilds. */
  canManageMessages(channelId: string, userId: string): Promise<boolean>
}

export interface IdentityResolver {
  /** Resolve a mention, ID or name to a user ID. Throws NotFoundError when unknown or ambiguous. */
  resolveUserId(guildId: string, userRef: string): Promise<string>
}

/** Everything the cleanup pipeline needs from the chat platform. */
export interface CleanupPlatform
  extends HistoryFeed, MessageLookup, MessageDeleter, ConversationPort, PermissionChecker, IdentityResolver {
  readonly botUserId: string
}

export interface CleanupInvocation {
  /** The message that invoked the command */
  trigger: CleanupMessage
  guildId: string | null
  authorName: string
}

export interface CleanupReport {
  command: CleanupCommand['name']
  selected: number
  outcome: DeletionOutcome
}

export interface CleanupServiceOptions {
  platform: CleanupPlatform
  registry: CommandRegistry
  config: CleanupConfig
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

const GUILD_ONLY: ReadonlySet<CleanupCommand['name']> = new Set(['text', 'user', 'after', 'messages', 'bot'])

// ============================================================================
// Service
// ============================================================================

export class CleanupService {
  private platform: CleanupPlatform
  private registry: CommandRegistry
  private config: CleanupConfig
  private now: () => number
  private sleep?: (ms: number) => Promise<void>

  constructor(options: CleanupServiceOptions) {
    this.platform = options.platform
    this.registry = options.registry
    this.config = options.config
    this.now = options.now ?? Date.now
    this.sleep = options.sleep
  }

  private get cutoffPolicy(): CutoffPolicy {
    return {
      maxAgeMs: this.config.maxAgeDays * 24 * 60 * 60 * 1000,
      safetyMarginMs: this.config.safetyMarginMinutes * 60 * 1000,
    }
  }

  /**
   * Parse and run a cleanup, replying in the channel with either the summary
   * or a single notice. Errors other than CleanupError propagate.
   */
  async handle(invocation: CleanupInvocation, argText: string): Promise<CleanupReport | null> {
    const { trigger } = invocation
    return withCleanupLogging(trigger.channelId, trigger.id, async () => {
      try {
        const command = parseCleanupCommand(tokenize(argText))
        const report = await this.run(invocation, command)
        if (report) {
          await this.platform.send(trigger.channelId, formatSummary(report.outcome))
        }
        return report
      } catch (error) {
        if (error instanceof CleanupError) {
          logger.info({ kind: error.kind, reason: error.message }, 'Cleanup refused')
          await this.platform.send(trigger.channelId, error.message)
          return null
        }
        throw error
      }
    })
  }

  /**
   * Run a parsed cleanup command. Resolves to null when the user declined (or
   * let the confirmation time out).
   */
  async run(invocation: CleanupInvocation, command: CleanupCommand): Promise<CleanupReport | null> {
    const { trigger, guildId } = invocation
    const channelId = trigger.channelId

    if (GUILD_ONLY.has(command.name) && !guildId) {
      throw new ValidationError('This command can only be used in a server.')
    }

    if (guildId && !(await this.platform.canManageMessages(channelId, trigger.authorId))) {
      throw new PermissionDeniedError('You need the Manage Messages permission to do this.')
    }

    // Bot messages can always be removed one by one; everything else needs bulk rights
    const canBulkDelete = await this.platform.canManageMessages(channelId, this.platform.botUserId)
    if (!canBulkDelete && command.name !== 'self') {
      throw new PermissionDeniedError('I need the Manage Messages permission to do this.')
    }

    const predicate = await this.buildPredicate(invocation, command)

    const count = commandCount(command)
    if (count !== undefined && needsConfirmation(count, this.config.confirmThreshold)) {
      const answer = await confirmLargeDeletion(this.platform, {
        channelId,
        authorId: trigger.authorId,
        count,
        timeoutMs: this.config.confirmTimeoutMs,
      })
      if (answer !== 'confirmed') {
        logger.info({ command: command.name, count, answer }, 'Cleanup cancelled')
        return null
      }
    }

    const context: PredicateContext = {
      botUserId: this.platform.botUserId,
      triggerMessageId: trigger.id,
      prefixes: ConfigSystem.prefixesFor(this.config, guildId),
      isCommand: name => this.registry.isCommand(name),
    }

    const toDelete = await this.select(command, predicate, context, trigger)
    const outcome = await dispatchDeletion(channelId, toDelete, canBulkDelete, this.platform, {
      batchLimit: this.config.bulkBatchLimit,
      delayMs: this.config.sequentialDelayMs,
      sleep: this.sleep,
    })

    logger.info({
      invokerId: trigger.authorId,
      invoker: invocation.authorName,
      command: command.name,
      policy: describePredicate(predicate),
      channelId,
      strategy: outcome.strategy,
      deleted: outcome.deleted,
      failed: outcome.failures.length,
      failures: outcome.failures,
    }, `${invocation.authorName}(${trigger.authorId}) deleted ${outcome.deleted} messages ${describePredicate(predicate)} in channel ${channelId}`)

    return { command: command.name, selected: toDelete.length, outcome }
  }

  private async buildPredicate(invocation: CleanupInvocation, command: CleanupCommand): Promise<SelectionPredicate> {
    switch (command.name) {
      case 'text':
        return { kind: 'substring', text: command.text }
      case 'user': {
        if (!invocation.guildId) {
          throw new ValidationError('This command can only be used in a server.')
        }
        const userId = await this.platform.resolveUserId(invocation.guildId, command.userRef)
        return { kind: 'author', userId }
      }
      case 'after':
        return { kind: 'anchor_exclusive' }
      case 'messages':
        return { kind: 'all' }
      case 'bot':
        return { kind: 'command_message' }
      case 'self':
        return selfMessagePredicate(command.pattern)
    }
  }

  /**
   * Scan for the messages to delete. Counted commands scan from just before the
   * trigger and then put the trigger itself first when the policy accepts it,
   * so the count never includes the command message.
   */
  private async select(
    command: CleanupCommand,
    predicate: SelectionPredicate,
    context: PredicateContext,
    trigger: CleanupMessage
  ): Promise<CleanupMessage[]> {
    const now = this.now()
    const base = {
      channelId: trigger.channelId,
      predicate,
      context,
      includePinned: command.includePinned,
      now,
      cutoffPolicy: this.cutoffPolicy,
    }

    let request: SelectionRequest
    if (command.name === 'after') {
      const anchor = await resolveAnchor(this.platform, trigger.channelId, command.messageId)
      request = { ...base, after: { messageId: anchor.id } }
    } else {
      request = { ...base, targetCount: command.count, before: { messageId: trigger.id } }
    }

    const selection = await scanHistory(this.platform, request)

    const cutoff = computeCutoff(now, this.cutoffPolicy)
    const includeTrigger = command.name !== 'after'
      && isEligible(trigger, cutoff, command.includePinned)
      && matchesPredicate(predicate, trigger, context)

    return includeTrigger ? [trigger, ...selection.messages] : selection.messages
  }
}

export function formatSummary(outcome: DeletionOutcome): string {
  const noun = outcome.deleted === 1 ? 'message' : 'messages'
  const failed = outcome.failures.reduce((sum, f) => sum + f.messageIds.length, 0)
  return failed > 0
    ? `Deleted ${outcome.deleted} ${noun} (${failed} failed).`
    : `Deleted ${outcome.deleted} ${noun}.`
}
