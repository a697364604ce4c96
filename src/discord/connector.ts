/**
 * Discord Connector
 * Handles all Discord API interactions
 */

import { Client, GatewayIntentBits, Message, Partials, PermissionFlagsBits } from 'discord.js'
import type { CleanupMessage } from '../types.js'
import { DiscordError } from '../types.js'
import type { CleanupInvocation, CleanupPlatform } from '../cleanup/service.js'
import { extractCleanupArgs } from '../cleanup/commands.js'
import { logger } from '../utils/logger.js'
import { retryDiscord } from '../utils/retry.js'
import { parseUserIdRef, pickMember } from './identity.js'

export interface ConnectorOptions {
  token: string
  maxBackoffMs: number
  /** Invocation prefixes for a guild (null in DMs) */
  prefixesFor: (guildId: string | null) => string[]
}

export type CleanupCommandHandler = (invocation: CleanupInvocation, argText: string) => Promise<unknown>

const MEMBER_QUERY_LIMIT = 10

/** Map a discord.js message onto the read-only shape the cleanup pipeline uses */
export function toCleanupMessage(message: Message): CleanupMessage {
  return {
    id: message.id,
    channelId: message.channelId,
    authorId: message.author.id,
    content: message.content,
    createdAt: message.createdTimestamp,
    pinned: message.pinned,
  }
}

function isUnknownMessage(error: unknown): boolean {
  return !!error && typeof error === 'object' && (error as { code?: unknown }).code === 10008
}

export class DiscordConnector implements CleanupPlatform {
  private client: Client
  private commandHandler: CleanupCommandHandler | null = null

  constructor(private options: ConnectorOptions) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages,
      ],
      partials: [Partials.Channel],
    })

    this.setupEventHandlers()
  }

  /**
   * Start the Discord client and wait until the gateway session is ready
   */
  async start(): Promise<void> {
    try {
      const ready = new Promise<void>(resolve => this.client.once('ready', () => resolve()))
      await this.client.login(this.options.token)
      await ready
      logger.info({ userId: this.client.user?.id, tag: this.client.user?.tag }, 'Discord connector started')
    } catch (error) {
      logger.error({ error }, 'Failed to start Discord connector')
      throw new DiscordError('Failed to connect to Discord', error)
    }
  }

  get botUserId(): string {
    const id = this.client.user?.id
    if (!id) {
      throw new DiscordError('Bot user ID not available before the client is ready')
    }
    return id
  }

  /**
   * Register the handler for `<prefix>cleanup ...` messages
   */
  onCleanupCommand(handler: CleanupCommandHandler): void {
    this.commandHandler = handler
  }

  private async textChannel(channelId: string) {
    const channel = await this.client.channels.fetch(channelId)
    if (!channel || !channel.isTextBased() || !('send' in channel)) {
      throw new DiscordError(`Channel ${channelId} not found or not text-based`)
    }
    return channel
  }

  // ──────────────────────────────────────────────────────────────────────────
  // History
  // ──────────────────────────────────────────────────────────────────────────

  async fetchPage(channelId: string, options: { before?: string; limit: number }): Promise<CleanupMessage[]> {
    const channel = await this.textChannel(channelId)
    const batch = options.before
      ? await channel.messages.fetch({ before: options.before, limit: options.limit, cache: false })
      : await channel.messages.fetch({ limit: options.limit, cache: false })
    return Array.from(batch.values(), toCleanupMessage)
  }

  async fetchMessage(channelId: string, messageId: string): Promise<CleanupMessage | null> {
    return retryDiscord(async () => {
      const channel = await this.textChannel(channelId)
      try {
        return toCleanupMessage(await channel.messages.fetch(messageId))
      } catch (error) {
        if (isUnknownMessage(error)) {
          return null
        }
        throw error
      }
    }, this.options.maxBackoffMs)
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Deletion (never retried here: the dispatcher records failures instead)
  // ──────────────────────────────────────────────────────────────────────────

  async bulkDelete(channelId: string, messageIds: string[]): Promise<void> {
    const channel = await this.textChannel(channelId)
    if (!('bulkDelete' in channel)) {
      throw new DiscordError(`Channel ${channelId} does not support bulk delete`)
    }
    // A one-ID call returns only cached messages, and history is fetched uncached
    const deleted = await channel.bulkDelete(messageIds, false)
    logger.debug({ channelId, requested: messageIds.length, reported: deleted.size }, 'Bulk deleted messages')
  }

  async deleteOne(channelId: string, messageId: string): Promise<void> {
    const channel = await this.textChannel(channelId)
    await channel.messages.delete(messageId)
  }

  async deleteMessage(channelId: string, messageId: string): Promise<void> {
    return this.deleteOne(channelId, messageId)
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Conversation
  // ──────────────────────────────────────────────────────────────────────────

  async send(channelId: string, content: string): Promise<string> {
    return retryDiscord(async () => {
      const channel = await this.textChannel(channelId)
      const sent = await channel.send(content)
      return sent.id
    }, this.options.maxBackoffMs)
  }

  async awaitReply(channelId: string, authorId: string, timeoutMs: number): Promise<CleanupMessage | null> {
    const channel = await this.textChannel(channelId)
    const collected = await channel.awaitMessages({
      filter: (m: Message) => m.author.id === authorId,
      max: 1,
      time: timeoutMs,
    })
    const reply = collected.first()
    return reply ? toCleanupMessage(reply) : null
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Permissions and identity
  // ──────────────────────────────────────────────────────────────────────────

  async canManageMessages(channelId: string, userId: string): Promise<boolean> {
    const channel = await this.textChannel(channelId)
    if (channel.isDMBased()) {
      return false
    }
    const member = await channel.guild.members.fetch(userId)
    return member.permissionsIn(channel.id).has(PermissionFlagsBits.ManageMessages)
  }

  async resolveUserId(guildId: string, userRef: string): Promise<string> {
    const direct = parseUserIdRef(userRef)
    if (direct) {
      return direct
    }

    const guild = await this.client.guilds.fetch(guildId)
    const found = await guild.members.fetch({ query: userRef, limit: MEMBER_QUERY_LIMIT })
    return pickMember(userRef, Array.from(found.values(), m => ({
      id: m.id,
      username: m.user.username,
      globalName: m.user.globalName,
      displayName: m.displayName,
    })))
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Events
  // ──────────────────────────────────────────────────────────────────────────

  private setupEventHandlers(): void {
    this.client.on('ready', () => {
      logger.info({ user: this.client.user?.tag }, 'Discord client ready')
    })

    this.client.on('messageCreate', (message) => {
      if (message.author.bot || !this.commandHandler) {
        return
      }

      const argText = extractCleanupArgs(message.content, this.options.prefixesFor(message.guildId))
      if (argText === null) {
        return
      }

      const invocation: CleanupInvocation = {
        trigger: toCleanupMessage(message),
        guildId: message.guildId,
        authorName: message.author.username,
      }

      this.commandHandler(invocation, argText).catch((error: unknown) => {
        logger.error({ error, channelId: message.channelId, messageId: message.id }, 'Cleanup command failed')
      })
    })

    this.client.on('error', (error) => {
      logger.error({ error }, 'Discord client error')
    })
  }

  async close(): Promise<void> {
    await this.client.destroy()
    logger.info('Discord connector closed')
  }
}
