/**
 * Confirmation gate for large cleanups.
 *
 * Asks the invoking user to confirm, waits for their next message, and tidies
 * up the prompt and reply when they say yes.
 */

import type { CleanupMessage } from '../types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger({ module: 'confirmation' })

export interface ConversationPort {
  /** Send a message to the channel, resolving to the sent message's ID. */
  send(channelId: string, content: string): Promise<string>
  /** Next message in the channel from `authorId`, or null when `timeoutMs` passes first. */
  awaitReply(channelId: string, authorId: string, timeoutMs: number): Promise<CleanupMessage | null>
  deleteMessage(channelId: string, messageId: string): Promise<void>
}

export type ConfirmationOutcome = 'confirmed' | 'declined' | 'timed_out'

export interface ConfirmationRequest {
  channelId: string
  authorId: string
  count: number
  timeoutMs: number
}

export const DEFAULT_CONFIRM_THRESHOLD = 100

export function needsConfirmation(count: number, threshold: number = DEFAULT_CONFIRM_THRESHOLD): boolean {
  return count > threshold
}

export function isAffirmative(content: string): boolean {
  return content.trim().toLowerCase().startsWith('y')
}

async function removeQuietly(port: ConversationPort, channelId: string, messageId: string): Promise<void> {
  try {
    await port.deleteMessage(channelId, messageId)
  } catch (error) {
    logger.debug({ error, channelId, messageId }, 'Could not remove confirmation message')
  }
}

export async function confirmLargeDeletion(
  port: ConversationPort,
  request: ConfirmationRequest
): Promise<ConfirmationOutcome> {
  const { channelId, authorId, count, timeoutMs } = request

  const promptId = await port.send(channelId, `Are you sure you want to delete ${count} messages? (y/n)`)
  const reply = await port.awaitReply(channelId, authorId, timeoutMs)

  if (!reply) {
    logger.info({ channelId, authorId, count, timeoutMs }, 'Confirmation timed out')
    await port.send(channelId, 'Timed out waiting for confirmation. Cancelled.')
    return 'timed_out'
  }

  if (isAffirmative(reply.content)) {
    await removeQuietly(port, channelId, promptId)
    await removeQuietly(port, channelId, reply.id)
    return 'confirmed'
  }

  await port.send(channelId, 'Cancelled.')
  return 'declined'
}
