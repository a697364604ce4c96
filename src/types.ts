/**
 * Core type definitions for the cleanup bot
 */

// ============================================================================
// Messages
// ============================================================================

/** A channel message as seen by the cleanup pipeline. Read-only. */
export interface CleanupMessage {
  readonly id: string
  readonly channelId: string
  readonly authorId: string
  readonly content: string
  readonly createdAt: number  // Unix timestamp ms
  readonly pinned: boolean
}

/** A history boundary: either a concrete message or a point in time. */
export type Anchor =
  | { messageId: string }
  | { timestamp: number }

// ============================================================================
// Errors
// ============================================================================

export class DiscordError extends Error {
  constructor(message: string, public override cause?: unknown) {
    super(message)
    this.name = 'DiscordError'
  }
}

export class ConfigError extends Error {
  constructor(message: string, public override cause?: unknown) {
    super(message)
    this.name = 'ConfigError'
  }
}

export type CleanupErrorKind = 'permission_denied' | 'not_found' | 'validation'

/** Errors that abort a cleanup before any message is deleted. */
export abstract class CleanupError extends Error {
  abstract readonly kind: CleanupErrorKind
}

export class PermissionDeniedError extends CleanupError {
  readonly kind = 'permission_denied' as const

  constructor(message: string) {
    super(message)
    this.name = 'PermissionDeniedError'
  }
}

export class NotFoundError extends CleanupError {
  readonly kind = 'not_found' as const

  constructor(message: string) {
    super(message)
    this.name = 'NotFoundError'
  }
}

export class ValidationError extends CleanupError {
  readonly kind = 'validation' as const

  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/** Why a single deletion call (batch or single) failed. */
export type DeletionErrorKind = 'permission_denied' | 'not_found' | 'rate_limited' | 'platform'
