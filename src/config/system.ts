/**
 * Config System
 *
 * Loads cleanup settings from an optional JSON file, layers environment
 * overrides on top, and validates the merged result.
 */

import { existsSync, readFileSync } from 'fs'
import { z } from 'zod'
import { ConfigError } from '../types.js'
import { logger } from '../utils/logger.js'

const positiveInt = z.number().int().positive()

export const cleanupConfigSchema = z.object({
  defaultPrefixes: z.array(z.string()).refine(p => p.some(x => x.length > 0), 'needs at least one non-empty prefix').default(['!']),
  guildPrefixes: z.record(z.array(z.string())).default({}),
  knownCommands: z.array(z.string().min(1)).default([]),
  confirmThreshold: positiveInt.default(100),
  confirmTimeoutMs: positiveInt.default(60_000),
  bulkBatchLimit: z.number().int().min(2).max(100).default(100),
  sequentialDelayMs: z.number().int().nonnegative().default(1100),
  maxAgeDays: z.number().positive().max(14).default(14),
  safetyMarginMinutes: z.number().nonnegative().default(5),
  maxBackoffMs: positiveInt.default(32_000),
})

export type CleanupConfig = z.infer<typeof cleanupConfigSchema>

/** Environment variables that override file settings */
export type ConfigEnv = Partial<Record<
  'CLEANUP_CONFIRM_THRESHOLD' | 'CLEANUP_CONFIRM_TIMEOUT_MS' | 'CLEANUP_SEQUENTIAL_DELAY_MS' | 'CLEANUP_PREFIXES',
  string
>>

function parseIntEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got '${value}'`)
  }
  return parsed
}

export class ConfigSystem {
  constructor(private configPath: string) {}

  /** Read the config file (if present) and merge env overrides. */
  load(env: ConfigEnv = process.env): CleanupConfig {
    let raw: unknown = {}

    if (existsSync(this.configPath)) {
      try {
        raw = JSON.parse(readFileSync(this.configPath, 'utf-8'))
      } catch (error) {
        throw new ConfigError(`Could not read config file: ${this.configPath}`, error)
      }
      logger.debug({ configPath: this.configPath }, 'Loaded config file')
    } else {
      logger.info({ configPath: this.configPath }, 'No config file found, using defaults')
    }

    return ConfigSystem.parse(raw, env)
  }

  static parse(raw: unknown, env: ConfigEnv = {}): CleanupConfig {
    const result = cleanupConfigSchema.safeParse(ConfigSystem.applyEnv(raw, env))
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
      throw new ConfigError(`Invalid config: ${issues}`, result.error)
    }
    return result.data
  }

  /** Overlay env values on the raw file contents, before validation. */
  private static applyEnv(raw: unknown, env: ConfigEnv): unknown {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      return raw
    }
    const merged: Record<string, unknown> = { ...raw }

    const threshold = parseIntEnv('CLEANUP_CONFIRM_THRESHOLD', env.CLEANUP_CONFIRM_THRESHOLD)
    if (threshold !== undefined) merged.confirmThreshold = threshold

    const timeout = parseIntEnv('CLEANUP_CONFIRM_TIMEOUT_MS', env.CLEANUP_CONFIRM_TIMEOUT_MS)
    if (timeout !== undefined) merged.confirmTimeoutMs = timeout

    const delay = parseIntEnv('CLEANUP_SEQUENTIAL_DELAY_MS', env.CLEANUP_SEQUENTIAL_DELAY_MS)
    if (delay !== undefined) merged.sequentialDelayMs = delay

    if (env.CLEANUP_PREFIXES) {
      merged.defaultPrefixes = env.CLEANUP_PREFIXES.split(',').map(p => p.trim()).filter(p => p.length > 0)
    }

    return merged
  }

  /** Invocation prefixes for a guild. Empty prefixes are dropped. */
  static prefixesFor(config: CleanupConfig, guildId: string | null): string[] {
    const prefixes = (guildId && config.guildPrefixes[guildId]) || config.defaultPrefixes
    return prefixes.filter(p => p.length > 0)
  }
}
