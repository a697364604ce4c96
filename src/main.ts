/**
 * Channel Cleanup Bot
 * Main entry point
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import { ConfigSystem } from './config/system.js'
import { DiscordConnector } from './discord/connector.js'
import { CleanupService } from './cleanup/service.js'
import { CommandRegistry } from './cleanup/commands.js'
import { logger } from './utils/logger.js'

async function main() {
  try {
    logger.info('Starting cleanup bot')

    const configPath = process.env.CONFIG_PATH || './config/cleanup.json'
    const tokenFilePath = process.env.DISCORD_TOKEN_FILE
      ? join(process.cwd(), process.env.DISCORD_TOKEN_FILE)
      : join(process.cwd(), 'discord_token')

    const config = new ConfigSystem(configPath).load()

    // Read Discord token from file
    let discordToken: string

    try {
      discordToken = readFileSync(tokenFilePath, 'utf-8').trim()
      logger.info({ tokenFile: tokenFilePath }, 'Discord token loaded from file')
    } catch (error) {
      logger.error({ error, tokenFile: tokenFilePath }, 'Failed to read discord_token file')
      throw new Error(`Could not read token file: ${tokenFilePath}. Please create it with your bot token.`)
    }

    if (!discordToken) {
      throw new Error('discord_token file is empty')
    }

    logger.info({
      configPath,
      prefixes: config.defaultPrefixes,
      confirmThreshold: config.confirmThreshold,
    }, 'Configuration loaded')

    const connector = new DiscordConnector({
      token: discordToken,
      maxBackoffMs: config.maxBackoffMs,
      prefixesFor: guildId => ConfigSystem.prefixesFor(config, guildId),
    })

    const service = new CleanupService({
      platform: connector,
      registry: new CommandRegistry(config.knownCommands),
      config,
    })

    connector.onCleanupCommand((invocation, argText) => service.handle(invocation, argText))

    await connector.start()

    // Handle shutdown
    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Shutting down')
      await connector.close()
      process.exit(0)
    }

    process.on('SIGINT', () => void shutdown('SIGINT'))
    process.on('SIGTERM', () => void shutdown('SIGTERM'))

  } catch (error) {
    logger.fatal({ error }, 'Fatal error')
    process.exit(1)
  }
}

// Run
main().catch((error) => {
  console.error('Unhandled error:', error)
  process.exit(1)
})
