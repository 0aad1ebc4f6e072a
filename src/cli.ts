#!/usr/bin/env node
import { program, InvalidArgumentError } from 'commander'
import { fileURLToPath } from 'url'
import { realpathSync } from 'fs'
import { logger } from './utils/logger.js'
import { getPackageInfo } from './utils/package-info.js'
import { MAX_DELAY_SECONDS, closePrompts, parseInteger } from './utils/prompt.js'
import { SetupError, UserCancelledError } from './types/index.js'
import type { RunOptions } from './types/index.js'

// Get package.json for version
const __filename = fileURLToPath(import.meta.url)
const packageJson = getPackageInfo(__filename)

/**
 * commander parser for --delay: whole, non-negative seconds a timer can wait
 */
export function parseDelayOption(value: string): number {
  const parsed = parseInteger(value)
  if (parsed === null) {
    throw new InvalidArgumentError('Delay must be a whole number of seconds.')
  }
  if (parsed < 0) {
    throw new InvalidArgumentError('Delay must be non-negative.')
  }
  if (parsed > MAX_DELAY_SECONDS) {
    throw new InvalidArgumentError(`Delay must be at most ${MAX_DELAY_SECONDS} seconds.`)
  }
  return parsed
}

/**
 * Report a failed command and return the exit code to use.
 * Cancelling a prompt is a normal way out; setup problems and anything else fail.
 */
export function reportCommandError(error: unknown, context: string): number {
  if (error instanceof UserCancelledError) {
    logger.warn(error.message)
    return 0
  }

  if (error instanceof SetupError) {
    logger.error(error.message)
    for (const hint of error.hints) {
      logger.info(hint)
    }
    return 1
  }

  logger.error(`${context}: ${error instanceof Error ? error.message : 'Unknown error'}`)
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack)
  }
  return 1
}

program
  .name('wsl-tabs')
  .description(packageJson.description)
  .version(packageJson.version)
  .option('--debug', 'Enable debug output (default: based on WSL_TABS_DEBUG env var)')
  .showHelpAfterError()
  .hook('preAction', (thisCommand) => {
    // Set debug mode based on flag or environment variable
    const options = thisCommand.opts()
    const envDebug = process.env.WSL_TABS_DEBUG === 'true'
    const debugEnabled = options.debug !== undefined ? Boolean(options.debug) : envDebug
    logger.setDebug(debugEnabled)
  })

program
  .command('run', { isDefault: true })
  .description('Open each command of a command file in its own Windows Terminal tab')
  .argument('[command-file]', 'File with one command per line (prompted for when omitted)')
  .option('-d, --distro <name>', 'WSL distribution to use instead of prompting')
  .option('-u, --user <name>', 'Account inside the distribution to run as instead of prompting')
  .option('--delay <seconds>', 'Seconds to wait between launches instead of prompting', parseDelayOption)
  .option('--dry-run', 'Print what would be launched without writing scripts or opening tabs')
  .action(async (commandFile: string | undefined, options: RunOptions) => {
    try {
      const { RunCommand } = await import('./commands/run.js')
      const cmd = new RunCommand()
      const summary = await cmd.execute({ commandFile, options })
      logger.debug('Run summary:', summary)
    } catch (error) {
      process.exit(reportCommandError(error, 'Run failed'))
    } finally {
      closePrompts()
    }
  })

program
  .command('list')
  .description('List WSL distributions, or the accounts of one distribution')
  .argument('[distro]', 'Distribution whose accounts to list')
  .action(async (distro?: string) => {
    try {
      const { ListCommand } = await import('./commands/list.js')
      const cmd = new ListCommand()
      await cmd.execute({ distro })
    } catch (error) {
      process.exit(reportCommandError(error, 'Failed to list'))
    }
  })

// Parse CLI arguments (only when run directly, not when imported for testing)
// Resolve symlinks to handle npm link and global installs
const isRunDirectly = process.argv[1] && ((): boolean => {
  try {
    const scriptPath = realpathSync(process.argv[1])
    const modulePath = fileURLToPath(import.meta.url)
    return scriptPath === modulePath
  } catch {
    // If we can't resolve the path, assume we should run
    return true
  }
})()

if (isRunDirectly) {
  // Ctrl+C outside a prompt (e.g. while waiting between launches)
  process.on('SIGINT', () => {
    logger.warn('Operation cancelled by user.')
    process.exit(0)
  })

  try {
    await program.parseAsync()
  } catch (error) {
    process.exit(reportCommandError(error, 'Error'))
  }
}
