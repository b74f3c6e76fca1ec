/**
 * pkgshelf proxy CLI
 */

import { toError } from '@pkgshelf/api'
import { createLogger } from '@pkgshelf/shared'
import { Command } from 'commander'
import { DEFAULT_CONFIG_PATH } from './config'
import { startServer } from './startup'

const program = new Command()

program
  .name('pkgshelf-proxy')
  .description('Serve static files and cache versioned unpkg assets on disk')
  .option('-c, --config <path>', 'path to the JSON config file', DEFAULT_CONFIG_PATH)
  .action(async (options: { config: string }) => {
    await startServer({ path: options.config })
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  const err = toError(error)
  createLogger('pkgshelf').error('Failed to start', {
    error: err.message,
  })
  process.exitCode = 1
})
