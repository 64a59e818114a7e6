#!/usr/bin/env -S node --import tsx

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import chalk from 'chalk'
import { CommanderError } from 'commander'
import { ArtifactWriter } from '../artifacts'
import { isChartError, toError } from '../errors'
import { parseChartDocument } from '../models'
import { Notifier } from '../notifications'
import { ChartRenderer } from '../render'
import { ChartRequestServer } from '../server'
import { ZmqTransport } from '../transport'
import logger, { setLogLevel } from '../utils/logger'
import { logLevelFor, parseArgs, type CliArgs } from './args-parser'
import {
  applyConfigOverrides,
  ConfigLoadError,
  ConfigValidationError,
  createDefaultServiceConfig,
  loadServiceConfig,
  type ChartServiceConfig
} from './config-loader'

/**
 * Resolves the effective configuration: file first, then command-line overrides.
 * Without a file, a directory given on the command line is enough.
 */
async function resolveConfig(args: CliArgs): Promise<ChartServiceConfig> {
  const overrides = {
    directory: args.directory,
    endpoint: args.endpoint,
    identity: args.identity,
    notify: args.notify
  }

  if (!existsSync(args.config) && args.directory) {
    return applyConfigOverrides(createDefaultServiceConfig(args.directory), overrides)
  }

  return applyConfigOverrides(await loadServiceConfig(args.config), overrides)
}

/**
 * Renders a single request file and exits
 */
async function renderOnce(config: ChartServiceConfig, file: string): Promise<void> {
  const request = parseChartDocument(await readFile(file))
  const writer = new ArtifactWriter(config.charts.directory, logger)
  const renderer = new ChartRenderer({ writer, logger })

  const result = await renderer.render(request, { file })
  console.log(chalk.green(`Chart saved to ${result.artifact.path}`))
  console.log(`  Candles: ${request.candles.length}`)
  console.log(`  Layers: ${result.layers.join(', ')}`)
  console.log(`  Duration: ${result.durationMs}ms`)
}

/**
 * Runs the message loop until SIGINT or SIGTERM
 */
async function serve(config: ChartServiceConfig): Promise<void> {
  const transport = new ZmqTransport(config.transport, logger)
  const writer = new ArtifactWriter(config.charts.directory, logger)
  const renderer = new ChartRenderer({ writer, logger })
  const notifier = new Notifier(transport, config.notifications, logger)
  const server = new ChartRequestServer(config.transport, { renderer, notifier, transport, logger })

  console.log(chalk.cyan('Chart renderer\n'))
  console.log(`  ${chalk.yellow('Endpoint:')}      ${config.transport.endpoint}`)
  console.log(`  ${chalk.yellow('Identity:')}      ${config.transport.identity}`)
  console.log(`  ${chalk.yellow('Output:')}        ${config.charts.directory}`)
  console.log(`  ${chalk.yellow('Notifications:')} ${config.notifications.enabled ? config.notifications.destination : 'disabled'}\n`)

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`)
    server.stop().then(
      () => {
        const stats = server.getStats()
        logger.info('Server stopped', { received: stats.received, rendered: stats.rendered, failed: stats.failed })
      },
      (error: unknown) => {
        logger.error(`Error during shutdown: ${toError(error).message}`)
        process.exitCode = 1
      }
    )
  }

  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))

  await server.start()
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  let args: CliArgs
  try {
    args = parseArgs(process.argv)
  } catch (error) {
    // --help and --version also end up here
    if (error instanceof CommanderError) {
      process.exit(error.exitCode)
    }
    throw error
  }

  const level = logLevelFor(args.verbose)
  if (level) {
    setLogLevel(level)
  }

  let config: ChartServiceConfig
  try {
    config = await resolveConfig(args)
  } catch (error) {
    if (error instanceof ConfigLoadError || error instanceof ConfigValidationError) {
      console.error(chalk.red(error.message))
      console.error('\nCreate a chart-renderer.json file, specify one with -c or pass an output directory with -d')
      console.error('\nExample chart-renderer.json:')
      console.error(JSON.stringify(createDefaultServiceConfig('./charts'), null, 2))
      process.exit(1)
    }
    throw error
  }

  try {
    if (args.render) {
      await renderOnce(config, args.render)
    } else {
      await serve(config)
    }
  } catch (error) {
    const failure = toError(error)
    console.error(chalk.red(`Fatal error: ${failure.message}`))
    if (isChartError(failure)) {
      console.error(chalk.gray(`  code: ${failure.code}`))
    }
    process.exit(1)
  }
}

// Export the main function for testing
export { main }

main().catch((error: unknown) => {
  console.error('Unhandled error:', error)
  process.exit(1)
})
